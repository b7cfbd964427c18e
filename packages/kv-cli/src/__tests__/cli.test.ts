import { describe, it, expect } from 'vitest';
import { CommanderError } from 'commander';
import { createMemoryServer, type MemoryServer } from '@remote-kv/client/testing';
import { createCLI } from '../index.js';

async function* noInput(): AsyncGenerator<string> {
  // empty stdin
}

async function* input(...chunks: string[]): AsyncGenerator<string> {
  for (const chunk of chunks) {
    yield chunk;
  }
}

interface Harness {
  server: MemoryServer;
  out: string[];
  err: string[];
  exitCode(): number;
  run(args: string[], stdin?: AsyncIterable<string>): Promise<void>;
}

function harness(env: Record<string, string> = { REMOTE_KV_URL: 'http://kv.test' }, basePath = ''): Harness {
  const server = createMemoryServer({ basePath });
  const out: string[] = [];
  const err: string[] = [];
  let exitCode = 0;
  return {
    server,
    out,
    err,
    exitCode: () => exitCode,
    run: async (args, stdin = noInput()) => {
      await createCLI({
        fetch: server.fetch,
        env,
        stdin,
        stdout: (line) => out.push(line),
        stderr: (line) => err.push(line),
        setExitCode: (code) => {
          exitCode = code;
        },
      }).parseAsync(args, { from: 'user' });
    },
  };
}

describe('rkv CLI', () => {
  it('should create the program with its commands', () => {
    const program = createCLI();

    expect(program.name()).toBe('rkv');
    expect(program.commands.map((cmd) => cmd.name())).toEqual(['get', 'set', 'delete', 'list']);
    expect(program.version()).toBe('0.1.0');
  });

  describe('set / get / delete', () => {
    it('stores a value and prints it back', async () => {
      const h = harness();

      await h.run(['set', 'greeting', 'hello']);
      await h.run(['get', 'greeting']);

      expect(h.out).toEqual(['hello']);
      expect(h.err).toEqual([]);
      expect(h.exitCode()).toBe(0);
      expect(h.server.committedText('greeting')).toBe('hello');
    });

    it('reads the value from stdin when it is omitted', async () => {
      const h = harness();

      await h.run(['set', 'note'], input('from ', 'stdin'));

      expect(h.server.committedText('note')).toBe('from stdin');
    });

    it('deletes a key in a committed transaction', async () => {
      const h = harness();
      h.server.seed({ gone: 'soon' });

      await h.run(['delete', 'gone']);

      expect(h.server.committedText('gone')).toBeUndefined();
      expect(h.server.callsTo('/tx/commit')).toBe(1);
    });

    it('reports a missing key and sets the exit code', async () => {
      const h = harness();

      await h.run(['get', 'missing']);

      expect(h.out).toEqual([]);
      expect(h.err).toEqual(['Error: key not found']);
      expect(h.exitCode()).toBe(1);
      expect(h.server.openSnapshots).toBe(0);
    });

    it('reports transport failures', async () => {
      const h = harness();
      h.server.failNext(500);

      await h.run(['get', 'k']);

      expect(h.err).toEqual(['Error: received non-ok http status 500 from http://kv.test/new-snapshot']);
      expect(h.exitCode()).toBe(1);
    });
  });

  describe('list', () => {
    const seeded = (): Harness => {
      const h = harness();
      h.server.seed({ a: '1', b: '2', c: '3', d: '4' });
      return h;
    };

    it('scans everything without bounds', async () => {
      const h = seeded();

      await h.run(['list']);

      expect(h.out).toEqual(['a\t1', 'b\t2', 'c\t3', 'd\t4']);
      expect(h.server.callsTo('/snap/scan')).toBe(1);
      expect(h.server.openSnapshots).toBe(0);
    });

    it('ascends over a range', async () => {
      const h = seeded();

      await h.run(['list', '--begin', 'b', '--end', 'd']);

      expect(h.out).toEqual(['b\t2', 'c\t3']);
      expect(h.server.callsTo('/snap/ascend')).toBe(1);
    });

    it('descends with --reverse and stops at --limit', async () => {
      const h = seeded();

      await h.run(['list', '--reverse', '--limit', '2']);

      expect(h.out).toEqual(['d\t4', 'c\t3']);
      expect(h.server.callsTo('/snap/descend')).toBe(1);
      expect(h.server.callsTo('/it/next')).toBe(2);
    });

    it('prints JSON lines', async () => {
      const h = seeded();

      await h.run(['list', '--json', '-n', '1']);

      expect(h.out).toEqual(['{"key":"a","value":"1"}']);
    });

    it('rejects a limit that is not a number', async () => {
      const h = seeded();

      const error = await h.run(['list', '--limit', 'x']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CommanderError);
      expect(error).toMatchObject({ code: 'commander.invalidArgument' });
      expect(h.server.requests).toHaveLength(0);
    });
  });

  describe('global options', () => {
    it('requires a database url', async () => {
      const h = harness({});

      await h.run(['get', 'k']);

      expect(h.err).toEqual(['Error: no database url: pass --url or set REMOTE_KV_URL']);
      expect(h.exitCode()).toBe(1);
    });

    it('prefers --url over the environment', async () => {
      const h = harness({ REMOTE_KV_URL: 'http://elsewhere.test' }, '/db');
      h.server.seed({ k: 'v' });

      await h.run(['--url', 'http://kv.test/db', 'get', 'k']);

      expect(h.out).toEqual(['v']);
      expect(h.server.requests[0].path).toBe('/new-snapshot');
    });

    it('sends the token as a bearer header', async () => {
      const h = harness();

      await h.run(['--token', 'test-secret', 'set', 'k', 'v']);

      expect(h.server.requests.every((request) => request.headers.authorization === 'Bearer test-secret')).toBe(true);
    });

    it('logs each request to stderr with --verbose', async () => {
      const h = harness();
      h.server.seed({ k: 'v' });

      await h.run(['--verbose', 'get', 'k']);

      expect(h.out).toEqual(['v']);
      expect(
        h.err.some((line) => line.startsWith('[DEBUG] kv call {"component":"transport","path":"/new-snapshot"'))
      ).toBe(true);
      expect(h.err.some((line) => line.startsWith('[DEBUG] snapshot started {"component":"client"'))).toBe(true);
    });
  });
});
