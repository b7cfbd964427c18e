/**
 * Transport Invoker
 *
 * Sends one JSON request to one endpoint and decodes one reply. Every other
 * part of the client talks to the server through {@link HttpInvoker.invoke},
 * which sorts failures into transport, protocol and domain errors. Nothing is
 * retried here; retry policy belongs to the fetch implementation or the caller.
 *
 * @packageDocumentation
 */

import {
  parseResponse,
  type EndpointPath,
  type EndpointRequest,
  type EndpointResponse,
} from '@remote-kv/shared-types';
import { operationUrl, validateTimeout, type DatabaseEndpoint, type ResolvedClientConfig } from './config.js';
import {
  CancelledError,
  ClientClosedError,
  DomainError,
  HttpStatusError,
  KVError,
  NetworkError,
  ProtocolError,
  TimeoutError,
  toError,
  type ErrorContext,
} from './errors.js';
import type { StructuredLogger } from './logging.js';
import type { CallOptions } from './types.js';

const JSON_MEDIA_TYPE = 'application/json';

/**
 * Shared by a client and every handle it creates.
 */
export class HttpInvoker {
  private closed = false;
  private readonly logger: StructuredLogger;

  constructor(private readonly config: ResolvedClientConfig) {
    this.logger = config.logger.child({ component: 'transport' });
  }

  get endpoint(): DatabaseEndpoint {
    return this.config.endpoint;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Fresh id for a session or cursor.
   */
  generateId(): string {
    return this.config.generateId();
  }

  /**
   * Refuse further calls. In-flight calls are not interrupted.
   */
  close(): void {
    this.closed = true;
  }

  /**
   * POST `request` to `path` and decode the reply.
   *
   * @throws {ClientClosedError} after {@link close}
   * @throws {CancelledError} when `options.signal` aborts
   * @throws {TimeoutError} when the call outlives its timeout
   * @throws {NetworkError} when the exchange fails otherwise
   * @throws {HttpStatusError} for a non-2xx status
   * @throws {ProtocolError} when the body does not decode
   * @throws {DomainError} when the reply carries an error text
   */
  async invoke<P extends EndpointPath>(
    path: P,
    request: EndpointRequest<P>,
    options: CallOptions = {},
    context: ErrorContext = {}
  ): Promise<EndpointResponse<P>> {
    const errorContext: ErrorContext = { path, ...context };
    const started = performance.now();

    try {
      const response = await this.send(path, request, options, errorContext);
      this.logger.debug('kv call', {
        ...errorContext,
        elapsedMs: Math.round(performance.now() - started),
      });
      return response;
    } catch (error) {
      this.logger.debug('kv call failed', {
        ...errorContext,
        code: error instanceof KVError ? error.code : undefined,
        elapsedMs: Math.round(performance.now() - started),
      });
      throw error;
    }
  }

  private async send<P extends EndpointPath>(
    path: P,
    request: EndpointRequest<P>,
    options: CallOptions,
    context: ErrorContext
  ): Promise<EndpointResponse<P>> {
    if (this.closed) {
      throw new ClientClosedError({ context });
    }
    if (options.signal?.aborted) {
      throw new CancelledError({ cause: options.signal.reason, context });
    }

    const url = operationUrl(this.config.endpoint, path);
    const timeout = options.timeout === undefined ? this.config.timeout : validateTimeout(options.timeout);
    const body = await this.exchange(url, JSON.stringify(request), timeout, options.signal, context);

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new ProtocolError(`invalid JSON in reply from ${path}`, body, { cause: error, context });
    }

    const parsed = parseResponse(path, json);
    if (!parsed.success) {
      throw new ProtocolError(`unexpected reply from ${path}: ${parsed.issues}`, body, { context });
    }
    if (parsed.data.Error.length > 0) {
      throw new DomainError(parsed.data.Error, { context });
    }
    return parsed.data;
  }

  /**
   * One HTTP round trip, returning the body text of a 2xx reply.
   */
  private async exchange(
    url: string,
    body: string,
    timeout: number,
    signal: AbortSignal | undefined,
    context: ErrorContext
  ): Promise<string> {
    const controller = new AbortController();
    let timedOut = false;
    const timer =
      timeout > 0
        ? setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, timeout)
        : undefined;
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.config.fetch(url, {
        method: 'POST',
        headers: {
          ...this.config.headers,
          'content-type': JSON_MEDIA_TYPE,
          accept: JSON_MEDIA_TYPE,
        },
        body,
        signal: controller.signal,
      });
      if (!response.ok) {
        await this.releaseBody(response, context);
        throw new HttpStatusError(response.status, url, { context });
      }
      return await response.text();
    } catch (error) {
      if (error instanceof KVError) {
        throw error;
      }
      if (signal?.aborted) {
        throw new CancelledError({ cause: error, context });
      }
      if (timedOut) {
        throw new TimeoutError(timeout, { cause: error, context });
      }
      throw new NetworkError(`request to ${url} failed: ${toError(error).message}`, { cause: error, context });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Cancel an unread reply body so its connection goes back to the pool.
   */
  private async releaseBody(response: Response, context: ErrorContext): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.logger.debug('reply body cancel failed', { ...context, reason: toError(error).message });
    }
  }
}
