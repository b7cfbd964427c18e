#!/usr/bin/env -S npx tsx
/**
 * rkv entry point.
 *
 * Usage:
 *   REMOTE_KV_URL=http://localhost:8080/db rkv get greeting
 *   echo hello | rkv --url http://localhost:8080/db set greeting
 */

import { CommanderError } from 'commander';
import { createCLI } from './index.js';

createCLI()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }
    console.error('Fatal error:', error);
    process.exit(1);
  });
