#!/usr/bin/env node
/**
 * metadatad - CLI entry point
 *
 * Usage:
 *   metadatad [--config <path>] [--host <host>] [--port <port>] [--threads <n>] [--verbose]
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createProgram, runAgent } from './cli/program.js';
import { formatError } from './core/errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')));

const program = createProgram(async (options) => {
  await runAgent(options);
}, packageJson.version);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${formatError(error)}`);
  process.exit(1);
});
