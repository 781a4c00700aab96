#!/usr/bin/env node

/**
 * Command-line entry point.
 *
 * Parses flags, creates the output directory, validates the job request and
 * runs it. Progress goes to stderr; the downloaded artifact is printed to
 * stdout as JSON.
 *
 * Usage:
 *   slicer -j J2807 -r 3:146142335-146301179 -p CEU
 *   slicer -j J2807 --open --timeout 600
 */

import { mkdirSync } from 'fs';
import { join, resolve, dirname, sep } from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { USAGE, parseCliArgs } from './cli-args.js';
import { loadSettings } from './config.js';
import { describeError, exitCodeFor } from './errors.js';
import { createJobRequest } from './job-request.js';
import { createLogger } from './logger.js';
import { runSlicerJob } from './runner.js';

// src/cli.ts or dist/src/cli.js -> package root
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const PLUGIN_ROOT = resolve(__dirname, __dirname.includes(`${sep}dist${sep}`) ? '../..' : '..');

// Load .env from the package root
dotenv.config({ path: join(PLUGIN_ROOT, '.env') });

async function main(): Promise<number> {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  const settings = loadSettings();
  const log = createLogger('slicer', settings.logLevel);
  const request = createJobRequest(command.input);

  mkdirSync(request.outputDir, { recursive: true });

  const controller = new AbortController();
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      log.warn('Interrupted, closing the browser...');
      controller.abort();
    });
  }

  const artifact = await runSlicerJob(request, { settings, signal: controller.signal, logger: log });
  console.log(JSON.stringify(artifact, null, 2));
  log.info('Completed.');
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error(`[slicer] ${describeError(err)}`);
    process.exit(exitCodeFor(err));
  });
