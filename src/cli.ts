#!/usr/bin/env node

/**
 * CLI entry point for the scorer
 * Reads a report submission as JSON from stdin, outputs the outcome to stdout
 */

import 'dotenv/config';
import { stdin, stdout, stderr } from 'process';
import { loadSettingsFromEnv } from './config.js';
import { createLogger } from './logger.js';
import { analyzeSubmission } from './pipeline.js';

async function main(): Promise<void> {
  let inputData = '';

  // Read JSON from stdin
  for await (const chunk of stdin) {
    inputData += chunk;
  }

  try {
    const settings = loadSettingsFromEnv();
    const logger = createLogger(settings.logLevel);

    // Parse input
    const input: unknown = JSON.parse(inputData);

    // Score the report
    const outcome = await analyzeSubmission(input, { config: settings.overrides, logger });

    // Output result as JSON
    stdout.write(JSON.stringify(outcome, null, 2));
    stdout.write('\n');

    process.exitCode = 0;
  } catch (error) {
    // Output error as JSON to stderr
    const errorOutput = {
      error: error instanceof Error ? error.message : 'Unknown error',
      code: error instanceof Error && 'code' in error ? error.code : undefined,
      type: error instanceof Error ? error.constructor.name : 'UnknownError',
    };

    stderr.write(JSON.stringify(errorOutput, null, 2));
    stderr.write('\n');

    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
  process.exitCode = 1;
});
