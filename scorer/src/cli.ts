#!/usr/bin/env node

/**
 * CLI entry point for the quality gate
 * Reads an evaluation request as JSON from stdin, outputs the report to stdout
 */

import 'dotenv/config';
import { stdin, stdout, stderr } from 'process';

import { evaluateRequest } from './combined.js';
import { loadConfigFromEnv } from './config.js';
import { EvaluationRequestSchema } from './schema.js';

async function main(): Promise<void> {
  let inputData = '';

  // Read JSON from stdin
  for await (const chunk of stdin) {
    inputData += chunk;
  }

  try {
    const request = EvaluationRequestSchema.parse(JSON.parse(inputData));
    const result = evaluateRequest(request, loadConfigFromEnv());

    stdout.write(JSON.stringify(result, null, 2));
    stdout.write('\n');

    process.exit(0);
  } catch (error) {
    // Output error as JSON to stderr
    const errorOutput = {
      error: error instanceof Error ? error.message : 'Unknown error',
      stack: error instanceof Error ? error.stack : undefined,
      type: error instanceof Error ? error.constructor.name : 'UnknownError',
    };

    stderr.write(JSON.stringify(errorOutput, null, 2));
    stderr.write('\n');

    process.exit(1);
  }
}

main().catch((error: unknown) => {
  stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
