#!/usr/bin/env tsx
// Entry point: property-tracker

import 'dotenv/config';
import { consoleLogger } from '@property-tracker/runtime';
import { EXIT_FATAL, createDefaultDependencies, runCli } from './app.js';

runCli(process.argv.slice(2), createDefaultDependencies()).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    consoleLogger.error('Unexpected failure', {
      error: error instanceof Error ? error.stack ?? error.message : String(error),
    });
    process.exitCode = EXIT_FATAL;
  }
);
