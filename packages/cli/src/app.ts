// CLI application: wires configuration, adapters and commands, and decides the exit code.
//
// Recoverable errors (bad input, bad range, too little data) are reported and
// the session carries on. Configuration and data source failures are fatal.

import {
  DataSourceError,
  createFilesystemExportWriter,
  sheets,
} from '@property-tracker/repositories';
import type { ExportWriter, RecordSource } from '@property-tracker/repositories';
import { RuntimeError, consoleLogger, createLevelLogger } from '@property-tracker/runtime';
import type { Logger } from '@property-tracker/runtime';
import { USAGE, parseCliArgs } from './args.js';
import { ConfigurationError, loadConfig } from './config.js';
import type { AppConfig, LoadConfigOptions } from './config.js';
import { createReadlinePrompter } from './prompts.js';
import type { Prompter } from './prompts.js';
import { runAnalysisOnce } from './commands/index.js';
import { runInteractiveSession } from './session.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

export type CliDependencies = {
  env: Record<string, string | undefined>;
  print: (text: string) => void;
  createPrompter: () => Prompter;
  createSource: (config: AppConfig) => RecordSource;
  createWriter: (config: AppConfig) => ExportWriter;
  /** Replaces the level-filtered console logger */
  logger?: Logger;
  configOptions?: LoadConfigOptions;
};

export function createDefaultDependencies(): CliDependencies {
  return {
    env: process.env,
    print: (text) => console.log(text),
    createPrompter: createReadlinePrompter,
    createSource: (config) =>
      sheets.createSheetsRecordSource(
        sheets.createGoogleSheetsApi({ credentialsPath: config.credentialsPath }),
        config.spreadsheet
      ),
    createWriter: (config) => createFilesystemExportWriter(config.exportDir),
  };
}

/**
 * Run the CLI and return the process exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.help) {
    deps.print(USAGE);
    return EXIT_OK;
  }

  let config: AppConfig;
  try {
    config = loadConfig(deps.env, args.overrides, deps.configOptions);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      (deps.logger ?? consoleLogger).error(error.message);
      return EXIT_FATAL;
    }
    throw error;
  }

  const logger = deps.logger ?? createLevelLogger(config.logLevel);
  logger.debug('Configuration loaded', {
    spreadsheet: 'id' in config.spreadsheet ? config.spreadsheet.id : config.spreadsheet.name,
    exportDir: config.exportDir,
  });

  const ctx = {
    source: deps.createSource(config),
    writer: deps.createWriter(config),
    logger,
    print: deps.print,
  };

  try {
    if (args.analysis) {
      try {
        await runAnalysisOnce(ctx, args.analysis);
        return EXIT_OK;
      } catch (error) {
        if (error instanceof RuntimeError) {
          deps.print(`Error: ${error.message}`);
          return EXIT_USAGE;
        }
        throw error;
      }
    }

    await runInteractiveSession({ ...ctx, prompter: deps.createPrompter() });
    return EXIT_OK;
  } catch (error) {
    if (error instanceof DataSourceError) {
      logger.error(error.message, { operation: error.operation });
      return EXIT_FATAL;
    }
    throw error;
  }
}
