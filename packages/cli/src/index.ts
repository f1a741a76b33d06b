// @property-tracker/cli
// Interactive front end for the property tracker.

export { runCli, createDefaultDependencies, EXIT_OK, EXIT_FATAL, EXIT_USAGE } from './app.js';
export type { CliDependencies } from './app.js';
export { loadConfig, ConfigurationError, DEFAULT_SPREADSHEET_NAME } from './config.js';
export type { AppConfig, ConfigOverrides, LoadConfigOptions } from './config.js';
export { parseCliArgs, USAGE } from './args.js';
export type { CliArgs } from './args.js';
export { createReadlinePrompter, createScriptedPrompter, PromptClosedError } from './prompts.js';
export type { Prompter } from './prompts.js';
export { runInteractiveSession } from './session.js';
