import type { ExportWriter, RecordSource } from '@property-tracker/repositories';
import type { Logger } from '@property-tracker/runtime';
import type { Prompter } from './prompts.js';

/**
 * Everything a command needs, built once per run.
 */
export type CliContext = {
  source: RecordSource;
  writer: ExportWriter;
  prompter: Prompter;
  logger: Logger;
  /** Terminal output for the operator (separate from logging) */
  print: (text: string) => void;
};
