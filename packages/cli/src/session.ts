// Interactive menu loop

import { RuntimeError, loadRecords } from '@property-tracker/runtime';
import { runAnalyzeCommand, runAppendCommand, printCoverage } from './commands/index.js';
import { PromptClosedError } from './prompts.js';
import type { CliContext } from './context.js';

type MenuEntry = {
  key: string;
  label: string;
  run?: (ctx: CliContext) => Promise<void>;
};

const MENU: MenuEntry[] = [
  { key: '1', label: 'Add data for the next quarter', run: runAppendCommand },
  { key: '2', label: 'Analyse a range of quarters', run: runAnalyzeCommand },
  {
    key: '3',
    label: 'Show available quarters',
    run: async (ctx) => {
      printCoverage(ctx, await loadRecords(ctx.source, { logger: ctx.logger }));
    },
  },
  { key: '4', label: 'Exit' },
];

/**
 * Run one command, reporting recoverable errors instead of throwing them.
 * DataSourceError and anything unexpected propagate.
 *
 * @returns false if the command failed with a recoverable error
 */
export async function runCommand(
  ctx: CliContext,
  command: (ctx: CliContext) => Promise<void>
): Promise<boolean> {
  try {
    await command(ctx);
    return true;
  } catch (error) {
    if (error instanceof RuntimeError) {
      ctx.logger.debug('Command failed', { code: error.code });
      ctx.print(`Error: ${error.message}`);
      return false;
    }
    throw error;
  }
}

/**
 * Show the menu until the operator exits or input ends.
 */
export async function runInteractiveSession(ctx: CliContext): Promise<void> {
  try {
    for (;;) {
      ctx.print('');
      ctx.print('Property Tracker');
      for (const entry of MENU) {
        ctx.print(`  ${entry.key}. ${entry.label}`);
      }

      const choice = (await ctx.prompter.ask('Choose an option: ')).trim();
      const entry = MENU.find((e) => e.key === choice);

      if (!entry) {
        ctx.print(`Unknown option "${choice}". Enter 1-${MENU.length}.`);
        continue;
      }
      if (!entry.run) {
        ctx.print('Goodbye.');
        return;
      }
      await runCommand(ctx, entry.run);
    }
  } catch (error) {
    if (error instanceof PromptClosedError) {
      ctx.logger.debug('Input closed, ending session');
      return;
    }
    throw error;
  } finally {
    ctx.prompter.close();
  }
}
