// Append command - adds the next quarter's prices to the sheet

import { REGIONS, formatPeriod } from '@property-tracker/protocol';
import type { YearQuarter } from '@property-tracker/protocol';
import {
  appendNextRecord,
  loadRecords,
  parsePriceInput,
  parseQuarterInput,
  parseYearInput,
  parseYesNo,
  periodToAppend,
} from '@property-tracker/runtime';
import type { RawRegionValues } from '@property-tracker/runtime';
import { askUntilValid } from '../prompts.js';
import type { CliContext } from '../context.js';

export async function runAppendCommand(ctx: CliContext): Promise<void> {
  const records = await loadRecords(ctx.source, { logger: ctx.logger });

  let firstPeriod: YearQuarter | undefined;
  if (records.length === 0) {
    ctx.print('The sheet has no data yet. Enter the first quarter to record.');
    const year = await askUntilValid(ctx.prompter, 'Year: ', parseYearInput, ctx.print);
    const quarter = await askUntilValid(ctx.prompter, 'Quarter (1-4): ', parseQuarterInput, ctx.print);
    firstPeriod = { year, quarter };
  }

  const period = periodToAppend(records, firstPeriod);
  ctx.print(`Adding prices for ${formatPeriod(period)}.`);

  const values: RawRegionValues = {};
  for (const region of REGIONS) {
    values[region] = await askUntilValid(
      ctx.prompter,
      `${region}: `,
      (raw) => parsePriceInput(raw, region),
      ctx.print
    );
  }

  const confirmed = await askUntilValid(
    ctx.prompter,
    `Save ${formatPeriod(period)} to the sheet? (y/n): `,
    parseYesNo,
    ctx.print
  );
  if (!confirmed) {
    ctx.print('Nothing saved.');
    return;
  }

  const record = await appendNextRecord(ctx.source, records, values, {
    firstPeriod,
    logger: ctx.logger,
  });
  ctx.print(`Saved ${formatPeriod(record)}.`);
}
