import type { Queryable } from '../db.js';
import { outputMissing } from '../errors.js';
import { fetchSalesRecords } from '../services/sales-source.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { avgWeeklySalesPerMonth } from './aggregate.js';
import { extract } from './extract.js';
import { load } from './load.js';
import { transform } from './transform.js';
import { validation } from './validate.js';

export { avgWeeklySalesPerMonth } from './aggregate.js';
export { extract, mergeRecords } from './extract.js';
export { load } from './load.js';
export { transform } from './transform.js';
export { validation } from './validate.js';

export type PipelineOptions = {
  salesTable: string;
  supplementPath: string;
  cleanDataPath: string;
  aggDataPath: string;
};

export type PipelineDeps = {
  db: Queryable;
  logger?: Logger;
};

export type PipelineSummary = {
  salesRows: number;
  mergedRows: number;
  cleanedRows: number;
  unparsedDates: number;
  months: number;
  cleanDataPath: string;
  aggDataPath: string;
  validated: {
    cleanData: boolean;
    aggData: boolean;
  };
};

export async function runPipeline(options: PipelineOptions, deps: PipelineDeps): Promise<PipelineSummary> {
  const log = deps.logger ?? consoleLogger;

  log('info', `Reading sales rows from ${options.salesTable}`);
  const salesRows = await fetchSalesRecords(deps.db, options.salesTable);

  log('info', `Merging ${salesRows.length} sales rows with ${options.supplementPath}`);
  const merged = await extract(salesRows, options.supplementPath);

  const cleaned = transform(merged);
  const unparsedDates = cleaned.filter((row) => row.Month === null).length;
  log('info', `Kept ${cleaned.length} of ${merged.length} merged rows after cleaning`);
  if (unparsedDates > 0) {
    log('warn', `${unparsedDates} cleaned rows have an unreadable date and are grouped under an empty month`);
  }

  const aggregate = avgWeeklySalesPerMonth(cleaned);
  log('info', `Computed average weekly sales for ${aggregate.length} months`);

  await load(cleaned, aggregate, options.cleanDataPath, options.aggDataPath);
  log('info', `Wrote ${options.cleanDataPath} and ${options.aggDataPath}`);

  const validated = {
    cleanData: await validation(options.cleanDataPath),
    aggData: await validation(options.aggDataPath),
  };
  if (!validated.cleanData) throw outputMissing(options.cleanDataPath);
  if (!validated.aggData) throw outputMissing(options.aggDataPath);

  return {
    salesRows: salesRows.length,
    mergedRows: merged.length,
    cleanedRows: cleaned.length,
    unparsedDates,
    months: aggregate.length,
    cleanDataPath: options.cleanDataPath,
    aggDataPath: options.aggDataPath,
    validated,
  };
}
