import { promises as fsp } from 'node:fs';
import { AGGREGATE_COLUMNS, CLEANED_COLUMNS, type CleanedRecord, type MonthlyAggregate } from '../types.js';
import { toCsv } from '../utils/csv.js';

export const DEFAULT_CLEAN_DATA_PATH = 'clean_data.csv';
export const DEFAULT_AGG_DATA_PATH = 'agg_data.csv';

/**
 * Writes both tables, cleaned first. The writes are independent: if the
 * second one fails the first file is left in place.
 */
export async function load(
  cleaned: readonly CleanedRecord[],
  aggregate: readonly MonthlyAggregate[],
  cleanPath: string = DEFAULT_CLEAN_DATA_PATH,
  aggPath: string = DEFAULT_AGG_DATA_PATH
): Promise<void> {
  await fsp.writeFile(cleanPath, toCsv<CleanedRecord>(CLEANED_COLUMNS, cleaned), 'utf8');
  await fsp.writeFile(aggPath, toCsv<MonthlyAggregate>(AGGREGATE_COLUMNS, aggregate), 'utf8');
}
