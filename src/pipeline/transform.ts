import type { CleanedRecord, FilledRecord, MergedRecord } from '../types.js';
import { parseCalendarDate } from '../utils/normalize.js';

export const SALES_THRESHOLD = 10000;

/** Numbers become 0 and text becomes ''; a missing `Date` stays null. */
export function fillMissing(record: MergedRecord): FilledRecord {
  return {
    index: record.index ?? 0,
    Store_ID: record.Store_ID ?? 0,
    Date: record.Date,
    Weekly_Sales: record.Weekly_Sales ?? 0,
    IsHoliday: record.IsHoliday ?? 0,
    Temperature: record.Temperature ?? 0,
    Fuel_Price: record.Fuel_Price ?? 0,
    CPI: record.CPI ?? 0,
    Unemployment: record.Unemployment ?? 0,
    MarkDown1: record.MarkDown1 ?? 0,
    MarkDown2: record.MarkDown2 ?? 0,
    MarkDown3: record.MarkDown3 ?? 0,
    MarkDown4: record.MarkDown4 ?? 0,
    Dept: record.Dept ?? 0,
    Size: record.Size ?? 0,
    Type: record.Type ?? '',
  };
}

export function monthOf(date: Date | null): number | null {
  return date === null ? null : date.getUTCMonth() + 1;
}

/**
 * Lossy by design: missing values turn into zeros and unreadable dates into a
 * null month instead of raising. Rows with a null month survive the sales
 * filter when their sales clear it.
 */
export function transform(merged: readonly MergedRecord[]): CleanedRecord[] {
  return merged
    .map(fillMissing)
    .map((record) => ({ record, month: monthOf(parseCalendarDate(record.Date)) }))
    .filter(({ record }) => record.Weekly_Sales > SALES_THRESHOLD)
    .map(({ record, month }) => ({
      Store_ID: record.Store_ID,
      Month: month,
      Dept: record.Dept,
      IsHoliday: record.IsHoliday,
      Weekly_Sales: record.Weekly_Sales,
      CPI: record.CPI,
      Unemployment: record.Unemployment,
    }));
}
