import type { SourceRow } from '../db.js';
import { missingColumn } from '../errors.js';
import { readSupplementFile } from '../services/supplement-reader.js';
import type { MergedRecord, SalesRecord, SupplementRecord } from '../types.js';
import { normalizeDateInput, normalizeNumber } from '../utils/normalize.js';

export const SALES_COLUMNS = ['index', 'Store_ID', 'Date', 'Weekly_Sales'] as const;

export function toSalesRecord(row: SourceRow, position: number): SalesRecord {
  for (const column of SALES_COLUMNS) {
    if (!Object.hasOwn(row, column)) {
      throw missingColumn('sales table', column, { row: position });
    }
  }
  return {
    index: normalizeNumber(row.index),
    Store_ID: normalizeNumber(row.Store_ID),
    Date: normalizeDateInput(row.Date),
    Weekly_Sales: normalizeNumber(row.Weekly_Sales),
  };
}

/**
 * Inner join on `index`. Output follows the sales order, and within one sale the
 * supplement order. Duplicate keys on either side multiply out; rows without a
 * partner, or without a usable key, are dropped.
 */
export function mergeRecords(sales: readonly SalesRecord[], supplement: readonly SupplementRecord[]): MergedRecord[] {
  const byIndex = new Map<number, SupplementRecord[]>();
  for (const record of supplement) {
    if (record.index === null) continue;
    const bucket = byIndex.get(record.index);
    if (bucket) {
      bucket.push(record);
    } else {
      byIndex.set(record.index, [record]);
    }
  }

  const merged: MergedRecord[] = [];
  for (const sale of sales) {
    if (sale.index === null) continue;
    for (const match of byIndex.get(sale.index) ?? []) {
      merged.push({ ...match, ...sale });
    }
  }
  return merged;
}

export async function extract(primaryTable: readonly SourceRow[], supplementPath: string): Promise<MergedRecord[]> {
  const sales = primaryTable.map(toSalesRecord);
  const supplement = await readSupplementFile(supplementPath);
  return mergeRecords(sales, supplement);
}
