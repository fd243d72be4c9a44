import type { CleanedRecord, MonthlyAggregate } from '../types.js';
import { roundTo } from '../utils/normalize.js';

type Bucket = { total: number; count: number };

// Ascending, with the null month last.
function compareMonths(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a - b;
}

export function avgWeeklySalesPerMonth(cleaned: readonly CleanedRecord[]): MonthlyAggregate[] {
  const buckets = new Map<number | null, Bucket>();
  for (const row of cleaned) {
    const bucket = buckets.get(row.Month);
    if (bucket) {
      bucket.total += row.Weekly_Sales;
      bucket.count += 1;
    } else {
      buckets.set(row.Month, { total: row.Weekly_Sales, count: 1 });
    }
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => compareMonths(a, b))
    .map(([month, { total, count }]) => ({
      Month: month,
      Weekly_Sales: roundTo(total / count, 2),
    }));
}
