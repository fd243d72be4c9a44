import type { Queryable, SourceRow } from '../db.js';

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export async function fetchSalesRecords(db: Queryable, table: string): Promise<SourceRow[]> {
  if (!TABLE_NAME.test(table)) {
    throw new Error(`invalid sales table name: ${table}`);
  }
  const { rows } = await db.query(
    `select "index", "Store_ID", "Date", "Weekly_Sales" from ${table} order by "index"`
  );
  return rows;
}
