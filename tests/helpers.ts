import { promises as fsp } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DBFFile } from 'dbffile';
import type { MergedRecord } from '../src/types.js';

type FieldList = Parameters<typeof DBFFile.create>[1];

export const SUPPLEMENT_FIELDS: FieldList = [
  { name: 'INDEX', type: 'N', size: 10, decimalPlaces: 0 },
  { name: 'ISHOLIDAY', type: 'L', size: 1 },
  { name: 'TEMP', type: 'N', size: 10, decimalPlaces: 2 },
  { name: 'FUEL_PRICE', type: 'N', size: 10, decimalPlaces: 3 },
  { name: 'CPI', type: 'N', size: 12, decimalPlaces: 4 },
  { name: 'UNEMPLOY', type: 'N', size: 8, decimalPlaces: 3 },
  { name: 'MARKDOWN1', type: 'N', size: 12, decimalPlaces: 2 },
  { name: 'DEPT', type: 'N', size: 4, decimalPlaces: 0 },
  { name: 'SIZE', type: 'N', size: 10, decimalPlaces: 0 },
  { name: 'TYPE', type: 'C', size: 1 },
];

export type SupplementFixture = {
  index: number;
  holiday: boolean;
  dept: number;
  cpi: number;
  unemployment: number;
};

export async function makeTempDir(): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), 'walmart-etl-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fsp.rm(dir, { recursive: true, force: true });
}

export async function writeDbf(filePath: string, fields: FieldList, records: Array<Record<string, unknown>>): Promise<void> {
  const dbf = await DBFFile.create(filePath, fields);
  await dbf.appendRecords(records);
}

export async function writeSupplementDbf(filePath: string, rows: SupplementFixture[]): Promise<void> {
  await writeDbf(
    filePath,
    SUPPLEMENT_FIELDS,
    rows.map((row) => ({
      INDEX: row.index,
      ISHOLIDAY: row.holiday,
      TEMP: 42.31,
      FUEL_PRICE: 2.572,
      CPI: row.cpi,
      UNEMPLOY: row.unemployment,
      MARKDOWN1: 120.5,
      DEPT: row.dept,
      SIZE: 151315,
      TYPE: 'A',
    }))
  );
}

export function mergedRow(overrides: Partial<MergedRecord> = {}): MergedRecord {
  return {
    index: 1,
    Store_ID: 5,
    Date: '2012-11-23',
    Weekly_Sales: 25000,
    IsHoliday: 1,
    Temperature: 42.31,
    Fuel_Price: 2.572,
    CPI: 130.5,
    Unemployment: 7.2,
    MarkDown1: null,
    MarkDown2: null,
    MarkDown3: null,
    MarkDown4: null,
    Dept: 3,
    Size: 151315,
    Type: 'A',
    ...overrides,
  };
}

export async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected promise to reject');
}
