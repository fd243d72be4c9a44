import { DBFFile, DELETED } from 'dbffile';
import { missingColumn, truncatedSource } from '../errors.js';
import type { SupplementRecord } from '../types.js';
import { normalizeFlag, normalizeNumber, normalizeString } from '../utils/normalize.js';

type SupplementColumn = {
  name: keyof SupplementRecord;
  field: string;
  required: boolean;
};

// dBase caps field names at 10 characters.
export const SUPPLEMENT_COLUMNS: readonly SupplementColumn[] = [
  { name: 'index', field: 'INDEX', required: true },
  { name: 'IsHoliday', field: 'ISHOLIDAY', required: true },
  { name: 'Temperature', field: 'TEMP', required: false },
  { name: 'Fuel_Price', field: 'FUEL_PRICE', required: false },
  { name: 'CPI', field: 'CPI', required: true },
  { name: 'Unemployment', field: 'UNEMPLOY', required: true },
  { name: 'MarkDown1', field: 'MARKDOWN1', required: false },
  { name: 'MarkDown2', field: 'MARKDOWN2', required: false },
  { name: 'MarkDown3', field: 'MARKDOWN3', required: false },
  { name: 'MarkDown4', field: 'MARKDOWN4', required: false },
  { name: 'Dept', field: 'DEPT', required: true },
  { name: 'Size', field: 'SIZE', required: false },
  { name: 'Type', field: 'TYPE', required: false },
];

const FIELD_BY_NAME = new Map(SUPPLEMENT_COLUMNS.map((column) => [column.name, column.field]));

const BATCH_SIZE = 500;

function toSupplementRecord(record: Record<string, unknown>, fieldNames: Map<string, string>): SupplementRecord {
  // Optional fields absent from the file read as null.
  const raw = (name: keyof SupplementRecord): unknown => {
    const field = FIELD_BY_NAME.get(name);
    const actual = field === undefined ? undefined : fieldNames.get(field);
    return actual === undefined ? null : record[actual];
  };
  const num = (name: keyof SupplementRecord): number | null => normalizeNumber(raw(name));

  return {
    index: num('index'),
    IsHoliday: normalizeFlag(raw('IsHoliday')),
    Temperature: num('Temperature'),
    Fuel_Price: num('Fuel_Price'),
    CPI: num('CPI'),
    Unemployment: num('Unemployment'),
    MarkDown1: num('MarkDown1'),
    MarkDown2: num('MarkDown2'),
    MarkDown3: num('MarkDown3'),
    MarkDown4: num('MarkDown4'),
    Dept: num('Dept'),
    Size: num('Size'),
    Type: normalizeString(raw('Type')),
  };
}

/**
 * Reads the whole supplement table into memory. Read errors from the file
 * itself surface unchanged; a missing required field fails before any
 * records are read, and a file holding fewer records than its header
 * declares fails after reading.
 */
export async function readSupplementFile(filePath: string): Promise<SupplementRecord[]> {
  const dbf = await DBFFile.open(filePath, { encoding: 'latin1', includeDeletedRecords: true });

  const fieldNames = new Map<string, string>();
  for (const field of dbf.fields) {
    fieldNames.set(field.name.toUpperCase(), field.name);
  }
  for (const column of SUPPLEMENT_COLUMNS) {
    if (column.required && !fieldNames.has(column.field)) {
      throw missingColumn(`supplement file ${filePath}`, column.field, {
        fields: dbf.fields.map((field) => field.name),
      });
    }
  }

  const result: SupplementRecord[] = [];
  let total = 0;
  while (true) {
    const records = await dbf.readRecords(BATCH_SIZE);
    if (!records.length) break;
    total += records.length;
    for (const record of records) {
      if (Reflect.get(record, DELETED) === true) continue;
      result.push(toSupplementRecord(record, fieldNames));
    }
  }
  // recordCount counts deleted records too
  if (total !== dbf.recordCount) {
    throw truncatedSource(`supplement file ${filePath}`, dbf.recordCount, total);
  }
  return result;
}
