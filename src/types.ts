export type SalesRecord = {
  index: number | null;
  Store_ID: number | null;
  Date: string | Date | null;
  Weekly_Sales: number | null;
};

export type SupplementRecord = {
  index: number | null;
  IsHoliday: number | null;
  Temperature: number | null;
  Fuel_Price: number | null;
  CPI: number | null;
  Unemployment: number | null;
  MarkDown1: number | null;
  MarkDown2: number | null;
  MarkDown3: number | null;
  MarkDown4: number | null;
  Dept: number | null;
  Size: number | null;
  Type: string | null;
};

export type MergedRecord = SalesRecord & Omit<SupplementRecord, 'index'>;

type NumericColumn = {
  [K in keyof MergedRecord]: MergedRecord[K] extends number | null ? K : never;
}[keyof MergedRecord];

/** A merged row after null filling: every column but `Date` holds a value. */
export type FilledRecord = { [K in NumericColumn]: number } & {
  Date: string | Date | null;
  Type: string;
};

export type CleanedRecord = {
  Store_ID: number;
  Month: number | null;
  Dept: number;
  IsHoliday: number;
  Weekly_Sales: number;
  CPI: number;
  Unemployment: number;
};

export type MonthlyAggregate = {
  Month: number | null;
  Weekly_Sales: number;
};

export const CLEANED_COLUMNS = [
  'Store_ID',
  'Month',
  'Dept',
  'IsHoliday',
  'Weekly_Sales',
  'CPI',
  'Unemployment',
] as const satisfies ReadonlyArray<keyof CleanedRecord>;

export const AGGREGATE_COLUMNS = ['Month', 'Weekly_Sales'] as const satisfies ReadonlyArray<keyof MonthlyAggregate>;
