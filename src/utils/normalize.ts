export function normalizeString(value: unknown): string | null {
  if (value == null) return null;
  if (value instanceof Date) return value.toISOString().split('T')[0];
  const str = String(value).trim();
  return str.length ? str : null;
}

export function normalizeNumber(value: unknown): number | null {
  if (value == null || value === '') return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'boolean' || value instanceof Date) return null;
  const text = String(value).trim();
  if (!text.length) return null;
  const parsed = Number(text.replace(',', '.'));
  return Number.isFinite(parsed) ? parsed : null;
}

/** Holiday-style flags: booleans, numbers and the usual spellings map to 1 or 0. */
export function normalizeFlag(value: unknown): number | null {
  if (value == null) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number') return Number.isFinite(value) ? (value === 0 ? 0 : 1) : null;
  const normalized = String(value).trim().toLowerCase();
  if (['1', 'true', 't', 'y', 'yes'].includes(normalized)) return 1;
  if (['0', 'false', 'f', 'n', 'no'].includes(normalized)) return 0;
  return null;
}

/**
 * Date column values as they arrive from either source: ISO strings, `Date`
 * objects, or null. Anything else is unusable and becomes null.
 */
export function normalizeDateInput(value: unknown): string | Date | null {
  if (value instanceof Date) return value;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/;

function calendarDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Parses to a calendar date held at UTC midnight. Returns null instead of
 * throwing for anything that is not a real date.
 */
export function parseCalendarDate(value: string | Date | null): Date | null {
  if (value == null) return null;
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    // pg hands `date` columns back as local midnight
    return calendarDate(value.getFullYear(), value.getMonth() + 1, value.getDate());
  }
  const trimmed = value.trim();
  if (!trimmed.length) return null;
  const iso = ISO_DATE.exec(trimmed);
  if (iso) {
    // a time part, when present, has to be a real time as well
    if (trimmed.length > 10 && Number.isNaN(new Date(trimmed.replace(' ', 'T')).getTime())) return null;
    return calendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }
  const parsed = new Date(trimmed);
  if (Number.isNaN(parsed.getTime())) return null;
  return calendarDate(parsed.getFullYear(), parsed.getMonth() + 1, parsed.getDate());
}

/** Halves go to the even neighbour: 12000.125 rounds to 12000.12. */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;
  let rounded: number;
  if (fraction > 0.5) {
    rounded = floor + 1;
  } else if (fraction < 0.5) {
    rounded = floor;
  } else {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  }
  return rounded / factor;
}
