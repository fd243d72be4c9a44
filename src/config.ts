import { z } from 'zod';

const envSchema = z.object({
  POSTGRES_HOST: z.string().min(1).default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_USER: z.string().min(1).default('walmart'),
  POSTGRES_PASSWORD: z.string().default('walmart'),
  POSTGRES_DB: z.string().min(1).default('walmart'),
  SALES_TABLE: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain table identifier')
    .default('grocery_sales'),
  SUPPLEMENT_PATH: z.string().min(1).default('extra_data.dbf'),
  CLEAN_DATA_PATH: z.string().min(1).default('clean_data.csv'),
  AGG_DATA_PATH: z.string().min(1).default('agg_data.csv'),
});

export type DbConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
};

export type EtlConfig = {
  db: DbConfig;
  salesTable: string;
  supplementPath: string;
  cleanDataPath: string;
  aggDataPath: string;
};

// An empty password is a real setting; only an unset one takes the default.
const KEEP_BLANK = new Set(['POSTGRES_PASSWORD']);

// Blank variables fall back to their defaults, the same as unset ones.
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) continue;
    if (KEEP_BLANK.has(key)) {
      result[key] = value;
    } else if (value.trim().length) {
      result[key] = value.trim();
    }
  }
  return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EtlConfig {
  const parsed = envSchema.parse(withoutBlanks(env));
  return {
    db: {
      host: parsed.POSTGRES_HOST,
      port: parsed.POSTGRES_PORT,
      user: parsed.POSTGRES_USER,
      password: parsed.POSTGRES_PASSWORD,
      database: parsed.POSTGRES_DB,
    },
    salesTable: parsed.SALES_TABLE,
    supplementPath: parsed.SUPPLEMENT_PATH,
    cleanDataPath: parsed.CLEAN_DATA_PATH,
    aggDataPath: parsed.AGG_DATA_PATH,
  };
}
