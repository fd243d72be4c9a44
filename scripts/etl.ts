// Batch ETL: grocery_sales (Postgres) + supplement DBF -> clean_data.csv, agg_data.csv.
import 'dotenv/config';
import { loadConfig } from '../src/config.js';
import { asQueryable, createPool } from '../src/db.js';
import { runPipeline } from '../src/pipeline/index.js';
import { consoleLogger } from '../src/utils/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.db);
  try {
    const summary = await runPipeline(
      {
        salesTable: config.salesTable,
        supplementPath: config.supplementPath,
        cleanDataPath: config.cleanDataPath,
        aggDataPath: config.aggDataPath,
      },
      { db: asQueryable(pool), logger: consoleLogger }
    );
    consoleLogger('info', `done: ${JSON.stringify(summary)}`);
  } finally {
    await pool.end();
  }
}

main().catch((error) => {
  consoleLogger('error', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
