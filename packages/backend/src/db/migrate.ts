import { readdir, readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { query, close_pool, with_transaction, client_query } from './index.js';
import { logger } from '../lib/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
export const MIGRATIONS_DIR = join(__dirname, 'migrations');

async function ensure_migrations_table(): Promise<void> {
  await query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      filename TEXT NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ DEFAULT NOW()
    )
  `);
}

async function get_applied_migrations(): Promise<Set<string>> {
  const result = await query<{ filename: string }>(
    'SELECT filename FROM schema_migrations ORDER BY id'
  );
  return new Set(result.rows.map((row) => row.filename));
}

export function select_pending(files: string[], applied: Set<string>): string[] {
  return files
    .filter((f) => f.endsWith('.sql') && !applied.has(f))
    .sort();
}

async function run_migration(dir: string, filename: string): Promise<void> {
  const sql = await readFile(join(dir, filename), 'utf-8');

  await with_transaction(async (client) => {
    await client_query(client, sql);
    await client_query(client, 'INSERT INTO schema_migrations (filename) VALUES ($1)', [filename]);
  });
  logger.info('migration applied', { filename });
}

export async function run_migrations(dir: string = MIGRATIONS_DIR): Promise<string[]> {
  logger.info('starting migrations', { dir });

  await ensure_migrations_table();
  const applied = await get_applied_migrations();
  const pending = select_pending(await readdir(dir), applied);

  if (pending.length === 0) {
    logger.info('no pending migrations');
    return [];
  }

  logger.info('pending migrations', { count: pending.length, files: pending });

  for (const filename of pending) {
    await run_migration(dir, filename);
  }

  logger.info('migrations complete', { applied: pending.length });
  return pending;
}

const is_main = process.argv[1]?.endsWith('migrate.ts') || process.argv[1]?.endsWith('migrate.js');
if (is_main) {
  run_migrations()
    .then(() => close_pool())
    .catch((err: unknown) => {
      logger.error('migration failed', {
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
      process.exit(1);
    });
}
