import type { ConfigEntry } from '@curator/shared';
import { query } from '../db/index.js';

export interface ConfigStore {
  get_value(key: string): Promise<string | null>;
  list_values(): Promise<ConfigEntry[]>;
  set_value(key: string, value: string): Promise<void>;
  delete_value(key: string): Promise<boolean>;
}

export function create_pg_config_store(): ConfigStore {
  return {
    async get_value(key) {
      const result = await query<{ value: string }>('SELECT value FROM config WHERE key = $1', [key]);
      return result.rows[0]?.value ?? null;
    },

    async list_values() {
      const result = await query<ConfigEntry>('SELECT key, value FROM config ORDER BY key');
      return result.rows;
    },

    async set_value(key, value) {
      await query(
        `INSERT INTO config (key, value) VALUES ($1, $2)
         ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value`,
        [key, value]
      );
    },

    async delete_value(key) {
      const result = await query('DELETE FROM config WHERE key = $1', [key]);
      return (result.rowCount ?? 0) > 0;
    },
  };
}
