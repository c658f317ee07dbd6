import { z } from 'zod';
import type { ConfigKey } from '@curator/shared';
import type { ConfigStore } from './config-store.js';
import { logger } from '../lib/logger.js';

const log = logger.child({ component: 'config_cache' });

export type EngineSettings = Record<ConfigKey, number>;

const similarity_schema = z.coerce.number().finite().min(-1).max(1);

export const CONFIG_VALUE_SCHEMAS: Record<ConfigKey, z.ZodNumber> = {
  confidence_threshold: similarity_schema,
  duplicate_threshold: similarity_schema,
  flag_alert_threshold: z.coerce.number().int().min(1),
  retrieval_candidates: z.coerce.number().int().min(1).max(25),
};

export const CONFIG_KEYS: ConfigKey[] = [
  'confidence_threshold',
  'duplicate_threshold',
  'flag_alert_threshold',
  'retrieval_candidates',
];

export function is_config_key(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

/**
 * Process-scoped read-through cache over the config table. A value is loaded
 * on first read and served from memory until the writer calls `invalidate`
 * or `invalidate_all`; nothing here polls the store.
 */
export class ConfigCache {
  private readonly entries = new Map<string, Promise<string | null>>();

  constructor(
    private readonly store: ConfigStore,
    private readonly defaults: EngineSettings,
  ) {}

  async preload(): Promise<number> {
    const values = await this.store.list_values();
    this.entries.clear();
    for (const entry of values) {
      this.entries.set(entry.key, Promise.resolve(entry.value));
    }
    log.info('config loaded', { keys: values.length });
    return values.length;
  }

  get(key: string): Promise<string | null> {
    const cached = this.entries.get(key);
    if (cached) return cached;

    const pending = this.store.get_value(key);
    this.entries.set(key, pending);
    // failed loads are not cached; the caller still sees the rejection
    pending.catch(() => {
      if (this.entries.get(key) === pending) {
        this.entries.delete(key);
      }
    });
    return pending;
  }

  async get_number(key: ConfigKey): Promise<number> {
    const raw = await this.get(key);
    const fallback = this.defaults[key];
    if (raw === null) return fallback;

    const parsed = CONFIG_VALUE_SCHEMAS[key].safeParse(raw);
    if (!parsed.success) {
      log.warn('config value invalid, using default', { key, value: raw, default: fallback });
      return fallback;
    }
    return parsed.data;
  }

  async get_settings(): Promise<EngineSettings> {
    const [confidence_threshold, duplicate_threshold, flag_alert_threshold, retrieval_candidates] =
      await Promise.all([
        this.get_number('confidence_threshold'),
        this.get_number('duplicate_threshold'),
        this.get_number('flag_alert_threshold'),
        this.get_number('retrieval_candidates'),
      ]);
    return { confidence_threshold, duplicate_threshold, flag_alert_threshold, retrieval_candidates };
  }

  invalidate(key: string): void {
    this.entries.delete(key);
    log.debug('config key invalidated', { key });
  }

  invalidate_all(): void {
    this.entries.clear();
    log.debug('config cache cleared');
  }
}
