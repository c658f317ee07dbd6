import type { Alias } from '@curator/shared';
import { query } from '../db/index.js';

export interface AliasStore {
  list_aliases(): Promise<Alias[]>;
  get_alias(trigger: string): Promise<Alias | null>;
  set_alias(trigger: string, replacement: string): Promise<Alias>;
  delete_alias(trigger: string): Promise<boolean>;
}

export function normalize_trigger(trigger: string): string {
  return trigger.trim().replace(/\s+/g, ' ').toLowerCase();
}

function escape_regex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Rewrites every whole-word, case-insensitive occurrence of an alias trigger
 * with its replacement. Longer triggers are tried first and each part of the
 * text is rewritten at most once, so replacements are never re-expanded.
 */
export function apply_aliases(text: string, aliases: Alias[]): string {
  const usable = aliases.filter((a) => normalize_trigger(a.trigger).length > 0);
  if (usable.length === 0) return text;

  const by_trigger = new Map<string, string>();
  for (const alias of usable) {
    by_trigger.set(normalize_trigger(alias.trigger), alias.replacement);
  }

  const triggers = [...by_trigger.keys()].sort((a, b) => b.length - a.length || a.localeCompare(b));
  const pattern = new RegExp(`(?<![\\w])(?:${triggers.map(escape_regex).join('|')})(?![\\w])`, 'gi');

  return text.replace(pattern, (match) => by_trigger.get(normalize_trigger(match)) ?? match);
}

export function create_pg_alias_store(): AliasStore {
  return {
    async list_aliases() {
      const result = await query<Alias>('SELECT trigger, replacement FROM aliases ORDER BY trigger');
      return result.rows;
    },

    async get_alias(trigger) {
      const result = await query<Alias>('SELECT trigger, replacement FROM aliases WHERE trigger = $1', [
        normalize_trigger(trigger),
      ]);
      return result.rows[0] ?? null;
    },

    async set_alias(trigger, replacement) {
      const result = await query<Alias>(
        `INSERT INTO aliases (trigger, replacement) VALUES ($1, $2)
         ON CONFLICT (trigger) DO UPDATE SET replacement = EXCLUDED.replacement
         RETURNING trigger, replacement`,
        [normalize_trigger(trigger), replacement]
      );
      const row = result.rows[0];
      if (!row) {
        throw new Error('set_alias: upsert returned no rows');
      }
      return row;
    },

    async delete_alias(trigger) {
      const result = await query('DELETE FROM aliases WHERE trigger = $1', [normalize_trigger(trigger)]);
      return (result.rowCount ?? 0) > 0;
    },
  };
}
