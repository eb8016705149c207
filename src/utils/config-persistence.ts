/**
 * Configuration Persistence Utilities
 *
 * Reads and writes runtime config changes in the run store's config table.
 * Separated from tools/config.ts and server/state.ts to avoid circular dependencies.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module utils/config-persistence
 */

import type Database from 'better-sqlite3';

export type PersistedConfigValue = string | number | boolean | null;

/**
 * Upsert one config value
 *
 * @param conn - better-sqlite3 Database connection
 * @param key - Config key name (snake_case, as accepted by duplex_config_set)
 */
export function persistConfigValue(
  conn: Database.Database,
  key: string,
  value: PersistedConfigValue
): void {
  conn
    .prepare(
      `INSERT INTO config (key, value_json, updated_at) VALUES (?, ?, ?)
       ON CONFLICT(key) DO UPDATE SET value_json = excluded.value_json, updated_at = excluded.updated_at`
    )
    .run(key, JSON.stringify(value), new Date().toISOString());
}

/**
 * Forget persisted values: one key, or all of them
 */
export function clearPersistedConfig(conn: Database.Database, key?: string): void {
  if (key) {
    conn.prepare('DELETE FROM config WHERE key = ?').run(key);
  } else {
    conn.exec('DELETE FROM config');
  }
}

/**
 * Load every persisted config value.
 *
 * Called when the run store opens to restore changes from a previous session.
 *
 * @returns Record of persisted key-value pairs, or empty object
 * @throws Error when a stored value is not valid JSON
 */
export function loadPersistedConfig(conn: Database.Database): Record<string, unknown> {
  const rows = conn
    .prepare<[], { key: string; value_json: string }>('SELECT key, value_json FROM config ORDER BY key')
    .all();

  const config: Record<string, unknown> = {};
  for (const row of rows) {
    try {
      const value: unknown = JSON.parse(row.value_json);
      config[row.key] = value;
    } catch (error) {
      console.error(
        `[Config] Failed to parse persisted value for ${row.key}: ${error instanceof Error ? error.message : String(error)}`
      );
      throw new Error(
        `Failed to load persisted config "${row.key}": ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
  return config;
}
