/**
 * Ledger schema for both drivers
 */

import type { DatabaseDriver } from "./driver";

/**
 * deliveries: one row per item ever handed to the delivery sink
 */
export function getLedgerSchema(driver: DatabaseDriver): string {
  const timestamp = driver === "postgres" ? "BIGINT" : "INTEGER";

  return `
    CREATE TABLE IF NOT EXISTS deliveries (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      link TEXT NOT NULL,
      published_raw TEXT NOT NULL DEFAULT '',
      source_feed TEXT NOT NULL,
      category TEXT NOT NULL,
      first_seen_at ${timestamp} NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_deliveries_first_seen ON deliveries(first_seen_at);
  `;
}
