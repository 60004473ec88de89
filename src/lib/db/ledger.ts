/**
 * Delivery ledger
 * Durable record of delivered content ids. `isDelivered` before `recordDelivered`
 * gives at-most-once delivery across passes; a second insert for the same id fails.
 */

import type { DeliveryRecord } from "../model";
import { isCategory } from "../../config/categories";
import type { DatabaseClient } from "./driver";
import { isUniqueViolation } from "./driver";
import { getLedgerSchema } from "./schema";
import { LedgerUnavailableError, LedgerWriteConflictError } from "../errors";
import { logger } from "../logger";

export interface DeliveryLedger {
  isDelivered(contentId: string): Promise<boolean>;
  /**
   * @throws LedgerWriteConflictError when the id is already recorded
   * @throws LedgerUnavailableError when storage fails
   */
  recordDelivered(record: DeliveryRecord): Promise<void>;
}

function text(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  return typeof value === "string" ? value : "";
}

function toRecord(row: Record<string, unknown>): DeliveryRecord {
  // pg returns BIGINT columns as strings
  const seconds = Number(row.first_seen_at);
  const category = text(row, "category");
  return {
    contentId: text(row, "id"),
    title: text(row, "title"),
    link: text(row, "link"),
    publishedRaw: text(row, "published_raw"),
    sourceFeed: text(row, "source_feed"),
    category: isCategory(category) ? category : "other",
    firstSeenAt: new Date(seconds * 1000),
  };
}

export class SqlDeliveryLedger implements DeliveryLedger {
  constructor(private readonly client: DatabaseClient) {}

  /**
   * Create the deliveries table if it does not exist
   */
  async initialize(): Promise<void> {
    try {
      await this.client.exec(getLedgerSchema(this.client.driver));
    } catch (error) {
      throw new LedgerUnavailableError("Failed to initialize ledger schema", error);
    }
  }

  async isDelivered(contentId: string): Promise<boolean> {
    try {
      const result = await this.client.query("SELECT 1 AS found FROM deliveries WHERE id = ?", [contentId]);
      return result.rowCount > 0;
    } catch (error) {
      throw new LedgerUnavailableError(`Failed to read ledger for ${contentId}`, error);
    }
  }

  async recordDelivered(record: DeliveryRecord): Promise<void> {
    try {
      await this.client.run(
        `INSERT INTO deliveries
         (id, title, link, published_raw, source_feed, category, first_seen_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [
          record.contentId,
          record.title,
          record.link,
          record.publishedRaw,
          record.sourceFeed,
          record.category,
          Math.floor(record.firstSeenAt.getTime() / 1000),
        ]
      );
      logger.debug(`Recorded delivery ${record.contentId}`, { category: record.category });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new LedgerWriteConflictError(record.contentId);
      }
      throw new LedgerUnavailableError(`Failed to record delivery ${record.contentId}`, error);
    }
  }

  async countDelivered(): Promise<number> {
    try {
      const result = await this.client.query("SELECT COUNT(*) AS count FROM deliveries");
      return Number(result.rows[0]?.count ?? 0);
    } catch (error) {
      throw new LedgerUnavailableError("Failed to count deliveries", error);
    }
  }

  /**
   * Most recent deliveries first
   */
  async listDelivered(limit: number = 50): Promise<DeliveryRecord[]> {
    try {
      const result = await this.client.query(
        `SELECT id, title, link, published_raw, source_feed, category, first_seen_at
         FROM deliveries
         ORDER BY first_seen_at DESC, id ASC
         LIMIT ?`,
        [limit]
      );
      return result.rows.map(toRecord);
    } catch (error) {
      throw new LedgerUnavailableError("Failed to list deliveries", error);
    }
  }
}
