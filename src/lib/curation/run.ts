/**
 * Curation pass: ingest → normalize → filter → deliver → record
 *
 * Delivery is at-most-once: an item is recorded in the ledger right after the sink
 * call, whether or not the sink accepted it, so a later pass never repeats it.
 */

import { setTimeout as sleep } from "timers/promises";
import type { BatchEntry, Category, DeliveryRecord, RawItem, TimeWindow } from "../model";
import { normalizeItems } from "../pipeline/normalize";
import { curate, type StageDrops } from "../pipeline/select";
import type { DeliveryLedger } from "../db/ledger";
import type { DeliverySink } from "../delivery/sink";
import { renderItem, renderSourceError } from "../delivery/render";
import { type FeedTable, type SourceFetcher, ingestSources } from "../sources";
import type { HttpOptions } from "../sources/http";
import { FEEDS } from "../../config/feeds";
import { formatLocal, KST_OFFSET_MINUTES } from "../pipeline/temporal";
import { LedgerUnavailableError, LedgerWriteConflictError } from "../errors";
import { logger } from "../logger";

export interface RunReport {
  fetched: number;
  errors: number;
  rejected: number;
  normalized: number;
  categoryCounts: Partial<Record<Category, number>>;
  dropped: StageDrops;
  candidates: number;
  delivered: number;
  alreadyDelivered: number;
  deliveryFailures: number;
  deliveredByCategory: Partial<Record<Category, number>>;
}

export interface CurationDeps {
  ledger: DeliveryLedger;
  sink: DeliverySink;
  sleep?: (ms: number) => Promise<unknown>;
}

export interface CurationRunOptions {
  now: Date;
  window: TimeWindow | null;
  delayMs?: number;
  localOffsetMinutes?: number;
  notifyErrors?: boolean;
}

export interface RunDeps extends CurationDeps {
  feeds?: FeedTable;
  fetcher?: SourceFetcher;
  http?: HttpOptions;
}

function ledgerFailure(error: unknown, message: string): LedgerUnavailableError {
  return error instanceof LedgerUnavailableError ? error : new LedgerUnavailableError(message, error);
}

/**
 * Curate and deliver one ingested batch
 * @throws LedgerUnavailableError when the ledger cannot be read or written
 */
export async function curateBatch(
  batch: BatchEntry[],
  deps: CurationDeps,
  options: CurationRunOptions
): Promise<RunReport> {
  const pause = deps.sleep ?? sleep;
  const delayMs = options.delayMs ?? 0;
  const offset = options.localOffsetMinutes ?? KST_OFFSET_MINUTES;

  const rawItems: RawItem[] = [];
  let errors = 0;

  for (const entry of batch) {
    if (entry.kind === "item") {
      rawItems.push(entry.item);
      continue;
    }

    errors++;
    if (options.notifyErrors) {
      const result = await deps.sink.deliver(renderSourceError(entry.group, entry.error));
      if (!result.ok) {
        logger.warn(`[CURATION] Could not send error notice for ${entry.group}`, { error: result.error });
      }
    }
  }

  const normalized = normalizeItems(rawItems, { localOffsetMinutes: offset });
  const curated = curate(normalized.items, { window: options.window });

  const report: RunReport = {
    fetched: rawItems.length,
    errors,
    rejected: normalized.rejected,
    normalized: normalized.items.length,
    categoryCounts: normalized.categoryCounts,
    dropped: curated.dropped,
    candidates: curated.items.length,
    delivered: 0,
    alreadyDelivered: 0,
    deliveryFailures: 0,
    deliveredByCategory: {},
  };

  let sent = 0;
  for (const item of curated.items) {
    let seen: boolean;
    try {
      seen = await deps.ledger.isDelivered(item.contentId);
    } catch (error) {
      throw ledgerFailure(error, `Ledger lookup failed for ${item.contentId}`);
    }
    if (seen) {
      report.alreadyDelivered++;
      continue;
    }

    if (sent > 0 && delayMs > 0) {
      await pause(delayMs);
    }
    sent++;

    const result = await deps.sink.deliver(renderItem(item, offset));
    if (result.ok) {
      report.delivered++;
      report.deliveredByCategory[item.category] = (report.deliveredByCategory[item.category] ?? 0) + 1;
    } else {
      report.deliveryFailures++;
      logger.warn(`[CURATION] Delivery failed for ${item.link}`, { error: result.error });
    }

    try {
      await deps.ledger.recordDelivered({
        contentId: item.contentId,
        title: item.title,
        link: item.link,
        publishedRaw: item.publishedRaw,
        sourceFeed: item.sourceFeed,
        category: item.category,
        firstSeenAt: options.now,
      });
    } catch (error) {
      if (error instanceof LedgerWriteConflictError) {
        // Another pass recorded it between the lookup and the insert
        report.alreadyDelivered++;
        continue;
      }
      throw ledgerFailure(error, `Ledger write failed for ${item.contentId}`);
    }
  }

  logger.info("[CURATION] Pass complete", {
    delivered: report.delivered,
    alreadyDelivered: report.alreadyDelivered,
    deliveryFailures: report.deliveryFailures,
    errors: report.errors,
  });

  return report;
}

/**
 * One summary line per ledger record: "YYYY-MM-DD HH:MM [category] title"
 */
export function formatDeliveryLine(record: DeliveryRecord, offsetMinutes: number = KST_OFFSET_MINUTES): string {
  return `${formatLocal(record.firstSeenAt, offsetMinutes)} [${record.category}] ${record.title}`;
}

/**
 * Ingest every configured source and curate the result
 */
export async function runOnce(
  now: Date,
  window: TimeWindow | null,
  deps: RunDeps,
  options: Omit<CurationRunOptions, "now" | "window"> = {}
): Promise<RunReport> {
  const batch = await ingestSources(deps.feeds ?? FEEDS, { http: deps.http, fetcher: deps.fetcher });
  return curateBatch(batch, deps, { ...options, now, window });
}
