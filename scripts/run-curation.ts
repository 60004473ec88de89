#!/usr/bin/env tsx
/**
 * Curation cron job script
 *
 * Runs one curation pass over every configured source and delivers new items to the
 * Telegram chat. Scheduled daily at 08:00 KST (`0 23 * * *` UTC).
 *
 * Usage:
 *   npx tsx scripts/run-curation.ts [--dry-run] [--no-window]
 *
 *   --dry-run    log messages instead of sending them; in-memory ledger
 *   --no-window  skip the time window (undated items included)
 *
 * Environment variables:
 *   - TELEGRAM_TOKEN, TELEGRAM_CHAT_ID (without them messages are only logged)
 *   - DATABASE_URL (PostgreSQL in production) or LEDGER_DB_PATH (SQLite)
 */

import * as dotenv from "dotenv";
import * as path from "path";

// Load .env.local for local development
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config();

import { loadConfig, type AppConfig } from "../src/config/env";
import { closeDbClient, getDbClient } from "../src/lib/db/driver";
import { SqlDeliveryLedger } from "../src/lib/db/ledger";
import { createLogSink, createTelegramSink, type DeliverySink } from "../src/lib/delivery/sink";
import { escapeMarkdown } from "../src/lib/delivery/render";
import { formatDeliveryLine, runOnce } from "../src/lib/curation/run";
import { buildWindow } from "../src/lib/pipeline/select";
import { describeError } from "../src/lib/errors";
import { logger } from "../src/lib/logger";

function createSink(config: AppConfig, dryRun: boolean): DeliverySink {
  if (dryRun || !config.telegram) {
    return createLogSink();
  }
  return createTelegramSink(config.telegram);
}

async function main() {
  const args = process.argv.slice(2);
  const dryRun = args.includes("--dry-run");
  const noWindow = args.includes("--no-window");

  const config = loadConfig();
  const sink = createSink(config, dryRun);
  const startTime = Date.now();

  try {
    logger.info(`🔄 Starting curation pass${dryRun ? " (dry run)" : ""}...`);

    const client = await getDbClient(
      dryRun ? { sqlitePath: ":memory:" } : config.database
    );
    const ledger = new SqlDeliveryLedger(client);
    await ledger.initialize();

    const now = new Date();
    const window = noWindow
      ? null
      : buildWindow(now, config.curation.windowHours, config.curation.endBufferMinutes);

    if (window) {
      logger.info(`Window: ${window.start.toISOString()} → ${window.end.toISOString()}`);
    }

    const report = await runOnce(
      now,
      window,
      { ledger, sink, http: config.http },
      {
        delayMs: config.curation.delayMs,
        localOffsetMinutes: config.curation.localOffsetMinutes,
        notifyErrors: config.curation.notifyErrors,
      }
    );

    console.log("\n" + "=".repeat(60));
    console.log("📊 Curation Summary");
    console.log("=".repeat(60));
    console.log(`Fetched:            ${report.fetched} (${report.errors} source errors)`);
    console.log(`Normalized:         ${report.normalized} (${report.rejected} rejected)`);
    console.log(`Dropped:            ${JSON.stringify(report.dropped)}`);
    console.log(`Candidates:         ${report.candidates}`);
    console.log(`Delivered:          ${report.delivered}`);
    console.log(`Already delivered:  ${report.alreadyDelivered}`);
    console.log(`Delivery failures:  ${report.deliveryFailures}`);
    console.log(`By category:        ${JSON.stringify(report.deliveredByCategory)}`);
    console.log(`Ledger size:        ${await ledger.countDelivered()}`);
    if (report.delivered > 0) {
      console.log("Latest deliveries:");
      for (const record of await ledger.listDelivered(Math.min(report.delivered, 10))) {
        console.log(`  ${formatDeliveryLine(record, config.curation.localOffsetMinutes)}`);
      }
    }
    console.log(`Duration:           ${((Date.now() - startTime) / 1000).toFixed(1)}s`);
    console.log("=".repeat(60) + "\n");

    logger.info("✅ Curation pass completed");
  } finally {
    await closeDbClient();
  }
}

main().catch(async (error) => {
  logger.error("❌ Curation pass failed", error);
  try {
    const config = loadConfig();
    if (config.telegram && !process.argv.includes("--dry-run")) {
      await createTelegramSink(config.telegram).deliver(
        escapeMarkdown(`[뉴스봇 치명오류] ${describeError(error)}`)
      );
    }
  } catch (notifyError) {
    logger.error("Failed to send failure notice", notifyError);
  }
  process.exit(1);
});
