/**
 * Delivery sinks
 * `deliver` never rejects; failures come back as a value.
 */

import type { TelegramConfig } from "../../config/env";
import { logger } from "../logger";

export type DeliveryResult = { ok: true } | { ok: false; error: string };

export interface DeliverySink {
  deliver(text: string): Promise<DeliveryResult>;
}

const TELEGRAM_API = "https://api.telegram.org";
const SEND_TIMEOUT_MS = 10000;

interface TelegramResponse {
  ok?: boolean;
  description?: string;
}

async function readTelegramError(response: Response): Promise<string> {
  try {
    const body: TelegramResponse = await response.json();
    return body.description ?? `HTTP ${response.status}`;
  } catch {
    return `HTTP ${response.status}`;
  }
}

/**
 * Sink posting each message to a Telegram chat
 */
export function createTelegramSink(config: TelegramConfig): DeliverySink {
  const endpoint = `${TELEGRAM_API}/bot${config.token}/sendMessage`;

  return {
    async deliver(text: string): Promise<DeliveryResult> {
      try {
        const response = await fetch(endpoint, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({
            chat_id: config.chatId,
            text,
            parse_mode: "MarkdownV2",
            disable_web_page_preview: true,
          }),
          signal: AbortSignal.timeout(SEND_TIMEOUT_MS),
        });

        if (!response.ok) {
          const error = await readTelegramError(response);
          logger.warn("[DELIVERY] Telegram rejected message", { status: response.status, error });
          return { ok: false, error };
        }
        return { ok: true };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn("[DELIVERY] Telegram request failed", { error: message });
        return { ok: false, error: message };
      }
    },
  };
}

/**
 * Sink writing messages to the log (dry runs, or no chat configured)
 */
export function createLogSink(): DeliverySink {
  return {
    async deliver(text: string): Promise<DeliveryResult> {
      logger.info(`[DELIVERY] ${text}`);
      return { ok: true };
    },
  };
}
