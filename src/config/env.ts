/**
 * Environment configuration
 * Loads and validates environment variables into a typed config
 */

import { z } from "zod";
import { ConfigurationError } from "../lib/errors";
import type { HttpOptions } from "../lib/sources/http";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  TELEGRAM_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
  DATABASE_URL: z.string().optional(),
  LEDGER_DB_PATH: z.string().default(".data/ledger.db"),
  WINDOW_HOURS: z.coerce.number().positive().default(24),
  WINDOW_END_BUFFER_MINUTES: z.coerce.number().min(0).default(1),
  LOCAL_UTC_OFFSET_MINUTES: z.coerce.number().int().min(-720).max(840).default(540),
  DELIVERY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  NOTIFY_SOURCE_ERRORS: booleanFlag.default("true"),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  USER_AGENT: z.string().default("LaborNewsBot/2.0"),
});

export interface TelegramConfig {
  token: string;
  chatId: string;
}

export interface CurationConfig {
  windowHours: number;
  endBufferMinutes: number;
  localOffsetMinutes: number;
  delayMs: number;
  notifyErrors: boolean;
}

export interface AppConfig {
  telegram: TelegramConfig | null; // null: deliveries go to the log
  database: {
    url?: string;
    sqlitePath: string;
  };
  curation: CurationConfig;
  http: HttpOptions;
}

/**
 * Load and validate configuration
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Unset and empty variables both fall back to defaults
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  const telegram =
    vars.TELEGRAM_TOKEN && vars.TELEGRAM_CHAT_ID
      ? { token: vars.TELEGRAM_TOKEN, chatId: vars.TELEGRAM_CHAT_ID }
      : null;

  return {
    telegram,
    database: {
      url: vars.DATABASE_URL,
      sqlitePath: vars.LEDGER_DB_PATH,
    },
    curation: {
      windowHours: vars.WINDOW_HOURS,
      endBufferMinutes: vars.WINDOW_END_BUFFER_MINUTES,
      localOffsetMinutes: vars.LOCAL_UTC_OFFSET_MINUTES,
      delayMs: vars.DELIVERY_DELAY_MS,
      notifyErrors: vars.NOTIFY_SOURCE_ERRORS,
    },
    http: {
      timeoutMs: vars.FETCH_TIMEOUT_MS,
      userAgent: vars.USER_AGENT,
    },
  };
}
