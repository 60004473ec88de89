/**
 * Structured logging utility
 */

type Meta = Record<string, unknown>;

function formatMeta(meta?: Meta): string {
  return meta ? JSON.stringify(meta) : "";
}

export const logger = {
  debug: (msg: string, meta?: Meta) => {
    if (process.env.DEBUG) {
      console.log(`[DEBUG] ${msg}`, formatMeta(meta));
    }
  },

  info: (msg: string, meta?: Meta) => {
    console.log(`[INFO] ${msg}`, formatMeta(meta));
  },

  warn: (msg: string, meta?: Meta) => {
    console.warn(`[WARN] ${msg}`, formatMeta(meta));
  },

  error: (msg: string, error?: unknown) => {
    console.error(`[ERROR] ${msg}`, error ?? "");
  },
};
