/**
 * Database driver abstraction for SQLite (local) and PostgreSQL (hosted)
 *
 * - better-sqlite3 when no postgres connection string is configured
 * - pg when the connection string starts with "postgres"
 *
 * Callers write SQLite-style "?" placeholders; the Postgres client rewrites them.
 */

import Database from "better-sqlite3";
import { Pool } from "pg";
import * as fs from "fs";
import * as path from "path";
import { logger } from "../logger";

export type DatabaseDriver = "sqlite" | "postgres";

export interface DbResult {
  rows: Record<string, unknown>[];
  rowCount: number;
}

export interface DatabaseClient {
  driver: DatabaseDriver;
  query(sql: string, params?: unknown[]): Promise<DbResult>;
  run(sql: string, params?: unknown[]): Promise<{ changes: number }>;
  exec(sql: string): Promise<void>;
  close(): Promise<void>;
}

export interface DatabaseOptions {
  url?: string; // postgres://... selects the pg driver
  sqlitePath: string; // File path or ":memory:"
}

let clientInstance: DatabaseClient | null = null;

/**
 * Detect which database driver a connection string selects
 */
export function detectDriver(url: string | undefined): DatabaseDriver {
  return url?.startsWith("postgres") ? "postgres" : "sqlite";
}

/**
 * Get or create the shared database client
 */
export async function getDbClient(options: DatabaseOptions): Promise<DatabaseClient> {
  if (clientInstance) {
    return clientInstance;
  }

  const driver = detectDriver(options.url);
  const client =
    driver === "postgres" && options.url
      ? await createPostgresClient(options.url)
      : createSqliteClient(options.sqlitePath);

  logger.info(`Database initialized with ${driver} driver`);
  clientInstance = client;
  return client;
}

/**
 * Close the shared client, if any
 */
export async function closeDbClient(): Promise<void> {
  if (clientInstance) {
    const client = clientInstance;
    clientInstance = null;
    await client.close();
  }
}

/**
 * Create SQLite client
 */
export function createSqliteClient(dbPath: string): DatabaseClient {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  if (dbPath !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }

  return {
    driver: "sqlite",

    async query(sql: string, params?: unknown[]): Promise<DbResult> {
      const stmt = sqlite.prepare(sql);
      const rows = params ? stmt.all(...params) : stmt.all();
      return {
        rows: rows as Record<string, unknown>[],
        rowCount: rows.length,
      };
    },

    async run(sql: string, params?: unknown[]): Promise<{ changes: number }> {
      const stmt = sqlite.prepare(sql);
      const result = params ? stmt.run(...params) : stmt.run();
      return { changes: result.changes };
    },

    async exec(sql: string): Promise<void> {
      sqlite.exec(sql);
    },

    async close(): Promise<void> {
      sqlite.close();
    },
  };
}

/**
 * Create PostgreSQL client
 */
export async function createPostgresClient(databaseUrl: string): Promise<DatabaseClient> {
  const needsSSL = process.env.NODE_ENV === "production";

  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: needsSSL ? { rejectUnauthorized: false } : undefined,
    max: 2, // One writer per pass
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });

  // Test connection
  await pool.query("SELECT 1");

  return {
    driver: "postgres",

    async query(sql: string, params?: unknown[]): Promise<DbResult> {
      const result = await pool.query(convertPlaceholders(sql), params);
      return {
        rows: result.rows,
        rowCount: result.rowCount ?? 0,
      };
    },

    async run(sql: string, params?: unknown[]): Promise<{ changes: number }> {
      const result = await pool.query(convertPlaceholders(sql), params);
      return { changes: result.rowCount ?? 0 };
    },

    async exec(sql: string): Promise<void> {
      const statements = sql.split(";").filter((s) => s.trim());
      for (const stmt of statements) {
        await pool.query(stmt);
      }
    },

    async close(): Promise<void> {
      await pool.end();
    },
  };
}

/**
 * Convert SQLite ? placeholders to PostgreSQL $1, $2, etc.
 */
export function convertPlaceholders(sql: string): string {
  let index = 0;
  return sql.replace(/\?/g, () => `$${++index}`);
}

/**
 * Whether an error is a primary-key / unique constraint violation on either driver
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  const code = error.code;
  if (typeof code !== "string") return false;
  // SQLITE_CONSTRAINT_PRIMARYKEY / SQLITE_CONSTRAINT_UNIQUE, Postgres unique_violation
  return code === "SQLITE_CONSTRAINT_PRIMARYKEY" || code === "SQLITE_CONSTRAINT_UNIQUE" || code === "23505";
}
