// Postgres access for the campaign engine.
// The pool is created on first use: the Trigger.dev indexer imports every task
// file, and DATABASE_URL may not be set during that phase.

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import pg from "pg";
import type { Pool, PoolClient, QueryResult, QueryResultRow } from "pg";
import { getConfig } from "./config";
import { CampaignEngineError } from "./errors";
import { logger } from "./logger";

const MIGRATION_FILE = "migrations/001_campaign_engine.sql";

let pool: Pool | null = null;
let schemaReady: Promise<void> | null = null;

function getPool(): Pool {
  if (pool) return pool;
  const connectionString = getConfig().DATABASE_URL;
  if (!connectionString) {
    throw new CampaignEngineError("CONFIG", "DATABASE_URL is not set");
  }
  pool = new pg.Pool({ connectionString, max: 5 });
  pool.on("error", (error) => logger.error("Idle Postgres client error", { error }));
  return pool;
}

// Deployed bundles carry the migration beside the worker (cwd); local runs read it from the source tree.
function migrationPath(): string {
  const candidates = [
    resolve(process.cwd(), MIGRATION_FILE),
    resolve(process.cwd(), "trigger", MIGRATION_FILE),
    fileURLToPath(new URL(`../${MIGRATION_FILE}`, import.meta.url)),
  ];
  const found = candidates.find((candidate) => existsSync(candidate));
  if (!found) throw new CampaignEngineError("CONFIG", `Migration file not found`, { candidates });
  return found;
}

async function query<R extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []): Promise<QueryResult<R>> {
  return getPool().query<R>(text, params);
}

async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

/** Applies the schema once per process. */
function ensureSchema(): Promise<void> {
  if (!schemaReady) {
    schemaReady = (async () => {
      const sql = await readFile(migrationPath(), "utf8");
      await query(sql);
      logger.info("Campaign engine schema ready");
    })();
    schemaReady.catch(() => {
      schemaReady = null;
    });
  }
  return schemaReady;
}

async function close(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  schemaReady = null;
  await current.end();
}

const db = { query, withTransaction, ensureSchema, close };

export default db;
export type Db = typeof db;
export { logger };
