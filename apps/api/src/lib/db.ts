import { randomUUID } from "node:crypto";
import { Pool, type QueryResult, type QueryResultRow } from "pg";

export type DbClient = Pool;

export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>>;
}

/** A checked-out connection; every statement of a transaction goes through it. */
export interface SqlSession extends SqlExecutor {
  release(): void;
}

export interface SqlPool extends SqlExecutor {
  connect(): Promise<SqlSession>;
}

export function createDbPool(databaseUrl: string): DbClient {
  return new Pool({
    connectionString: databaseUrl,
  });
}

export function newId(): string {
  return randomUUID();
}

export function newApplicationId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:T]/g, "").slice(0, 14);
  return `app_${stamp}_${randomUUID().replaceAll("-", "").slice(0, 6)}`;
}

export function isUniqueViolation(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "23505";
}
