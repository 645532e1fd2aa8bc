import { type QueryResultRow } from "pg";
import { sqlStateOf } from "./errors";

/**
 * The slice of the `pg` client API the engine relies on. A `pg` Pool and its
 * PoolClients satisfy these interfaces as they are.
 */

export interface SqlResult {
  rows: QueryResultRow[];
  rowCount: number | null;
}

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

/**
 * A client checked out of the pool. Transactions live on a session.
 */
export interface SqlSession extends SqlClient {
  release(): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlSession>;
  end(): Promise<void>;
}

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

/**
 * Validate a table name taken from configuration. Accepts `name` or `schema.name`.
 */
export function assertSafeTableName(name: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new Error(`Invalid table name: ${name}`);
  }

  return name;
}

/**
 * Quote an identifier such as a policy or trigger name
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Split `schema.table` into its parts, defaulting the schema to `public`
 */
export function splitTableName(name: string): { schema: string; table: string } {
  const dot = name.indexOf(".");

  if (dot === -1) {
    return { schema: "public", table: name };
  }

  return { schema: name.slice(0, dot), table: name.slice(dot + 1) };
}

/**
 * Two sessions racing `CREATE TABLE IF NOT EXISTS` can both pass the existence
 * check; the loser fails on the catalog's unique index (23505) or with
 * duplicate_table (42P07) although the table is there.
 */
export function isAlreadyCreated(error: unknown): boolean {
  const state = sqlStateOf(error);
  return state === "23505" || state === "42P07";
}
