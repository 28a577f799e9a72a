/* Storage connections: descriptor parsing, knex clients and driver error mapping */
import { createHash } from "node:crypto";
import knex, { type Knex } from "knex";
import {
  ConnectionError,
  EngineError,
  QuerySyntaxError,
  TimeoutError,
  UnsupportedDescriptorError,
} from "../utils/errors";
import { logger } from "../utils/logger";

export type Dialect = "postgres" | "mysql" | "sqlite";

export type Row = Record<string, unknown>;
export type BindValue = string | number | boolean | null;

/**
 * A live handle on the store being translated against. Everything above this
 * interface speaks in SQL text plus positional `?` bindings.
 */
export interface StorageConnection {
  readonly id: string;
  readonly dialect: Dialect;
  /** Descriptor with credentials masked, safe to log. */
  readonly redacted: string;
  query(sql: string, bindings?: readonly BindValue[]): Promise<Row[]>;
  close(): Promise<void>;
}

export interface ConnectionTarget {
  dialect: Dialect;
  config: Knex.Config;
  connectionId: string;
  redacted: string;
}

export function parseConnectionDescriptor(descriptor: string): ConnectionTarget {
  const trimmed = descriptor.trim();
  const connectionId = createHash("sha256").update(trimmed).digest("hex").slice(0, 16);
  const redacted = redactDescriptor(trimmed);

  if (/^postgres(ql)?:\/\//i.test(trimmed)) {
    return {
      dialect: "postgres",
      config: { client: "pg", connection: trimmed, pool: { min: 0, max: 5 } },
      connectionId,
      redacted,
    };
  }

  if (/^mysql2?:\/\//i.test(trimmed)) {
    return {
      dialect: "mysql",
      config: {
        client: "mysql2",
        connection: trimmed.replace(/^mysql2:/i, "mysql:"),
        pool: { min: 0, max: 5 },
      },
      connectionId,
      redacted,
    };
  }

  const filename = sqliteFilename(trimmed);
  if (filename !== null) {
    return {
      dialect: "sqlite",
      config: {
        client: "better-sqlite3",
        connection: { filename },
        useNullAsDefault: true,
        // one connection so an in-memory database is shared by every query
        pool: { min: 1, max: 1 },
      },
      connectionId,
      redacted,
    };
  }

  const scheme = /^([a-z][a-z0-9+.-]*):/i.exec(trimmed)?.[1] ?? "unknown";
  throw new UnsupportedDescriptorError(scheme);
}

function sqliteFilename(descriptor: string): string | null {
  if (/^sqlite::memory:$/i.test(descriptor) || descriptor === ":memory:") return ":memory:";
  const prefixed = /^(?:sqlite3?|file):(?:\/\/)?(.+)$/i.exec(descriptor);
  if (prefixed) return prefixed[1];
  if (/\.(db|sqlite3?)$/i.test(descriptor)) return descriptor;
  return null;
}

export function redactDescriptor(descriptor: string): string {
  return descriptor.replace(/\/\/([^:/@]+):([^@]*)@/, "//$1:***@");
}

export async function openConnection(descriptor: string): Promise<StorageConnection> {
  const target = parseConnectionDescriptor(descriptor);
  const db = knex(target.config);
  const connection = new KnexConnection(db, target);
  try {
    await connection.query("SELECT 1");
  } catch (err) {
    await db.destroy();
    throw mapDriverError(err, `connecting to ${target.redacted}`);
  }
  logger.info({ dialect: target.dialect, target: target.redacted }, "storage connected");
  return connection;
}

export class KnexConnection implements StorageConnection {
  readonly id: string;
  readonly dialect: Dialect;
  readonly redacted: string;

  constructor(private readonly db: Knex, target: ConnectionTarget) {
    this.id = target.connectionId;
    this.dialect = target.dialect;
    this.redacted = target.redacted;
  }

  async query(sql: string, bindings: readonly BindValue[] = []): Promise<Row[]> {
    const result: unknown = await this.db.raw(sql, [...bindings]);
    return extractRows(result);
  }

  async close(): Promise<void> {
    await this.db.destroy();
    logger.debug({ target: this.redacted }, "storage connection closed");
  }
}

/**
 * knex.raw hands back the driver's own result shape:
 * pg `{ rows }`, mysql2 `[rows, fields]`, better-sqlite3 the row array.
 */
export function extractRows(result: unknown): Row[] {
  if (isRow(result) && Array.isArray(result.rows)) return result.rows.filter(isRow).map(normalizeRow);
  if (Array.isArray(result)) {
    const rows = result.length === 2 && Array.isArray(result[0]) ? result[0] : result;
    return rows.filter(isRow).map(normalizeRow);
  }
  return [];
}

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeRow(row: Row): Row {
  const out: Row = {};
  for (const [key, value] of Object.entries(row)) {
    if (typeof value === "bigint") {
      out[key] = Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
    } else {
      out[key] = value;
    }
  }
  return out;
}

export function quoteIdentifier(dialect: Dialect, identifier: string): string {
  if (dialect === "mysql") return `\`${identifier.replace(/`/g, "``")}\``;
  return `"${identifier.replace(/"/g, '""')}"`;
}

const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ETIMEDOUT",
  "EPIPE",
  "PROTOCOL_CONNECTION_LOST",
  "ER_ACCESS_DENIED_ERROR",
  "ER_BAD_DB_ERROR",
  "ER_CON_COUNT_ERROR",
  "SQLITE_CANTOPEN",
  "SQLITE_NOTADB",
  "SQLITE_CORRUPT",
  "28000",
  "28P01",
  "3D000",
  "53300",
  "57P01",
  "57P03",
]);

const CANCELLED_CODES = new Set(["57014", "ER_QUERY_TIMEOUT", "ER_QUERY_INTERRUPTED"]);

/** Maps a driver failure onto the engine's error taxonomy by its error code. */
export function mapDriverError(error: unknown, context: string): EngineError {
  if (error instanceof EngineError) return error;
  const code = errorCode(error);
  const detail = error instanceof Error ? error.message : String(error);

  if (error instanceof Error && error.name === "KnexTimeoutError") {
    return new ConnectionError(`Timed out acquiring a connection while ${context}`, { cause: error });
  }
  if (code && CANCELLED_CODES.has(code)) {
    return new TimeoutError(context);
  }
  if (code && (CONNECTION_CODES.has(code) || code.startsWith("08"))) {
    return new ConnectionError(`Connection failed while ${context}: ${detail}`, { cause: error });
  }
  return new QuerySyntaxError(`Storage rejected the statement while ${context}: ${detail}`, { cause: error });
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  const { code } = error;
  return typeof code === "string" ? code : undefined;
}
