// Per-dialect catalog readers. Each returns raw facts; interpretation happens in discovery.
import { quoteIdentifier, type Row, type StorageConnection } from "../../db/client";

export interface RawColumn {
  name: string;
  dataType: string;
  nullable: boolean;
  primaryKey: boolean;
}

export interface RawForeignKey {
  column: string;
  refTable: string;
  /** Null when the store leaves the referenced column implicit (SQLite). */
  refColumn: string | null;
}

export interface Introspector {
  listTables(): Promise<string[]>;
  columns(table: string): Promise<RawColumn[]>;
  foreignKeys(table: string): Promise<RawForeignKey[]>;
  sampleRows(table: string, limit: number): Promise<Row[]>;
}

export function createIntrospector(connection: StorageConnection): Introspector {
  switch (connection.dialect) {
    case "postgres":
      return new PostgresIntrospector(connection);
    case "mysql":
      return new MySqlIntrospector(connection);
    case "sqlite":
      return new SqliteIntrospector(connection);
  }
}

function text(row: Row, key: string): string {
  const value = row[key];
  if (typeof value === "string") return value;
  if (value === null || value === undefined) return "";
  return String(value);
}

abstract class BaseIntrospector implements Introspector {
  constructor(protected readonly connection: StorageConnection) {}

  abstract listTables(): Promise<string[]>;
  abstract columns(table: string): Promise<RawColumn[]>;
  abstract foreignKeys(table: string): Promise<RawForeignKey[]>;

  async sampleRows(table: string, limit: number): Promise<Row[]> {
    const quoted = quoteIdentifier(this.connection.dialect, table);
    return await this.connection.query(`SELECT * FROM ${quoted} LIMIT ?`, [limit]);
  }
}

class PostgresIntrospector extends BaseIntrospector {
  async listTables() {
    const rows = await this.connection.query(
      `SELECT table_name FROM information_schema.tables
       WHERE table_schema = current_schema() AND table_type = 'BASE TABLE'
       ORDER BY table_name`
    );
    return rows.map((row) => text(row, "table_name"));
  }

  async columns(table: string) {
    const rows = await this.connection.query(
      `SELECT c.column_name, c.data_type, c.is_nullable,
              EXISTS (
                SELECT 1 FROM information_schema.table_constraints tc
                JOIN information_schema.key_column_usage kcu
                  ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
                WHERE tc.constraint_type = 'PRIMARY KEY'
                  AND tc.table_schema = c.table_schema
                  AND tc.table_name = c.table_name
                  AND kcu.column_name = c.column_name
              ) AS is_primary
       FROM information_schema.columns c
       WHERE c.table_schema = current_schema() AND c.table_name = ?
       ORDER BY c.ordinal_position`,
      [table]
    );
    return rows.map((row) => ({
      name: text(row, "column_name"),
      dataType: text(row, "data_type"),
      nullable: text(row, "is_nullable") === "YES",
      primaryKey: row.is_primary === true,
    }));
  }

  async foreignKeys(table: string) {
    const rows = await this.connection.query(
      `SELECT kcu.column_name, ccu.table_name AS foreign_table_name, ccu.column_name AS foreign_column_name
       FROM information_schema.table_constraints AS tc
       JOIN information_schema.key_column_usage AS kcu
         ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
       JOIN information_schema.constraint_column_usage AS ccu
         ON ccu.constraint_name = tc.constraint_name AND ccu.table_schema = tc.table_schema
       WHERE tc.constraint_type = 'FOREIGN KEY'
         AND tc.table_schema = current_schema()
         AND tc.table_name = ?`,
      [table]
    );
    return rows.map((row) => ({
      column: text(row, "column_name"),
      refTable: text(row, "foreign_table_name"),
      refColumn: text(row, "foreign_column_name"),
    }));
  }
}

class MySqlIntrospector extends BaseIntrospector {
  async listTables() {
    const rows = await this.connection.query(
      `SELECT table_name AS table_name FROM information_schema.tables
       WHERE table_schema = DATABASE() AND table_type = 'BASE TABLE'
       ORDER BY table_name`
    );
    return rows.map((row) => text(row, "table_name"));
  }

  async columns(table: string) {
    const rows = await this.connection.query(
      `SELECT column_name AS column_name, data_type AS data_type,
              is_nullable AS is_nullable, column_key AS column_key
       FROM information_schema.columns
       WHERE table_schema = DATABASE() AND table_name = ?
       ORDER BY ordinal_position`,
      [table]
    );
    return rows.map((row) => ({
      name: text(row, "column_name"),
      dataType: text(row, "data_type"),
      nullable: text(row, "is_nullable") === "YES",
      primaryKey: text(row, "column_key") === "PRI",
    }));
  }

  async foreignKeys(table: string) {
    const rows = await this.connection.query(
      `SELECT column_name AS column_name, referenced_table_name AS ref_table,
              referenced_column_name AS ref_column
       FROM information_schema.key_column_usage
       WHERE table_schema = DATABASE() AND table_name = ? AND referenced_table_name IS NOT NULL`,
      [table]
    );
    return rows.map((row) => ({
      column: text(row, "column_name"),
      refTable: text(row, "ref_table"),
      refColumn: text(row, "ref_column"),
    }));
  }
}

class SqliteIntrospector extends BaseIntrospector {
  async listTables() {
    const rows = await this.connection.query(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    );
    return rows.map((row) => text(row, "name"));
  }

  // PRAGMA arguments cannot be bound; names come from sqlite_master and are quoted.
  async columns(table: string) {
    const rows = await this.connection.query(`PRAGMA table_info(${quoteIdentifier("sqlite", table)})`);
    return rows.map((row) => ({
      name: text(row, "name"),
      dataType: text(row, "type"),
      nullable: Number(row.notnull) === 0 && Number(row.pk) === 0,
      primaryKey: Number(row.pk) > 0,
    }));
  }

  async foreignKeys(table: string) {
    const rows = await this.connection.query(`PRAGMA foreign_key_list(${quoteIdentifier("sqlite", table)})`);
    return rows.map((row) => ({
      column: text(row, "from"),
      refTable: text(row, "table"),
      refColumn: row.to === null || row.to === undefined ? null : text(row, "to"),
    }));
  }
}
