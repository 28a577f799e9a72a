// Structured branch: compile a plan and run it against the connected store.
import type { TableResult } from "../../../../shared/types";
import { withSpan } from "../../config/otel";
import { mapDriverError, type StorageConnection } from "../../db/client";
import { logger } from "../../utils/logger";
import type { SchemaCatalog } from "../sql/schema_catalog";
import { buildSQLFromPlan } from "./sql.binder";
import type { CompiledSQL, QueryPlan } from "./sql.types";

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export interface StorageExecutor {
  compile(plan: QueryPlan): CompiledSQL;
  execute(plan: QueryPlan, options?: ExecuteOptions): Promise<TableResult>;
}

export class SqlExecutor implements StorageExecutor {
  constructor(
    private readonly connection: StorageConnection,
    private readonly catalog: SchemaCatalog
  ) {}

  compile(plan: QueryPlan): CompiledSQL {
    return buildSQLFromPlan(plan, this.catalog);
  }

  async execute(plan: QueryPlan, options: ExecuteOptions = {}): Promise<TableResult> {
    const compiled = this.compile(plan);
    return await withSpan(
      "sql.execute",
      async () => {
        options.signal?.throwIfAborted();
        let rows;
        try {
          rows = await this.connection.query(compiled.sql, compiled.params);
        } catch (err) {
          const mapped = mapDriverError(err, `running a query on "${plan.from}"`);
          logger.warn({ code: mapped.code, table: plan.from, err: mapped.message }, "structured query failed");
          throw mapped;
        }
        logger.debug({ sql: compiled.sql, rows: rows.length }, "structured query executed");
        return {
          columns: plan.select.map((projection) => projection.alias),
          rows,
          page: plan.page,
          pageSize: plan.pageSize,
        };
      },
      { table: plan.from, joins: plan.joins.length, operation: plan.operation }
    );
  }
}

export function createExecutor(connection: StorageConnection, catalog: SchemaCatalog): StorageExecutor {
  return new SqlExecutor(connection, catalog);
}
