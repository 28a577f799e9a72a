// Hybrid answers: combine the structured and document branches.
import type { BranchError, DocumentHit, HybridResult, TableResult } from "../../../shared/types";
import { branchFailuresCounter } from "../config/metrics";
import { isEngineError, toError } from "../utils/errors";
import { logger } from "../utils/logger";

function describeFailure(reason: unknown): BranchError {
  const error = toError(reason);
  return { code: isEngineError(error) ? error.code : "INTERNAL_ERROR", message: error.message };
}

/**
 * Merges settled branch outcomes. One failed branch yields a partial result with
 * the failure recorded; when both fail the structured failure is rethrown.
 */
export function mergeHybrid(
  table: PromiseSettledResult<TableResult>,
  documents: PromiseSettledResult<DocumentHit[]>,
  emptyTable: TableResult
): HybridResult {
  if (table.status === "rejected" && documents.status === "rejected") {
    throw toError(table.reason);
  }

  const errors: HybridResult["errors"] = {};
  if (table.status === "rejected") {
    errors.table = describeFailure(table.reason);
    branchFailuresCounter.labels("table", errors.table.code).inc();
    logger.warn({ branch: "table", ...errors.table }, "hybrid branch failed");
  }
  if (documents.status === "rejected") {
    errors.documents = describeFailure(documents.reason);
    branchFailuresCounter.labels("documents", errors.documents.code).inc();
    logger.warn({ branch: "documents", ...errors.documents }, "hybrid branch failed");
  }

  return {
    table: table.status === "fulfilled" ? table.value : emptyTable,
    documents: documents.status === "fulfilled" ? documents.value : [],
    partialFailure: table.status === "rejected" || documents.status === "rejected",
    errors,
  };
}
