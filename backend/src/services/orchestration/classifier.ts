// Orchestration: question classifier
import { classificationCounter, notUnderstoodCounter } from "../../config/metrics";
import { QueryNotUnderstood } from "../../utils/errors";
import { mapEntities, type MapOptions, type MapperIndex } from "../mapping/entityMapper";
import type { MappedEntity, MappingResult, OperationShape, QueryIntent } from "../executors/sql.types";

const AVG_PATTERN = /\b(average|avg|mean)\b/i;
const MAX_PATTERN = /\b(maximum|max|highest|largest|biggest)\b/i;
const MIN_PATTERN = /\b(minimum|min|lowest|smallest)\b/i;
const COUNT_PATTERN = /\b(how many|count|number of)\b/i;
const SUM_PATTERN = /\b(sum|total)\b/i;

const GROUP_WORDS = new Set(["by", "per", "each"]);

/**
 * Detects the operation a question asks for. Count wins over `total` so that
 * "total number of employees" counts rather than sums.
 */
export function detectOperation(text: string, mapping: MappingResult): OperationShape {
  const groupBy = findGroupBy(mapping);
  if (AVG_PATTERN.test(text)) return { type: "aggregate", fn: "avg", groupBy };
  if (MAX_PATTERN.test(text)) return { type: "aggregate", fn: "max", groupBy };
  if (MIN_PATTERN.test(text)) return { type: "aggregate", fn: "min", groupBy };
  if (COUNT_PATTERN.test(text)) return { type: "count", groupBy };
  if (SUM_PATTERN.test(text)) return { type: "aggregate", fn: "sum", groupBy };
  return { type: "lookup" };
}

/** First table or column named after "by", "per" or "each". */
function findGroupBy(mapping: MappingResult): MappedEntity | undefined {
  const marker = mapping.tokens.find((token) => GROUP_WORDS.has(token.text));
  if (!marker) return undefined;
  return mapping.entities
    .filter((entity) => entity.start > marker.index)
    .filter((entity) => entity.binding.kind === "table" || entity.binding.kind === "column")
    .sort((a, b) => a.start - b.start)[0];
}

export function isStructuredEntity(entity: MappedEntity): boolean {
  const { binding } = entity;
  switch (binding.kind) {
    case "table":
    case "column":
    case "value":
      return true;
    case "literal":
      return binding.column !== undefined;
    case "limit":
      return false;
  }
}

/**
 * Decides how a mapped question is answered:
 * schema matches only → structured; schema matches plus leftover words → hybrid;
 * leftover words only → document; nothing → {@link QueryNotUnderstood}.
 */
export function classifyIntent(text: string, mapping: MappingResult): QueryIntent {
  const structured = mapping.entities.filter(isStructuredEntity);
  const hasFreeText = mapping.freeText.length > 0;

  if (structured.length === 0 && !hasFreeText) {
    notUnderstoodCounter.inc();
    throw new QueryNotUnderstood("The question did not match any table, column or value, and had no words to search documents for.", {
      matched: mapping.entities,
      unmatched: uncoveredWords(mapping),
    });
  }

  const kind = structured.length === 0 ? "document" : hasFreeText ? "hybrid" : "structured";
  classificationCounter.labels(kind).inc();

  return {
    kind,
    text,
    operation: kind === "document" ? { type: "lookup" } : detectOperation(text, mapping),
    entities: mapping.entities,
    freeText: mapping.freeText,
  };
}

function uncoveredWords(mapping: MappingResult): string[] {
  const covered = new Set<number>();
  for (const entity of mapping.entities) {
    for (let i = entity.start; i <= entity.end; i++) covered.add(i);
  }
  return mapping.tokens.filter((token) => token.kind === "word" && !covered.has(token.index)).map((token) => token.text);
}

export function classifyQuery(text: string, index: MapperIndex, options: MapOptions = {}): QueryIntent {
  return classifyIntent(text, mapEntities(text, index, options));
}
