// Entity mapping: match spans of a question against schema names, hints and sampled values.
import { readFileSync } from "node:fs";
import { z } from "zod";
import { MATCH_THRESHOLD } from "../../config/constants";
import { collapse, normalizePhrase, similarity, splitWords } from "../../utils/text";
import type { SchemaCatalog } from "../sql/schema_catalog";
import { defaultHintRules, synonymsForHint, type HintRuleSet } from "../sql/schema_hints";
import type {
  EntityBinding,
  FilterOperator,
  LiteralValue,
  MappedEntity,
  MappingResult,
  Token,
} from "../executors/sql.types";

const LexiconSchema = z.object({
  stopwords: z.array(z.string()),
  operationWords: z.array(z.string()),
  comparisonWords: z.array(z.string()),
});

const lexicon = LexiconSchema.parse(
  JSON.parse(readFileSync(new URL("./lexicon.json", import.meta.url), "utf8"))
);

export const STOPWORDS: ReadonlySet<string> = new Set(lexicon.stopwords);
export const OPERATION_WORDS: ReadonlySet<string> = new Set(lexicon.operationWords);
export const COMPARISON_WORDS: ReadonlySet<string> = new Set(lexicon.comparisonWords);

const MAX_NGRAM = 3;
const MIN_FUZZY_LENGTH = 4;

const WEIGHTS = {
  name: 1.0,
  tableHint: 0.9,
  columnHint: 0.85,
  value: 0.95,
} as const;

type SchemaBinding = Extract<EntityBinding, { kind: "table" | "column" | "value" }>;

export interface MatchTarget {
  label: string;
  binding: SchemaBinding;
  matchedBy: "name" | "hint" | "value";
  weight: number;
}

/** Everything the mapper compares against, derived once per catalog. */
export interface MapperIndex {
  connectionId: string;
  targets: readonly MatchTarget[];
}

export function buildMapperIndex(catalog: SchemaCatalog, rules: HintRuleSet = defaultHintRules): MapperIndex {
  const targets = new Map<string, MatchTarget>();
  const add = (target: MatchTarget) => {
    if (!target.label) return;
    const key = `${target.label}|${JSON.stringify(target.binding)}`;
    const existing = targets.get(key);
    if (!existing || existing.weight < target.weight) targets.set(key, target);
  };

  for (const table of catalog.tables) {
    const tableBinding: SchemaBinding = { kind: "table", table: table.name };
    add({ label: normalizePhrase(splitWords(table.name)), binding: tableBinding, matchedBy: "name", weight: WEIGHTS.name });
    for (const hint of table.hints) {
      for (const synonym of synonymsForHint(rules, hint, "table")) {
        add({ label: synonym, binding: tableBinding, matchedBy: "hint", weight: WEIGHTS.tableHint });
      }
    }

    for (const column of table.columns) {
      const columnBinding: SchemaBinding = { kind: "column", table: table.name, column: column.name };
      add({ label: normalizePhrase(splitWords(column.name)), binding: columnBinding, matchedBy: "name", weight: WEIGHTS.name });
      for (const hint of column.hints) {
        for (const synonym of synonymsForHint(rules, hint, "column")) {
          add({ label: synonym, binding: columnBinding, matchedBy: "hint", weight: WEIGHTS.columnHint });
        }
      }
      for (const value of column.sampleValues) {
        if (value.length < 2 || value.length > 60 || /^[\d\s.,-]+$/.test(value)) continue;
        add({
          label: normalizePhrase(splitWords(value)),
          binding: { kind: "value", table: table.name, column: column.name, value },
          matchedBy: "value",
          weight: WEIGHTS.value,
        });
      }
    }
  }

  return { connectionId: catalog.connectionId, targets: [...targets.values()] };
}

const TOKEN_PATTERN = /\d{4}-\d{2}-\d{2}|\d+(?:\.\d+)?[km]?|[a-z][a-z0-9_]*/g;

export function tokenize(text: string): Token[] {
  const cleaned = text.toLowerCase().replace(/(\d),(?=\d{3}(?!\d))/g, "$1");
  const tokens: Token[] = [];
  for (const match of cleaned.matchAll(TOKEN_PATTERN)) {
    const value = match[0];
    const kind = /^\d{4}-\d{2}-\d{2}$/.test(value) ? "date" : /^\d/.test(value) ? "number" : "word";
    tokens.push({ text: value, index: tokens.length, kind });
  }
  return tokens;
}

export function isContentWord(word: string): boolean {
  return !STOPWORDS.has(word) && !OPERATION_WORDS.has(word) && !COMPARISON_WORDS.has(word);
}

interface Candidate {
  start: number;
  end: number;
  phrase: string;
  target: MatchTarget;
  confidence: number;
}

export interface MapOptions {
  threshold?: number;
}

/**
 * Maps a question onto the schema. Overlapping candidates are resolved greedily by
 * confidence, then by affinity to tables already named in the question, then by the
 * shortest label. Literals bind to the nearest mapped column.
 */
export function mapEntities(text: string, index: MapperIndex, options: MapOptions = {}): MappingResult {
  const threshold = options.threshold ?? MATCH_THRESHOLD;
  const tokens = tokenize(text);
  const candidates = collectCandidates(tokens, index, threshold);

  const namedTables = new Set(
    candidates.flatMap((c) => (c.target.binding.kind === "table" ? [c.target.binding.table] : []))
  );
  candidates.sort((a, b) => compareCandidates(a, b, namedTables));

  const covered = new Set<number>();
  const entities: MappedEntity[] = [];
  for (const candidate of candidates) {
    if (overlaps(covered, candidate.start, candidate.end)) continue;
    for (let i = candidate.start; i <= candidate.end; i++) covered.add(i);
    entities.push({
      phrase: candidate.phrase,
      start: candidate.start,
      end: candidate.end,
      binding: candidate.target.binding,
      confidence: round(candidate.confidence),
      matchedBy: candidate.target.matchedBy,
    });
  }

  const columns = entities.filter((e) => e.binding.kind === "column");
  for (const literal of extractLiterals(tokens)) {
    for (let i = literal.start; i <= literal.end; i++) covered.add(i);
    entities.push(bindLiteral(literal, columns));
  }

  entities.sort((a, b) => b.confidence - a.confidence || a.start - b.start);

  const freeText: string[] = [];
  for (const token of tokens) {
    if (token.kind !== "word" || covered.has(token.index)) continue;
    if (token.text.length < 2 || !isContentWord(token.text)) continue;
    if (!freeText.includes(token.text)) freeText.push(token.text);
  }

  return { tokens, entities, freeText };
}

function collectCandidates(tokens: Token[], index: MapperIndex, threshold: number): Candidate[] {
  const candidates: Candidate[] = [];
  for (let start = 0; start < tokens.length; start++) {
    for (let size = 1; size <= MAX_NGRAM && start + size <= tokens.length; size++) {
      const span = tokens.slice(start, start + size);
      if (span.some((token) => token.kind !== "word")) break;
      if (!isBoundary(span[0].text) || !isBoundary(span[span.length - 1].text)) continue;

      const phrase = normalizePhrase(span.flatMap((token) => splitWords(token.text)));
      for (const target of index.targets) {
        const confidence = score(phrase, target.label) * target.weight;
        if (confidence < threshold) continue;
        candidates.push({ start, end: start + size - 1, phrase: span.map((t) => t.text).join(" "), target, confidence });
      }
    }
  }
  return candidates;
}

function isBoundary(word: string): boolean {
  return !STOPWORDS.has(word) && !COMPARISON_WORDS.has(word);
}

function score(phrase: string, label: string): number {
  const left = collapse(phrase);
  const right = collapse(label);
  if (Math.min(left.length, right.length) < MIN_FUZZY_LENGTH) return left === right ? 1 : 0;
  return similarity(left, right);
}

function compareCandidates(a: Candidate, b: Candidate, namedTables: ReadonlySet<string>): number {
  if (Math.abs(a.confidence - b.confidence) > 1e-9) return b.confidence - a.confidence;
  const affinity = affinityOf(b, namedTables) - affinityOf(a, namedTables);
  if (affinity !== 0) return affinity;
  if (a.target.label.length !== b.target.label.length) return a.target.label.length - b.target.label.length;
  const width = b.end - b.start - (a.end - a.start);
  if (width !== 0) return width;
  return a.start - b.start;
}

function affinityOf(candidate: Candidate, namedTables: ReadonlySet<string>): number {
  const { binding } = candidate.target;
  return binding.kind !== "table" && namedTables.has(binding.table) ? 1 : 0;
}

function overlaps(covered: ReadonlySet<number>, start: number, end: number): boolean {
  for (let i = start; i <= end; i++) if (covered.has(i)) return true;
  return false;
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

interface Literal {
  start: number;
  end: number;
  phrase: string;
  literalType: "number" | "date";
  value: LiteralValue;
  operator: FilterOperator;
  limit: boolean;
}

const OPERATOR_PHRASES: ReadonlyArray<readonly [string[], FilterOperator]> = [
  [["more", "than"], "gt"],
  [["greater", "than"], "gt"],
  [["later", "than"], "gt"],
  [["at", "least"], "gte"],
  [["less", "than"], "lt"],
  [["fewer", "than"], "lt"],
  [["earlier", "than"], "lt"],
  [["at", "most"], "lte"],
  [["up", "to"], "lte"],
  [["equal", "to"], "eq"],
  [["exactly"], "eq"],
  [["over"], "gt"],
  [["above"], "gt"],
  [["exceeding"], "gt"],
  [["exceeds"], "gt"],
  [["after"], "gt"],
  [["since"], "gte"],
  [["under"], "lt"],
  [["below"], "lt"],
  [["before"], "lt"],
];

const LIMIT_WORDS = new Set(["top", "first", "limit"]);

function literalValue(token: Token): string | number {
  if (token.kind === "date") return token.text;
  const multiplier = token.text.endsWith("k") ? 1_000 : token.text.endsWith("m") ? 1_000_000 : 1;
  const digits = multiplier === 1 ? token.text : token.text.slice(0, -1);
  return Number(digits) * multiplier;
}

function extractLiterals(tokens: Token[]): Literal[] {
  const literals: Literal[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.kind === "word") continue;
    const literalType = token.kind === "date" ? "date" : "number";
    const previous = tokens[i - 1]?.text;

    const and = tokens[i + 1];
    const upper = tokens[i + 2];
    if (previous === "between" && and?.text === "and" && upper && upper.kind === token.kind) {
      literals.push({
        start: i,
        end: i + 2,
        phrase: `${token.text} and ${upper.text}`,
        literalType,
        value: [literalValue(token), literalValue(upper)],
        operator: "between",
        limit: false,
      });
      i += 2;
      continue;
    }

    const value = literalValue(token);
    const isLimit = previous !== undefined && LIMIT_WORDS.has(previous) && typeof value === "number" && Number.isInteger(value);
    literals.push({
      start: i,
      end: i,
      phrase: token.text,
      literalType,
      value,
      operator: isLimit ? "eq" : operatorBefore(tokens, i),
      limit: isLimit,
    });
  }
  return literals;
}

function operatorBefore(tokens: Token[], index: number): FilterOperator {
  for (const [words, operator] of OPERATOR_PHRASES) {
    const from = index - words.length;
    if (from < 0) continue;
    if (words.every((word, offset) => tokens[from + offset].text === word)) return operator;
  }
  return "eq";
}

function bindLiteral(literal: Literal, columns: MappedEntity[]): MappedEntity {
  const base = { phrase: literal.phrase, start: literal.start, end: literal.end, confidence: 1, matchedBy: "pattern" as const };
  if (literal.limit && typeof literal.value === "number") {
    return { ...base, binding: { kind: "limit", value: literal.value } };
  }

  let nearest: { entity: MappedEntity; distance: number; before: boolean } | undefined;
  for (const entity of columns) {
    const before = entity.end < literal.start;
    const distance = before ? literal.start - entity.end : entity.start - literal.end;
    if (!nearest || distance < nearest.distance || (distance === nearest.distance && before && !nearest.before)) {
      nearest = { entity, distance, before };
    }
  }

  const target = nearest?.entity.binding;
  return {
    ...base,
    binding: {
      kind: "literal",
      literalType: literal.literalType,
      value: literal.value,
      operator: literal.operator,
      ...(target && target.kind === "column" ? { table: target.table, column: target.column } : {}),
    },
  };
}
