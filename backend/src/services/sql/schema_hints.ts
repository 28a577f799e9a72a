// Semantic hint rules: map table and column names to domain categories.
import { readFileSync } from "node:fs";
import { z } from "zod";
import { collapse, normalizePhrase, splitWords } from "../../utils/text";
import { LOGICAL_TYPES, type LogicalType } from "./schema_catalog";

export type HintTarget = "table" | "column";

const HintRuleSchema = z.object({
  hint: z.string().min(1),
  target: z.enum(["table", "column"]),
  synonyms: z.array(z.string().min(1)).default([]),
  types: z.array(z.enum(LOGICAL_TYPES)).default([]),
});

const HintRuleFileSchema = z.object({
  rules: z.array(HintRuleSchema).min(1),
});

export type HintRule = z.infer<typeof HintRuleSchema>;

export interface CompiledHintRule {
  hint: string;
  target: HintTarget;
  /** Normalized synonyms, e.g. `pay rate`. */
  synonyms: readonly string[];
  types: ReadonlySet<LogicalType>;
}

export interface HintRuleSet {
  rules: readonly CompiledHintRule[];
}

export function compileHintRules(input: unknown): HintRuleSet {
  const parsed = HintRuleFileSchema.parse(input);
  return {
    rules: parsed.rules.map((rule) => ({
      hint: rule.hint,
      target: rule.target,
      synonyms: rule.synonyms.map((synonym) => normalizePhrase(splitWords(synonym))),
      types: new Set(rule.types),
    })),
  };
}

export function loadHintRules(file: URL = new URL("./hint-rules.json", import.meta.url)): HintRuleSet {
  const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
  return compileHintRules(raw);
}

export const defaultHintRules = loadHintRules();

/**
 * Hints whose rules match `name`. A synonym matches when its words appear as a
 * contiguous run of the name's words, or when its collapsed form equals a single
 * word or the whole collapsed name (`payrate`, `fullname`). A rule listing logical
 * types also matches any column of those types. Result is sorted.
 */
export function matchHints(
  name: string,
  target: HintTarget,
  rules: HintRuleSet,
  logicalType?: LogicalType
): string[] {
  const words = splitWords(name).map((word) => normalizePhrase([word]));
  const whole = words.join("");
  const matched = new Set<string>();

  for (const rule of rules.rules) {
    if (rule.target !== target) continue;
    if (logicalType && rule.types.has(logicalType)) {
      matched.add(rule.hint);
      continue;
    }
    for (const synonym of rule.synonyms) {
      if (synonymMatches(words, whole, synonym)) {
        matched.add(rule.hint);
        break;
      }
    }
  }

  return [...matched].sort();
}

function synonymMatches(words: readonly string[], whole: string, synonym: string): boolean {
  const parts = synonym.split(" ");
  for (let i = 0; i + parts.length <= words.length; i++) {
    if (parts.every((part, j) => words[i + j] === part)) return true;
  }
  const collapsed = collapse(synonym);
  return collapsed === whole || words.includes(collapsed);
}

export function synonymsForHint(rules: HintRuleSet, hint: string, target: HintTarget): string[] {
  return rules.rules
    .filter((rule) => rule.hint === hint && rule.target === target)
    .flatMap((rule) => rule.synonyms);
}
