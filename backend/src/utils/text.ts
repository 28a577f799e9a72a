// Name and phrase normalization shared by schema hints, discovery and entity mapping.

const IRREGULAR_PLURALS = new Map<string, string>([
  ["people", "person"],
  ["men", "man"],
  ["women", "woman"],
  ["children", "child"],
  ["data", "data"],
]);

/** Splits an identifier or phrase into lowercase words: `annualSalary`, `annual_salary` → `annual salary`. */
export function splitWords(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);
}

export function singularize(word: string): string {
  const irregular = IRREGULAR_PLURALS.get(word);
  if (irregular) return irregular;
  if (word.length <= 3) return word;
  if (word.endsWith("ies")) return `${word.slice(0, -3)}y`;
  if (/(ses|xes|zes|ches|shes)$/.test(word)) return word.slice(0, -2);
  if (/(ss|us|is)$/.test(word)) return word;
  if (word.endsWith("s")) return word.slice(0, -1);
  return word;
}

/** Singular, lowercase, space-separated form used for every name comparison. */
export function normalizePhrase(words: readonly string[]): string {
  return words.map(singularize).join(" ");
}

export function normalizeName(name: string): string {
  return normalizePhrase(splitWords(name));
}

export function collapse(phrase: string): string {
  return phrase.replace(/\s+/g, "");
}

/** Edit-distance similarity in [0, 1] on whitespace-collapsed strings. */
export function similarity(a: string, b: string): number {
  const left = collapse(a);
  const right = collapse(b);
  if (left === right) return 1;
  const longest = Math.max(left.length, right.length);
  if (longest === 0) return 1;
  return 1 - levenshtein(left, right) / longest;
}

export function levenshtein(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;
  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(current[j - 1] + 1, previous[j] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}
