export type ScoredField = "searchContent" | "summary" | "path" | "description";

export type ScoringFields = Record<ScoredField, string>;

type FieldWeight = { field: ScoredField; score: number };

// First matching row wins in both tables.
export const PHRASE_TIERS: readonly FieldWeight[] = [
  { field: "searchContent", score: 150 },
  { field: "summary", score: 120 },
  { field: "path", score: 100 },
  { field: "description", score: 80 }
];
export const NO_PHRASE_TIER = 10;

export const TOKEN_BONUSES: readonly FieldWeight[] = [
  { field: "summary", score: 15 },
  { field: "path", score: 12 },
  { field: "description", score: 8 },
  { field: "searchContent", score: 5 }
];

export const PATH_EXACT_SCORE = 100;
export const PATH_SUBSTRING_SCORE = 80;
export const PATH_FLOOR_SCORE = 50;

export const DESCRIPTION_SUMMARY_SCORE = 100;
export const DESCRIPTION_BODY_SCORE = 90;
export const DESCRIPTION_FLOOR_SCORE = 30;

function contains(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

export function tierScore(fields: ScoringFields, phrase: string): number {
  for (const tier of PHRASE_TIERS) {
    if (contains(fields[tier.field], phrase)) {
      return tier.score;
    }
  }
  return NO_PHRASE_TIER;
}

export function tokenBonus(fields: ScoringFields, token: string): number {
  for (const bonus of TOKEN_BONUSES) {
    if (contains(fields[bonus.field], token)) {
      return bonus.score;
    }
  }
  return 0;
}

/**
 * Whole-phrase tier plus one bonus per query token. Tokens are not
 * de-duplicated, so a repeated word counts every time it appears.
 */
export function naturalLanguageScore(fields: ScoringFields, phrase: string, tokens: string[]): number {
  return tokens.reduce((total, token) => total + tokenBonus(fields, token), tierScore(fields, phrase));
}

export function pathScore(path: string, pathQuery: string): number {
  if (path === pathQuery) return PATH_EXACT_SCORE;
  if (contains(path, pathQuery)) return PATH_SUBSTRING_SCORE;
  return PATH_FLOOR_SCORE;
}

export function descriptionScore(fields: Pick<ScoringFields, "summary" | "description">, text: string): number {
  if (contains(fields.summary, text)) return DESCRIPTION_SUMMARY_SCORE;
  if (contains(fields.description, text)) return DESCRIPTION_BODY_SCORE;
  return DESCRIPTION_FLOOR_SCORE;
}

export type Ranked = { path: string; method: string; score: number };

/** Score descending, then path ascending (code-unit order), then method. */
export function compareRanked(a: Ranked, b: Ranked): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  if (a.path !== b.path) {
    return a.path < b.path ? -1 : 1;
  }
  if (a.method === b.method) return 0;
  return a.method < b.method ? -1 : 1;
}
