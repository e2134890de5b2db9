import type { EndpointRow } from "@/lib/endpoint-store";
import { isStringArray, toJsonValue, type JsonValue } from "@/lib/json";

const DESCRIPTION_PREVIEW_LENGTH = 100;
const ELLIPSIS = "...";

export type SearchResult = {
  path: string;
  method: string;
  operationId: string | null;
  summary: string;
  description: string;
  tags: string[];
  sampleLanguages: string[];
  score: number;
};

/**
 * Keeps the first `maxLength` characters and appends "..." when anything was
 * cut. Lengths are counted in code points so surrogate pairs stay whole.
 */
export function truncateDescription(text: string | null | undefined, maxLength = DESCRIPTION_PREVIEW_LENGTH): string {
  const value = text ?? "";
  const characters = Array.from(value);
  if (characters.length <= maxLength) {
    return value;
  }
  return `${characters.slice(0, maxLength).join("")}${ELLIPSIS}`;
}

export function toSearchResult(row: EndpointRow, score: number): SearchResult {
  return {
    path: row.path,
    method: row.method,
    operationId: row.operation_id,
    summary: row.summary ?? "",
    description: truncateDescription(row.description),
    tags: decodeStringList(row.tags, "tags", row.path),
    sampleLanguages: decodeStringList(row.sample_languages, "sample_languages", row.path),
    score: Number(score)
  };
}

/**
 * Parses a JSON text column. Empty columns, invalid JSON and values rejected
 * by `accept` all yield `fallback`; only the latter two are logged.
 */
export function decodeJsonColumn<T>(
  text: string | null | undefined,
  accept: (value: unknown) => value is T,
  fallback: T,
  context: { column: string; key: string }
): T {
  if (!text) {
    return fallback;
  }

  let parsed: JsonValue;
  try {
    parsed = toJsonValue(JSON.parse(text));
  } catch (error) {
    console.warn("[result-format] failed to parse stored JSON column", {
      ...context,
      reason: error instanceof Error ? error.message : "unknown error"
    });
    return fallback;
  }

  if (!accept(parsed)) {
    console.warn("[result-format] failed to parse stored JSON column", {
      ...context,
      reason: "unexpected shape"
    });
    return fallback;
  }
  return parsed;
}

export function decodeStringList(text: string | null | undefined, column: string, key: string): string[] {
  return decodeJsonColumn<string[]>(text, isStringArray, [], { column, key });
}
