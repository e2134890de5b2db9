import { MAX_SEARCH_LIMIT } from "@/lib/config";
import type { EndpointFilters } from "@/lib/endpoint-store";

export type SearchMode = "natural" | "path" | "description" | "none";

export type SearchRequest = {
  query?: string | null;
  pathQuery?: string | null;
  descriptionQuery?: string | null;
  tagFilter?: string | null;
  methodFilter?: string | null;
  limit?: number | null;
};

export type NormalizedSearch =
  | { mode: "natural"; phrase: string; tokens: string[]; filters: EndpointFilters }
  | { mode: "path"; pathQuery: string; filters: EndpointFilters }
  | { mode: "description"; text: string; filters: EndpointFilters }
  | { mode: "none" };

export function tokenizeQuery(text: string | null | undefined): string[] {
  if (!text) return [];
  return text.toLowerCase().split(/\s+/).filter(Boolean);
}

export function normalizeMethodFilter(method: string | null | undefined): string | undefined {
  const trimmed = method?.trim();
  return trimmed ? trimmed.toUpperCase() : undefined;
}

export function normalizeTagFilter(tag: string | null | undefined): string | undefined {
  const trimmed = tag?.trim();
  return trimmed ? trimmed : undefined;
}

/** Out-of-range limits fall back to the caller's default rather than being rejected. */
export function clampLimit(limit: number | null | undefined, fallback: number): number {
  if (limit === null || limit === undefined || !Number.isFinite(limit)) {
    return fallback;
  }
  if (limit < 1 || limit > MAX_SEARCH_LIMIT) {
    return fallback;
  }
  return Math.floor(limit);
}

export function selectSearchMode(request: SearchRequest): SearchMode {
  if (request.query?.trim()) return "natural";
  if (request.pathQuery?.trim()) return "path";
  if (request.descriptionQuery?.trim()) return "description";
  return "none";
}

/**
 * Only the highest-priority non-empty query is honoured: natural language,
 * then path, then description. Tag filtering does not apply to path search.
 */
export function normalizeSearchRequest(request: SearchRequest): NormalizedSearch {
  const method = normalizeMethodFilter(request.methodFilter);
  const tag = normalizeTagFilter(request.tagFilter);

  switch (selectSearchMode(request)) {
    case "natural": {
      const phrase = (request.query ?? "").trim().toLowerCase();
      return { mode: "natural", phrase, tokens: tokenizeQuery(phrase), filters: { method, tag } };
    }
    case "path":
      return { mode: "path", pathQuery: (request.pathQuery ?? "").trim(), filters: { method } };
    case "description":
      return { mode: "description", text: (request.descriptionQuery ?? "").trim(), filters: { method, tag } };
    default:
      return { mode: "none" };
  }
}
