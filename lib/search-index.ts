import { DEFAULT_SCHEMA_LIMIT, DEFAULT_SEARCH_LIMIT } from "@/lib/config";
import type { EndpointRow, EndpointStore, ScoredSchemaRow, SchemaRow } from "@/lib/endpoint-store";
import { SearchQueryError, describeError, fail, succeed, type SearchOutcome } from "@/lib/errors";
import {
  isJsonArray,
  isJsonObject,
  isStringMap,
  toJsonValue,
  type JsonObject,
  type JsonValue
} from "@/lib/json";
import {
  clampLimit,
  normalizeSearchRequest,
  tokenizeQuery,
  type NormalizedSearch,
  type SearchRequest
} from "@/lib/query";
import { decodeJsonColumn, decodeStringList, toSearchResult, type SearchResult } from "@/lib/result-format";
import {
  compareRanked,
  descriptionScore,
  naturalLanguageScore,
  pathScore,
  type ScoringFields
} from "@/lib/scoring";

export type DetailRequest = {
  path?: string | null;
  method?: string | null;
  operationId?: string | null;
  language?: string | null;
};

export type DetailResult = {
  path: string;
  method: string;
  operationId: string | null;
  summary: string;
  description: string;
  tags: string[];
  parameters: JsonValue[];
  requestBody: JsonObject | null;
  responses: JsonObject;
  sampleLanguages: string[];
  sampleCode: string | null;
};

export type SchemaSearchRequest = {
  query?: string | null;
  schemaType?: string | null;
  limit?: number | null;
};

export type SchemaSearchResult = {
  schemaName: string;
  schemaType: string;
  title: string;
  description: string;
  score: number;
};

export type SchemaDetail = {
  schemaName: string;
  schemaType: string;
  title: string;
  description: string;
  properties: JsonObject;
  requiredFields: string[];
  example: JsonValue;
};

type ScoredRow = { row: EndpointRow; path: string; method: string; score: number };

const DEFAULT_SCHEMA_TYPE = "object";

function isNonNullJsonObject(value: unknown): value is JsonObject | null {
  return value === null || isJsonObject(value);
}

/**
 * Search, detail and schema lookups over one opened store. Every public
 * operation reports store failures through its outcome instead of throwing.
 */
export class ApiSearchEngine {
  readonly store: EndpointStore;

  constructor(store: EndpointStore) {
    this.store = store;
  }

  close(): void {
    this.store.close();
  }

  searchApis(request: SearchRequest): SearchOutcome<SearchResult[]> {
    const normalized = normalizeSearchRequest(request);
    if (normalized.mode === "none") {
      return succeed([]);
    }

    const limit = clampLimit(request.limit, DEFAULT_SEARCH_LIMIT);

    let scored: ScoredRow[];
    try {
      scored = this.scoreMatches(normalized);
    } catch (error) {
      console.warn("[search-index] endpoint search failed", { mode: normalized.mode, reason: describeError(error) });
      return fail(new SearchQueryError("Endpoint search", error));
    }

    return succeed(
      scored
        .sort(compareRanked)
        .slice(0, limit)
        .map((entry) => toSearchResult(entry.row, entry.score))
    );
  }

  getApiDetail(request: DetailRequest): SearchOutcome<DetailResult | null> {
    const operationId = request.operationId?.trim();
    const apiPath = request.path?.trim();
    const method = request.method?.trim().toUpperCase();

    let row: EndpointRow | undefined;
    try {
      if (operationId) {
        row = this.store.findByOperationId(operationId);
      } else if (apiPath && method) {
        row = this.store.findByPathAndMethod(apiPath, method);
      } else {
        return succeed(null);
      }
    } catch (error) {
      console.warn("[search-index] detail lookup failed", {
        operationId: operationId ?? null,
        path: apiPath ?? null,
        method: method ?? null,
        reason: describeError(error)
      });
      return fail(new SearchQueryError("Detail lookup", error));
    }

    return succeed(row ? toDetailResult(row, request.language) : null);
  }

  searchSchemas(request: SchemaSearchRequest): SearchOutcome<SchemaSearchResult[]> {
    const query = request.query?.trim();
    const schemaType = request.schemaType?.trim() || undefined;
    const limit = clampLimit(request.limit, DEFAULT_SCHEMA_LIMIT);

    try {
      if (!query) {
        return succeed(this.store.listSchemas(schemaType, limit).map(toSchemaSearchResult));
      }
      return succeed(this.searchSchemasByQuery(query, schemaType, limit).map(toSchemaSearchResult));
    } catch (error) {
      console.warn("[search-index] schema search failed", { query: query ?? null, reason: describeError(error) });
      return fail(new SearchQueryError("Schema search", error));
    }
  }

  getSchemaDetail(schemaName: string): SearchOutcome<SchemaDetail | null> {
    let row: SchemaRow | undefined;
    try {
      row = this.store.findSchemaByName(schemaName);
    } catch (error) {
      console.warn("[search-index] schema lookup failed", { schemaName, reason: describeError(error) });
      return fail(new SearchQueryError("Schema lookup", error));
    }
    return succeed(row ? toSchemaDetail(row) : null);
  }

  private scoreMatches(search: NormalizedSearch): ScoredRow[] {
    switch (search.mode) {
      case "natural":
        return this.store
          .findBySearchContentTokens(search.tokens, search.filters)
          .map((row) => rank(row, naturalLanguageScore(scoringFields(row), search.phrase, search.tokens)));
      case "path":
        return this.store
          .findByPathSubstring(search.pathQuery, search.filters)
          .map((row) => rank(row, pathScore(row.path, search.pathQuery)));
      case "description":
        return this.store
          .findByTextSubstring(search.text, search.filters)
          .map((row) => rank(row, descriptionScore(scoringFields(row), search.text)));
      case "none":
        return [];
    }
  }

  private searchSchemasByQuery(query: string, schemaType: string | undefined, limit: number): ScoredSchemaRow[] {
    try {
      const ranked = this.store.searchSchemasFullText(query, schemaType, limit);
      if (ranked.length > 0) {
        return ranked;
      }
    } catch (error) {
      console.warn("[search-index] full-text schema search failed, falling back to substring match", {
        query,
        reason: describeError(error)
      });
    }
    return this.store.findSchemasByTokens(tokenizeQuery(query), schemaType, limit);
  }
}

function scoringFields(row: EndpointRow): ScoringFields {
  return {
    searchContent: row.search_content,
    summary: row.summary ?? "",
    path: row.path,
    description: row.description ?? ""
  };
}

function rank(row: EndpointRow, score: number): ScoredRow {
  return { row, path: row.path, method: row.method, score };
}

function toDetailResult(row: EndpointRow, language: string | null | undefined): DetailResult {
  const key = row.operation_id ?? `${row.method} ${row.path}`;
  const sampleCodes = decodeJsonColumn<Record<string, string>>(row.sample_codes, isStringMap, {}, {
    column: "sample_codes",
    key
  });

  return {
    path: row.path,
    method: row.method,
    operationId: row.operation_id,
    summary: row.summary ?? "",
    description: row.description ?? "",
    tags: decodeStringList(row.tags, "tags", key),
    parameters: decodeJsonColumn<JsonValue[]>(row.parameters, isJsonArray, [], { column: "parameters", key }),
    requestBody: decodeJsonColumn<JsonObject | null>(row.request_body, isNonNullJsonObject, null, {
      column: "request_body",
      key
    }),
    responses: decodeJsonColumn<JsonObject>(row.responses, isJsonObject, {}, { column: "responses", key }),
    sampleLanguages: decodeStringList(row.sample_languages, "sample_languages", key),
    sampleCode: language && Object.hasOwn(sampleCodes, language) ? sampleCodes[language] : null
  };
}

function toSchemaSearchResult(row: ScoredSchemaRow): SchemaSearchResult {
  return {
    schemaName: row.schema_name,
    schemaType: row.schema_type ?? DEFAULT_SCHEMA_TYPE,
    title: row.title ?? "",
    description: row.description ?? "",
    score: Number(row.score)
  };
}

function toSchemaDetail(row: SchemaRow): SchemaDetail {
  const key = row.schema_name;
  return {
    schemaName: row.schema_name,
    schemaType: row.schema_type ?? DEFAULT_SCHEMA_TYPE,
    title: row.title ?? "",
    description: row.description ?? "",
    properties: decodeJsonColumn<JsonObject>(row.properties, isJsonObject, {}, { column: "properties", key }),
    requiredFields: decodeStringList(row.required_fields, "required_fields", key),
    example: decodeExample(row.example_value)
  };
}

/** Example values that are not JSON are returned as their raw text. */
function decodeExample(text: string | null): JsonValue {
  if (!text) {
    return null;
  }
  try {
    return toJsonValue(JSON.parse(text));
  } catch {
    return text;
  }
}
