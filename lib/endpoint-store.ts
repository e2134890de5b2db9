import { existsSync, mkdirSync, rmSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { StoreNotFoundError } from "@/lib/errors";
import type { EndpointRecord, SchemaRecord } from "@/lib/openapi-index";

export type EndpointRow = {
  path: string;
  method: string;
  operation_id: string | null;
  summary: string | null;
  description: string | null;
  tags: string | null;
  parameters: string | null;
  request_body: string | null;
  responses: string | null;
  sample_languages: string | null;
  sample_codes: string | null;
  search_content: string;
};

export type SchemaRow = {
  schema_name: string;
  schema_type: string | null;
  title: string | null;
  description: string | null;
  properties: string | null;
  required_fields: string | null;
  example_value: string | null;
  search_content: string;
};

export type ScoredSchemaRow = SchemaRow & { score: number };

export type EndpointFilters = {
  /** Compared for equality; callers pass the upper-cased verb. */
  method?: string;
  /** Case-insensitive substring of the serialized tag list. */
  tag?: string;
};

export type StoreStats = {
  endpoints: number;
  schemas: number;
  methods: Record<string, number>;
};

type SqlValue = string | number | null;

const ENDPOINT_COLUMNS = [
  "path",
  "method",
  "operation_id",
  "summary",
  "description",
  "tags",
  "parameters",
  "request_body",
  "responses",
  "sample_languages",
  "sample_codes",
  "search_content"
] as const;

const SCHEMA_COLUMNS = [
  "schema_name",
  "schema_type",
  "title",
  "description",
  "properties",
  "required_fields",
  "example_value",
  "search_content"
] as const;

const CREATE_TABLES_SQL = `
  DROP TABLE IF EXISTS api_schemas_fts;
  DROP TABLE IF EXISTS api_endpoints;
  DROP TABLE IF EXISTS api_schemas;

  CREATE TABLE api_endpoints (
    id INTEGER PRIMARY KEY,
    path TEXT NOT NULL,
    method TEXT NOT NULL,
    operation_id TEXT,
    summary TEXT,
    description TEXT,
    tags TEXT,
    parameters TEXT,
    request_body TEXT,
    responses TEXT,
    sample_languages TEXT,
    sample_codes TEXT,
    search_content TEXT NOT NULL
  );
  CREATE UNIQUE INDEX api_endpoints_path_method ON api_endpoints (path, method);
  CREATE UNIQUE INDEX api_endpoints_operation_id ON api_endpoints (operation_id) WHERE operation_id IS NOT NULL;

  CREATE TABLE api_schemas (
    id INTEGER PRIMARY KEY,
    schema_name TEXT NOT NULL UNIQUE,
    schema_type TEXT,
    title TEXT,
    description TEXT,
    properties TEXT,
    required_fields TEXT,
    example_value TEXT,
    search_content TEXT NOT NULL
  );

  CREATE VIRTUAL TABLE api_schemas_fts USING fts5(
    search_content,
    content = 'api_schemas',
    content_rowid = 'id'
  );
`;

/**
 * File-backed table of endpoint and schema records. All text predicates are
 * case-insensitive substring tests, so a token also matches inside longer
 * words ("cat" matches "category").
 */
export class EndpointStore {
  readonly dbPath: string;
  private readonly db: Database.Database;

  private constructor(db: Database.Database, dbPath: string) {
    this.db = db;
    this.dbPath = dbPath;
    db.function("contains_ci", { deterministic: true }, containsIgnoringCase);
  }

  static open(dbPath: string): EndpointStore {
    if (!existsSync(dbPath)) {
      throw new StoreNotFoundError(dbPath);
    }
    return new EndpointStore(new Database(dbPath, { readonly: true, fileMustExist: true }), dbPath);
  }

  /** Creates an empty store, replacing any file already at `dbPath`. */
  static create(dbPath: string): EndpointStore {
    mkdirSync(path.dirname(dbPath), { recursive: true });
    rmSync(dbPath, { force: true });
    const db = new Database(dbPath);
    db.exec(CREATE_TABLES_SQL);
    return new EndpointStore(db, dbPath);
  }

  close(): void {
    this.db.close();
  }

  findBySearchContentTokens(tokens: string[], filters: EndpointFilters = {}, limit?: number): EndpointRow[] {
    if (tokens.length === 0) return [];
    const anyToken = tokens.map(() => "contains_ci(search_content, ?)").join(" OR ");
    return this.selectEndpoints([`(${anyToken})`], tokens, filters, limit);
  }

  findByPathSubstring(substring: string, filters: EndpointFilters = {}, limit?: number): EndpointRow[] {
    return this.selectEndpoints(["contains_ci(path, ?)"], [substring], filters, limit);
  }

  findByTextSubstring(text: string, filters: EndpointFilters = {}, limit?: number): EndpointRow[] {
    return this.selectEndpoints(
      ["(contains_ci(summary, ?) OR contains_ci(description, ?))"],
      [text, text],
      filters,
      limit
    );
  }

  findByOperationId(operationId: string): EndpointRow | undefined {
    return this.db
      .prepare<[string], EndpointRow>(`SELECT ${ENDPOINT_COLUMNS.join(", ")} FROM api_endpoints WHERE operation_id = ?`)
      .get(operationId);
  }

  findByPathAndMethod(apiPath: string, method: string): EndpointRow | undefined {
    return this.db
      .prepare<[string, string], EndpointRow>(
        `SELECT ${ENDPOINT_COLUMNS.join(", ")} FROM api_endpoints WHERE path = ? AND method = ?`
      )
      .get(apiPath, method);
  }

  listSchemas(schemaType: string | undefined, limit: number): ScoredSchemaRow[] {
    const where = schemaType ? "WHERE schema_type = ?" : "";
    const params: SqlValue[] = schemaType ? [schemaType, limit] : [limit];
    return this.db
      .prepare<SqlValue[], ScoredSchemaRow>(
        `SELECT ${SCHEMA_COLUMNS.join(", ")}, 0 AS score FROM api_schemas ${where} ORDER BY schema_name ASC LIMIT ?`
      )
      .all(...params);
  }

  /**
   * BM25-ranked lookup through the FTS5 index; query terms are OR-ed. Scores
   * are negated so that higher means more relevant. Throws when the index is
   * missing or the match expression is rejected.
   */
  searchSchemasFullText(query: string, schemaType: string | undefined, limit: number): ScoredSchemaRow[] {
    const match = buildFtsMatchExpression(query);
    if (!match) return [];

    const columns = SCHEMA_COLUMNS.map((column) => `s.${column}`).join(", ");
    const typeClause = schemaType ? "AND s.schema_type = ?" : "";
    const params: SqlValue[] = schemaType ? [match, schemaType, limit] : [match, limit];

    return this.db
      .prepare<SqlValue[], ScoredSchemaRow>(
        `SELECT ${columns}, -bm25(api_schemas_fts) AS score
         FROM api_schemas_fts
         JOIN api_schemas s ON s.id = api_schemas_fts.rowid
         WHERE api_schemas_fts MATCH ? ${typeClause}
         ORDER BY score DESC, s.schema_name ASC
         LIMIT ?`
      )
      .all(...params);
  }

  findSchemasByTokens(tokens: string[], schemaType: string | undefined, limit: number): ScoredSchemaRow[] {
    const where: string[] = [];
    const params: SqlValue[] = [];
    if (tokens.length > 0) {
      where.push(`(${tokens.map(() => "contains_ci(search_content, ?)").join(" OR ")})`);
      params.push(...tokens);
    }
    if (schemaType) {
      where.push("schema_type = ?");
      params.push(schemaType);
    }
    params.push(limit);

    const whereClause = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";
    return this.db
      .prepare<SqlValue[], ScoredSchemaRow>(
        `SELECT ${SCHEMA_COLUMNS.join(", ")}, 0 AS score FROM api_schemas ${whereClause} ORDER BY schema_name ASC LIMIT ?`
      )
      .all(...params);
  }

  findSchemaByName(schemaName: string): SchemaRow | undefined {
    return this.db
      .prepare<[string], SchemaRow>(`SELECT ${SCHEMA_COLUMNS.join(", ")} FROM api_schemas WHERE schema_name = ?`)
      .get(schemaName);
  }

  replaceAll(endpoints: EndpointRecord[], schemas: SchemaRecord[]): void {
    const insertEndpoint = this.db.prepare<SqlValue[]>(
      `INSERT INTO api_endpoints (${ENDPOINT_COLUMNS.join(", ")})
       VALUES (${ENDPOINT_COLUMNS.map(() => "?").join(", ")})`
    );
    const insertSchema = this.db.prepare<SqlValue[]>(
      `INSERT INTO api_schemas (${SCHEMA_COLUMNS.join(", ")})
       VALUES (${SCHEMA_COLUMNS.map(() => "?").join(", ")})`
    );

    const write = this.db.transaction(() => {
      this.db.exec("DELETE FROM api_endpoints; DELETE FROM api_schemas;");
      for (const endpoint of endpoints) {
        insertEndpoint.run(...serializeEndpoint(endpoint));
      }
      for (const schema of schemas) {
        insertSchema.run(...serializeSchema(schema));
      }
      this.db.exec("INSERT INTO api_schemas_fts(api_schemas_fts) VALUES ('rebuild');");
    });

    write();
  }

  stats(): StoreStats {
    const endpoints = this.db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM api_endpoints").get();
    const schemas = this.db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM api_schemas").get();
    const methodRows = this.db
      .prepare<[], { method: string; count: number }>(
        "SELECT method, COUNT(*) AS count FROM api_endpoints GROUP BY method ORDER BY count DESC, method ASC"
      )
      .all();

    return {
      endpoints: endpoints?.count ?? 0,
      schemas: schemas?.count ?? 0,
      methods: Object.fromEntries(methodRows.map((row) => [row.method, row.count]))
    };
  }

  private selectEndpoints(
    clauses: string[],
    params: SqlValue[],
    filters: EndpointFilters,
    limit: number | undefined
  ): EndpointRow[] {
    const where = [...clauses];
    const values = [...params];

    if (filters.method) {
      where.push("method = ?");
      values.push(filters.method);
    }
    if (filters.tag) {
      where.push("contains_ci(tags, ?)");
      values.push(filters.tag);
    }

    let sql = `SELECT ${ENDPOINT_COLUMNS.join(", ")} FROM api_endpoints WHERE ${where.join(" AND ")} ORDER BY path ASC, method ASC`;
    if (limit !== undefined) {
      sql += " LIMIT ?";
      values.push(limit);
    }

    return this.db.prepare<SqlValue[], EndpointRow>(sql).all(...values);
  }
}

function containsIgnoringCase(haystack: unknown, needle: unknown): number {
  if (typeof haystack !== "string" || typeof needle !== "string") {
    return 0;
  }
  return haystack.toLowerCase().includes(needle.toLowerCase()) ? 1 : 0;
}

function buildFtsMatchExpression(query: string): string {
  return query
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean)
    .map((term) => `"${term.replace(/"/g, '""')}"`)
    .join(" OR ");
}

function serializeEndpoint(endpoint: EndpointRecord): SqlValue[] {
  return [
    endpoint.path,
    endpoint.method,
    endpoint.operationId,
    endpoint.summary,
    endpoint.description,
    JSON.stringify(endpoint.tags),
    JSON.stringify(endpoint.parameters),
    endpoint.requestBody ? JSON.stringify(endpoint.requestBody) : null,
    JSON.stringify(endpoint.responses),
    JSON.stringify(endpoint.sampleLanguages),
    JSON.stringify(endpoint.sampleCodes),
    endpoint.searchContent
  ];
}

function serializeSchema(schema: SchemaRecord): SqlValue[] {
  return [
    schema.schemaName,
    schema.schemaType,
    schema.title,
    schema.description,
    JSON.stringify(schema.properties),
    JSON.stringify(schema.requiredFields),
    schema.exampleValue === null ? null : JSON.stringify(schema.exampleValue),
    schema.searchContent
  ];
}
