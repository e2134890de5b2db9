import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { EndpointStore } from "@/lib/endpoint-store";
import { StoreNotFoundError } from "@/lib/errors";
import { createFixtureStore, type FixtureStore } from "./helpers";

let fixture: FixtureStore;
let store: EndpointStore;

beforeAll(async () => {
  fixture = await createFixtureStore();
  store = EndpointStore.open(fixture.dbPath);
});

afterAll(() => {
  store.close();
  fixture.cleanup();
});

function keys(rows: { method: string; path: string }[]): string[] {
  return rows.map((row) => `${row.method} ${row.path}`);
}

describe("EndpointStore.open", () => {
  it("fails fast with the path and the rebuild command when the file is missing", () => {
    const missing = path.join(fixture.dir, "missing.sqlite");

    expect(() => EndpointStore.open(missing)).toThrow(StoreNotFoundError);
    expect(() => EndpointStore.open(missing)).toThrow(
      `Search database not found: ${missing}\nPlease run 'npm run build-index' first`
    );
  });
});

describe("endpoint lookups", () => {
  it("matches tokens as substrings inside longer words", () => {
    expect(keys(store.findBySearchContentTokens(["vocat"]))).toEqual(["POST /api/{serviceId}/auth/token/revoke"]);
  });

  it("ORs tokens together and orders rows by path", () => {
    expect(keys(store.findBySearchContentTokens(["REVOKE", "developer"]))).toEqual([
      "POST /api/{serviceId}/auth/token/revoke",
      "GET /api/{serviceId}/client/get/list"
    ]);
  });

  it("returns nothing for an empty token list", () => {
    expect(store.findBySearchContentTokens([])).toEqual([]);
  });

  it("applies the method filter exactly", () => {
    expect(keys(store.findBySearchContentTokens(["client"], { method: "GET" }))).toEqual([
      "GET /api/{serviceId}/client/get/list"
    ]);
  });

  it("applies the tag filter as a case-insensitive substring", () => {
    expect(keys(store.findBySearchContentTokens(["client"], { tag: "token operations" }))).toEqual([
      "POST /api/{serviceId}/auth/token"
    ]);
  });

  it("honours an explicit limit", () => {
    expect(store.findBySearchContentTokens(["client"], {}, 1)).toHaveLength(1);
  });

  it("finds paths by case-insensitive substring", () => {
    expect(keys(store.findByPathSubstring("/AUTH/TOKEN"))).toEqual([
      "POST /api/{serviceId}/auth/token",
      "POST /api/{serviceId}/auth/token/revoke"
    ]);
  });

  it("finds text in either the summary or the description", () => {
    expect(keys(store.findByTextSubstring("REGISTERED"))).toEqual(["GET /api/{serviceId}/client/get/list"]);
    expect(keys(store.findByTextSubstring("server info"))).toEqual(["GET /api/info"]);
  });

  it("looks up single rows by operation id or by path and method", () => {
    expect(store.findByOperationId("client_delete_api")?.path).toBe("/api/{serviceId}/client/delete/{clientId}");
    expect(store.findByPathAndMethod("/api/info", "GET")?.operation_id).toBeNull();
    expect(store.findByPathAndMethod("/api/info", "get")).toBeUndefined();
    expect(store.findByOperationId("missing")).toBeUndefined();
  });

  it("reports counts per method", () => {
    expect(store.stats()).toEqual({ endpoints: 5, schemas: 5, methods: { POST: 2, GET: 2, DELETE: 1 } });
  });
});

describe("schema lookups", () => {
  it("lists schemas by name", () => {
    expect(store.listSchemas(undefined, 100).map((row) => row.schema_name)).toEqual([
      "Client",
      "ClientList",
      "GrantType",
      "RevocationRequest",
      "RevocationResponse"
    ]);
    expect(store.listSchemas("array", 100).map((row) => row.schema_name)).toEqual(["ClientList"]);
    expect(store.listSchemas(undefined, 2)).toHaveLength(2);
  });

  it("ranks full-text matches with a positive score", () => {
    const rows = store.searchSchemasFullText("revoke", undefined, 20);

    expect(rows.map((row) => row.schema_name)).toEqual(["RevocationRequest"]);
    expect(rows[0].score).toBeGreaterThan(0);
  });

  it("matches whole words only in the full-text index", () => {
    expect(store.searchSchemasFullText("client", "array", 20)).toEqual([]);
    expect(store.findSchemasByTokens(["client"], "array", 20).map((row) => row.schema_name)).toEqual(["ClientList"]);
  });

  it("finds a schema by exact name", () => {
    expect(store.findSchemaByName("GrantType")?.schema_type).toBe("string");
    expect(store.findSchemaByName("granttype")).toBeUndefined();
  });
});
