import { EndpointStore, type StoreStats } from "@/lib/endpoint-store";
import { extractEndpointRecords, extractSchemaRecords, loadOpenApiDocument } from "@/lib/openapi-index";

export type IndexBuildResult = StoreStats & {
  specPath: string;
  dbPath: string;
};

/** Parses the OpenAPI document and writes a fresh store at `dbPath`. */
export async function buildSearchStore(specPath: string, dbPath: string): Promise<IndexBuildResult> {
  const document = await loadOpenApiDocument(specPath);
  const endpoints = extractEndpointRecords(document);
  const schemas = extractSchemaRecords(document);

  const store = EndpointStore.create(dbPath);
  try {
    store.replaceAll(endpoints, schemas);
    return { specPath, dbPath, ...store.stats() };
  } finally {
    store.close();
  }
}
