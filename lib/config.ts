import path from "node:path";

const DEFAULT_DB_FILE = path.join("resources", "api-index.sqlite");
const DEFAULT_SPEC_FILE = path.join("resources", "openapi-spec.yaml");

export const DEFAULT_SEARCH_LIMIT = 20;
export const DEFAULT_SCHEMA_LIMIT = 20;
export const MAX_SEARCH_LIMIT = 100;

export const BUILD_INDEX_COMMAND = "npm run build-index";

export type SearchConfig = {
  dbPath: string;
  specPath: string;
};

function resolvePath(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return path.resolve(process.cwd(), trimmed || fallback);
}

export function getSearchConfig(env: NodeJS.ProcessEnv = process.env): SearchConfig {
  return {
    dbPath: resolvePath(env.SEARCH_DB_PATH, DEFAULT_DB_FILE),
    specPath: resolvePath(env.OPENAPI_SPEC_PATH, DEFAULT_SPEC_FILE)
  };
}
