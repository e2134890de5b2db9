import { mkdtempSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { EndpointStore } from "@/lib/endpoint-store";
import { buildSearchStore } from "@/lib/index-build";
import { ApiSearchEngine } from "@/lib/search-index";

export const FIXTURE_SPEC_PATH = fileURLToPath(new URL("./fixtures/openapi.yaml", import.meta.url));

export type FixtureStore = {
  dir: string;
  dbPath: string;
  openEngine: () => ApiSearchEngine;
  cleanup: () => void;
};

/** Builds the fixture document into a throwaway SQLite file. */
export async function createFixtureStore(): Promise<FixtureStore> {
  const dir = mkdtempSync(path.join(os.tmpdir(), "endpoint-search-"));
  const dbPath = path.join(dir, "api-index.sqlite");
  await buildSearchStore(FIXTURE_SPEC_PATH, dbPath);

  const engines: ApiSearchEngine[] = [];
  return {
    dir,
    dbPath,
    openEngine: () => {
      const engine = new ApiSearchEngine(EndpointStore.open(dbPath));
      engines.push(engine);
      return engine;
    },
    cleanup: () => {
      for (const engine of engines) {
        engine.close();
      }
      rmSync(dir, { recursive: true, force: true });
    }
  };
}
