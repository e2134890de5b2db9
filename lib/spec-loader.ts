import { getSearchConfig } from "@/lib/config";
import { EndpointStore } from "@/lib/endpoint-store";
import { ApiSearchEngine } from "@/lib/search-index";

let cachedEngine: ApiSearchEngine | null = null;

/**
 * Opens the store named by the current configuration on first use and shares
 * the engine afterwards. A missing store throws `StoreNotFoundError` and
 * leaves nothing cached, so a later call retries once the index is built.
 */
export function loadSearchEngine(options?: { forceReload?: boolean }): ApiSearchEngine {
  if (options?.forceReload) {
    resetSearchEngine();
  }

  if (!cachedEngine) {
    const config = getSearchConfig();
    const store = EndpointStore.open(config.dbPath);
    cachedEngine = new ApiSearchEngine(store);
    console.warn("[spec-loader] Search store opened", { dbPath: config.dbPath });
  }

  return cachedEngine;
}

export function resetSearchEngine(): void {
  if (cachedEngine) {
    cachedEngine.close();
    cachedEngine = null;
  }
}
