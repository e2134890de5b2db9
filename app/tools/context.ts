import { StoreNotFoundError, describeError } from "@/lib/errors";
import type { ApiSearchEngine } from "@/lib/search-index";
import { loadSearchEngine } from "@/lib/spec-loader";

export type ToolContext = {
  /** Defaults to the process-wide engine. */
  getEngine?: () => ApiSearchEngine;
};

export type EngineAccess = { ok: true; engine: ApiSearchEngine } | { ok: false; message: string };

/**
 * Resolves the engine for one tool call. A missing store becomes its
 * remediation message; any other failure is logged and rendered with the
 * tool's error prefix.
 */
export function resolveEngine(tool: string, context: ToolContext, errorPrefix: string): EngineAccess {
  try {
    const engine = (context.getEngine ?? loadSearchEngine)();
    return { ok: true, engine };
  } catch (error) {
    if (error instanceof StoreNotFoundError) {
      return { ok: false, message: error.message };
    }
    console.error(`[tools:${tool}] failed to open search engine`, { reason: describeError(error) });
    return { ok: false, message: `${errorPrefix}: ${describeError(error)}` };
  }
}

export function renderJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function describeEndpoint(args: { operation_id?: string | null; method?: string | null; path?: string | null }): string {
  return args.operation_id || `${args.method ?? ""} ${args.path ?? ""}`;
}

export function hasEndpointIdentifier(args: {
  operation_id?: string | null;
  method?: string | null;
  path?: string | null;
}): boolean {
  return Boolean(args.operation_id?.trim() || (args.path?.trim() && args.method?.trim()));
}

export const IDENTIFIER_REQUIRED_MESSAGE =
  "Either 'operation_id' or both 'path' and 'method' parameters are required.";
