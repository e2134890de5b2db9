import { BUILD_INDEX_COMMAND } from "@/lib/config";

export class StoreNotFoundError extends Error {
  readonly dbPath: string;

  constructor(dbPath: string) {
    super(`Search database not found: ${dbPath}\nPlease run '${BUILD_INDEX_COMMAND}' first`);
    this.name = "StoreNotFoundError";
    this.dbPath = dbPath;
  }
}

export class SearchQueryError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${describeError(cause)}`, { cause });
    this.name = "SearchQueryError";
    this.operation = operation;
  }
}

export type SearchOutcome<T> = { ok: true; value: T } | { ok: false; error: SearchQueryError };

export function succeed<T>(value: T): SearchOutcome<T> {
  return { ok: true, value };
}

export function fail<T>(error: SearchQueryError): SearchOutcome<T> {
  return { ok: false, error };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
