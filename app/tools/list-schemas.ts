import { renderJson, resolveEngine, type ToolContext } from "@/app/tools/context";

export const NO_SCHEMAS_FOUND_MESSAGE = "No schemas found matching the search criteria.";

export type ListSchemasArgs = {
  query?: string | null;
  schema_type?: string | null;
  limit?: number | null;
};

export function processListSchemas(args: ListSchemasArgs, context: ToolContext = {}): string {
  const access = resolveEngine("list_schemas", context, "Schema search error");
  if (!access.ok) {
    return access.message;
  }

  const outcome = access.engine.searchSchemas({
    query: args.query,
    schemaType: args.schema_type,
    limit: args.limit
  });
  if (!outcome.ok || outcome.value.length === 0) {
    return NO_SCHEMAS_FOUND_MESSAGE;
  }

  return renderJson(outcome.value);
}
