import { renderJson, resolveEngine, type ToolContext } from "@/app/tools/context";

export const SCHEMA_NAME_REQUIRED_MESSAGE = "schema_name parameter is required.";

export type GetSchemaDetailArgs = {
  schema_name?: string | null;
};

export function processGetSchemaDetail(args: GetSchemaDetailArgs, context: ToolContext = {}): string {
  const schemaName = args.schema_name?.trim();
  if (!schemaName) {
    return SCHEMA_NAME_REQUIRED_MESSAGE;
  }

  const access = resolveEngine("get_schema_detail", context, "Schema detail retrieval error");
  if (!access.ok) {
    return access.message;
  }

  const outcome = access.engine.getSchemaDetail(schemaName);
  if (!outcome.ok) {
    return `Schema detail retrieval error: ${outcome.error.message}`;
  }
  if (!outcome.value) {
    return `Schema not found: ${schemaName}`;
  }

  return renderJson(outcome.value);
}
