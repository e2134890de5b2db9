import {
  IDENTIFIER_REQUIRED_MESSAGE,
  describeEndpoint,
  hasEndpointIdentifier,
  resolveEngine,
  type ToolContext
} from "@/app/tools/context";

export const LANGUAGE_REQUIRED_MESSAGE = "language parameter is required.";

export type GetSampleCodeArgs = {
  language?: string | null;
  path?: string | null;
  method?: string | null;
  operation_id?: string | null;
};

/** Returns the raw sample source so agents can paste it without unescaping. */
export function processGetSampleCode(args: GetSampleCodeArgs, context: ToolContext = {}): string {
  const language = args.language?.trim();
  if (!language) {
    return LANGUAGE_REQUIRED_MESSAGE;
  }
  if (!hasEndpointIdentifier(args)) {
    return IDENTIFIER_REQUIRED_MESSAGE;
  }

  const access = resolveEngine("get_sample_code", context, "Sample code retrieval error");
  if (!access.ok) {
    return access.message;
  }

  const outcome = access.engine.getApiDetail({
    path: args.path,
    method: args.method,
    operationId: args.operation_id,
    language
  });
  if (!outcome.ok) {
    return `Sample code retrieval error: ${outcome.error.message}`;
  }
  if (!outcome.value?.sampleCode) {
    return `Sample code not found: ${describeEndpoint(args)} (${language})`;
  }

  return outcome.value.sampleCode;
}
