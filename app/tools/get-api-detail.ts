import {
  IDENTIFIER_REQUIRED_MESSAGE,
  describeEndpoint,
  hasEndpointIdentifier,
  renderJson,
  resolveEngine,
  type ToolContext
} from "@/app/tools/context";
import {
  filterBody,
  filterDescription,
  parseBodyStyle,
  parseDescriptionStyle,
  type LineRange
} from "@/lib/detail-filters";
import type { JsonValue } from "@/lib/json";
import type { DetailResult } from "@/lib/search-index";

export type GetApiDetailArgs = {
  path?: string | null;
  method?: string | null;
  operation_id?: string | null;
  language?: string | null;
  description_style?: string | null;
  line_start?: number | null;
  line_end?: number | null;
  request_body_style?: string | null;
  response_style?: string | null;
};

export type ApiDetailView = Omit<DetailResult, "description" | "requestBody" | "responses"> & {
  description: string | null;
  requestBody: JsonValue | null;
  responses: JsonValue | null;
};

/** A lone `line_start` runs to the end of the text; a lone `line_end` starts at line 1. */
export function toLineRange(start: number | null | undefined, end: number | null | undefined): LineRange | null {
  if (start == null && end == null) {
    return null;
  }
  const from = start ?? 1;
  return { start: from, end: end ?? Number.MAX_SAFE_INTEGER };
}

export function presentDetail(detail: DetailResult, args: GetApiDetailArgs): ApiDetailView {
  return {
    ...detail,
    description: filterDescription(
      detail.description,
      parseDescriptionStyle(args.description_style),
      toLineRange(args.line_start, args.line_end)
    ),
    requestBody: filterBody(detail.requestBody, parseBodyStyle(args.request_body_style)),
    responses: filterBody(detail.responses, parseBodyStyle(args.response_style))
  };
}

export function processGetApiDetail(args: GetApiDetailArgs, context: ToolContext = {}): string {
  if (!hasEndpointIdentifier(args)) {
    return IDENTIFIER_REQUIRED_MESSAGE;
  }

  const access = resolveEngine("get_api_detail", context, "Detail retrieval error");
  if (!access.ok) {
    return access.message;
  }

  const outcome = access.engine.getApiDetail({
    path: args.path,
    method: args.method,
    operationId: args.operation_id,
    language: args.language
  });
  if (!outcome.ok) {
    return `Detail retrieval error: ${outcome.error.message}`;
  }
  if (!outcome.value) {
    return `API details not found: ${describeEndpoint(args)}`;
  }

  return renderJson(presentDetail(outcome.value, args));
}
