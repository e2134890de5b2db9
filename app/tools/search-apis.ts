import { renderJson, resolveEngine, type ToolContext } from "@/app/tools/context";

export const NO_APIS_FOUND_MESSAGE = "No APIs found matching the search criteria.";

export type SearchApisArgs = {
  query?: string | null;
  path_query?: string | null;
  description_query?: string | null;
  tag_filter?: string | null;
  method_filter?: string | null;
  limit?: number | null;
};

export function processSearchApis(args: SearchApisArgs, context: ToolContext = {}): string {
  const access = resolveEngine("search_apis", context, "Search error");
  if (!access.ok) {
    return access.message;
  }

  const outcome = access.engine.searchApis({
    query: args.query,
    pathQuery: args.path_query,
    descriptionQuery: args.description_query,
    tagFilter: args.tag_filter,
    methodFilter: args.method_filter,
    limit: args.limit
  });

  // A failed query was already logged by the engine; callers see it as an empty result.
  if (!outcome.ok || outcome.value.length === 0) {
    return NO_APIS_FOUND_MESSAGE;
  }

  return renderJson(outcome.value);
}
