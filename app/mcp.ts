import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { ToolContext } from "@/app/tools/context";
import { processGetApiDetail } from "@/app/tools/get-api-detail";
import { processGetSampleCode } from "@/app/tools/get-sample-code";
import { processGetSchemaDetail } from "@/app/tools/get-schema-detail";
import { processListSchemas } from "@/app/tools/list-schemas";
import { processSearchApis } from "@/app/tools/search-apis";
import { describeError } from "@/lib/errors";

export const MCP_SERVER_NAME = "openapi-endpoint-search";
export const MCP_SERVER_VERSION = "0.1.0";

const endpointIdentifier = {
  path: z.string().optional().describe("API path (required if operation_id is not provided)"),
  method: z.string().optional().describe("HTTP method (required if operation_id is not provided)"),
  operation_id: z.string().optional().describe("Operation ID (alternative to path + method)")
};

function runTool(tool: string, run: () => string): CallToolResult {
  try {
    return { content: [{ type: "text", text: run() }] };
  } catch (error) {
    console.error(`[mcp] tool ${tool} failed`, { reason: describeError(error) });
    return { content: [{ type: "text", text: `${tool} failed: ${describeError(error)}` }], isError: true };
  }
}

export function createMcpServer(context: ToolContext = {}): McpServer {
  const server = new McpServer({ name: MCP_SERVER_NAME, version: MCP_SERVER_VERSION });

  server.tool(
    "search_apis",
    "Search API endpoints by natural language, path or description. Descriptions are truncated to about 100 characters; use get_api_detail for the full record.",
    {
      query: z.string().optional().describe("Natural language query, e.g. 'revoke token'"),
      path_query: z.string().optional().describe("Path substring, e.g. '/auth/token'"),
      description_query: z.string().optional().describe("Text to find in summaries or descriptions"),
      tag_filter: z.string().optional().describe("Tag filter (case-insensitive substring)"),
      method_filter: z.string().optional().describe("HTTP method filter (GET, POST, PUT, DELETE, ...)"),
      limit: z.number().optional().describe("Maximum number of results (default 20, max 100)")
    },
    (args) => runTool("search_apis", () => processSearchApis(args, context))
  );

  server.tool(
    "get_api_detail",
    "Get parameters, request body, responses and sample code for one endpoint. Provide operation_id, or both path and method.",
    {
      ...endpointIdentifier,
      language: z.string().optional().describe("Sample code language (curl, javascript, python, ...)"),
      description_style: z
        .string()
        .optional()
        .describe("full | none | line_range | summary_and_headers"),
      line_start: z.number().int().optional().describe("First description line for line_range (1-based)"),
      line_end: z.number().int().optional().describe("Last description line for line_range (inclusive)"),
      request_body_style: z.string().optional().describe("full | none | schema_only"),
      response_style: z.string().optional().describe("full | none | schema_only")
    },
    (args) => runTool("get_api_detail", () => processGetApiDetail(args, context))
  );

  server.tool(
    "get_sample_code",
    "Get the sample code of one endpoint in the given language. Provide operation_id, or both path and method.",
    {
      language: z.string().describe("Sample code language (curl, javascript, python, ...)"),
      ...endpointIdentifier
    },
    (args) => runTool("get_sample_code", () => processGetSampleCode(args, context))
  );

  server.tool(
    "list_schemas",
    "List or search component schemas. Without arguments every schema is returned, ordered by name.",
    {
      query: z.string().optional().describe("Full-text query over schema names, titles, descriptions and properties"),
      schema_type: z.string().optional().describe("Schema type filter (object, array, string, ...)"),
      limit: z.number().optional().describe("Maximum number of results (default 20, max 100)")
    },
    (args) => runTool("list_schemas", () => processListSchemas(args, context))
  );

  server.tool(
    "get_schema_detail",
    "Get the properties, required fields and example of one component schema.",
    {
      schema_name: z.string().describe("Schema name, e.g. 'AccessToken'")
    },
    (args) => runTool("get_schema_detail", () => processGetSchemaDetail(args, context))
  );

  return server;
}
