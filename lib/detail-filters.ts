import { isJsonObject, type JsonObject, type JsonValue } from "@/lib/json";

export type DescriptionStyle = "full" | "none" | "lineRange" | "summaryAndHeaders";
export type BodyStyle = "full" | "none" | "schemaOnly";

export type LineRange = { start: number; end: number };

const DESCRIPTION_STYLE_ALIASES = new Map<string, DescriptionStyle>([
  ["full", "full"],
  ["none", "none"],
  ["linerange", "lineRange"],
  ["line_range", "lineRange"],
  ["summaryandheaders", "summaryAndHeaders"],
  ["summary_and_headers", "summaryAndHeaders"]
]);

const BODY_STYLE_ALIASES = new Map<string, BodyStyle>([
  ["full", "full"],
  ["none", "none"],
  ["schemaonly", "schemaOnly"],
  ["schema_only", "schemaOnly"]
]);

const MAX_ENUM_VALUES = 10;
const MAX_VALUE_LENGTH = 50;
const EXAMPLE_KEYS = new Set(["example", "examples"]);

const MARKDOWN_HEADER = /^#{1,6}\s+\S/;
const BOLD_HEADER = /^\*\*[^*]+\*\*$/;

/** Unknown or missing styles mean "full". */
export function parseDescriptionStyle(value: string | null | undefined): DescriptionStyle {
  return DESCRIPTION_STYLE_ALIASES.get(value?.trim().toLowerCase() ?? "") ?? "full";
}

export function parseBodyStyle(value: string | null | undefined): BodyStyle {
  return BODY_STYLE_ALIASES.get(value?.trim().toLowerCase() ?? "") ?? "full";
}

export function filterDescription(
  text: string | null | undefined,
  style: DescriptionStyle,
  range?: LineRange | null
): string | null {
  if (text === null || text === undefined || style === "none") {
    return null;
  }

  switch (style) {
    case "lineRange":
      return range ? selectLineRange(text, range) : text;
    case "summaryAndHeaders":
      return summarizeWithHeaders(text);
    default:
      return text;
  }
}

function formatNumberedLine(lineNumber: number, line: string): string {
  return `${String(lineNumber).padStart(4)}: ${line}`;
}

function selectLineRange(text: string, range: LineRange): string {
  const lines = text.split("\n");
  const total = lines.length;
  if (range.start < 1 || range.start > total || range.end < range.start) {
    return `Invalid line range: ${range.start}-${range.end} (total lines: ${total})`;
  }

  const end = Math.min(range.end, total);
  return lines
    .slice(range.start - 1, end)
    .map((line, offset) => formatNumberedLine(range.start + offset, line))
    .join("\n");
}

function isHeaderLine(line: string): boolean {
  const trimmed = line.trim();
  return MARKDOWN_HEADER.test(trimmed) || BOLD_HEADER.test(trimmed);
}

/**
 * Keeps the text before the first header plus a numbered outline of every
 * header line (markdown `#` headings and lines that are only `**bold**`).
 */
function summarizeWithHeaders(text: string): string {
  const lines = text.split("\n");
  const firstHeader = lines.findIndex(isHeaderLine);
  const summary = (firstHeader === -1 ? lines : lines.slice(0, firstHeader)).join("\n").trim();

  const headers: string[] = [];
  lines.forEach((line, index) => {
    if (isHeaderLine(line)) {
      headers.push(formatNumberedLine(index + 1, line.trim()));
    }
  });

  const sections: string[] = [];
  if (summary) {
    sections.push(`=== Summary ===\n${summary}`);
  }
  if (headers.length > 0) {
    sections.push(`=== Headers ===\n${headers.join("\n")}`);
  }
  return sections.length > 0 ? sections.join("\n\n") : text;
}

export function filterBody(body: JsonValue | null | undefined, style: BodyStyle): JsonValue | null {
  if (body === undefined || style === "none") {
    return null;
  }
  if (style === "full") {
    return body;
  }
  return stripToSchema(body);
}

function stripToSchema(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(stripToSchema);
  }
  if (!isJsonObject(value)) {
    return value;
  }

  return Object.fromEntries(
    Object.entries(value)
      .filter(([key]) => !EXAMPLE_KEYS.has(key))
      .map(([key, entry]): [string, JsonValue] => [key, stripEntry(key, entry)])
  );
}

function stripEntry(key: string, entry: JsonValue): JsonValue {
  if (key === "properties" && isJsonObject(entry)) {
    return compactProperties(entry);
  }
  if (key === "enum" && Array.isArray(entry)) {
    return capEnum(entry);
  }
  return stripToSchema(entry);
}

function compactProperties(properties: JsonObject): JsonObject {
  return Object.fromEntries(
    Object.entries(properties).map(([name, schema]): [string, JsonValue] => [name, compactPropertySchema(schema)])
  );
}

function compactPropertySchema(schema: JsonValue): JsonObject {
  if (!isJsonObject(schema)) {
    return { type: "unknown" };
  }
  if (typeof schema.$ref === "string") {
    return { $ref: schema.$ref };
  }

  const compact: JsonObject = { type: inferType(schema) };
  if (typeof schema.format === "string") {
    compact.format = schema.format;
  }
  if (Array.isArray(schema.enum)) {
    compact.enum = capEnum(schema.enum);
  }
  return compact;
}

function inferType(schema: JsonObject): JsonValue {
  if (typeof schema.type === "string" || Array.isArray(schema.type)) return schema.type;
  if (isJsonObject(schema.properties)) return "object";
  if (schema.items !== undefined) return "array";
  return "unknown";
}

function capEnum(values: JsonValue[]): JsonValue[] {
  return values.slice(0, MAX_ENUM_VALUES).map((value) =>
    typeof value === "string" && value.length > MAX_VALUE_LENGTH ? `${value.slice(0, MAX_VALUE_LENGTH)}...` : value
  );
}
