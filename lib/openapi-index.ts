import { promises as fs } from "node:fs";
import { OpenAPIV3 } from "openapi-types";
import yaml from "yaml";
import { isJsonObject, isRecord, type JsonObject, type JsonValue } from "@/lib/json";

type CodeSampleExtension = {
  "x-code-samples"?: unknown;
  "x-codeSamples"?: unknown;
};

export type OpenApiDocument = OpenAPIV3.Document<CodeSampleExtension>;
type OperationObject = OpenAPIV3.OperationObject<CodeSampleExtension>;

export type EndpointRecord = {
  path: string;
  method: string;
  operationId: string | null;
  summary: string;
  description: string;
  tags: string[];
  parameters: JsonValue[];
  requestBody: JsonObject | null;
  responses: JsonObject;
  sampleLanguages: string[];
  sampleCodes: Record<string, string>;
  searchContent: string;
};

export type SchemaRecord = {
  schemaName: string;
  schemaType: string;
  title: string;
  description: string;
  properties: JsonObject;
  requiredFields: string[];
  exampleValue: JsonValue | null;
  searchContent: string;
};

export type SearchContentFields = Pick<
  EndpointRecord,
  "path" | "summary" | "description" | "operationId" | "method" | "tags" | "parameters"
>;

export type SchemaSearchContentFields = Pick<
  SchemaRecord,
  "schemaName" | "title" | "description" | "schemaType" | "properties"
>;

const HTTP_METHODS = Object.values(OpenAPIV3.HttpMethods);

export async function loadOpenApiDocument(filePath: string): Promise<OpenApiDocument> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isRecord(error) && error.code === "ENOENT") {
      throw new Error(`OpenAPI document not found: ${filePath}`);
    }
    throw error;
  }

  // YAML 1.2 is a superset of JSON, so .json documents parse the same way.
  const parsed: unknown = yaml.parse(content);
  if (!isOpenApiDocument(parsed)) {
    throw new Error(`Not an OpenAPI 3 document: ${filePath}`);
  }
  return parsed;
}

export function isOpenApiDocument(value: unknown): value is OpenApiDocument {
  return isRecord(value) && typeof value.openapi === "string" && value.openapi.startsWith("3") && isRecord(value.paths);
}

export function extractEndpointRecords(document: OpenApiDocument): EndpointRecord[] {
  const records: EndpointRecord[] = [];
  const seenOperationIds = new Set<string>();

  for (const [rawPath, pathItem] of Object.entries(document.paths)) {
    if (!pathItem) continue;
    const sharedParameters = pathItem.parameters ?? [];

    for (const method of HTTP_METHODS) {
      const operation = pathItem[method];
      if (!operation) continue;

      let operationId = operation.operationId?.trim() || null;
      if (operationId && seenOperationIds.has(operationId)) {
        console.warn("[openapi-index] Duplicate operationId dropped", { operationId, path: rawPath, method });
        operationId = null;
      }
      if (operationId) {
        seenOperationIds.add(operationId);
      }

      const parameters = [...(operation.parameters ?? []), ...sharedParameters].map((parameter) =>
        dereference(parameter, document)
      );
      const requestBody = operation.requestBody ? dereference(operation.requestBody, document) : null;
      const responses = dereference(operation.responses ?? {}, document);
      const { sampleLanguages, sampleCodes } = extractCodeSamples(operation);

      const fields: SearchContentFields = {
        path: rawPath,
        method: method.toUpperCase(),
        operationId,
        summary: operation.summary ?? "",
        description: operation.description ?? "",
        tags: (operation.tags ?? []).filter((tag) => typeof tag === "string"),
        parameters
      };

      records.push({
        ...fields,
        requestBody: isJsonObject(requestBody) ? requestBody : null,
        responses: isJsonObject(responses) ? responses : {},
        sampleLanguages,
        sampleCodes,
        searchContent: buildEndpointSearchContent(fields)
      });
    }
  }

  return records;
}

export function extractSchemaRecords(document: OpenApiDocument): SchemaRecord[] {
  const schemas = document.components?.schemas ?? {};
  const records: SchemaRecord[] = [];

  for (const [schemaName, definition] of Object.entries(schemas)) {
    const resolved = dereference(definition, document);
    if (!isJsonObject(resolved)) continue;

    const fields: SchemaSearchContentFields = {
      schemaName,
      schemaType: typeof resolved.type === "string" ? resolved.type : "object",
      title: typeof resolved.title === "string" ? resolved.title : "",
      description: typeof resolved.description === "string" ? resolved.description : "",
      properties: isJsonObject(resolved.properties) ? resolved.properties : {}
    };

    const required = resolved.required;
    records.push({
      ...fields,
      requiredFields: Array.isArray(required)
        ? required.filter((name): name is string => typeof name === "string")
        : [],
      exampleValue: Object.hasOwn(resolved, "example") ? resolved.example : null,
      searchContent: buildSchemaSearchContent(fields)
    });
  }

  return records;
}

/**
 * Flattened text every endpoint search matches against. Order follows field
 * importance: path and summary first, parameter names last.
 */
export function buildEndpointSearchContent(fields: SearchContentFields): string {
  const parts = [
    fields.path,
    fields.summary,
    fields.description,
    fields.operationId ?? "",
    fields.method,
    fields.tags.join(" "),
    ...collectParameterNames(fields.parameters)
  ];
  return parts.filter(Boolean).join(" ");
}

export function buildSchemaSearchContent(fields: SchemaSearchContentFields): string {
  const parts = [fields.schemaName, fields.title, fields.description, fields.schemaType];
  for (const [propertyName, propertySchema] of Object.entries(fields.properties)) {
    parts.push(propertyName);
    if (isJsonObject(propertySchema) && typeof propertySchema.description === "string") {
      parts.push(propertySchema.description);
    }
  }
  return parts.filter(Boolean).join(" ");
}

function collectParameterNames(parameters: JsonValue[]): string[] {
  const names: string[] = [];
  for (const parameter of parameters) {
    if (isJsonObject(parameter) && typeof parameter.name === "string" && parameter.name) {
      names.push(parameter.name);
    }
  }
  return names;
}

function extractCodeSamples(operation: OperationObject): {
  sampleLanguages: string[];
  sampleCodes: Record<string, string>;
} {
  const samples = operation["x-code-samples"] ?? operation["x-codeSamples"];
  if (!Array.isArray(samples)) {
    return { sampleLanguages: [], sampleCodes: {} };
  }

  // Later samples for a language replace earlier ones but keep its first position.
  const sources = new Map<string, string>();
  for (const sample of samples) {
    if (!isRecord(sample) || typeof sample.lang !== "string" || !sample.lang) continue;
    sources.set(sample.lang, typeof sample.source === "string" ? sample.source : "");
  }

  return { sampleLanguages: [...sources.keys()], sampleCodes: Object.fromEntries(sources) };
}

/**
 * Inlines local `$ref`s. A reference already being expanded higher up the
 * tree is left as `{ $ref }` so recursive schemas terminate.
 */
export function dereference(value: unknown, document: OpenApiDocument, activeRefs: readonly string[] = []): JsonValue {
  if (value === null) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) {
    return value.map((item) => dereference(item, document, activeRefs));
  }
  if (!isRecord(value)) return null;

  const ref = value.$ref;
  if (typeof ref === "string") {
    if (activeRefs.includes(ref)) {
      return { $ref: ref };
    }
    const target = resolveRef(document, ref);
    if (target === undefined) {
      return { $ref: ref };
    }
    return dereference(target, document, [...activeRefs, ref]);
  }

  return Object.fromEntries(
    Object.entries(value)
      .filter(([, entry]) => entry !== undefined && typeof entry !== "function")
      .map(([key, entry]): [string, JsonValue] => [key, dereference(entry, document, activeRefs)])
  );
}

export function resolveRef(document: OpenApiDocument, ref: string): unknown {
  if (!ref.startsWith("#/")) {
    return undefined;
  }

  const pathParts = ref.replace(/^#\//, "").split("/");
  let current: unknown = document;

  for (const part of pathParts) {
    const key = part.replace(/~1/g, "/").replace(/~0/g, "~");
    if (isRecord(current) && Object.hasOwn(current, key)) {
      current = current[key];
    } else if (Array.isArray(current) && /^\d+$/.test(key)) {
      current = current[Number(key)];
    } else {
      return undefined;
    }
  }

  return current;
}
