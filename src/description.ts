/**
 * Codestencil API Descriptions
 *
 * Builds the model context from a normalized API description (JSON or
 * YAML). Types are either spelled out as `codeType` or derived from JSON
 * schema `type`/`format` through the target language's type map.
 *
 * ```yaml
 * name: books
 * version: v1
 * module: { ownerDomain: example.com, path: books/v1 }
 * models:
 *   - className: Book
 *     properties:
 *       - { wireName: title, type: string }
 *       - { wireName: pages, type: integer, format: int32 }
 * methods:
 *   - codeName: get
 *     path: books/{bookId}
 *     responseType: Book
 *     parameters:
 *       - { wireName: bookId, type: string, required: true, location: path }
 * ```
 */

import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { DescriptionError } from "./errors.ts";
import { capfirst } from "./filters.ts";
import { codeTypeFor } from "./languages.ts";
import type { LanguageRules } from "./languages.ts";
import { createApi, createMethod, createModel, createModule, createParameter, createProperty } from "./model.ts";
import type { Api, Method, Model, Module, Parameter } from "./model.ts";
import { readTextFile } from "./platform.ts";

// ── Schema ───────────────────────────────────────────────

export interface TypeSpec {
  codeType?: string;
  type?: string;
  format?: string;
  $ref?: string;
  items?: TypeSpec;
  additionalProperties?: TypeSpec;
}

const typeFields = {
  codeType: z.string().min(1).optional(),
  type: z.string().min(1).optional(),
  format: z.string().min(1).optional(),
  $ref: z.string().min(1).optional(),
};

const TypeSpecSchema: z.ZodType<TypeSpec> = z.lazy(() =>
  z.object({
    ...typeFields,
    items: TypeSpecSchema.optional(),
    additionalProperties: TypeSpecSchema.optional(),
  })
);

const PropertySchema = z.object({
  wireName: z.string().min(1),
  codeName: z.string().min(1).optional(),
  description: z.string().nullable().optional(),
  ...typeFields,
  items: TypeSpecSchema.optional(),
  additionalProperties: TypeSpecSchema.optional(),
});

const ParameterSchema = PropertySchema.extend({
  required: z.boolean().optional(),
  location: z.enum(["path", "query"]).optional(),
});

const ModelSchema = z.object({
  className: z.string().min(1),
  description: z.string().nullable().optional(),
  arrayOf: z.string().min(1).optional(),
  properties: z.array(PropertySchema).optional(),
});

const MethodSchema = z.object({
  codeName: z.string().min(1),
  path: z.string(),
  httpMethod: z.string().min(1).optional(),
  description: z.string().nullable().optional(),
  requestType: z.string().min(1).optional(),
  responseType: z.string().min(1).optional(),
  parameters: z.array(ParameterSchema).optional(),
  parameterOrder: z.array(z.string().min(1)).optional(),
});

const DescriptionSchema = z.object({
  name: z.string().min(1),
  className: z.string().min(1).optional(),
  version: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
  module: z
    .object({
      ownerDomain: z.string().min(1).optional(),
      path: z.string().optional(),
    })
    .optional(),
  models: z.array(ModelSchema).optional(),
  methods: z.array(MethodSchema).optional(),
});

export type ApiDescription = z.infer<typeof DescriptionSchema>;
type ModelDescription = z.infer<typeof ModelSchema>;
type MethodDescription = z.infer<typeof MethodSchema>;

// ── Modules ──────────────────────────────────────────────

/**
 * Module path for an owner domain and API path:
 * `example.com` + `books/v1` → `com/example/books/v1`.
 */
export function modulePath(ownerDomain: string | undefined, path: string | undefined): string {
  const segments = (ownerDomain ?? "")
    .split(".")
    .filter((s) => s !== "")
    .reverse();
  segments.push(...(path ?? "").split("/").filter((s) => s !== ""));
  return segments.join("/");
}

// ── Builder ──────────────────────────────────────────────

interface BuildState {
  language: LanguageRules;
  modelModule: Module;
  declared: Map<string, ModelDescription>;
  built: Map<string, Model>;
  building: string[];
}

function codeTypeOf(state: BuildState, typeSpec: TypeSpec, where: string): string {
  if (typeSpec.codeType !== undefined) {
    return typeSpec.codeType;
  }
  if (typeSpec.$ref !== undefined) {
    // By name only, so models may refer to themselves or to each other.
    if (!state.declared.has(typeSpec.$ref)) {
      throw new DescriptionError(`${where}: unknown model '${typeSpec.$ref}'`);
    }
    return typeSpec.$ref;
  }
  if (typeSpec.type === "array") {
    if (typeSpec.items === undefined) {
      throw new DescriptionError(`${where}: array type without items`);
    }
    return state.language.arrayOf(codeTypeOf(state, typeSpec.items, `${where}[]`));
  }
  if (typeSpec.type === "object" && typeSpec.additionalProperties !== undefined) {
    return state.language.mapOf(codeTypeOf(state, typeSpec.additionalProperties, `${where}{}`));
  }
  if (typeSpec.type !== undefined) {
    return codeTypeFor(state.language, typeSpec.type, typeSpec.format ?? null);
  }
  throw new DescriptionError(`${where}: one of codeType, $ref or type is required`);
}

function buildModel(state: BuildState, className: string, where: string): Model {
  const existing = state.built.get(className);
  if (existing) return existing;

  const description = state.declared.get(className);
  if (description === undefined) {
    throw new DescriptionError(`${where}: unknown model '${className}'`);
  }
  if (state.building.includes(className)) {
    throw new DescriptionError(`Model '${className}' refers to itself: ${[...state.building, className].join(" -> ")}`);
  }

  state.building.push(className);
  try {
    const arrayOf =
      description.arrayOf === undefined ? null : buildModel(state, description.arrayOf, `${className}.arrayOf`);
    const properties = (description.properties ?? []).map((p) =>
      createProperty({
        wireName: p.wireName,
        codeName: p.codeName ?? p.wireName,
        codeType: codeTypeOf(state, p, `${className}.${p.wireName}`),
        description: p.description ?? null,
      })
    );

    const model = createModel({
      className,
      description: description.description ?? null,
      module: state.modelModule,
      arrayOf,
      properties,
    });
    state.built.set(className, model);
    return model;
  } finally {
    state.building.pop();
  }
}

function optionalModel(state: BuildState, name: string | undefined, where: string): Model | null {
  return name === undefined ? null : buildModel(state, name, where);
}

function buildMethod(state: BuildState, method: MethodDescription): Method {
  const parameters: Parameter[] = (method.parameters ?? []).map((p) =>
    createParameter({
      wireName: p.wireName,
      codeName: p.codeName ?? p.wireName,
      codeType: codeTypeOf(state, p, `${method.codeName}(${p.wireName})`),
      description: p.description ?? null,
      required: p.required ?? false,
      location: p.location ?? "query",
    })
  );

  for (const name of method.parameterOrder ?? []) {
    if (!parameters.some((p) => p.wireName === name)) {
      throw new DescriptionError(`${method.codeName}: parameterOrder names unknown parameter '${name}'`);
    }
  }

  return createMethod({
    codeName: method.codeName,
    path: method.path,
    httpMethod: method.httpMethod ?? "GET",
    description: method.description ?? null,
    requestType: optionalModel(state, method.requestType, `${method.codeName}.requestType`),
    responseType: optionalModel(state, method.responseType, `${method.codeName}.responseType`),
    parameters,
    parameterOrder: method.parameterOrder ?? [],
  });
}

// ── Public API ───────────────────────────────────────────

/**
 * Validate an API description and build its model context for a language.
 */
export function loadDescription(raw: unknown, language: LanguageRules): Api {
  const result = DescriptionSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new DescriptionError("Invalid API description", issues);
  }
  const description = result.data;

  const apiPath = modulePath(description.module?.ownerDomain, description.module?.path);
  const modelPath = [apiPath, language.modelSubmodule].filter((s) => s !== "").join("/");

  const declared = new Map<string, ModelDescription>();
  for (const model of description.models ?? []) {
    if (declared.has(model.className)) {
      throw new DescriptionError(`Duplicate model '${model.className}'`);
    }
    declared.set(model.className, model);
  }

  const state: BuildState = {
    language,
    modelModule: createModule({ path: modelPath, delimiter: language.moduleDelimiter }),
    declared,
    built: new Map(),
    building: [],
  };

  const models = [...declared.keys()].map((name) => buildModel(state, name, "models"));
  const methods = (description.methods ?? []).map((method) => buildMethod(state, method));

  return createApi({
    name: description.name,
    className: description.className ?? capfirst(description.name),
    version: description.version ?? null,
    description: description.description ?? null,
    module: createModule({ path: apiPath, delimiter: language.moduleDelimiter }),
    methods,
    models,
  });
}

/**
 * Read a JSON or YAML API description file and build its model context.
 */
export async function readDescriptionFile(path: string, language: LanguageRules): Promise<Api> {
  const content = await readTextFile(path);
  let raw: unknown;
  try {
    raw = path.endsWith(".json") ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DescriptionError(`Cannot parse API description "${path}": ${reason}`);
  }
  return loadDescription(raw, language);
}
