/**
 * Codestencil Model Context
 *
 * Read-only object graph describing one API. Every entity exposes a fixed
 * attribute table to templates through `AttributeResolvable`.
 */

import { DescriptionError } from "./errors.ts";
import type { AttributeResolvable, AttributeTable } from "./value.ts";
import { lookupAttribute } from "./value.ts";

export interface Module extends AttributeResolvable {
  readonly kind: "module";
  readonly path: string;
  readonly name: string;
}

export interface Property extends AttributeResolvable {
  readonly kind: "property";
  readonly wireName: string;
  readonly codeName: string;
  readonly codeType: string;
  readonly description: string | null;
}

export interface Model extends AttributeResolvable {
  readonly kind: "model";
  readonly className: string;
  readonly description: string | null;
  readonly module: Module | null;
  readonly arrayOf: Model | null;
  readonly properties: readonly Property[];
}

export type ParameterLocation = "path" | "query";

export interface Parameter extends AttributeResolvable {
  readonly kind: "parameter";
  readonly wireName: string;
  readonly codeName: string;
  readonly codeType: string;
  readonly description: string | null;
  readonly required: boolean;
  readonly location: ParameterLocation;
}

export interface Method extends AttributeResolvable {
  readonly kind: "method";
  readonly codeName: string;
  readonly path: string;
  readonly httpMethod: string;
  readonly description: string | null;
  readonly requestType: Model | null;
  readonly responseType: Model | null;
  readonly parameters: readonly Parameter[];
  readonly requiredParameters: readonly Parameter[];
  readonly optionalParameters: readonly Parameter[];
  readonly pathParameters: readonly Parameter[];
  readonly queryParameters: readonly Parameter[];
}

export interface Api extends AttributeResolvable {
  readonly kind: "api";
  readonly name: string;
  readonly className: string;
  readonly version: string | null;
  readonly description: string | null;
  readonly module: Module;
  readonly methods: readonly Method[];
  readonly models: readonly Model[];
}

// =============================================================================
// Attribute tables
// =============================================================================

const MODULE_ATTRIBUTES: AttributeTable<Module> = {
  path: (m) => m.path,
  name: (m) => m.name,
};

const PROPERTY_ATTRIBUTES: AttributeTable<Property> = {
  wireName: (p) => p.wireName,
  codeName: (p) => p.codeName,
  codeType: (p) => p.codeType,
  description: (p) => p.description,
};

const MODEL_ATTRIBUTES: AttributeTable<Model> = {
  className: (m) => m.className,
  fullClassName: (m) => (m.module && m.module.name !== "" ? `${m.module.name}.${m.className}` : m.className),
  description: (m) => m.description,
  module: (m) => m.module,
  arrayOf: (m) => m.arrayOf,
  isArray: (m) => m.arrayOf !== null,
  properties: (m) => m.properties,
};

const PARAMETER_ATTRIBUTES: AttributeTable<Parameter> = {
  wireName: (p) => p.wireName,
  codeName: (p) => p.codeName,
  codeType: (p) => p.codeType,
  description: (p) => p.description,
  required: (p) => p.required,
  location: (p) => p.location,
};

const METHOD_ATTRIBUTES: AttributeTable<Method> = {
  codeName: (m) => m.codeName,
  path: (m) => m.path,
  httpMethod: (m) => m.httpMethod,
  description: (m) => m.description,
  requestType: (m) => m.requestType,
  responseType: (m) => m.responseType,
  parameters: (m) => m.parameters,
  requiredParameters: (m) => m.requiredParameters,
  optionalParameters: (m) => m.optionalParameters,
  pathParameters: (m) => m.pathParameters,
  queryParameters: (m) => m.queryParameters,
};

const API_ATTRIBUTES: AttributeTable<Api> = {
  name: (a) => a.name,
  className: (a) => a.className,
  version: (a) => a.version,
  description: (a) => a.description,
  module: (a) => a.module,
  methods: (a) => a.methods,
  models: (a) => a.models,
  topLevelModels: (a) => a.models.filter((m) => m.arrayOf === null),
};

function requireName(entity: string, field: string, value: string): void {
  if (value.length === 0) {
    throw new DescriptionError(`${entity} ${field} must not be empty`);
  }
}

// =============================================================================
// Constructors
// =============================================================================

export interface ModuleInit {
  path: string;
  delimiter: string;
}

export function createModule(init: ModuleInit): Module {
  const name = init.path.split("/").filter((s) => s !== "").join(init.delimiter);
  const mod: Module = {
    kind: "module",
    path: init.path,
    name,
    get: (attr: string) => lookupAttribute(MODULE_ATTRIBUTES, mod, attr),
  };
  return Object.freeze(mod);
}

export interface PropertyInit {
  wireName: string;
  codeName: string;
  codeType: string;
  description?: string | null;
}

export function createProperty(init: PropertyInit): Property {
  requireName("Property", "wireName", init.wireName);
  requireName("Property", "codeName", init.codeName);
  requireName("Property", "codeType", init.codeType);
  const property: Property = {
    kind: "property",
    wireName: init.wireName,
    codeName: init.codeName,
    codeType: init.codeType,
    description: init.description ?? null,
    get: (attr: string) => lookupAttribute(PROPERTY_ATTRIBUTES, property, attr),
  };
  return Object.freeze(property);
}

export interface ModelInit {
  className: string;
  description?: string | null;
  module?: Module | null;
  arrayOf?: Model | null;
  properties?: readonly Property[];
}

export function createModel(init: ModelInit): Model {
  requireName("Model", "className", init.className);
  const properties = Object.freeze([...(init.properties ?? [])]);
  const arrayOf = init.arrayOf ?? null;
  if (arrayOf !== null && properties.length > 0) {
    throw new DescriptionError(`Model ${init.className} cannot be both an array and have properties`);
  }
  const model: Model = {
    kind: "model",
    className: init.className,
    description: init.description ?? null,
    module: init.module ?? null,
    arrayOf,
    properties,
    get: (attr: string) => lookupAttribute(MODEL_ATTRIBUTES, model, attr),
  };
  return Object.freeze(model);
}

export interface ParameterInit {
  wireName: string;
  codeName: string;
  codeType: string;
  description?: string | null;
  required?: boolean;
  location?: ParameterLocation;
}

export function createParameter(init: ParameterInit): Parameter {
  requireName("Parameter", "wireName", init.wireName);
  requireName("Parameter", "codeName", init.codeName);
  requireName("Parameter", "codeType", init.codeType);
  const parameter: Parameter = {
    kind: "parameter",
    wireName: init.wireName,
    codeName: init.codeName,
    codeType: init.codeType,
    description: init.description ?? null,
    required: init.required ?? false,
    location: init.location ?? "query",
    get: (attr: string) => lookupAttribute(PARAMETER_ATTRIBUTES, parameter, attr),
  };
  return Object.freeze(parameter);
}

export interface MethodInit {
  codeName: string;
  path: string;
  httpMethod: string;
  description?: string | null;
  requestType?: Model | null;
  responseType?: Model | null;
  parameters?: readonly Parameter[];
  /** Order of required parameters by wire name; others follow in declaration order */
  parameterOrder?: readonly string[];
}

function orderRequired(required: Parameter[], order: readonly string[]): Parameter[] {
  const rank = (p: Parameter): number => {
    const index = order.indexOf(p.wireName);
    return index === -1 ? order.length : index;
  };
  // Array.prototype.sort is stable, so unranked parameters keep declaration order.
  return [...required].sort((a, b) => rank(a) - rank(b));
}

export function createMethod(init: MethodInit): Method {
  requireName("Method", "codeName", init.codeName);
  const parameters = Object.freeze([...(init.parameters ?? [])]);
  const required = orderRequired(
    parameters.filter((p) => p.required),
    init.parameterOrder ?? []
  );

  const method: Method = {
    kind: "method",
    codeName: init.codeName,
    path: init.path,
    httpMethod: init.httpMethod,
    description: init.description ?? null,
    requestType: init.requestType ?? null,
    responseType: init.responseType ?? null,
    parameters,
    requiredParameters: Object.freeze(required),
    optionalParameters: Object.freeze(parameters.filter((p) => !p.required)),
    pathParameters: Object.freeze(parameters.filter((p) => p.location === "path")),
    queryParameters: Object.freeze(parameters.filter((p) => p.location === "query")),
    get: (attr: string) => lookupAttribute(METHOD_ATTRIBUTES, method, attr),
  };
  return Object.freeze(method);
}

export interface ApiInit {
  name: string;
  className: string;
  version?: string | null;
  description?: string | null;
  module: Module;
  methods?: readonly Method[];
  models?: readonly Model[];
}

export function createApi(init: ApiInit): Api {
  requireName("Api", "name", init.name);
  requireName("Api", "className", init.className);
  const api: Api = {
    kind: "api",
    name: init.name,
    className: init.className,
    version: init.version ?? null,
    description: init.description ?? null,
    module: init.module,
    methods: Object.freeze([...(init.methods ?? [])]),
    models: Object.freeze([...(init.models ?? [])]),
    get: (attr: string) => lookupAttribute(API_ATTRIBUTES, api, attr),
  };
  return Object.freeze(api);
}
