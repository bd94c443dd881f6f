/**
 * Codestencil Value Utilities
 *
 * The value universe templates operate on, the attribute protocol
 * implemented by model objects, truthiness and stringification.
 */

import { ValueTypeError } from "./errors.ts";
import type { SourcePosition } from "./errors.ts";

/**
 * An object whose attributes can be read by dotted paths in templates.
 *
 * `get` returns `undefined` when the attribute does not exist and `null`
 * when it exists but holds no value.
 */
export interface AttributeResolvable {
  get(name: string): TemplateValue | undefined;
}

export type TemplateValue =
  | string
  | number
  | boolean
  | null
  | AttributeResolvable
  | readonly TemplateValue[];

/** Named bindings forming one scope frame. */
export type Bindings = Readonly<Record<string, TemplateValue>>;

export function isSequence(value: TemplateValue): value is readonly TemplateValue[] {
  return Array.isArray(value);
}

export function isResolvable(value: TemplateValue): value is AttributeResolvable {
  return typeof value === "object" && value !== null && !isSequence(value);
}

/**
 * Wrap plain bindings as an attribute-resolvable record.
 */
export function createRecord(entries: Bindings): AttributeResolvable {
  const table = new Map(Object.entries(entries));
  return {
    get: (name: string) => table.get(name),
  };
}

/**
 * Build an attribute lookup from a table of accessor functions.
 *
 * Each entity type declares the attributes it exposes once, so that
 * resolution never reflects over arbitrary object properties.
 */
export type AttributeTable<T> = Readonly<Record<string, (subject: T) => TemplateValue>>;

export function lookupAttribute<T>(
  table: AttributeTable<T>,
  subject: T,
  name: string
): TemplateValue | undefined {
  if (!Object.prototype.hasOwnProperty.call(table, name)) {
    return undefined;
  }
  return table[name](subject);
}

/**
 * Check if a value is truthy.
 *
 * Falsy values:
 * - false
 * - null
 * - 0
 * - "" (empty string)
 * - [] (empty sequence)
 */
export function isTruthy(value: TemplateValue): boolean {
  if (value === false || value === null) {
    return false;
  }

  if (typeof value === "number") {
    return value !== 0;
  }

  if (typeof value === "string") {
    return value.length > 0;
  }

  if (isSequence(value)) {
    return value.length > 0;
  }

  return true;
}

/**
 * Convert a value to output text.
 *
 * - String: returned as-is
 * - Number: decimal form
 * - Boolean: "true" / "false"
 * - null: empty string
 * - Sequence/Object: ERROR
 */
export function stringify(value: TemplateValue, position: SourcePosition | null = null): string {
  if (typeof value === "string") {
    return value;
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new ValueTypeError(`Cannot stringify non-finite number: ${value}`, position);
    }
    return String(value);
  }

  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }

  if (value === null) {
    return "";
  }

  if (isSequence(value)) {
    throw new ValueTypeError("Cannot stringify a sequence", position);
  }

  throw new ValueTypeError("Cannot stringify an object", position);
}

/**
 * Ensure a value is a sequence.
 */
export function ensureSequence(
  value: TemplateValue,
  position: SourcePosition | null = null
): readonly TemplateValue[] {
  if (!isSequence(value)) {
    throw new ValueTypeError(`Expected a sequence, got ${describeValue(value)}`, position);
  }
  return value;
}

/**
 * Type guard to check if a value is a plain Record<string, unknown>.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Convert plain data, such as parsed JSON or YAML, to a template value.
 * Objects become records; values with no template counterpart are rejected.
 */
export function normalizeData(data: unknown): TemplateValue {
  if (data === null || typeof data === "string" || typeof data === "boolean") {
    return data;
  }

  if (typeof data === "number") {
    if (!Number.isFinite(data)) {
      throw new ValueTypeError(`Invalid number: ${data}`);
    }
    return data;
  }

  if (Array.isArray(data)) {
    return data.map((item: unknown) => normalizeData(item));
  }

  if (isRecord(data)) {
    return createRecord(normalizeBindings(data));
  }

  throw new ValueTypeError(`Unsupported value of type ${typeof data}`);
}

/**
 * Normalize plain data into root bindings.
 * Throws if the input is not an object.
 */
export function normalizeBindings(data: unknown): Bindings {
  if (!isRecord(data)) {
    throw new ValueTypeError("Root data must be an object");
  }
  const bindings: Record<string, TemplateValue> = {};
  for (const [key, value] of Object.entries(data)) {
    bindings[key] = normalizeData(value);
  }
  return bindings;
}

export function describeValue(value: TemplateValue): string {
  if (value === null) return "null";
  if (isSequence(value)) return "sequence";
  if (isResolvable(value)) return "object";
  return typeof value;
}
