/**
 * Codestencil Target Languages
 *
 * Per-language rules the engine needs: literal spelling and escaping,
 * comment styles, the options-group delimiters used by parameter lists,
 * and the JSON-schema type map used when building a model context.
 */

import type { CommentStyle } from "./comments.ts";
import { ValueTypeError } from "./errors.ts";
import type { SourcePosition } from "./errors.ts";
import { describeValue } from "./value.ts";
import type { TemplateValue } from "./value.ts";

export interface LanguageRules {
  name: string;
  /** Quote and escape a string so the language reads it back unchanged */
  stringLiteral(value: string): string;
  /** Spell a finite number */
  numberLiteral(value: number): string;
  nullLiteral: string;
  trueLiteral: string;
  falseLiteral: string;
  docComment: CommentStyle;
  /** Rewrite text that would end a comment early */
  sanitizeComment(text: string): string;
  /** Comment style wrapping `copyright_block` */
  blockComment: CommentStyle;
  /** Line prefix used by the `block_comment` filter */
  commentContinuation: string;
  /** Delimiters around grouped entries of a parameter list */
  optionsGroup: { open: string; close: string };
  moduleDelimiter: string;
  /** Module path segment appended for model classes, or "" */
  modelSubmodule: string;
  /** Keys are a JSON type, or "type/format" */
  typeMap: Readonly<Record<string, string>>;
  arrayOf(elementType: string): string;
  mapOf(valueType: string): string;
}

function hex(char: string, digits: number): string {
  return char.charCodeAt(0).toString(16).toUpperCase().padStart(digits, "0");
}

const JAVA_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\t": "\\t",
  "\r": "\\r",
  "\b": "\\b",
  "\f": "\\f",
};

const PYTHON_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\t": "\\t",
  "\r": "\\r",
};

const SPECIAL_CHAR_REGEX = /[\\"\u0000-\u001f\u007f]/g;

export function javaStringLiteral(value: string): string {
  const body = value.replace(SPECIAL_CHAR_REGEX, (char) => JAVA_ESCAPES[char] ?? `\\u${hex(char, 4)}`);
  return `"${body}"`;
}

export function pythonStringLiteral(value: string): string {
  const body = value.replace(SPECIAL_CHAR_REGEX, (char) => PYTHON_ESCAPES[char] ?? `\\x${hex(char, 2)}`);
  return `"${body}"`;
}

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/** Integers outside the int range need the long suffix. */
export function javaNumberLiteral(value: number): string {
  if (Number.isInteger(value) && (value < INT32_MIN || value > INT32_MAX)) {
    return `${BigInt(value)}L`;
  }
  return String(value);
}

function closeBlockCommentSafely(text: string): string {
  return text.replace(/\*\//g, "*&#47;");
}

const C_STYLE_DOC: CommentStyle = { open: "/**", linePrefix: " * ", close: " */" };
const C_STYLE_BLOCK: CommentStyle = { open: "/*", linePrefix: " * ", close: " */" };
const HASH_COMMENT: CommentStyle = { open: null, linePrefix: "# ", close: null };

export const JAVA: LanguageRules = {
  name: "java",
  stringLiteral: javaStringLiteral,
  numberLiteral: javaNumberLiteral,
  nullLiteral: "null",
  trueLiteral: "true",
  falseLiteral: "false",
  docComment: C_STYLE_DOC,
  sanitizeComment: closeBlockCommentSafely,
  blockComment: C_STYLE_BLOCK,
  commentContinuation: " * ",
  optionsGroup: { open: "{", close: "}" },
  moduleDelimiter: ".",
  modelSubmodule: "model",
  typeMap: {
    boolean: "Boolean",
    any: "Object",
    "integer/int16": "Short",
    "integer/int32": "Integer",
    // Long rather than an unsigned type: it autoboxes.
    "integer/uint32": "Long",
    "number/double": "Double",
    "number/float": "Float",
    object: "Object",
    string: "String",
    "string/byte": "String",
    "string/date": "DateTime",
    "string/date-time": "DateTime",
    "string/int64": "Long",
    "string/uint64": "UnsignedLong",
  },
  arrayOf: (elementType) => `java.util.List<${elementType}>`,
  mapOf: (valueType) => `java.util.Map<String, ${valueType}>`,
};

export const GWT: LanguageRules = {
  ...JAVA,
  name: "gwt",
};

export const PYTHON: LanguageRules = {
  name: "python",
  stringLiteral: pythonStringLiteral,
  numberLiteral: (value) => String(value),
  nullLiteral: "None",
  trueLiteral: "True",
  falseLiteral: "False",
  docComment: HASH_COMMENT,
  sanitizeComment: (text) => text,
  blockComment: HASH_COMMENT,
  commentContinuation: "# ",
  optionsGroup: { open: "{", close: "}" },
  moduleDelimiter: ".",
  modelSubmodule: "",
  typeMap: {
    boolean: "bool",
    any: "object",
    integer: "int",
    number: "float",
    object: "object",
    string: "str",
  },
  arrayOf: (elementType) => `list[${elementType}]`,
  mapOf: (valueType) => `dict[str, ${valueType}]`,
};

export const DEFAULT_LANGUAGE: LanguageRules = {
  name: "default",
  stringLiteral: (value) => JSON.stringify(value),
  numberLiteral: (value) => String(value),
  nullLiteral: "null",
  trueLiteral: "true",
  falseLiteral: "false",
  docComment: C_STYLE_DOC,
  sanitizeComment: closeBlockCommentSafely,
  blockComment: C_STYLE_BLOCK,
  commentContinuation: " * ",
  optionsGroup: { open: "{", close: "}" },
  moduleDelimiter: ".",
  modelSubmodule: "",
  typeMap: {
    boolean: "boolean",
    any: "any",
    integer: "integer",
    number: "number",
    object: "object",
    string: "string",
  },
  arrayOf: (elementType) => `array<${elementType}>`,
  mapOf: (valueType) => `map<string, ${valueType}>`,
};

export const BUILTIN_LANGUAGES: readonly LanguageRules[] = [DEFAULT_LANGUAGE, JAVA, GWT, PYTHON];

export interface LanguageRegistry {
  get(name: string): LanguageRules | undefined;
  names(): string[];
}

/**
 * Create a registry of the built-in languages plus `extra` ones.
 * An extra language replaces a built-in of the same name.
 */
export function createLanguageRegistry(extra: readonly LanguageRules[] = []): LanguageRegistry {
  const table = new Map<string, LanguageRules>();
  for (const rules of [...BUILTIN_LANGUAGES, ...extra]) {
    table.set(rules.name, rules);
  }

  return {
    get: (name: string) => table.get(name),
    names: () => [...table.keys()],
  };
}

function camelCase(word: string): string {
  return word
    .split(/[^A-Za-z0-9]+/)
    .filter((part) => part !== "")
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}

/**
 * Map a JSON schema type/format pair to a code type.
 * Falls back to the bare type, then to the CamelCased type name.
 */
export function codeTypeFor(rules: LanguageRules, jsonType: string, format: string | null): string {
  if (format !== null) {
    const withFormat = rules.typeMap[`${jsonType}/${format}`];
    if (withFormat !== undefined) return withFormat;
  }
  return rules.typeMap[jsonType] ?? camelCase(jsonType);
}

/**
 * Spell a scalar value as a literal of the language.
 */
export function formatLiteral(
  rules: LanguageRules,
  value: TemplateValue,
  position: SourcePosition | null = null
): string {
  if (typeof value === "string") {
    return rules.stringLiteral(value);
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new ValueTypeError(`Cannot write non-finite number as a literal: ${value}`, position);
    }
    return rules.numberLiteral(value);
  }
  if (typeof value === "boolean") {
    return value ? rules.trueLiteral : rules.falseLiteral;
  }
  if (value === null) {
    return rules.nullLiteral;
  }
  throw new ValueTypeError(`Cannot write ${describeValue(value)} as a literal`, position);
}
