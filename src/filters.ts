/**
 * Codestencil Filters
 *
 * The closed set of filters usable in `{{ value|name }}` and
 * `{% filter name %}`. Each is a pure function; a chain applies them left
 * to right, the first receiving the resolved value and the rest text.
 */

import type { SourcePosition } from "./errors.ts";
import { reflowCommentBody } from "./comments.ts";
import { formatLiteral } from "./languages.ts";
import type { LanguageRules } from "./languages.ts";
import { stringify } from "./value.ts";
import type { TemplateValue } from "./value.ts";

export type FilterName = "capfirst" | "block_comment" | "noblanklines" | "literal";

export interface FilterEnv {
  language: LanguageRules;
  lineWidth: number;
  position: SourcePosition | null;
}

type FilterFn = (input: TemplateValue, env: FilterEnv) => string;

export function capfirst(text: string): string {
  if (text === "") return "";
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Blank (or whitespace-only) lines are emptied and runs of them collapse
 * to a single empty line.
 */
export function noBlankLines(text: string): string {
  const out: string[] = [];
  let previousBlank = false;

  for (const line of text.split("\n")) {
    const blank = line.trimEnd() === "";
    if (blank && previousBlank) continue;
    out.push(blank ? "" : line);
    previousBlank = blank;
  }

  return out.join("\n");
}

const FILTERS: Readonly<Record<FilterName, FilterFn>> = {
  capfirst: (input, env) => capfirst(stringify(input, env.position)),
  block_comment: (input, env) =>
    reflowCommentBody(
      env.language.sanitizeComment(stringify(input, env.position)),
      env.language.commentContinuation,
      env.lineWidth
    ),
  noblanklines: (input, env) => noBlankLines(stringify(input, env.position)),
  literal: (input, env) => formatLiteral(env.language, input, env.position),
};

export function isFilterName(name: string): name is FilterName {
  return Object.prototype.hasOwnProperty.call(FILTERS, name);
}

/**
 * Apply a filter chain. An empty chain just stringifies the value.
 */
export function applyFilters(value: TemplateValue, filters: readonly FilterName[], env: FilterEnv): string {
  let current: TemplateValue = value;
  for (const name of filters) {
    current = FILTERS[name](current, env);
  }
  return stringify(current, env.position);
}
