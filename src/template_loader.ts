/**
 * Codestencil Template Loader
 *
 * Template name normalization, in-memory template sources and the parse
 * cache shared by a composer.
 */

import { TemplateNotFoundError } from "./errors.ts";
import type { SourcePosition } from "./errors.ts";
import type { Template } from "./ast.ts";
import { templateNameProblem } from "./validator.ts";

export const DEFAULT_EXTENSION = ".tmpl";

/**
 * Where template text comes from. `read` returns null for unknown names.
 */
export interface TemplateSource {
  read(name: string): string | null;
  names(): string[];
}

/**
 * Parsed templates by normalized name. Entries are deterministic, so a
 * second `set` for the same name is harmless.
 */
export interface TemplateCache {
  get(name: string): Template | undefined;
  set(name: string, template: Template): void;
  clear(): void;
  readonly size: number;
}

/**
 * Normalize a template name: drop a leading '/', and append the default
 * extension when the last segment has none.
 */
export function normalizeTemplateName(name: string, position: SourcePosition | null = null): string {
  const problem = templateNameProblem(name);
  if (problem !== null) {
    throw new TemplateNotFoundError(problem, position);
  }

  const relative = name.startsWith("/") ? name.slice(1) : name;
  const segments = relative.split("/");
  const last = segments[segments.length - 1];
  return last.includes(".") ? relative : relative + DEFAULT_EXTENSION;
}

/**
 * Create a template source over a fixed set of texts.
 */
export function createMemorySource(templates: Readonly<Record<string, string>>): TemplateSource {
  const table = new Map<string, string>();
  for (const [name, text] of Object.entries(templates)) {
    table.set(normalizeTemplateName(name), text);
  }

  return {
    read: (name: string) => table.get(name) ?? null,
    names: () => [...table.keys()].sort(),
  };
}

/**
 * Create an empty parse cache.
 */
export function createTemplateCache(): TemplateCache {
  const entries = new Map<string, Template>();

  return {
    get: (name: string) => entries.get(name),
    set: (name: string, template: Template) => {
      entries.set(name, template);
    },
    clear: () => entries.clear(),
    get size() {
      return entries.size;
    },
  };
}
