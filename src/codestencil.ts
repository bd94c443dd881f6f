/**
 * Codestencil - Templates for API Client Code
 *
 * Convenience API for parsing and rendering single templates. Use
 * `createComposer` directly to render many templates against one cache.
 */

import { dirname } from "node:path";
import type { Template } from "./ast.ts";
import { createComposer } from "./composer.ts";
import type { LanguageRules } from "./languages.ts";
import { tokenize } from "./lexer.ts";
import { parse as parseTokens } from "./parser.ts";
import { loadTemplateDirectory, readTextFile } from "./platform.ts";
import { createMemorySource } from "./template_loader.ts";
import type { TemplateSource } from "./template_loader.ts";
import type { Bindings } from "./value.ts";

export interface RenderOptions {
  /** Starting language (default "default") */
  language?: string;
  languages?: readonly LanguageRules[];
  /**
   * Templates reachable through `call_template`, by name.
   */
  templates?: Readonly<Record<string, string>>;
  copyright?: string | null;
  lineWidth?: number;
}

export interface RenderFileOptions extends Omit<RenderOptions, "templates"> {
  /**
   * Directories searched by `call_template`.
   * Defaults to the directory holding the file.
   */
  searchPath?: readonly string[];
}

function renderWithSource(
  text: string,
  bindings: Bindings,
  source: TemplateSource,
  options: Omit<RenderOptions, "templates">,
  name: string | null
): string {
  const composer = createComposer({
    source,
    ...(options.language !== undefined ? { language: options.language } : {}),
    ...(options.languages !== undefined ? { languages: options.languages } : {}),
    ...(options.copyright !== undefined ? { copyright: options.copyright } : {}),
    ...(options.lineWidth !== undefined ? { lineWidth: options.lineWidth } : {}),
  });
  return composer.renderSource(text, bindings, name);
}

/**
 * Parse a template source string into an AST.
 */
export function parse(source: string, name: string | null = null): Template {
  const tokens = tokenize(source, name);
  return parseTokens(tokens, name);
}

/**
 * Render a template source string with the given bindings.
 *
 * This is the main entry point for rendering templates.
 */
export function render(source: string, bindings: Bindings = {}, options: RenderOptions = {}): string {
  return renderWithSource(source, bindings, createMemorySource(options.templates ?? {}), options, null);
}

/**
 * Render a template file with the given bindings.
 */
export async function renderFile(
  filePath: string,
  bindings: Bindings = {},
  options: RenderFileOptions = {}
): Promise<string> {
  const text = await readTextFile(filePath);
  const source = await loadTemplateDirectory(options.searchPath ?? [dirname(filePath)]);
  return renderWithSource(text, bindings, source, options, null);
}
