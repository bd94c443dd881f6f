/**
 * Codestencil Composer
 *
 * Resolves template names through a source, caches parse results and
 * renders templates, following `call_template` into other templates.
 */

import { RenderError, TemplateCycleError, TemplateNotFoundError, UnknownLanguageError } from "./errors.ts";
import type { SourcePosition } from "./errors.ts";
import type { Template } from "./ast.ts";
import type { DebugObserverFn } from "./debug_observer.ts";
import { createLanguageRegistry } from "./languages.ts";
import type { LanguageRegistry, LanguageRules } from "./languages.ts";
import { tokenize } from "./lexer.ts";
import { parse as parseTokens } from "./parser.ts";
import { render as renderAst } from "./renderer.ts";
import type { RenderHooks } from "./renderer.ts";
import { createTemplateCache, normalizeTemplateName } from "./template_loader.ts";
import type { TemplateCache, TemplateSource } from "./template_loader.ts";
import type { Bindings } from "./value.ts";

export const DEFAULT_LINE_WIDTH = 80;
export const DEFAULT_MAX_DEPTH = 32;

export interface ComposerOptions {
  source: TemplateSource;
  /** Language in effect until a template switches it (default "default") */
  language?: string;
  /** Extra languages; one named like a built-in replaces it */
  languages?: readonly LanguageRules[];
  /** License text emitted by `copyright_block` */
  copyright?: string | null;
  lineWidth?: number;
  /** Maximum nesting of `call_template` */
  maxDepth?: number;
  /** Parse cache; a fresh one is created when omitted */
  cache?: TemplateCache;
  debug?: DebugObserverFn;
}

export interface RenderJob {
  readonly template: string;
  readonly bindings: Bindings;
}

export type RenderResult =
  | { readonly ok: true; readonly template: string; readonly output: string }
  | { readonly ok: false; readonly template: string; readonly error: Error };

export interface Composer {
  readonly language: LanguageRules;
  readonly cache: TemplateCache;
  /** Load and parse a template by name, through the cache */
  parse(name: string): Template;
  render(name: string, bindings?: Bindings): string;
  /** Render template text that is not part of the source; never cached */
  renderSource(text: string, bindings?: Bindings, name?: string | null): string;
  /** Render each job independently; one failure does not affect the others */
  renderBatch(jobs: readonly RenderJob[]): RenderResult[];
}

interface ComposerState {
  source: TemplateSource;
  languages: LanguageRegistry;
  language: LanguageRules;
  copyright: string | null;
  lineWidth: number;
  maxDepth: number;
  cache: TemplateCache;
  debug: DebugObserverFn | null;
}

/** Templates being rendered by one top-level call, outermost first */
interface Session {
  stack: string[];
}

function parseSource(text: string, name: string | null): Template {
  return parseTokens(tokenize(text, name), name);
}

function loadTemplate(state: ComposerState, name: string, position: SourcePosition | null): Template {
  const key = normalizeTemplateName(name, position);

  const cached = state.cache.get(key);
  if (cached) {
    state.debug?.({ type: "parse", template: key, cached: true, durationMs: 0 });
    return cached;
  }

  const text = state.source.read(key);
  if (text === null) {
    throw new TemplateNotFoundError(`Template not found: ${key}`, position);
  }

  const start = performance.now();
  const template = parseSource(text, key);
  state.cache.set(key, template);
  state.debug?.({ type: "parse", template: key, cached: false, durationMs: performance.now() - start });
  return template;
}

function renderWithSession(
  state: ComposerState,
  session: Session,
  ast: Template,
  bindings: Bindings,
  language: LanguageRules
): string {
  const hooks: RenderHooks = {
    callTemplate: (name, args, callerLanguage, position) =>
      callTemplate(state, session, name, args, callerLanguage, position),
  };

  return renderAst(ast, bindings, {
    language,
    languages: state.languages,
    copyright: state.copyright,
    lineWidth: state.lineWidth,
    hooks,
  });
}

function callTemplate(
  state: ComposerState,
  session: Session,
  name: string,
  bindings: Bindings,
  language: LanguageRules,
  position: SourcePosition
): string {
  const key = normalizeTemplateName(name, position);
  const chain = [...session.stack, key];

  if (session.stack.includes(key)) {
    throw new TemplateCycleError(`Template cycle: ${chain.join(" -> ")}`, chain, position);
  }
  if (session.stack.length >= state.maxDepth) {
    throw new TemplateCycleError(`Template nesting exceeds maximum depth of ${state.maxDepth}`, chain, position);
  }

  const ast = loadTemplate(state, key, position);
  session.stack.push(key);
  try {
    return renderWithSession(state, session, ast, bindings, language);
  } finally {
    session.stack.pop();
  }
}

function observed(state: ComposerState, template: string, fn: () => string): string {
  const start = performance.now();
  try {
    const output = fn();
    state.debug?.({
      type: "render",
      template,
      durationMs: performance.now() - start,
      outputLength: output.length,
    });
    return output;
  } catch (error) {
    if (error instanceof Error) {
      state.debug?.({ type: "error", template, errorName: error.name, message: error.message });
    }
    throw error;
  }
}

function renderNamed(state: ComposerState, name: string, bindings: Bindings): string {
  return observed(state, name, () => {
    const key = normalizeTemplateName(name);
    const ast = loadTemplate(state, key, null);
    return renderWithSession(state, { stack: [key] }, ast, bindings, state.language);
  });
}

function renderSource(state: ComposerState, text: string, bindings: Bindings, name: string | null): string {
  return observed(state, name ?? "<source>", () => {
    const ast = parseSource(text, name);
    const stack = name === null ? [] : [normalizeTemplateName(name)];
    return renderWithSession(state, { stack }, ast, bindings, state.language);
  });
}

function renderBatch(state: ComposerState, jobs: readonly RenderJob[]): RenderResult[] {
  return jobs.map((job): RenderResult => {
    try {
      return { ok: true, template: job.template, output: renderNamed(state, job.template, job.bindings) };
    } catch (error) {
      const failure = error instanceof Error ? error : new RenderError(String(error));
      return { ok: false, template: job.template, error: failure };
    }
  });
}

/**
 * Create a composer.
 */
export function createComposer(options: ComposerOptions): Composer {
  const languages = createLanguageRegistry(options.languages ?? []);
  const languageName = options.language ?? "default";
  const language = languages.get(languageName);
  if (language === undefined) {
    throw new UnknownLanguageError(languageName);
  }

  const state: ComposerState = {
    source: options.source,
    languages,
    language,
    copyright: options.copyright ?? null,
    lineWidth: options.lineWidth ?? DEFAULT_LINE_WIDTH,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    cache: options.cache ?? createTemplateCache(),
    debug: options.debug ?? null,
  };

  return {
    language,
    cache: state.cache,
    parse: (name: string) => loadTemplate(state, name, null),
    render: (name: string, bindings: Bindings = {}) => renderNamed(state, name, bindings),
    renderSource: (text: string, bindings: Bindings = {}, name: string | null = null) =>
      renderSource(state, text, bindings, name),
    renderBatch: (jobs: readonly RenderJob[]) => renderBatch(state, jobs),
  };
}
