/**
 * Codestencil Renderer
 *
 * Renders an AST to a string.
 * Functional implementation without classes.
 */

import { RenderError, UnknownLanguageError } from "./errors.ts";
import type { SourcePosition } from "./errors.ts";
import type {
  CallTemplateNode,
  CopyrightBlockNode,
  DocCommentIfNode,
  FilterBlockNode,
  ForNode,
  IfNode,
  ImportsNode,
  LanguageNode,
  LiteralNode,
  Location,
  Node,
  ParameterListNode,
  ParameterNode,
  Template,
  VariableNode,
} from "./ast.ts";
import { createContext, resolve, withScope } from "./context.ts";
import type { Context } from "./context.ts";
import { formatDocComment, renderComment, stripHtml } from "./comments.ts";
import { applyFilters } from "./filters.ts";
import type { FilterEnv } from "./filters.ts";
import { formatLiteral } from "./languages.ts";
import type { LanguageRegistry, LanguageRules } from "./languages.ts";
import { createRecord, ensureSequence, isResolvable, isTruthy, stringify } from "./value.ts";
import type { Bindings, TemplateValue } from "./value.ts";

/**
 * Services a render needs from its composer.
 */
export interface RenderHooks {
  /** Render another template in a fresh scope holding only `bindings` */
  callTemplate(name: string, bindings: Bindings, language: LanguageRules, position: SourcePosition): string;
}

export interface RenderOptions {
  language: LanguageRules;
  languages: LanguageRegistry;
  copyright: string | null;
  lineWidth: number;
  hooks: RenderHooks | null;
}

interface ParameterCollector {
  entries: string[];
  grouped: string[];
}

interface RenderState {
  context: Context;
  templateName: string | null;
  language: LanguageRules;
  languages: LanguageRegistry;
  copyright: string | null;
  lineWidth: number;
  hooks: RenderHooks | null;
  collectors: ParameterCollector[];
}

function createRenderState(ast: Template, bindings: Bindings, options: RenderOptions): RenderState {
  return {
    context: createContext(bindings),
    templateName: ast.name,
    language: options.language,
    languages: options.languages,
    copyright: options.copyright,
    lineWidth: options.lineWidth,
    hooks: options.hooks,
    collectors: [],
  };
}

function positionOf(state: RenderState, at: Location): SourcePosition {
  return { templateName: state.templateName, line: at.line, column: at.column };
}

function filterEnv(state: RenderState, at: Location): FilterEnv {
  return { language: state.language, lineWidth: state.lineWidth, position: positionOf(state, at) };
}

function renderNodes(state: RenderState, nodes: Node[]): string {
  let output = "";
  for (const node of nodes) {
    output += renderNode(state, node);
  }
  return output;
}

function renderNode(state: RenderState, node: Node): string {
  switch (node.type) {
    case "text":
      return node.value;
    case "variable":
      return renderVariable(state, node);
    case "if":
      return renderIf(state, node);
    case "for":
      return renderFor(state, node);
    case "filter_block":
      return renderFilterBlock(state, node);
    case "imports":
      return renderImports(state, node);
    case "call_template":
      return renderCallTemplate(state, node);
    case "doc_comment_if":
      return renderDocCommentIf(state, node);
    case "literal":
      return renderLiteral(state, node);
    case "parameter_list":
      return renderParameterList(state, node);
    case "parameter":
      return renderParameter(state, node);
    case "language":
      return switchLanguage(state, node);
    case "copyright_block":
      return renderCopyright(state, node);
  }
}

function renderVariable(state: RenderState, node: VariableNode): string {
  const value = resolve(state.context, node.path, positionOf(state, node));
  return applyFilters(value, node.filters, filterEnv(state, node));
}

function renderIf(state: RenderState, node: IfNode): string {
  const value = resolve(state.context, node.condition, positionOf(state, node));

  if (isTruthy(value)) {
    return renderNodes(state, node.thenBranch);
  } else if (node.elseBranch) {
    return renderNodes(state, node.elseBranch);
  }

  return "";
}

function renderFor(state: RenderState, node: ForNode): string {
  const position = positionOf(state, node);
  const items = ensureSequence(resolve(state.context, node.collection, position), position);
  const length = items.length;

  let output = "";
  items.forEach((item, index) => {
    const forloop = createRecord({
      first: index === 0,
      last: index === length - 1,
      counter: index + 1,
      counter0: index,
      revcounter: length - index,
      length,
    });
    const bindings: Bindings = { [node.itemName]: item, forloop };
    output += withScope(state.context, bindings, () => renderNodes(state, node.body));
  });

  return output;
}

function renderFilterBlock(state: RenderState, node: FilterBlockNode): string {
  const body = renderNodes(state, node.body);
  return applyFilters(body, node.filters, filterEnv(state, node));
}

function renderImports(state: RenderState, node: ImportsNode): string {
  resolve(state.context, node.subject, positionOf(state, node));
  return renderNodes(state, node.body);
}

function renderCallTemplate(state: RenderState, node: CallTemplateNode): string {
  const position = positionOf(state, node);
  if (!state.hooks) {
    throw new RenderError(`Cannot call template '${node.name}' without a composer`, position);
  }

  const bindings: Record<string, TemplateValue> = {};
  for (const arg of node.args) {
    bindings[arg.key] =
      arg.value.kind === "string" ? arg.value.value : resolve(state.context, arg.value.path, position);
  }

  return state.hooks.callTemplate(node.name, bindings, state.language, position);
}

function descriptionOf(subject: TemplateValue, position: SourcePosition): string {
  if (!isResolvable(subject)) return "";
  const description = subject.get("description");
  if (description === undefined || description === null) return "";
  return stringify(description, position);
}

function renderDocCommentIf(state: RenderState, node: DocCommentIfNode): string {
  const position = positionOf(state, node);
  const description = descriptionOf(resolve(state.context, node.subject, position), position);
  if (description.trim() === "") {
    return "";
  }
  const text = state.language.sanitizeComment(stripHtml(description));
  return formatDocComment(text, state.language.docComment, node.indent, state.lineWidth);
}

function renderLiteral(state: RenderState, node: LiteralNode): string {
  const position = positionOf(state, node);
  return formatLiteral(state.language, resolve(state.context, node.path, position), position);
}

/**
 * Nested `parameter` tags record entries; any other body text is dropped.
 * Grouped entries are emitted last, inside the language's options group.
 */
function renderParameterList(state: RenderState, node: ParameterListNode): string {
  const collector: ParameterCollector = { entries: [], grouped: [] };

  state.collectors.push(collector);
  try {
    renderNodes(state, node.body);
  } finally {
    state.collectors.pop();
  }

  const entries = [...collector.entries];
  if (collector.grouped.length > 0) {
    const { open, close } = state.language.optionsGroup;
    entries.push(open + collector.grouped.join(", ") + close);
  }
  return "(" + entries.join(", ") + ")";
}

function renderParameter(state: RenderState, node: ParameterNode): string {
  const collector = state.collectors[state.collectors.length - 1];
  if (collector === undefined) {
    throw new RenderError("'parameter' rendered outside of 'parameter_list'", positionOf(state, node));
  }

  const text = renderNodes(state, node.body).trim();
  if (text !== "") {
    (node.grouped ? collector.grouped : collector.entries).push(text);
  }
  return "";
}

function switchLanguage(state: RenderState, node: LanguageNode): string {
  const rules = state.languages.get(node.name);
  if (rules === undefined) {
    throw new UnknownLanguageError(node.name, positionOf(state, node));
  }
  state.language = rules;
  return "";
}

function renderCopyright(state: RenderState, node: CopyrightBlockNode): string {
  if (state.copyright === null || state.copyright.trim() === "") {
    return "";
  }
  const lines = state.copyright
    .replace(/\s+$/, "")
    .split("\n")
    .map((line) => line.trimEnd());
  return renderComment(lines, state.language.blockComment, node.indent);
}

/**
 * Render an AST template with the given bindings.
 */
export function render(ast: Template, bindings: Bindings, options: RenderOptions): string {
  const state = createRenderState(ast, bindings, options);
  return renderNodes(state, ast.nodes);
}
