/**
 * Codestencil Parser
 *
 * Parses tokens into an AST.
 * Functional implementation without classes.
 */

import { ParseError, UnknownFilterError, UnknownTagError } from "./errors.ts";
import type { Token, TokenType } from "./token.ts";
import { TEMPLATE_TAG_TEXT } from "./token.ts";
import type { CallArg, CallArgValue, Location, Node, Path, Template } from "./ast.ts";
import {
  createPath,
  textNode,
  variableNode,
  ifNode,
  forNode,
  filterBlockNode,
  importsNode,
  callTemplateNode,
  docCommentIfNode,
  literalNode,
  parameterListNode,
  parameterNode,
  languageNode,
  copyrightBlockNode,
  template,
} from "./ast.ts";
import { isFilterName } from "./filters.ts";
import type { FilterName } from "./filters.ts";
import { templateNameProblem } from "./validator.ts";

/** Tags that close or split an enclosing block */
const END_TAGS = new Set([
  "else",
  "endif",
  "endfor",
  "endimports",
  "endfilter",
  "end_parameter_list",
  "end_parameter",
  "endcomment",
]);

interface OpenBlock {
  name: string;
  line: number;
  column: number;
}

interface ParserState {
  tokens: Token[];
  pos: number;
  templateName: string | null;
  openBlocks: OpenBlock[];
}

interface BlockEnd {
  name: string;
  token: Token;
}

function createState(tokens: Token[], templateName: string | null): ParserState {
  return {
    tokens,
    pos: 0,
    templateName,
    openBlocks: [],
  };
}

function error(state: ParserState, message: string, at: Location): ParseError {
  return new ParseError(message, { templateName: state.templateName, line: at.line, column: at.column });
}

function current(state: ParserState): Token {
  return state.tokens[state.pos] ?? { type: "eof", value: null, line: 0, column: 0, indent: "" };
}

function peek(state: ParserState): Token | null {
  return state.tokens[state.pos + 1] ?? null;
}

/**
 * Get the value of a token, throwing if null.
 * Use this after verifying the token type guarantees a value.
 */
function tokenValue(state: ParserState, token: Token): string {
  if (token.value === null) {
    throw error(state, `Expected token value for ${token.type}`, token);
  }
  return token.value;
}

function advance(state: ParserState): void {
  state.pos++;
}

function expect(state: ParserState, type: TokenType): Token {
  const token = current(state);
  if (token.type !== type) {
    throw error(state, `Expected ${type}, got ${token.type}`, token);
  }
  advance(state);
  return token;
}

function expectIdent(state: ParserState, what: string): string {
  const token = current(state);
  if (token.type !== "ident") {
    throw error(state, `Expected ${what}, got ${token.type}`, token);
  }
  advance(state);
  return tokenValue(state, token);
}

function expectWord(state: ParserState, word: string): void {
  const token = current(state);
  if (token.type !== "ident" || token.value !== word) {
    throw error(state, `Expected '${word}', got ${token.value ?? token.type}`, token);
  }
  advance(state);
}

function expectBlockClose(state: ParserState, tagName: string): void {
  const token = current(state);
  if (token.type !== "block_close") {
    throw error(state, `Unexpected ${token.value ?? token.type} in '${tagName}' tag`, token);
  }
  advance(state);
}

function parsePath(state: ParserState): Path {
  const segments = [expectIdent(state, "identifier")];

  while (current(state).type === "dot") {
    advance(state);
    segments.push(expectIdent(state, "identifier after '.'"));
  }

  return createPath(segments);
}

function parseFilterChain(state: ParserState, first: boolean): FilterName[] {
  const filters: FilterName[] = [];
  let needName = first;

  while (needName || current(state).type === "pipe") {
    if (!needName) advance(state); // |
    needName = false;

    const token = current(state);
    const name = expectIdent(state, "filter name");
    if (!isFilterName(name)) {
      throw new UnknownFilterError(name, { templateName: state.templateName, line: token.line, column: token.column });
    }
    filters.push(name);
  }

  return filters;
}

function parseVariable(state: ParserState): Node {
  const open = expect(state, "var_open");
  const path = parsePath(state);
  const filters = parseFilterChain(state, false);
  expect(state, "var_close");
  return variableNode(path, filters, open);
}

function closeBlock(state: ParserState, end: BlockEnd, expected: string): void {
  if (end.name !== expected) {
    throw error(state, `Expected '${expected}', got '${end.name}'`, end.token);
  }
  expectBlockClose(state, end.name);
}

/**
 * Parse a block body up to one of `ends`, which must close the innermost
 * open block.
 */
function parseBody(state: ParserState, open: OpenBlock, ends: readonly string[]): { nodes: Node[]; end: BlockEnd } {
  state.openBlocks.push(open);
  try {
    const { nodes, end } = parseNodes(state, ends);
    if (end === null) {
      throw error(state, `Unclosed '${open.name}' block`, open);
    }
    return { nodes, end };
  } finally {
    state.openBlocks.pop();
  }
}

function parseIf(state: ParserState, open: Token): Node {
  const condition = parsePath(state);
  expectBlockClose(state, "if");

  const at = { name: "if", line: open.line, column: open.column };
  const thenPart = parseBody(state, at, ["else", "endif"]);

  let elseBranch: Node[] | null = null;
  if (thenPart.end.name === "else") {
    expectBlockClose(state, "else");
    const elsePart = parseBody(state, at, ["endif"]);
    closeBlock(state, elsePart.end, "endif");
    elseBranch = elsePart.nodes;
  } else {
    closeBlock(state, thenPart.end, "endif");
  }

  return ifNode(condition, thenPart.nodes, elseBranch, open);
}

function parseFor(state: ParserState, open: Token): Node {
  const itemName = expectIdent(state, "loop variable");
  expectWord(state, "in");
  const collection = parsePath(state);
  expectBlockClose(state, "for");

  const body = parseBody(state, { name: "for", line: open.line, column: open.column }, ["endfor"]);
  closeBlock(state, body.end, "endfor");
  return forNode(itemName, collection, body.nodes, open);
}

function parseFilterBlock(state: ParserState, open: Token): Node {
  const filters = parseFilterChain(state, true);
  expectBlockClose(state, "filter");

  const body = parseBody(state, { name: "filter", line: open.line, column: open.column }, ["endfilter"]);
  closeBlock(state, body.end, "endfilter");
  return filterBlockNode(filters, body.nodes, open);
}

function parseImports(state: ParserState, open: Token): Node {
  const subject = parsePath(state);
  expectBlockClose(state, "imports");

  const body = parseBody(state, { name: "imports", line: open.line, column: open.column }, ["endimports"]);
  closeBlock(state, body.end, "endimports");
  return importsNode(subject, body.nodes, open);
}

function parseTemplateName(state: ParserState): string {
  const token = current(state);
  let name: string;

  if (token.type === "string") {
    advance(state);
    name = tokenValue(state, token);
  } else {
    name = "";
    if (current(state).type === "slash") {
      advance(state);
      name = "/";
    }
    name += expectIdent(state, "template name");
    while (current(state).type === "slash" || current(state).type === "dot") {
      name += current(state).type === "slash" ? "/" : ".";
      advance(state);
      name += expectIdent(state, "template name segment");
    }
  }

  const problem = templateNameProblem(name);
  if (problem !== null) {
    throw error(state, problem, token);
  }
  return name;
}

function parseCallArgValue(state: ParserState): CallArgValue {
  const token = current(state);
  if (token.type === "string") {
    advance(state);
    return { kind: "string", value: tokenValue(state, token) };
  }
  return { kind: "path", path: parsePath(state) };
}

function parseCallTemplate(state: ParserState, open: Token): Node {
  const name = parseTemplateName(state);
  const args: CallArg[] = [];

  while (current(state).type === "ident") {
    const keyToken = current(state);
    const key = tokenValue(state, keyToken);

    if (args.some((a) => a.key === key)) {
      throw error(state, `Duplicate call_template argument: ${key}`, keyToken);
    }

    advance(state);
    expect(state, "equal");
    args.push({ key, value: parseCallArgValue(state) });
  }

  expectBlockClose(state, "call_template");
  return callTemplateNode(name, args, open);
}

function parseParameterList(state: ParserState, open: Token): Node {
  expectBlockClose(state, "parameter_list");

  const body = parseBody(state, { name: "parameter_list", line: open.line, column: open.column }, [
    "end_parameter_list",
  ]);
  closeBlock(state, body.end, "end_parameter_list");
  return parameterListNode(body.nodes, open);
}

function parseParameter(state: ParserState, open: Token): Node {
  const enclosing = [...state.openBlocks]
    .reverse()
    .find((block) => block.name === "parameter" || block.name === "parameter_list");
  if (enclosing === undefined) {
    throw error(state, "'parameter' is only allowed inside 'parameter_list'", open);
  }
  if (enclosing.name === "parameter") {
    throw error(
      state,
      `'parameter' cannot be nested in the 'parameter' opened at line ${enclosing.line}, column ${enclosing.column}`,
      open
    );
  }

  let grouped = false;
  if (current(state).type === "ident") {
    expectWord(state, "group");
    grouped = true;
  }
  expectBlockClose(state, "parameter");

  const body = parseBody(state, { name: "parameter", line: open.line, column: open.column }, ["end_parameter"]);
  closeBlock(state, body.end, "end_parameter");
  return parameterNode(grouped, body.nodes, open);
}

function parseTemplateTag(state: ParserState): Node {
  const token = current(state);
  const which = expectIdent(state, "templatetag name");
  const text = TEMPLATE_TAG_TEXT[which];
  if (text === undefined) {
    throw error(state, `Unknown templatetag '${which}'`, token);
  }
  expectBlockClose(state, "templatetag");
  return textNode(text);
}

function parseTag(state: ParserState, open: Token, name: string): Node {
  switch (name) {
    case "language": {
      const language = expectIdent(state, "language name");
      expectBlockClose(state, name);
      return languageNode(language, open);
    }
    case "copyright_block":
      expectBlockClose(state, name);
      return copyrightBlockNode(open.indent, open);
    case "if":
      return parseIf(state, open);
    case "for":
      return parseFor(state, open);
    case "filter":
      return parseFilterBlock(state, open);
    case "imports":
      return parseImports(state, open);
    case "call_template":
      return parseCallTemplate(state, open);
    case "doc_comment_if": {
      const subject = parsePath(state);
      expectBlockClose(state, name);
      return docCommentIfNode(subject, open.indent, open);
    }
    case "literal": {
      const path = parsePath(state);
      expectBlockClose(state, name);
      return literalNode(path, open);
    }
    case "parameter_list":
      return parseParameterList(state, open);
    case "parameter":
      return parseParameter(state, open);
    case "templatetag":
      return parseTemplateTag(state);
    default:
      throw new UnknownTagError(name, { templateName: state.templateName, line: open.line, column: open.column });
  }
}

function unexpectedEnd(state: ParserState, name: string, token: Token): ParseError {
  const innermost = state.openBlocks[state.openBlocks.length - 1];
  if (innermost === undefined) {
    return error(state, `Unexpected '${name}' outside of any block`, token);
  }
  return error(
    state,
    `Unexpected '${name}' inside '${innermost.name}' block opened at line ${innermost.line}, column ${innermost.column}`,
    token
  );
}

/**
 * Parse nodes until EOF or a tag named in `ends`. The terminating tag's
 * open delimiter and name are consumed; its close delimiter is left for
 * the caller.
 */
function parseNodes(state: ParserState, ends: readonly string[]): { nodes: Node[]; end: BlockEnd | null } {
  const nodes: Node[] = [];

  while (true) {
    const token = current(state);

    switch (token.type) {
      case "eof":
        return { nodes, end: null };
      case "text":
        advance(state);
        nodes.push(textNode(tokenValue(state, token)));
        break;
      case "var_open":
        nodes.push(parseVariable(state));
        break;
      case "block_open": {
        const nameToken = peek(state);
        if (nameToken === null || nameToken.type !== "ident") {
          throw error(state, "Expected tag name", nameToken ?? token);
        }
        const name = tokenValue(state, nameToken);
        advance(state); // {%
        advance(state); // name

        if (ends.includes(name)) {
          return { nodes, end: { name, token: nameToken } };
        }
        if (END_TAGS.has(name)) {
          throw unexpectedEnd(state, name, nameToken);
        }
        nodes.push(parseTag(state, token, name));
        break;
      }
      default:
        throw error(state, `Unexpected token: ${token.type}`, token);
    }
  }
}

/**
 * Parse tokens into an AST Template.
 */
export function parse(tokens: Token[], templateName: string | null = null): Template {
  const state = createState(tokens, templateName);
  const { nodes } = parseNodes(state, []);
  return template(templateName, nodes);
}
