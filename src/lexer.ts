/**
 * Codestencil Lexer
 *
 * Tokenizes template source into a stream of tokens.
 * Functional implementation without classes.
 */

import { LexerError } from "./errors.ts";
import type { Token, TokenType } from "./token.ts";
import {
  createToken,
  BLOCK_OPEN,
  BLOCK_CLOSE,
  VAR_OPEN,
  VAR_CLOSE,
  COMMENT_OPEN,
  COMMENT_CLOSE,
} from "./token.ts";
import { isIdentStart, isIdentCont } from "./validator.ts";

type Mode = "text" | "block" | "var";

interface LexerState {
  source: string;
  templateName: string | null;
  pos: number;
  line: number;
  column: number;
  tokens: Token[];
  mode: Mode;
  tagLine: number;
  tagColumn: number;
  stripAfterClose: boolean;
}

const COMMENT_TAG_REGEX = /^-?\s*comment\s*(-?)%\}/;
const END_COMMENT_TAG_REGEX = /\{%-?\s*endcomment\s*(-?)%\}/g;

function createState(source: string, templateName: string | null): LexerState {
  return {
    source,
    templateName,
    pos: 0,
    line: 1,
    column: 1,
    tokens: [],
    mode: "text",
    tagLine: 1,
    tagColumn: 1,
    stripAfterClose: false,
  };
}

function error(state: LexerState, message: string, line = state.line, column = state.column): LexerError {
  return new LexerError(message, { templateName: state.templateName, line, column });
}

function eof(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

function currentChar(state: LexerState): string | null {
  if (eof(state)) return null;
  return state.source[state.pos];
}

function advance(state: LexerState): string {
  const char = state.source[state.pos];
  state.pos++;
  if (char === "\n") {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return char;
}

function advanceBy(state: LexerState, count: number): void {
  for (let i = 0; i < count; i++) advance(state);
}

function match(state: LexerState, str: string): boolean {
  return state.source.startsWith(str, state.pos);
}

function isBlank(char: string | null): boolean {
  return char === " " || char === "\t" || char === "\r" || char === "\n";
}

function addToken(state: LexerState, type: TokenType, value: string | null, line: number, column: number, indent = ""): void {
  state.tokens.push(createToken(type, value, line, column, indent));
}

function lineIndent(state: LexerState): string {
  const lineStart = state.source.lastIndexOf("\n", state.pos - 1) + 1;
  const match = /^[ \t]*/.exec(state.source.slice(lineStart, state.pos));
  return match ? match[0] : "";
}

/**
 * After `-%}`: drop the rest of the line, newline included, if it is blank.
 */
function skipBlankRestOfLine(state: LexerState): void {
  let lookahead = 0;
  while (state.pos + lookahead < state.source.length) {
    const char = state.source[state.pos + lookahead];
    if (char === "\n") {
      lookahead++;
      break;
    }
    if (char !== " " && char !== "\t" && char !== "\r") return;
    lookahead++;
  }
  advanceBy(state, lookahead);
}

/**
 * Before `{%-`: drop blanks between the previous newline and the tag.
 */
function stripTrailingWhitespaceFromLastText(state: LexerState): void {
  const lastIdx = state.tokens.length - 1;
  if (lastIdx < 0 || state.tokens[lastIdx].type !== "text") return;

  const textToken = state.tokens[lastIdx];
  const value = textToken.value ?? "";

  const newlinePos = value.lastIndexOf("\n");
  if (newlinePos !== -1) {
    const suffix = value.slice(newlinePos + 1);
    if (!/^[ \t]*$/.test(suffix)) return;

    const newValue = value.slice(0, newlinePos + 1);
    state.tokens[lastIdx] = createToken("text", newValue, textToken.line, textToken.column);
  } else {
    if (!/^[ \t]*$/.test(value)) return;
    state.tokens.splice(lastIdx, 1);
  }
}

function skipInlineComment(state: LexerState): void {
  const startLine = state.line;
  const startColumn = state.column;
  advanceBy(state, COMMENT_OPEN.length);

  while (!eof(state) && !match(state, COMMENT_CLOSE)) {
    advance(state);
  }

  if (eof(state)) {
    throw error(state, "Unclosed comment", startLine, startColumn);
  }
  advanceBy(state, COMMENT_CLOSE.length);
}

/**
 * `{% comment %} ... {% endcomment %}`: the body is skipped unparsed.
 */
function skipCommentBlock(state: LexerState, openLength: number, startLine: number, startColumn: number): void {
  advanceBy(state, openLength);

  END_COMMENT_TAG_REGEX.lastIndex = state.pos;
  const end = END_COMMENT_TAG_REGEX.exec(state.source);
  if (end === null) {
    throw error(state, "Unclosed comment block", startLine, startColumn);
  }

  advanceBy(state, end.index + end[0].length - state.pos);
  if (end[1] === "-") {
    state.stripAfterClose = true;
  }
}

function consumeOpen(state: LexerState): void {
  const startLine = state.line;
  const startColumn = state.column;

  if (match(state, COMMENT_OPEN)) {
    skipInlineComment(state);
    return;
  }

  if (match(state, VAR_OPEN)) {
    advanceBy(state, VAR_OPEN.length);
    addToken(state, "var_open", VAR_OPEN, startLine, startColumn);
    enterTag(state, "var", startLine, startColumn);
    return;
  }

  const indent = lineIndent(state);
  const afterOpen = state.source.slice(state.pos + BLOCK_OPEN.length);
  const trimBefore = afterOpen.startsWith("-");

  const comment = COMMENT_TAG_REGEX.exec(afterOpen);
  if (comment) {
    if (trimBefore) stripTrailingWhitespaceFromLastText(state);
    skipCommentBlock(state, BLOCK_OPEN.length + comment[0].length, startLine, startColumn);
    return;
  }

  advanceBy(state, BLOCK_OPEN.length);
  if (trimBefore) {
    advance(state); // -
    stripTrailingWhitespaceFromLastText(state);
  }

  addToken(state, "block_open", BLOCK_OPEN, startLine, startColumn, indent);
  enterTag(state, "block", startLine, startColumn);
}

function enterTag(state: LexerState, mode: Mode, line: number, column: number): void {
  state.mode = mode;
  state.tagLine = line;
  state.tagColumn = column;
}

function atTagOpen(state: LexerState): boolean {
  return match(state, BLOCK_OPEN) || match(state, VAR_OPEN) || match(state, COMMENT_OPEN);
}

function tokenizeText(state: LexerState): void {
  if (state.stripAfterClose) {
    state.stripAfterClose = false;
    skipBlankRestOfLine(state);
  }

  const startLine = state.line;
  const startColumn = state.column;
  let text = "";

  while (!eof(state) && !atTagOpen(state)) {
    text += advance(state);
  }

  if (text.length > 0) {
    addToken(state, "text", text, startLine, startColumn);
  }

  if (!eof(state)) {
    consumeOpen(state);
  }
}

function consumeClose(state: LexerState, type: TokenType, delimiter: string): void {
  const startLine = state.line;
  const startColumn = state.column;
  advanceBy(state, delimiter.length);
  addToken(state, type, delimiter, startLine, startColumn);
  state.mode = "text";
}

function addSingleCharToken(state: LexerState, type: TokenType): void {
  const line = state.line;
  const column = state.column;
  const value = advance(state);
  addToken(state, type, value, line, column);
}

function tokenizeIdentifier(state: LexerState): void {
  const startLine = state.line;
  const startColumn = state.column;
  let value = "";

  while (isIdentCont(currentChar(state))) {
    value += advance(state);
  }

  addToken(state, "ident", value, startLine, startColumn);
}

const STRING_ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
};

function tokenizeString(state: LexerState): void {
  const startLine = state.line;
  const startColumn = state.column;
  const quote = advance(state);
  let value = "";

  while (true) {
    const char = currentChar(state);
    if (char === null || char === "\n") {
      throw error(state, "Unterminated string", startLine, startColumn);
    }
    advance(state);
    if (char === quote) break;

    if (char === "\\") {
      const escaped = currentChar(state);
      if (escaped === null) {
        throw error(state, "Unterminated string", startLine, startColumn);
      }
      advance(state);
      value += STRING_ESCAPES[escaped] ?? escaped;
    } else {
      value += char;
    }
  }

  addToken(state, "string", value, startLine, startColumn);
}

function tokenizeInsideTag(state: LexerState): void {
  while (isBlank(currentChar(state))) {
    advance(state);
  }

  if (eof(state)) {
    const kind = state.mode === "block" ? "tag" : "variable";
    throw error(state, `Unclosed ${kind}`, state.tagLine, state.tagColumn);
  }

  if (state.mode === "block") {
    if (match(state, "-" + BLOCK_CLOSE)) {
      advance(state); // -
      state.stripAfterClose = true;
      consumeClose(state, "block_close", BLOCK_CLOSE);
      return;
    }
    if (match(state, BLOCK_CLOSE)) {
      consumeClose(state, "block_close", BLOCK_CLOSE);
      return;
    }
  } else if (match(state, VAR_CLOSE)) {
    consumeClose(state, "var_close", VAR_CLOSE);
    return;
  }

  const char = currentChar(state);
  switch (char) {
    case ".":
      addSingleCharToken(state, "dot");
      break;
    case "|":
      addSingleCharToken(state, "pipe");
      break;
    case "=":
      addSingleCharToken(state, "equal");
      break;
    case "/":
      addSingleCharToken(state, "slash");
      break;
    case '"':
    case "'":
      tokenizeString(state);
      break;
    default:
      if (isIdentStart(char)) {
        tokenizeIdentifier(state);
      } else {
        throw error(state, `Unexpected character: '${char}'`);
      }
  }
}

/**
 * Tokenize a template source string into tokens.
 */
export function tokenize(source: string, templateName: string | null = null): Token[] {
  const state = createState(source, templateName);

  while (!eof(state)) {
    if (state.mode === "text") {
      tokenizeText(state);
    } else {
      tokenizeInsideTag(state);
    }
  }

  if (state.mode !== "text") {
    const kind = state.mode === "block" ? "tag" : "variable";
    throw error(state, `Unclosed ${kind}`, state.tagLine, state.tagColumn);
  }

  addToken(state, "eof", null, state.line, state.column);
  return state.tokens;
}
