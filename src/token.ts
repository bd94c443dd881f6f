/**
 * Codestencil Token Types
 */

export type TokenType =
  | "text"
  | "block_open"
  | "block_close"
  | "var_open"
  | "var_close"
  | "ident"
  | "string"
  | "dot"
  | "pipe"
  | "equal"
  | "slash"
  | "eof";

export interface Token {
  type: TokenType;
  value: string | null;
  line: number;
  column: number;
  /** Leading whitespace of the source line a tag opens on */
  indent: string;
}

export function createToken(
  type: TokenType,
  value: string | null,
  line: number,
  column: number,
  indent = ""
): Token {
  return { type, value, line, column, indent };
}

export const BLOCK_OPEN = "{%";
export const BLOCK_CLOSE = "%}";
export const VAR_OPEN = "{{";
export const VAR_CLOSE = "}}";
export const COMMENT_OPEN = "{#";
export const COMMENT_CLOSE = "#}";

/** Output of `{% templatetag NAME %}` */
export const TEMPLATE_TAG_TEXT: Readonly<Record<string, string>> = {
  openblock: BLOCK_OPEN,
  closeblock: BLOCK_CLOSE,
  openvariable: VAR_OPEN,
  closevariable: VAR_CLOSE,
  openbrace: "{",
  closebrace: "}",
  opencomment: COMMENT_OPEN,
  closecomment: COMMENT_CLOSE,
};
