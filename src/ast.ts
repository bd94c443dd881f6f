/**
 * Codestencil AST Node Types
 */

import type { FilterName } from "./filters.ts";

export interface Path {
  segments: string[];
}

export function createPath(segments: string[]): Path {
  return { segments };
}

export interface Location {
  line: number;
  column: number;
}

// Node types
export interface TextNode {
  type: "text";
  value: string;
}

export interface VariableNode extends Location {
  type: "variable";
  path: Path;
  filters: FilterName[];
}

export interface IfNode extends Location {
  type: "if";
  condition: Path;
  thenBranch: Node[];
  elseBranch: Node[] | null;
}

export interface ForNode extends Location {
  type: "for";
  itemName: string;
  collection: Path;
  body: Node[];
}

export interface FilterBlockNode extends Location {
  type: "filter_block";
  filters: FilterName[];
  body: Node[];
}

export interface ImportsNode extends Location {
  type: "imports";
  subject: Path;
  body: Node[];
}

export type CallArgValue =
  | { kind: "path"; path: Path }
  | { kind: "string"; value: string };

export interface CallArg {
  key: string;
  value: CallArgValue;
}

export interface CallTemplateNode extends Location {
  type: "call_template";
  name: string;
  args: CallArg[];
}

export interface DocCommentIfNode extends Location {
  type: "doc_comment_if";
  subject: Path;
  indent: string;
}

export interface LiteralNode extends Location {
  type: "literal";
  path: Path;
}

export interface ParameterListNode extends Location {
  type: "parameter_list";
  body: Node[];
}

export interface ParameterNode extends Location {
  type: "parameter";
  grouped: boolean;
  body: Node[];
}

export interface LanguageNode extends Location {
  type: "language";
  name: string;
}

export interface CopyrightBlockNode extends Location {
  type: "copyright_block";
  indent: string;
}

export type Node =
  | TextNode
  | VariableNode
  | IfNode
  | ForNode
  | FilterBlockNode
  | ImportsNode
  | CallTemplateNode
  | DocCommentIfNode
  | LiteralNode
  | ParameterListNode
  | ParameterNode
  | LanguageNode
  | CopyrightBlockNode;

export interface Template {
  name: string | null;
  nodes: Node[];
}

// Node constructors
export function textNode(value: string): TextNode {
  return { type: "text", value };
}

export function variableNode(path: Path, filters: FilterName[], at: Location): VariableNode {
  return { type: "variable", path, filters, line: at.line, column: at.column };
}

export function ifNode(
  condition: Path,
  thenBranch: Node[],
  elseBranch: Node[] | null,
  at: Location
): IfNode {
  return { type: "if", condition, thenBranch, elseBranch, line: at.line, column: at.column };
}

export function forNode(itemName: string, collection: Path, body: Node[], at: Location): ForNode {
  return { type: "for", itemName, collection, body, line: at.line, column: at.column };
}

export function filterBlockNode(filters: FilterName[], body: Node[], at: Location): FilterBlockNode {
  return { type: "filter_block", filters, body, line: at.line, column: at.column };
}

export function importsNode(subject: Path, body: Node[], at: Location): ImportsNode {
  return { type: "imports", subject, body, line: at.line, column: at.column };
}

export function callTemplateNode(name: string, args: CallArg[], at: Location): CallTemplateNode {
  return { type: "call_template", name, args, line: at.line, column: at.column };
}

export function docCommentIfNode(subject: Path, indent: string, at: Location): DocCommentIfNode {
  return { type: "doc_comment_if", subject, indent, line: at.line, column: at.column };
}

export function literalNode(path: Path, at: Location): LiteralNode {
  return { type: "literal", path, line: at.line, column: at.column };
}

export function parameterListNode(body: Node[], at: Location): ParameterListNode {
  return { type: "parameter_list", body, line: at.line, column: at.column };
}

export function parameterNode(grouped: boolean, body: Node[], at: Location): ParameterNode {
  return { type: "parameter", grouped, body, line: at.line, column: at.column };
}

export function languageNode(name: string, at: Location): LanguageNode {
  return { type: "language", name, line: at.line, column: at.column };
}

export function copyrightBlockNode(indent: string, at: Location): CopyrightBlockNode {
  return { type: "copyright_block", indent, line: at.line, column: at.column };
}

export function template(name: string | null, nodes: Node[]): Template {
  return { name, nodes };
}
