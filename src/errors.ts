/**
 * Codestencil Error Types
 */

export interface SourcePosition {
  templateName: string | null;
  line: number;
  column: number;
}

function describePosition(position: SourcePosition): string {
  const at = `at line ${position.line}, column ${position.column}`;
  return position.templateName ? ` in ${position.templateName} ${at}` : ` ${at}`;
}

export class TemplateError extends Error {
  templateName: string | null;
  line: number | null;
  column: number | null;

  constructor(message: string, position: SourcePosition | null = null) {
    super(position ? message + describePosition(position) : message);
    this.name = "TemplateError";
    this.templateName = position?.templateName ?? null;
    this.line = position?.line ?? null;
    this.column = position?.column ?? null;
  }
}

// Syntax errors: raised while turning template text into a tree.

export class TemplateSyntaxError extends TemplateError {
  constructor(message: string, position: SourcePosition) {
    super(message, position);
    this.name = "TemplateSyntaxError";
  }
}

export class LexerError extends TemplateSyntaxError {
  constructor(message: string, position: SourcePosition) {
    super(message, position);
    this.name = "LexerError";
  }
}

export class ParseError extends TemplateSyntaxError {
  constructor(message: string, position: SourcePosition) {
    super(message, position);
    this.name = "ParseError";
  }
}

export class UnknownTagError extends ParseError {
  tagName: string;

  constructor(tagName: string, position: SourcePosition) {
    super(`Unknown tag '${tagName}'`, position);
    this.name = "UnknownTagError";
    this.tagName = tagName;
  }
}

export class UnknownFilterError extends ParseError {
  filterName: string;

  constructor(filterName: string, position: SourcePosition) {
    super(`Unknown filter '${filterName}'`, position);
    this.name = "UnknownFilterError";
    this.filterName = filterName;
  }
}

// Render errors: raised while evaluating a tree against a context.

export class RenderError extends TemplateError {
  constructor(message: string, position: SourcePosition | null = null) {
    super(message, position);
    this.name = "RenderError";
  }
}

export class AttributeError extends RenderError {
  attribute: string;

  constructor(attribute: string, path: string, position: SourcePosition | null = null) {
    super(`Cannot resolve '${attribute}' in '${path}'`, position);
    this.name = "AttributeError";
    this.attribute = attribute;
  }
}

export class ValueTypeError extends RenderError {
  constructor(message: string, position: SourcePosition | null = null) {
    super(message, position);
    this.name = "ValueTypeError";
  }
}

export class TemplateCycleError extends RenderError {
  chain: string[];

  constructor(message: string, chain: string[], position: SourcePosition | null = null) {
    super(message, position);
    this.name = "TemplateCycleError";
    this.chain = chain;
  }
}

export class TemplateNotFoundError extends RenderError {
  constructor(message: string, position: SourcePosition | null = null) {
    super(message, position);
    this.name = "TemplateNotFoundError";
  }
}

export class UnknownLanguageError extends RenderError {
  language: string;

  constructor(language: string, position: SourcePosition | null = null) {
    super(`Unknown language '${language}'`, position);
    this.name = "UnknownLanguageError";
    this.language = language;
  }
}

// Errors outside template evaluation.

export class ConfigError extends TemplateError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class DescriptionError extends TemplateError {
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "DescriptionError";
    this.issues = issues;
  }
}
