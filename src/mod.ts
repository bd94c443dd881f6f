/**
 * Codestencil - Templates for API Client Code
 *
 * Module entry point.
 */

// Main API
export { parse, render, renderFile } from "./codestencil.ts";
export type { RenderOptions, RenderFileOptions } from "./codestencil.ts";

// Composer
export { createComposer, DEFAULT_LINE_WIDTH, DEFAULT_MAX_DEPTH } from "./composer.ts";
export type { Composer, ComposerOptions, RenderJob, RenderResult } from "./composer.ts";

// Template sources
export { createMemorySource, createTemplateCache, normalizeTemplateName } from "./template_loader.ts";
export type { TemplateSource, TemplateCache } from "./template_loader.ts";
export { loadTemplateDirectory, readTextFile } from "./platform.ts";

// Model context
export { createApi, createMethod, createModel, createModule, createParameter, createProperty } from "./model.ts";
export type {
  Api,
  Method,
  Model,
  Module,
  Parameter,
  ParameterLocation,
  Property,
  ApiInit,
  MethodInit,
  ModelInit,
  ModuleInit,
  ParameterInit,
  PropertyInit,
} from "./model.ts";
export { loadDescription, readDescriptionFile, modulePath } from "./description.ts";
export type { ApiDescription, TypeSpec } from "./description.ts";

// Values
export { createRecord, isTruthy, normalizeBindings, normalizeData, stringify } from "./value.ts";
export type { AttributeResolvable, Bindings, TemplateValue } from "./value.ts";

// Languages
export {
  BUILTIN_LANGUAGES,
  DEFAULT_LANGUAGE,
  GWT,
  JAVA,
  PYTHON,
  codeTypeFor,
  createLanguageRegistry,
  formatLiteral,
} from "./languages.ts";
export type { LanguageRegistry, LanguageRules } from "./languages.ts";
export type { CommentStyle } from "./comments.ts";

// Configuration
export { DEFAULT_CONFIG, createComposerFromConfig, loadConfig, mergeConfig, validateConfig } from "./config.ts";
export type { CodestencilConfig, PartialConfig } from "./config.ts";

// Observability
export { createDebugObserver } from "./debug_observer.ts";
export type { DebugEvent, DebugObserverFn, ErrorEvent, ParseEvent, RenderEvent } from "./debug_observer.ts";

// Error types
export {
  TemplateError,
  TemplateSyntaxError,
  LexerError,
  ParseError,
  UnknownTagError,
  UnknownFilterError,
  RenderError,
  AttributeError,
  ValueTypeError,
  TemplateCycleError,
  TemplateNotFoundError,
  UnknownLanguageError,
  ConfigError,
  DescriptionError,
} from "./errors.ts";
export type { SourcePosition } from "./errors.ts";

// AST types (for advanced usage)
export type {
  Node,
  TextNode,
  VariableNode,
  IfNode,
  ForNode,
  FilterBlockNode,
  ImportsNode,
  CallTemplateNode,
  CallArg,
  CallArgValue,
  DocCommentIfNode,
  LiteralNode,
  ParameterListNode,
  ParameterNode,
  LanguageNode,
  CopyrightBlockNode,
  Path,
  Template,
} from "./ast.ts";

// Low-level APIs (for advanced usage)
export { tokenize } from "./lexer.ts";
export { parse as parseTokens } from "./parser.ts";
export { render as renderAst } from "./renderer.ts";
export type { RenderHooks, RenderOptions as RenderAstOptions } from "./renderer.ts";
export type { Token, TokenType } from "./token.ts";
export type { FilterName } from "./filters.ts";
