/**
 * Codestencil Context
 *
 * Scope stack management and name resolution.
 * Functional implementation without classes.
 */

import { AttributeError } from "./errors.ts";
import type { SourcePosition } from "./errors.ts";
import type { Path } from "./ast.ts";
import { isResolvable } from "./value.ts";
import type { Bindings, TemplateValue } from "./value.ts";

export interface Context {
  frames: Bindings[];
}

/**
 * Create a new context whose root frame holds the caller bindings.
 */
export function createContext(root: Bindings): Context {
  return { frames: [root] };
}

/**
 * Resolve a path to its value in the context.
 * The leading name is searched innermost frame first.
 */
export function resolve(ctx: Context, path: Path, position: SourcePosition | null = null): TemplateValue {
  const [name, ...attributes] = path.segments;
  let value = resolveName(ctx, name, position);

  let traversed = name;
  for (const attribute of attributes) {
    value = accessAttribute(value, attribute, traversed, position);
    traversed += "." + attribute;
  }

  return value;
}

function resolveName(ctx: Context, name: string, position: SourcePosition | null): TemplateValue {
  for (let i = ctx.frames.length - 1; i >= 0; i--) {
    const frame = ctx.frames[i];
    if (Object.prototype.hasOwnProperty.call(frame, name)) {
      return frame[name];
    }
  }

  throw new AttributeError(name, name, position);
}

function accessAttribute(
  value: TemplateValue,
  attribute: string,
  traversed: string,
  position: SourcePosition | null
): TemplateValue {
  if (!isResolvable(value)) {
    throw new AttributeError(attribute, traversed, position);
  }

  const result = value.get(attribute);
  if (result === undefined) {
    throw new AttributeError(attribute, traversed, position);
  }
  return result;
}

/**
 * Execute a function within a new innermost frame.
 */
export function withScope<T>(ctx: Context, bindings: Bindings, fn: () => T): T {
  ctx.frames.push(bindings);
  try {
    return fn();
  } finally {
    ctx.frames.pop();
  }
}
