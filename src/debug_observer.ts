/**
 * Codestencil Debug Observer
 *
 * Typed debug events emitted by a composer while it parses and renders.
 * Observers are opt-in: a composer without one emits nothing.
 *
 * @example
 * ```typescript
 * const composer = createComposer({
 *   source,
 *   debug: createDebugObserver(),
 * });
 * ```
 */

/**
 * Emitted whenever a template is requested by name, whether or not the
 * parse cache already held it.
 */
export interface ParseEvent {
  readonly type: "parse";
  readonly template: string;
  readonly cached: boolean;
  /** Milliseconds spent tokenizing and parsing (0 on a cache hit) */
  readonly durationMs: number;
}

/**
 * Emitted after a top-level render completes.
 */
export interface RenderEvent {
  readonly type: "render";
  readonly template: string;
  readonly durationMs: number;
  readonly outputLength: number;
}

/**
 * Emitted when a top-level render fails. The error still propagates.
 */
export interface ErrorEvent {
  readonly type: "error";
  readonly template: string;
  readonly errorName: string;
  readonly message: string;
}

export type DebugEvent = ParseEvent | RenderEvent | ErrorEvent;

export type DebugObserverFn = (event: DebugEvent) => void;

/**
 * Create a debug observer. Without a handler, events are printed with
 * `console.debug`:
 *
 * ```
 * [codestencil] parse     java/model.tmpl 0.4ms
 * [codestencil] parse     java/model.tmpl (cached)
 * [codestencil] render    java/model.tmpl 1.2ms 512 chars
 * [codestencil] ERROR     java/model.tmpl AttributeError: Cannot resolve ...
 * ```
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
  if (handler) return handler;

  return (event: DebugEvent): void => {
    const prefix = "[codestencil]";

    switch (event.type) {
      case "parse": {
        const detail = event.cached ? "(cached)" : `${event.durationMs.toFixed(1)}ms`;
        console.debug(`${prefix} parse     ${event.template} ${detail}`);
        break;
      }

      case "render":
        console.debug(
          `${prefix} render    ${event.template} ${event.durationMs.toFixed(1)}ms ${event.outputLength} chars`
        );
        break;

      case "error":
        console.debug(`${prefix} ERROR     ${event.template} ${event.errorName}: ${event.message}`);
        break;
    }
  };
}
