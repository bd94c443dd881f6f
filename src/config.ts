/**
 * Codestencil Configuration
 *
 * Loads `codestencil.yaml` (or `.yml` / `.json`) from cwd or a given path,
 * validates it, and merges it with defaults.
 *
 * ```yaml
 * language: java
 * searchPath: [templates, vendor/templates]
 * copyrightFile: LICENSE_HEADER.txt
 * lineWidth: 100
 * ```
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { createComposer } from "./composer.ts";
import type { Composer, ComposerOptions } from "./composer.ts";
import { createDebugObserver } from "./debug_observer.ts";
import { ConfigError } from "./errors.ts";
import { loadTemplateDirectory } from "./platform.ts";

// ── Filename Conventions ─────────────────────────────────

const CONFIG_FILENAMES = ["codestencil.yaml", "codestencil.yml", "codestencil.json"];

// ── Schema ───────────────────────────────────────────────

const PartialConfigSchema = z
  .object({
    language: z.string().min(1).optional(),
    searchPath: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]).optional(),
    copyright: z.string().optional(),
    copyrightFile: z.string().min(1).optional(),
    lineWidth: z.number().int().positive().optional(),
    maxDepth: z.number().int().positive().optional(),
    debug: z.boolean().optional(),
  })
  .strict()
  .refine((c) => c.copyright === undefined || c.copyrightFile === undefined, {
    message: "copyright and copyrightFile cannot both be set",
  });

/** Config file shape before defaults are applied */
export type PartialConfig = z.infer<typeof PartialConfigSchema>;

export interface CodestencilConfig {
  /** Language in effect at the start of every template */
  readonly language: string;
  /** Absolute template directories; earlier ones win */
  readonly searchPath: readonly string[];
  readonly copyright: string | null;
  readonly lineWidth: number;
  readonly maxDepth: number;
  /** Print debug events to the console */
  readonly debug: boolean;
}

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_CONFIG: CodestencilConfig = {
  language: "default",
  searchPath: ["templates"],
  copyright: null,
  lineWidth: 80,
  maxDepth: 32,
  debug: false,
};

// ── Public API ───────────────────────────────────────────

/**
 * Validate raw config data, such as a parsed YAML document.
 */
export function validateConfig(raw: unknown): PartialConfig {
  const result = PartialConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`);
  }
  return result.data;
}

/**
 * Merge a partial config with defaults. Relative paths are resolved
 * against `baseDir`.
 */
export function mergeConfig(partial: PartialConfig, baseDir: string = process.cwd()): CodestencilConfig {
  const searchPath =
    partial.searchPath === undefined
      ? DEFAULT_CONFIG.searchPath
      : typeof partial.searchPath === "string"
        ? [partial.searchPath]
        : partial.searchPath;

  let copyright = partial.copyright ?? DEFAULT_CONFIG.copyright;
  if (partial.copyrightFile !== undefined) {
    const copyrightPath = resolve(baseDir, partial.copyrightFile);
    if (!existsSync(copyrightPath)) {
      throw new ConfigError(`Copyright file not found: "${copyrightPath}"`);
    }
    copyright = readFileSync(copyrightPath, "utf-8");
  }

  return {
    language: partial.language ?? DEFAULT_CONFIG.language,
    searchPath: searchPath.map((dir) => resolve(baseDir, dir)),
    copyright,
    lineWidth: partial.lineWidth ?? DEFAULT_CONFIG.lineWidth,
    maxDepth: partial.maxDepth ?? DEFAULT_CONFIG.maxDepth,
    debug: partial.debug ?? DEFAULT_CONFIG.debug,
  };
}

/**
 * Load configuration from a YAML/JSON file.
 *
 * Priority:
 *   1. Explicit `configPath` argument
 *   2. Auto-detect `codestencil.yaml`, `.yml` or `.json` in `cwd`
 *   3. Fall back to all defaults
 */
export function loadConfig(configPath?: string, cwd?: string): CodestencilConfig {
  const workDir = cwd ?? process.cwd();

  if (configPath) {
    const absPath = resolve(workDir, configPath);
    if (!existsSync(absPath)) {
      throw new ConfigError(`Config file not found: "${absPath}"`);
    }
    return parseConfigFile(absPath);
  }

  for (const filename of CONFIG_FILENAMES) {
    const candidate = join(workDir, filename);
    if (existsSync(candidate)) {
      return parseConfigFile(candidate);
    }
  }

  return mergeConfig({}, workDir);
}

/**
 * Build a composer whose templates come from the configured search path.
 */
export async function createComposerFromConfig(
  config: CodestencilConfig,
  options: Pick<ComposerOptions, "languages" | "cache"> = {}
): Promise<Composer> {
  const source = await loadTemplateDirectory(config.searchPath);

  return createComposer({
    ...options,
    source,
    language: config.language,
    copyright: config.copyright,
    lineWidth: config.lineWidth,
    maxDepth: config.maxDepth,
    ...(config.debug ? { debug: createDebugObserver() } : {}),
  });
}

// ── Internal ─────────────────────────────────────────────

function parseRaw(filePath: string, content: string): unknown {
  try {
    return filePath.endsWith(".json") ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot parse config file "${filePath}": ${reason}`);
  }
}

function parseConfigFile(filePath: string): CodestencilConfig {
  const content = readFileSync(filePath, "utf-8");
  return mergeConfig(validateConfig(parseRaw(filePath, content)), dirname(filePath));
}
