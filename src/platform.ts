/**
 * Platform Layer
 *
 * File system access. Template text is read up front so that rendering
 * itself never performs I/O.
 */

import { readFile, readdir, stat } from "node:fs/promises";
import { join, relative, sep } from "node:path";
import { TemplateNotFoundError } from "./errors.ts";
import { createMemorySource, DEFAULT_EXTENSION } from "./template_loader.ts";
import type { TemplateSource } from "./template_loader.ts";

/**
 * Read a file as UTF-8 text.
 */
export function readTextFile(path: string): Promise<string> {
  return readFile(path, "utf-8");
}

async function listTemplateFiles(root: string, dir: string, found: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      await listTemplateFiles(root, full, found);
    } else if (entry.isFile() && entry.name.endsWith(DEFAULT_EXTENSION)) {
      found.push(relative(root, full).split(sep).join("/"));
    }
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Load every `.tmpl` file below the given directories into an in-memory
 * source. Names are relative paths with '/' separators; when two
 * directories hold the same name, the earlier directory wins.
 */
export async function loadTemplateDirectory(dirs: readonly string[]): Promise<TemplateSource> {
  const templates: Record<string, string> = {};

  for (const dir of dirs) {
    if (!(await isDirectory(dir))) {
      throw new TemplateNotFoundError(`Template directory not found: ${dir}`);
    }

    const names: string[] = [];
    await listTemplateFiles(dir, dir, names);
    for (const name of names) {
      if (!Object.prototype.hasOwnProperty.call(templates, name)) {
        templates[name] = await readTextFile(join(dir, name));
      }
    }
  }

  return createMemorySource(templates);
}
