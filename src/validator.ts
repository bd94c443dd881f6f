/**
 * Codestencil Validator
 *
 * Validates identifiers and template names.
 */

const IDENT_START_REGEX = /^[A-Za-z_]$/;
const IDENT_CONT_REGEX = /^[A-Za-z0-9_]$/;
const NAME_SEGMENT_REGEX = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

/**
 * Check if a character can start an identifier.
 */
export function isIdentStart(char: string | null): boolean {
  if (char === null) return false;
  return IDENT_START_REGEX.test(char);
}

/**
 * Check if a character can continue an identifier.
 */
export function isIdentCont(char: string | null): boolean {
  if (char === null) return false;
  return IDENT_CONT_REGEX.test(char);
}

/**
 * Check a template name, returning a reason when it is unusable.
 * - Segments are separated by '/' and must be non-empty
 * - Cannot contain '..', '\' or ':'
 * - A leading '/' is allowed and ignored
 */
export function templateNameProblem(name: string): string | null {
  if (name.length === 0) {
    return "Template name is empty";
  }

  if (name.includes("..")) {
    return `Template name cannot contain '..': ${name}`;
  }

  if (name.includes("\\")) {
    return `Template name cannot contain '\\': ${name}`;
  }

  if (name.includes(":")) {
    return `Template name cannot contain ':': ${name}`;
  }

  const segments = (name.startsWith("/") ? name.slice(1) : name).split("/");
  for (const segment of segments) {
    if (segment.length === 0) {
      return `Template name has empty segment: ${name}`;
    }
    if (!NAME_SEGMENT_REGEX.test(segment)) {
      return `Invalid character in template name segment: ${segment}`;
    }
  }

  return null;
}
