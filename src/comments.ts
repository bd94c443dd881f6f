/**
 * Codestencil Comment Layout
 *
 * Word wrapping and comment-body reflow shared by the `block_comment`
 * filter, `doc_comment_if` and `copyright_block`.
 */

/** Narrowest column budget a reflowed line is given. */
export const MIN_WRAP_WIDTH = 20;

export interface CommentStyle {
  /** Opening delimiter line, or null for line-comment styles */
  open: string | null;
  /** Prefix of every body line */
  linePrefix: string;
  /** Closing delimiter line, or null for line-comment styles */
  close: string | null;
}

/**
 * Greedy word wrap. A word longer than the width gets a line of its own.
 */
export function wrapWords(words: readonly string[], width: number): string[] {
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    if (current === "") {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current += " " + word;
    } else {
      lines.push(current);
      current = word;
    }
  }

  if (current !== "") {
    lines.push(current);
  }
  return lines;
}

/**
 * Split text into paragraphs of words. Blank lines separate paragraphs;
 * `marker`, when given, is stripped from the start of each line first.
 */
export function splitParagraphs(text: string, marker = ""): string[][] {
  const paragraphs: string[][] = [];
  let current: string[] = [];

  for (const line of text.split("\n")) {
    let body = line.trim();
    if (marker !== "" && body.startsWith(marker)) {
      body = body.slice(marker.length).trim();
    }

    if (body === "") {
      if (current.length > 0) {
        paragraphs.push(current);
        current = [];
      }
      continue;
    }
    current.push(...body.split(/\s+/));
  }

  if (current.length > 0) {
    paragraphs.push(current);
  }
  return paragraphs;
}

function leadingWhitespace(line: string): string {
  const match = /^[ \t]*/.exec(line);
  return match ? match[0] : "";
}

/**
 * Lay out wrapped paragraphs behind a line prefix.
 * Paragraph breaks become a prefix-only line without trailing blanks.
 */
export function layoutParagraphs(paragraphs: string[][], lead: string, width: number): string[] {
  const available = Math.max(width - lead.length, MIN_WRAP_WIDTH);
  const lines: string[] = [];

  paragraphs.forEach((words, index) => {
    if (index > 0) {
      lines.push(lead.trimEnd());
    }
    for (const wrapped of wrapWords(words, available)) {
      lines.push(lead + wrapped);
    }
  });

  return lines;
}

/**
 * Reflow text into the body of a multi-line comment.
 *
 * If the first non-blank line already starts with the comment marker, its
 * leading text up to the marker (plus one space) prefixes every output line.
 * Otherwise the line's indentation plus `continuation` is used.
 */
export function reflowCommentBody(text: string, continuation: string, width: number): string {
  const trailingNewline = text.endsWith("\n");
  const marker = continuation.trim();
  const firstLine = text.split("\n").find((line) => line.trim() !== "");
  if (firstLine === undefined) {
    return "";
  }

  const indent = leadingWhitespace(firstLine);
  let lead = indent + continuation;
  if (marker !== "" && firstLine.slice(indent.length).startsWith(marker)) {
    lead = firstLine.slice(0, indent.length + marker.length) + " ";
  }

  const paragraphs = splitParagraphs(text, marker);
  if (paragraphs.length === 0) {
    return "";
  }

  const body = layoutParagraphs(paragraphs, lead, width).join("\n");
  return trailingNewline ? body + "\n" : body;
}

/**
 * Render a delimited comment. The first line is emitted at the current
 * output position; later lines start with `indent`.
 */
export function renderComment(bodyLines: readonly string[], style: CommentStyle, indent: string): string {
  const lines: string[] = [];
  if (style.open !== null) {
    lines.push(style.open);
  }
  for (const line of bodyLines) {
    lines.push(line === "" ? style.linePrefix.trimEnd() : style.linePrefix + line);
  }
  if (style.close !== null) {
    lines.push(style.close);
  }
  return lines.map((line, index) => (index === 0 ? line : indent + line)).join("\n");
}

/**
 * Documentation comment for a description, reflowed to fit the line width.
 */
export function formatDocComment(
  description: string,
  style: CommentStyle,
  indent: string,
  width: number
): string {
  const paragraphs = splitParagraphs(description);
  const body = layoutParagraphs(paragraphs, "", width - indent.length - style.linePrefix.length);
  return renderComment(body, style, indent);
}

const HTML_TAG_REGEX = /<\/?[A-Za-z][^<>]*>/g;
const HTML_ENTITY_REGEX = /&(?:lt|gt|quot|#39|amp);/g;

const HTML_ENTITIES: Readonly<Record<string, string>> = {
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&amp;": "&",
};

/**
 * Drop markup tags from description text and decode the common entities.
 * A `<` not followed by a tag name is kept.
 */
export function stripHtml(text: string): string {
  return text.replace(HTML_TAG_REGEX, "").replace(HTML_ENTITY_REGEX, (entity) => HTML_ENTITIES[entity] ?? entity);
}
