/**
 * Comment layout tests
 */

import { describe, it, expect } from "vitest";
import {
  formatDocComment,
  layoutParagraphs,
  renderComment,
  splitParagraphs,
  stripHtml,
  wrapWords,
} from "../src/comments.ts";
import { JAVA, PYTHON } from "../src/languages.ts";

describe("wrapWords", () => {
  it("fills lines greedily", () => {
    expect(wrapWords(["aa", "bb", "cc"], 5)).toEqual(["aa bb", "cc"]);
  });

  it("long words get a line of their own", () => {
    expect(wrapWords(["abcdefghijkl", "b"], 10)).toEqual(["abcdefghijkl", "b"]);
  });

  it("no words", () => {
    expect(wrapWords([], 10)).toEqual([]);
  });
});

describe("splitParagraphs", () => {
  it("blank lines separate paragraphs", () => {
    expect(splitParagraphs("a b\nc\n\n\nd")).toEqual([["a", "b", "c"], ["d"]]);
  });

  it("strips a leading marker", () => {
    expect(splitParagraphs("# a\n#\n# b", "#")).toEqual([["a"], ["b"]]);
  });
});

describe("layoutParagraphs", () => {
  it("never wraps narrower than the minimum width", () => {
    const words = "one two three four five six".split(" ");
    expect(layoutParagraphs([words], "", 5)).toEqual(["one two three four", "five six"]);
  });
});

describe("renderComment", () => {
  it("indents continuation lines only", () => {
    expect(renderComment(["x", "", "y"], JAVA.docComment, "  ")).toBe("/**\n   * x\n   *\n   * y\n   */");
  });

  it("line comment style has no delimiters", () => {
    expect(renderComment(["x", "y"], PYTHON.docComment, "    ")).toBe("# x\n    # y");
  });
});

describe("formatDocComment", () => {
  it("wraps to the remaining width", () => {
    const description = "A long description that will need to wrap across lines.";
    expect(formatDocComment(description, JAVA.docComment, "  ", 30)).toBe(
      "/**\n   * A long description that\n   * will need to wrap across\n   * lines.\n   */"
    );
  });

  it("keeps paragraph breaks", () => {
    expect(formatDocComment("First.\n\nSecond.", JAVA.docComment, "", 80)).toBe(
      "/**\n * First.\n *\n * Second.\n */"
    );
  });

  it("reflows single newlines", () => {
    expect(formatDocComment("Lists\nbooks.", JAVA.docComment, "", 80)).toBe("/**\n * Lists books.\n */");
  });
});

describe("stripHtml", () => {
  it("drops tags", () => {
    expect(stripHtml('Returns <b>all</b> <a href="x">books</a>.')).toBe("Returns all books.");
  });

  it("keeps a bare less-than and decodes entities once", () => {
    expect(stripHtml("a < b &lt;c&gt; &amp;amp;")).toBe("a < b <c> &amp;");
  });
});
