/**
 * Parser unit tests
 */

import { describe, it, expect } from "vitest";
import { tokenize } from "../src/lexer.ts";
import { parse } from "../src/parser.ts";
import { ParseError, TemplateSyntaxError, UnknownFilterError, UnknownTagError } from "../src/errors.ts";
import type { Template } from "../src/ast.ts";

function parseText(source: string, name: string | null = null): Template {
  return parse(tokenize(source, name), name);
}

// =============================================================================
// Basic parsing
// =============================================================================

describe("Parser - basic parsing", () => {
  it("empty template", () => {
    expect(parseText("").nodes).toEqual([]);
  });

  it("plain text", () => {
    expect(parseText("Hello").nodes).toEqual([{ type: "text", value: "Hello" }]);
  });

  it("variable with filters and position", () => {
    const ast = parseText("x\n  {{ a.b|capfirst }}");
    expect(ast.nodes[1]).toEqual({
      type: "variable",
      path: { segments: ["a", "b"] },
      filters: ["capfirst"],
      line: 2,
      column: 3,
    });
  });

  it("keeps the template name", () => {
    expect(parseText("", "java/model.tmpl").name).toBe("java/model.tmpl");
  });

  it("parsing the same text twice gives equal trees", () => {
    const source = "{% for p in m.properties %}{{ p.codeName|capfirst }}{% endfor %}";
    expect(parseText(source)).toEqual(parseText(source));
  });
});

// =============================================================================
// Block tags
// =============================================================================

describe("Parser - block tags", () => {
  it("if with else", () => {
    const node = parseText("{% if a %}yes{% else %}no{% endif %}").nodes[0];
    expect(node.type).toBe("if");
    if (node.type === "if") {
      expect(node.condition.segments).toEqual(["a"]);
      expect(node.thenBranch).toEqual([{ type: "text", value: "yes" }]);
      expect(node.elseBranch).toEqual([{ type: "text", value: "no" }]);
    }
  });

  it("if without else", () => {
    const node = parseText("{% if a %}yes{% endif %}").nodes[0];
    if (node.type === "if") {
      expect(node.elseBranch).toBeNull();
    }
  });

  it("for loop", () => {
    const node = parseText("{% for p in method.parameters %}x{% endfor %}").nodes[0];
    expect(node.type).toBe("for");
    if (node.type === "for") {
      expect(node.itemName).toBe("p");
      expect(node.collection.segments).toEqual(["method", "parameters"]);
      expect(node.body).toEqual([{ type: "text", value: "x" }]);
    }
  });

  it("filter block with a chain", () => {
    const node = parseText("{% filter noblanklines|capfirst %}x{% endfilter %}").nodes[0];
    if (node.type === "filter_block") {
      expect(node.filters).toEqual(["noblanklines", "capfirst"]);
    }
  });

  it("imports block", () => {
    const node = parseText("{% imports model %}import a;{% endimports %}").nodes[0];
    if (node.type === "imports") {
      expect(node.subject.segments).toEqual(["model"]);
      expect(node.body).toEqual([{ type: "text", value: "import a;" }]);
    }
  });

  it("nested blocks", () => {
    const ast = parseText("{% for m in api.models %}{% if m.isArray %}[]{% endif %}{% endfor %}");
    const outer = ast.nodes[0];
    expect(outer.type).toBe("for");
    if (outer.type === "for") {
      expect(outer.body[0].type).toBe("if");
    }
  });
});

// =============================================================================
// Simple tags
// =============================================================================

describe("Parser - simple tags", () => {
  it("language", () => {
    expect(parseText("{% language java %}").nodes).toEqual([
      { type: "language", name: "java", line: 1, column: 1 },
    ]);
  });

  it("doc_comment_if keeps the line indentation", () => {
    const nodes = parseText("  {% doc_comment_if m %}").nodes;
    expect(nodes[1]).toEqual({
      type: "doc_comment_if",
      subject: { segments: ["m"] },
      indent: "  ",
      line: 1,
      column: 3,
    });
  });

  it("copyright_block", () => {
    expect(parseText("{% copyright_block %}").nodes[0].type).toBe("copyright_block");
  });

  it("literal", () => {
    const node = parseText("{% literal p.wireName %}").nodes[0];
    if (node.type === "literal") {
      expect(node.path.segments).toEqual(["p", "wireName"]);
    }
  });

  it("templatetag becomes text", () => {
    const ast = parseText("{% templatetag openblock %} x {% templatetag closeblock %}{% templatetag openbrace %}");
    expect(ast.nodes).toEqual([
      { type: "text", value: "{%" },
      { type: "text", value: " x " },
      { type: "text", value: "%}" },
      { type: "text", value: "{" },
    ]);
  });

  it("unknown templatetag", () => {
    expect(() => parseText("{% templatetag nothing %}")).toThrow("Unknown templatetag 'nothing'");
  });
});

describe("Parser - call_template", () => {
  it("path name with arguments", () => {
    const node = parseText('{% call_template java/model m=model.x label="hi" %}').nodes[0];
    expect(node).toEqual({
      type: "call_template",
      name: "java/model",
      args: [
        { key: "m", value: { kind: "path", path: { segments: ["model", "x"] } } },
        { key: "label", value: { kind: "string", value: "hi" } },
      ],
      line: 1,
      column: 1,
    });
  });

  it("dotted name", () => {
    const node = parseText("{% call_template common.tmpl %}").nodes[0];
    if (node.type === "call_template") {
      expect(node.name).toBe("common.tmpl");
    }
  });

  it("quoted name", () => {
    const node = parseText('{% call_template "java/method-signature" %}').nodes[0];
    if (node.type === "call_template") {
      expect(node.name).toBe("java/method-signature");
    }
  });

  it("duplicate argument", () => {
    expect(() => parseText("{% call_template t a=x a=y %}")).toThrow("Duplicate call_template argument: a");
  });

  it("name with '..'", () => {
    expect(() => parseText('{% call_template "../x" %}')).toThrow(ParseError);
    expect(() => parseText('{% call_template "../x" %}')).toThrow("Template name cannot contain '..': ../x");
  });
});

describe("Parser - parameter lists", () => {
  it("parameter inside parameter_list", () => {
    const node = parseText(
      "{% parameter_list %}{% parameter %}a{% end_parameter %}{% parameter group %}b{% end_parameter %}{% end_parameter_list %}"
    ).nodes[0];
    expect(node.type).toBe("parameter_list");
    if (node.type === "parameter_list") {
      const grouped = node.body.map((n) => (n.type === "parameter" ? n.grouped : null));
      expect(grouped).toEqual([false, true]);
    }
  });

  it("parameter nested in a loop inside parameter_list", () => {
    const source =
      "{% parameter_list %}{% for p in ps %}{% parameter %}{{ p }}{% end_parameter %}{% endfor %}{% end_parameter_list %}";
    expect(() => parseText(source)).not.toThrow();
  });

  it("parameter outside parameter_list", () => {
    expect(() => parseText("{% parameter %}a{% end_parameter %}")).toThrow(
      "'parameter' is only allowed inside 'parameter_list' at line 1, column 1"
    );
  });

  it("parameter directly inside another parameter", () => {
    const source =
      "{% parameter_list %}{% parameter %}a{% parameter %}b{% end_parameter %}{% end_parameter %}{% end_parameter_list %}";
    expect(() => parseText(source)).toThrow(
      "'parameter' cannot be nested in the 'parameter' opened at line 1, column 21 at line 1, column 37"
    );
  });

  it("parameter inside a list nested in a parameter", () => {
    const source =
      "{% parameter_list %}{% parameter %}f{% parameter_list %}{% parameter %}y{% end_parameter %}{% end_parameter_list %}{% end_parameter %}{% end_parameter_list %}";
    expect(parseText(source).nodes[0].type).toBe("parameter_list");
  });
});

// =============================================================================
// Errors
// =============================================================================

describe("Parser - errors", () => {
  it("unknown tag", () => {
    expect(() => parseText("{% include x %}")).toThrow(UnknownTagError);
    expect(() => parseText("{% include x %}")).toThrow("Unknown tag 'include' at line 1, column 1");
  });

  it("unknown filter", () => {
    expect(() => parseText("{{ x|upper }}")).toThrow(UnknownFilterError);
    expect(() => parseText("{{ x|upper }}")).toThrow("Unknown filter 'upper' at line 1, column 6");
  });

  it("syntax errors share a base class", () => {
    expect(() => parseText("{% include x %}")).toThrow(TemplateSyntaxError);
    expect(() => parseText("{{ x|upper }}")).toThrow(TemplateSyntaxError);
  });

  it("end tag that does not close the innermost block", () => {
    expect(() => parseText("{% if a %}{% for x in y %}{% endif %}")).toThrow(
      "Unexpected 'endif' inside 'for' block opened at line 1, column 11"
    );
  });

  it("end tag outside any block", () => {
    expect(() => parseText("{% endif %}")).toThrow("Unexpected 'endif' outside of any block at line 1, column 4");
  });

  it("else inside for", () => {
    expect(() => parseText("{% for x in y %}{% else %}{% endfor %}")).toThrow("Unexpected 'else' inside 'for' block");
  });

  it("unclosed block", () => {
    expect(() => parseText("{% if a %}text")).toThrow("Unclosed 'if' block at line 1, column 1");
  });

  it("unclosed block names the template", () => {
    expect(() => parseText("\n{% for x in y %}", "t.tmpl")).toThrow("Unclosed 'for' block in t.tmpl at line 2, column 1");
  });

  it("for without 'in'", () => {
    expect(() => parseText("{% for x y %}{% endfor %}")).toThrow("Expected 'in', got y");
  });
});
