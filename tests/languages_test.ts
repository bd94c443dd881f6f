/**
 * Target language tests
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_LANGUAGE,
  GWT,
  JAVA,
  PYTHON,
  codeTypeFor,
  createLanguageRegistry,
  formatLiteral,
  javaStringLiteral,
  pythonStringLiteral,
} from "../src/languages.ts";
import { ValueTypeError } from "../src/errors.ts";

const JAVA_DECODE: Record<string, string> = {
  "\\": "\\",
  '"': '"',
  n: "\n",
  t: "\t",
  r: "\r",
  b: "\b",
  f: "\f",
};

/** Read back a Java string literal the way javac would. */
function decodeJavaLiteral(literal: string): string {
  expect(literal.startsWith('"') && literal.endsWith('"')).toBe(true);
  const body = literal.slice(1, -1);
  let out = "";
  for (let i = 0; i < body.length; i++) {
    const char = body[i];
    if (char !== "\\") {
      expect(char === '"' || char === "\n").toBe(false);
      out += char;
      continue;
    }
    const next = body[++i];
    if (next === "u") {
      out += String.fromCharCode(parseInt(body.slice(i + 1, i + 5), 16));
      i += 4;
    } else {
      const decoded = JAVA_DECODE[next];
      expect(decoded).toBeDefined();
      out += decoded ?? "";
    }
  }
  return out;
}

const SAMPLES = [
  "",
  "plain",
  'quote " and \\ backslash',
  "tab\tnew\nline\rreturn",
  "bell\u0007 delete\u007f backspace\b feed\f",
  "unicode é ✓",
  "books/{bookId}",
];

describe("Java string literals", () => {
  it("escape special characters", () => {
    expect(javaStringLiteral('a"b')).toBe('"a\\"b"');
    expect(javaStringLiteral("a\\b")).toBe('"a\\\\b"');
    expect(javaStringLiteral("\u0007")).toBe('"\\u0007"');
    expect(javaStringLiteral("\u007f")).toBe('"\\u007F"');
  });

  it("read back unchanged", () => {
    for (const sample of SAMPLES) {
      expect(decodeJavaLiteral(javaStringLiteral(sample))).toBe(sample);
    }
  });

  it("gwt shares the java spelling", () => {
    expect(GWT.stringLiteral("x\ny")).toBe(JAVA.stringLiteral("x\ny"));
    expect(GWT.name).toBe("gwt");
  });
});

describe("Default and python string literals", () => {
  it("default literals are JSON", () => {
    for (const sample of SAMPLES) {
      expect(JSON.parse(DEFAULT_LANGUAGE.stringLiteral(sample))).toBe(sample);
    }
  });

  it("python escapes control characters as hex", () => {
    expect(pythonStringLiteral("a\u0001b")).toBe('"a\\x01b"');
    expect(pythonStringLiteral('say "x"\n')).toBe('"say \\"x\\"\\n"');
  });
});

describe("formatLiteral", () => {
  it("numbers", () => {
    expect(formatLiteral(JAVA, 3.5)).toBe("3.5");
    expect(formatLiteral(JAVA, -2)).toBe("-2");
  });

  it("java integers outside the int range take the long suffix", () => {
    expect(formatLiteral(JAVA, 3000000000)).toBe("3000000000L");
    expect(formatLiteral(JAVA, -2147483649)).toBe("-2147483649L");
    expect(formatLiteral(JAVA, 2147483647)).toBe("2147483647");
    expect(formatLiteral(JAVA, -2147483648)).toBe("-2147483648");
    expect(formatLiteral(GWT, 3000000000)).toBe("3000000000L");
  });

  it("other languages have no long suffix", () => {
    expect(formatLiteral(PYTHON, 3000000000)).toBe("3000000000");
    expect(formatLiteral(DEFAULT_LANGUAGE, 3000000000)).toBe("3000000000");
  });

  it("booleans and null per language", () => {
    expect(formatLiteral(JAVA, true)).toBe("true");
    expect(formatLiteral(PYTHON, false)).toBe("False");
    expect(formatLiteral(JAVA, null)).toBe("null");
    expect(formatLiteral(PYTHON, null)).toBe("None");
  });

  it("rejects non-finite numbers", () => {
    expect(() => formatLiteral(JAVA, Number.POSITIVE_INFINITY)).toThrow(
      "Cannot write non-finite number as a literal: Infinity"
    );
  });

  it("rejects sequences", () => {
    expect(() => formatLiteral(JAVA, [1])).toThrow(ValueTypeError);
    expect(() => formatLiteral(JAVA, [1])).toThrow("Cannot write sequence as a literal");
  });
});

describe("codeTypeFor", () => {
  it("java type/format pairs", () => {
    expect(codeTypeFor(JAVA, "integer", "int32")).toBe("Integer");
    expect(codeTypeFor(JAVA, "string", "date-time")).toBe("DateTime");
    expect(codeTypeFor(JAVA, "string", "uint64")).toBe("UnsignedLong");
    expect(codeTypeFor(JAVA, "any", null)).toBe("Object");
  });

  it("falls back to the bare type", () => {
    expect(codeTypeFor(JAVA, "string", "unknown-format")).toBe("String");
  });

  it("falls back to the CamelCased type name", () => {
    expect(codeTypeFor(JAVA, "integer", null)).toBe("Integer");
    expect(codeTypeFor(JAVA, "fancy-type", null)).toBe("FancyType");
  });

  it("python names", () => {
    expect(codeTypeFor(PYTHON, "integer", "int32")).toBe("int");
    expect(codeTypeFor(PYTHON, "boolean", null)).toBe("bool");
  });

  it("container types", () => {
    expect(JAVA.arrayOf("String")).toBe("java.util.List<String>");
    expect(JAVA.mapOf("Integer")).toBe("java.util.Map<String, Integer>");
    expect(PYTHON.arrayOf("int")).toBe("list[int]");
  });
});

describe("createLanguageRegistry", () => {
  it("holds the built-in languages", () => {
    const registry = createLanguageRegistry();
    expect(registry.names()).toEqual(["default", "java", "gwt", "python"]);
    expect(registry.get("java")).toBe(JAVA);
    expect(registry.get("cobol")).toBeUndefined();
  });

  it("extra languages replace built-ins of the same name", () => {
    const registry = createLanguageRegistry([{ ...JAVA, nullLiteral: "nil" }]);
    expect(registry.get("java")?.nullLiteral).toBe("nil");
    expect(registry.names()).toEqual(["default", "java", "gwt", "python"]);
  });
});
