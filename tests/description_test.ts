/**
 * API description loading tests
 */

import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadDescription, modulePath, readDescriptionFile } from "../src/description.ts";
import { DEFAULT_LANGUAGE, JAVA, PYTHON } from "../src/languages.ts";
import { DescriptionError } from "../src/errors.ts";

const BOOKS = {
  name: "books",
  version: "v1",
  description: "Manages books.",
  module: { ownerDomain: "example.com", path: "books/v1" },
  models: [
    {
      className: "Book",
      description: "A book.",
      properties: [
        { wireName: "title", type: "string", description: "Title of the book." },
        { wireName: "pages", type: "integer", format: "int32" },
        { wireName: "published", type: "string", format: "date-time" },
        { wireName: "tags", type: "array", items: { type: "string" } },
        { wireName: "extras", type: "object", additionalProperties: { $ref: "Shelf" } },
      ],
    },
    { className: "BookList", arrayOf: "Book" },
    { className: "Shelf", properties: [{ wireName: "id", codeType: "ShelfId" }] },
  ],
  methods: [
    {
      codeName: "list",
      path: "shelves/{shelf}/books",
      description: "Lists books.",
      responseType: "BookList",
      parameters: [
        { wireName: "maxResults", type: "integer", format: "int32" },
        { wireName: "shelf", type: "string", required: true, location: "path" },
        { wireName: "owner", type: "string", required: true },
      ],
      parameterOrder: ["shelf"],
    },
    {
      codeName: "insert",
      path: "books",
      httpMethod: "POST",
      requestType: "Book",
      responseType: "Book",
    },
  ],
};

describe("modulePath", () => {
  it("reverses the owner domain", () => {
    expect(modulePath("example.com", "books/v1")).toBe("com/example/books/v1");
  });

  it("either part may be missing", () => {
    expect(modulePath(undefined, "books/v1")).toBe("books/v1");
    expect(modulePath("example.com", undefined)).toBe("com/example");
    expect(modulePath(undefined, undefined)).toBe("");
  });
});

describe("loadDescription - java", () => {
  const api = loadDescription(BOOKS, JAVA);
  const [book, bookList, shelf] = api.models;

  it("api attributes", () => {
    expect(api.name).toBe("books");
    expect(api.className).toBe("Books");
    expect(api.version).toBe("v1");
    expect(api.description).toBe("Manages books.");
    expect(api.module.name).toBe("com.example.books.v1");
  });

  it("models live in the model submodule", () => {
    expect(book.module?.name).toBe("com.example.books.v1.model");
    expect(book.get("fullClassName")).toBe("com.example.books.v1.model.Book");
  });

  it("maps property types", () => {
    expect(book.properties.map((p) => p.codeType)).toEqual([
      "String",
      "Integer",
      "DateTime",
      "java.util.List<String>",
      "java.util.Map<String, Shelf>",
    ]);
    expect(book.properties[0].description).toBe("Title of the book.");
    expect(book.properties[1].codeName).toBe("pages");
  });

  it("references share model objects", () => {
    expect(bookList.arrayOf).toBe(book);
    expect(shelf.properties[0].codeType).toBe("ShelfId");
    expect(api.get("topLevelModels")).toEqual([book, shelf]);
  });

  it("methods", () => {
    const [list, insert] = api.methods;
    expect(list.httpMethod).toBe("GET");
    expect(list.responseType).toBe(bookList);
    expect(list.requestType).toBeNull();
    expect(list.requiredParameters.map((p) => p.codeName)).toEqual(["shelf", "owner"]);
    expect(list.optionalParameters.map((p) => p.codeType)).toEqual(["Integer"]);
    expect(list.pathParameters.map((p) => p.wireName)).toEqual(["shelf"]);

    expect(insert.httpMethod).toBe("POST");
    expect(insert.requestType).toBe(book);
    expect(insert.parameters).toEqual([]);
  });
});

describe("loadDescription - recursive models", () => {
  it("a model may refer to itself", () => {
    const api = loadDescription(
      {
        name: "trees",
        models: [
          {
            className: "TreeNode",
            properties: [
              { wireName: "label", type: "string" },
              { wireName: "children", type: "array", items: { $ref: "TreeNode" } },
            ],
          },
        ],
      },
      JAVA
    );
    expect(api.models[0].properties.map((p) => p.codeType)).toEqual(["String", "java.util.List<TreeNode>"]);
  });

  it("models may refer to each other", () => {
    const api = loadDescription(
      {
        name: "x",
        models: [
          { className: "Author", properties: [{ wireName: "books", type: "array", items: { $ref: "Book" } }] },
          { className: "Book", properties: [{ wireName: "author", $ref: "Author" }] },
        ],
      },
      JAVA
    );
    expect(api.models.map((m) => m.properties[0].codeType)).toEqual(["java.util.List<Book>", "Author"]);
  });
});

describe("loadDescription - other languages", () => {
  it("python has no model submodule", () => {
    const api = loadDescription(BOOKS, PYTHON);
    expect(api.models[0].get("fullClassName")).toBe("com.example.books.v1.Book");
    expect(api.models[0].properties.map((p) => p.codeType)).toEqual([
      "str",
      "int",
      "str",
      "list[str]",
      "dict[str, Shelf]",
    ]);
  });

  it("unmapped types are CamelCased", () => {
    const api = loadDescription(
      { name: "x", models: [{ className: "M", properties: [{ wireName: "a", type: "geo-point" }] }] },
      DEFAULT_LANGUAGE
    );
    expect(api.models[0].properties[0].codeType).toBe("GeoPoint");
  });
});

describe("loadDescription - errors", () => {
  it("schema issues are listed", () => {
    try {
      loadDescription({}, JAVA);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DescriptionError);
      if (error instanceof DescriptionError) {
        expect(error.issues).toEqual(["name: Required"]);
        expect(error.message).toBe("Invalid API description: name: Required");
      }
    }
  });

  it("unknown model reference", () => {
    const raw = { name: "x", methods: [{ codeName: "get", path: "x", responseType: "Nope" }] };
    expect(() => loadDescription(raw, JAVA)).toThrow("get.responseType: unknown model 'Nope'");
  });

  it("an array model of itself", () => {
    const raw = { name: "x", models: [{ className: "Loop", arrayOf: "Loop" }] };
    expect(() => loadDescription(raw, JAVA)).toThrow("Model 'Loop' refers to itself: Loop -> Loop");
  });

  it("unknown $ref", () => {
    const raw = { name: "x", models: [{ className: "A", properties: [{ wireName: "b", $ref: "B" }] }] };
    expect(() => loadDescription(raw, JAVA)).toThrow("A.b: unknown model 'B'");
  });

  it("duplicate model", () => {
    const raw = { name: "x", models: [{ className: "A" }, { className: "A" }] };
    expect(() => loadDescription(raw, JAVA)).toThrow("Duplicate model 'A'");
  });

  it("array without items", () => {
    const raw = { name: "x", models: [{ className: "A", properties: [{ wireName: "xs", type: "array" }] }] };
    expect(() => loadDescription(raw, JAVA)).toThrow("A.xs: array type without items");
  });

  it("property without any type", () => {
    const raw = { name: "x", models: [{ className: "A", properties: [{ wireName: "p" }] }] };
    expect(() => loadDescription(raw, JAVA)).toThrow("A.p: one of codeType, $ref or type is required");
  });

  it("parameterOrder must name parameters", () => {
    const raw = { name: "x", methods: [{ codeName: "get", path: "x", parameterOrder: ["id"] }] };
    expect(() => loadDescription(raw, JAVA)).toThrow("get: parameterOrder names unknown parameter 'id'");
  });
});

describe("readDescriptionFile", () => {
  let dir = "";

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "codestencil-description-"));
    await writeFile(join(dir, "api.json"), JSON.stringify({ name: "books" }));
    await writeFile(
      join(dir, "api.yaml"),
      "name: books\nmodule:\n  ownerDomain: example.com\n  path: books/v1\nmodels:\n  - className: Book\n"
    );
    await writeFile(join(dir, "broken.json"), "{");
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads JSON", async () => {
    const api = await readDescriptionFile(join(dir, "api.json"), JAVA);
    expect(api.className).toBe("Books");
    expect(api.module.name).toBe("");
  });

  it("reads YAML", async () => {
    const api = await readDescriptionFile(join(dir, "api.yaml"), JAVA);
    expect(api.models[0].get("fullClassName")).toBe("com.example.books.v1.model.Book");
  });

  it("unparseable content", async () => {
    await expect(readDescriptionFile(join(dir, "broken.json"), JAVA)).rejects.toThrow(DescriptionError);
  });
});
