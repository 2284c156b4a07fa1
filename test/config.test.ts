import { describe, it, expect } from "vitest";
import { resolveOptions, splitArgs } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("splitArgs", () => {
  it("separates positionals from flags", () => {
    expect(splitArgs(["book.txt", "--format", "simple", "--top", "3"])).toEqual({
      positionals: ["book.txt"],
      format: "simple",
      top: "3",
      help: false,
    });
  });

  it("recognises help in either spelling", () => {
    expect(splitArgs(["-h"]).help).toBe(true);
    expect(splitArgs(["a", "--help"]).help).toBe(true);
  });

  it("keeps extra positionals for the caller to reject", () => {
    expect(splitArgs(["a.txt", "b.txt"]).positionals).toEqual(["a.txt", "b.txt"]);
  });

  it("reads a trailing flag without a value as empty", () => {
    expect(splitArgs(["a.txt", "--format"]).format).toBe("");
  });
});

describe("resolveOptions", () => {
  it("applies defaults", () => {
    expect(resolveOptions("book.txt", splitArgs(["book.txt"]))).toEqual({
      path: "book.txt",
      format: "banner",
      top: 10,
    });
  });

  it("coerces --top to a number", () => {
    expect(resolveOptions("b.txt", splitArgs(["b.txt", "--top", "4", "--format", "json"]))).toEqual({
      path: "b.txt",
      format: "json",
      top: 4,
    });
  });

  it("rejects an unknown format", () => {
    expect(() => resolveOptions("b.txt", splitArgs(["b.txt", "--format", "xml"]))).toThrow(ConfigError);
  });

  it("rejects a non-positive or fractional --top", () => {
    for (const top of ["0", "-1", "2.5", "many"]) {
      try {
        resolveOptions("b.txt", splitArgs(["b.txt", "--top", top]));
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(ConfigError);
        if (e instanceof ConfigError) expect(e.issues[0]).toMatch(/^top: /);
      }
    }
  });

  it("rejects an empty path", () => {
    expect(() => resolveOptions("", splitArgs([""]))).toThrow("path: path to book must not be empty");
  });
});
