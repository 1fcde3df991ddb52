import { describe, expect, it } from "vitest";
import { mangle, unmangle } from "../src/magicIdentifier";

describe("mangle", () => {
  it("keeps letters and digits and encodes spaces", () => {
    expect(mangle("Hello World")).toBe("__TURBOPACK__Hello__World__");
    expect(mangle("external fs")).toBe("__TURBOPACK__external__fs__");
    expect(mangle("abc123")).toBe("__TURBOPACK__abc123__");
  });

  it("keeps single underscores and hex-encodes repeated ones", () => {
    expect(mangle("Hello_World")).toBe("__TURBOPACK__Hello_World__");
    expect(mangle("Hello__World")).toBe("__TURBOPACK__Hello_$5f$World__");
  });

  it("groups punctuation into one hex run", () => {
    expect(mangle("Hello/World")).toBe("__TURBOPACK__Hello$2f$World__");
    expect(mangle("Hello///World")).toBe("__TURBOPACK__Hello$2f2f2f$World__");
    expect(mangle("a.js")).toBe("__TURBOPACK__a$2e$js__");
  });

  it("doubles dollar signs", () => {
    expect(mangle("a$b")).toBe("__TURBOPACK__a$$b__");
  });

  it("writes code points above 0xff in long form", () => {
    expect(mangle("Hello😀World")).toBe("__TURBOPACK__Hello$_1f600$World__");
  });

  it("gives distinct identifiers for labels that differ only in spacing", () => {
    expect(mangle("a_ b")).not.toBe(mangle("a _b"));
  });

  it("always yields a valid identifier", () => {
    for (const label of ["imported module [project]/src/a.js (ecmascript)", "ü-ß", "x\ny"]) {
      expect(mangle(label)).toMatch(/^[A-Za-z_$][A-Za-z0-9_$]*$/);
    }
  });
});

describe("unmangle", () => {
  it("restores labels inside text", () => {
    expect(unmangle("var __TURBOPACK__external__fs__ = 1;")).toBe("var `external fs` = 1;");
  });

  it.each([
    "Hello__World",
    "Hello/World",
    "a_ b",
    "a$b",
    "Hello😀World",
    "imported module [project]/src/a.js (ecmascript)",
  ])("reverses mangle for %s", (label) => {
    expect(unmangle(mangle(label))).toBe(`\`${label}\``);
  });

  it("leaves other text alone", () => {
    expect(unmangle("const __dirname = 1;")).toBe("const __dirname = 1;");
  });
});
