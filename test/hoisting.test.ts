import * as t from "@babel/types";
import { describe, expect, it } from "vitest";
import { ESM_HOISTING_LOCATION, insertHoistedStmt, isHoistingMarker } from "../src/hoisting";
import { emptyProgram, print } from "./helpers";

const varStmt = (name: string) =>
  t.variableDeclaration("var", [t.variableDeclarator(t.identifier(name), t.numericLiteral(1))]);

describe("insertHoistedStmt", () => {
  it("uses the mangled hoisting location as marker", () => {
    expect(ESM_HOISTING_LOCATION).toBe("__TURBOPACK__ecmascript__hoisting__location__");
  });

  describe("module", () => {
    it("creates the marker after the first statement", () => {
      const program = emptyProgram("module");
      const s = varStmt("s");
      insertHoistedStmt(program, s);

      expect(program.body).toHaveLength(2);
      expect(program.body[0]).toBe(s);
      expect(isHoistingMarker(program.body[1])).toBe(true);
    });

    it("does not insert an equal statement twice", () => {
      const program = emptyProgram("module");
      insertHoistedStmt(program, varStmt("s"));
      insertHoistedStmt(program, varStmt("s"));

      expect(program.body).toHaveLength(2);
    });

    it("inserts new statements right before the marker", () => {
      const program = emptyProgram("module");
      insertHoistedStmt(program, varStmt("s"));
      insertHoistedStmt(program, varStmt("s"));
      insertHoistedStmt(program, varStmt("t"));

      expect(program.body.map(print)).toEqual([
        "var s = 1;",
        "var t = 1;",
        `"${ESM_HOISTING_LOCATION}";`,
      ]);
    });

    it("puts the marker in front of existing code", () => {
      const program = emptyProgram("module");
      program.body.push(t.expressionStatement(t.callExpression(t.identifier("main"), [])));
      insertHoistedStmt(program, varStmt("s"));

      expect(program.body.map(print)).toEqual([
        "var s = 1;",
        `"${ESM_HOISTING_LOCATION}";`,
        "main();",
      ]);
    });

    it("only looks above the marker for duplicates", () => {
      const program = emptyProgram("module");
      insertHoistedStmt(program, varStmt("t"));
      program.body.push(varStmt("s"));
      insertHoistedStmt(program, varStmt("s"));

      expect(program.body.map(print)).toEqual([
        "var t = 1;",
        "var s = 1;",
        `"${ESM_HOISTING_LOCATION}";`,
        "var s = 1;",
      ]);
    });
  });

  describe("script", () => {
    it("creates the marker after the first statement", () => {
      const program = emptyProgram("script");
      insertHoistedStmt(program, varStmt("s"));

      expect(program.body.map(print)).toEqual(["var s = 1;", `"${ESM_HOISTING_LOCATION}";`]);
    });

    it("inserts duplicates", () => {
      const program = emptyProgram("script");
      insertHoistedStmt(program, varStmt("s"));
      insertHoistedStmt(program, varStmt("s"));

      expect(program.body.map(print)).toEqual([
        "var s = 1;",
        "var s = 1;",
        `"${ESM_HOISTING_LOCATION}";`,
      ]);
    });
  });
});
