import * as t from "@babel/types";
import { mangle } from "./magicIdentifier";

/** Value of the string-literal statement that marks where hoisted code goes. */
export const ESM_HOISTING_LOCATION = mangle("ecmascript hoisting location");

export function isHoistingMarker(stmt: t.Statement): boolean {
  return (
    t.isExpressionStatement(stmt) &&
    t.isStringLiteral(stmt.expression, { value: ESM_HOISTING_LOCATION })
  );
}

const hoistingMarker = () =>
  t.expressionStatement(t.stringLiteral(ESM_HOISTING_LOCATION));

/**
 * Inserts `stmt` right before the hoisting marker of `program`, creating the
 * marker at the top of the body on first use.
 *
 * In a module an equal statement already above the marker is not inserted
 * again. Scripts get no such check.
 */
export function insertHoistedStmt(program: t.Program, stmt: t.Statement): void {
  const { body } = program;
  const pos = body.findIndex(isHoistingMarker);

  if (program.sourceType === "module") {
    if (pos !== -1) {
      const hasStmt = body
        .slice(0, pos)
        .some((item) => !t.isImportOrExportDeclaration(item) && t.isNodesEquivalent(item, stmt));
      if (!hasStmt) {
        body.splice(pos, 0, stmt);
      }
    } else {
      body.splice(0, 0, stmt, hoistingMarker());
    }
    return;
  }

  if (pos !== -1) {
    body.splice(pos, 0, stmt);
  } else {
    body.unshift(hoistingMarker());
    body.unshift(stmt);
  }
}
