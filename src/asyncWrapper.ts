import * as t from "@babel/types";
import { mangle } from "./magicIdentifier";
import { asyncModuleWrapper } from "./runtime";

export const DEFAULT_EXPORT = mangle("default export");

function declaredNames(decl: t.Declaration): string[] {
  if (t.isVariableDeclaration(decl)) {
    return decl.declarations.flatMap((d) => Object.keys(t.getBindingIdentifiers(d.id)));
  }
  if ((t.isFunctionDeclaration(decl) || t.isClassDeclaration(decl)) && decl.id) {
    return [decl.id.name];
  }
  return [];
}

const assign = (left: t.LVal, right: t.Expression) =>
  t.expressionStatement(t.assignmentExpression("=", left, right));

const functionExpression = (fn: t.FunctionDeclaration) =>
  t.functionExpression(fn.id, fn.params, fn.body, fn.generator, fn.async);

const classExpression = (cls: t.ClassDeclaration) =>
  t.classExpression(cls.id, cls.superClass, cls.body, cls.decorators);

const exportList = (pairs: readonly (readonly [local: string, exported: string])[]) =>
  t.exportNamedDeclaration(
    null,
    pairs.map(([local, exported]) => t.exportSpecifier(t.identifier(local), t.identifier(exported))),
  );

/**
 * Moves a module body into the async-module wrapper. Imports and re-exports
 * stay at the top level. Bindings the module exports become top-level `let`s
 * that the wrapped code assigns, so the exports keep pointing at them.
 */
export function wrapAsyncModuleBody(
  body: readonly t.Statement[],
  hasTopLevelAwait: boolean,
): t.Statement[] {
  const exportedLocals = new Set<string>();
  for (const stmt of body) {
    if (t.isExportNamedDeclaration(stmt) && !stmt.source) {
      for (const spec of stmt.specifiers) {
        if (t.isExportSpecifier(spec)) exportedLocals.add(spec.local.name);
      }
    }
  }

  const imports: t.Statement[] = [];
  const exports: t.Statement[] = [];
  const lifted: string[] = [];
  // function declarations are assigned first, like hoisting would
  const functions: t.Statement[] = [];
  const inner: t.Statement[] = [];

  const lift = (names: readonly string[]) => {
    for (const name of names) {
      if (!lifted.includes(name)) lifted.push(name);
    }
  };

  const move = (decl: t.Statement, exported: boolean) => {
    if (t.isVariableDeclaration(decl)) {
      const names = declaredNames(decl);
      if (!exported && !names.some((n) => exportedLocals.has(n))) {
        inner.push(decl);
        return;
      }
      lift(names);
      for (const declarator of decl.declarations) {
        if (declarator.init && t.isLVal(declarator.id)) {
          inner.push(assign(declarator.id, declarator.init));
        }
      }
      return;
    }
    if (t.isFunctionDeclaration(decl) && decl.id && (exported || exportedLocals.has(decl.id.name))) {
      lift([decl.id.name]);
      functions.push(assign(t.identifier(decl.id.name), functionExpression(decl)));
      return;
    }
    if (t.isClassDeclaration(decl) && decl.id && (exported || exportedLocals.has(decl.id.name))) {
      lift([decl.id.name]);
      inner.push(assign(t.identifier(decl.id.name), classExpression(decl)));
      return;
    }
    inner.push(decl);
  };

  for (const stmt of body) {
    if (t.isImportDeclaration(stmt) || t.isExportAllDeclaration(stmt)) {
      imports.push(stmt);
    } else if (t.isExportNamedDeclaration(stmt)) {
      if (stmt.source) {
        imports.push(stmt);
      } else if (stmt.declaration) {
        const names = declaredNames(stmt.declaration);
        move(stmt.declaration, true);
        exports.push(exportList(names.map((n): [string, string] => [n, n])));
      } else {
        exports.push(stmt);
      }
    } else if (t.isExportDefaultDeclaration(stmt)) {
      const decl = stmt.declaration;
      if ((t.isFunctionDeclaration(decl) || t.isClassDeclaration(decl)) && decl.id) {
        move(decl, true);
        exports.push(exportList([[decl.id.name, "default"]]));
      } else if (t.isFunctionDeclaration(decl)) {
        lift([DEFAULT_EXPORT]);
        functions.push(assign(t.identifier(DEFAULT_EXPORT), functionExpression(decl)));
        exports.push(exportList([[DEFAULT_EXPORT, "default"]]));
      } else if (t.isClassDeclaration(decl)) {
        lift([DEFAULT_EXPORT]);
        inner.push(assign(t.identifier(DEFAULT_EXPORT), classExpression(decl)));
        exports.push(exportList([[DEFAULT_EXPORT, "default"]]));
      } else if (t.isExpression(decl)) {
        lift([DEFAULT_EXPORT]);
        inner.push(assign(t.identifier(DEFAULT_EXPORT), decl));
        exports.push(exportList([[DEFAULT_EXPORT, "default"]]));
      } else {
        imports.push(stmt);
      }
    } else {
      move(stmt, false);
    }
  }

  const declarations =
    lifted.length > 0
      ? [t.variableDeclaration("let", lifted.map((n) => t.variableDeclarator(t.identifier(n))))]
      : [];

  return [
    ...imports,
    ...declarations,
    ...exports,
    asyncModuleWrapper([...functions, ...inner], hasTopLevelAwait),
  ];
}
