import * as t from "@babel/types";

// Free names the generated code expects the chunk runtime to provide.
export const RUNTIME = {
  import: "__turbopack_import__",
  externalImport: "__turbopack_external_import__",
  externalRequire: "__turbopack_external_require__",
  asyncModule: "__turbopack_async_module__",
  handleAsyncDependencies: "__turbopack_handle_async_dependencies__",
  asyncResult: "__turbopack_async_result__",
  asyncDependencies: "__turbopack_async_dependencies__",
} as const;

export type ModuleId = string | number;

const literalFor = (id: ModuleId) =>
  typeof id === "number" ? t.numericLiteral(id) : t.stringLiteral(id);

const varDecl = (name: string, init: t.Expression) =>
  t.variableDeclaration("var", [t.variableDeclarator(t.identifier(name), init)]);

/** `var <name> = __turbopack_import__(<id>);` */
export function importStmt(name: string, id: ModuleId): t.Statement {
  return varDecl(name, t.callExpression(t.identifier(RUNTIME.import), [literalFor(id)]));
}

/** `var <name> = __turbopack_external_import__(<request>);` */
export function externalImportStmt(name: string, request: string): t.Statement {
  return varDecl(
    name,
    t.callExpression(t.identifier(RUNTIME.externalImport), [t.stringLiteral(request)]),
  );
}

/** `var <name> = __turbopack_external_require__(<request>, true);` */
export function externalRequireStmt(name: string, request: string): t.Statement {
  return varDecl(
    name,
    t.callExpression(t.identifier(RUNTIME.externalRequire), [
      t.stringLiteral(request),
      t.booleanLiteral(true),
    ]),
  );
}

export function asyncDependenciesStmts(idents: readonly string[]): [t.Statement, t.Statement] {
  const deps = RUNTIME.asyncDependencies;
  const handler = varDecl(
    deps,
    t.callExpression(t.identifier(RUNTIME.handleAsyncDependencies), [
      t.arrayExpression(idents.map((ident) => t.identifier(ident))),
    ]),
  );
  const reassign = t.expressionStatement(
    t.assignmentExpression(
      "=",
      t.arrayPattern(idents.map((ident) => t.identifier(ident))),
      t.conditionalExpression(
        t.memberExpression(t.identifier(deps), t.identifier("then")),
        t.callExpression(t.awaitExpression(t.identifier(deps)), []),
        t.identifier(deps),
      ),
    ),
  );
  return [handler, reassign];
}

/**
 * Expression that throws a `MODULE_NOT_FOUND` error for `request` when it is
 * evaluated:
 * `(() => { const e = new Error("Cannot find module '<request>'"); e.code = "MODULE_NOT_FOUND"; throw e; })()`
 */
export function throwModuleNotFoundExpr(request: string): t.Expression {
  const e = () => t.identifier("e");
  return t.callExpression(
    t.arrowFunctionExpression(
      [],
      t.blockStatement([
        t.variableDeclaration("const", [
          t.variableDeclarator(
            e(),
            t.newExpression(t.identifier("Error"), [
              t.stringLiteral(`Cannot find module '${request}'`),
            ]),
          ),
        ]),
        t.expressionStatement(
          t.assignmentExpression(
            "=",
            t.memberExpression(e(), t.identifier("code")),
            t.stringLiteral("MODULE_NOT_FOUND"),
          ),
        ),
        t.throwStatement(e()),
      ]),
    ),
    [],
  );
}

/**
 * Wraps a module body so that it runs as an async module:
 * `__turbopack_async_module__(async (handle, result) => { try { ... result(); } catch (e) { result(e); } }, hasTopLevelAwait);`
 */
export function asyncModuleWrapper(body: t.Statement[], hasTopLevelAwait: boolean): t.Statement {
  const result = () => t.identifier(RUNTIME.asyncResult);
  const fn = t.arrowFunctionExpression(
    [t.identifier(RUNTIME.handleAsyncDependencies), result()],
    t.blockStatement([
      t.tryStatement(
        t.blockStatement([...body, t.expressionStatement(t.callExpression(result(), []))]),
        t.catchClause(
          t.identifier("e"),
          t.blockStatement([
            t.expressionStatement(t.callExpression(result(), [t.identifier("e")])),
          ]),
        ),
      ),
    ]),
    true,
  );
  return t.expressionStatement(
    t.callExpression(t.identifier(RUNTIME.asyncModule), [fn, t.booleanLiteral(hasTopLevelAwait)]),
  );
}
