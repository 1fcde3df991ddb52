import traverse from "@babel/traverse";
import * as bblp from "@babel/parser";
import * as t from "@babel/types";
import fs from "fs-extra";
import { ImportAnnotations } from "./annotations";
import type FileParser from "./fileParser";

const JS_EXTENSIONS = [".js", ".mjs", ".jsx"];

/** A static `import` or `export ... from` found in a module. */
export interface ImportRecord {
  specifier: string;
  annotations: ImportAnnotations;
  exportName?: string;
  line: number;
  column: number;
}

export interface ModuleAnalysis {
  file: string;
  ast: bblp.ParseResult<t.File>;
  imports: ImportRecord[];
  hasTopLevelAwait: boolean;
}

export function isEcmascriptFile(filename: string): boolean {
  return JS_EXTENSIONS.some((ext) => filename.endsWith(ext));
}

// `import { a } from "x"` and `export { a } from "x"` only need one export
function singleExportName(specifiers: readonly t.Node[]): string | undefined {
  if (specifiers.length !== 1) return undefined;
  const [spec] = specifiers;
  if (t.isImportSpecifier(spec)) {
    return t.isIdentifier(spec.imported) ? spec.imported.name : spec.imported.value;
  }
  if (t.isExportSpecifier(spec)) {
    return spec.local.name;
  }
  return undefined;
}

export default class EsmParser implements FileParser<ModuleAnalysis> {
  async isParseable(filename: string): Promise<boolean> {
    return isEcmascriptFile(filename) && (await fs.pathExists(filename));
  }

  async parse(filename: string): Promise<ModuleAnalysis> {
    const code = await fs.readFile(filename, "utf-8");
    return this.parseSource(code, filename);
  }

  parseSource(code: string, filename: string): ModuleAnalysis {
    const ast = bblp.parse(code, {
      sourceType: "module",
      sourceFilename: filename,
      plugins: ["jsx", "importAttributes"],
    });

    const imports: ImportRecord[] = [];
    let hasTopLevelAwait = false;

    const record = (
      node: t.ImportDeclaration | t.ExportNamedDeclaration | t.ExportAllDeclaration,
      source: t.StringLiteral,
      exportName?: string,
    ) => {
      const start = node.loc?.start;
      imports.push({
        specifier: source.value,
        annotations: ImportAnnotations.parse(node.attributes ?? node.assertions),
        exportName,
        line: start?.line ?? 0,
        column: start?.column ?? 0,
      });
    };

    traverse(ast, {
      ImportDeclaration: (path) => {
        record(path.node, path.node.source, singleExportName(path.node.specifiers));
      },
      ExportNamedDeclaration: (path) => {
        const { source } = path.node;
        if (!source) return;
        record(path.node, source, singleExportName(path.node.specifiers));
      },
      ExportAllDeclaration: (path) => {
        record(path.node, path.node.source);
      },
      AwaitExpression: (path) => {
        if (!path.getFunctionParent()) hasTopLevelAwait = true;
      },
      ForOfStatement: (path) => {
        if (path.node.await && !path.getFunctionParent()) hasTopLevelAwait = true;
      },
    });

    return { file: filename, ast, imports, hasTopLevelAwait };
  }
}
