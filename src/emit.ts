import { ESLint } from "eslint";
import fsExtra from "fs-extra";
import path from "path";
import * as prettier from "prettier";
import type { EnvironmentName } from "./config";
import eslintConfig from "./eslintConfig";
import type { CompiledModule } from "./project";

export function createLinter(environment: EnvironmentName): ESLint {
  return new ESLint({
    ignore: false,
    useEslintrc: false,
    extensions: [".js", ".mjs", ".jsx"],
    overrideConfig: eslintConfig(environment),
  });
}

/** Lints emitted code; each problem becomes one `At line <n> : <message>` line. */
export async function lintCode(eslint: ESLint, code: string): Promise<string[]> {
  const [result] = await eslint.lintText(code);
  return (result?.messages ?? []).map((msg) => `At line ${msg.line} : ${msg.message}`);
}

export async function formatCode(code: string): Promise<string> {
  return prettier.format(code, {
    parser: "babel",
    printWidth: 100,
  });
}

/** Writes `code` for `compiled` below `outDir`, skipping files that did not change. */
export async function writeModule(
  outDir: string,
  compiled: CompiledModule,
  code: string,
): Promise<boolean> {
  const filePath = path.join(outDir, compiled.outputPath);
  if ((await fsExtra.pathExists(filePath)) && (await fsExtra.readFile(filePath, "utf-8")) === code) {
    return false;
  }
  await fsExtra.outputFile(filePath, code);
  return true;
}
