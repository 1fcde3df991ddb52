#!/usr/bin/env node
import { defineCommand, runMain } from "citty";
import fsExtra from "fs-extra";
import path from "path";
import { CONFIG_FILE, loadConfig } from "./config";
import { createLinter, formatCode, lintCode, writeModule } from "./emit";
import { unmangle } from "./magicIdentifier";
import Project from "./project";

export const main = defineCommand({
  meta: {
    name: "esm-codegen",
    description: "Splices import and async-module runtime code into a directory of ES modules",
  },
  args: {
    config: {
      type: "string",
      description: "Path of the JSONC config file",
      default: CONFIG_FILE,
    },
    root: {
      type: "string",
      description: "Directory to read modules from (overrides the config)",
    },
    out: {
      type: "string",
      description: "Directory to write compiled modules to (overrides the config)",
    },
  },
  async run({ args }) {
    const config = await loadConfig(args.config);
    const root = path.resolve(args.root ?? config.root);
    const outDir = path.resolve(args.out ?? config.out);

    console.log("Reading files...");

    if (!(await fsExtra.pathExists(root))) {
      throw new Error(`${root} does not exist!`);
    }

    const project = await Project.load(root, config);
    const compiled = await project.compileAll();
    const eslint = config.lint ? createLinter(config.environment) : undefined;

    for (const mod of compiled) {
      for (const warning of mod.warnings) {
        console.warn(`${mod.module.path}: ${warning}`);
      }

      let code = mod.code;
      if (config.format) {
        code = await formatCode(code);
      }
      if (eslint) {
        for (const message of await lintCode(eslint, code)) {
          console.warn(`${mod.outputPath}: ${unmangle(message)}`);
        }
      }

      if (await writeModule(outDir, mod, code)) {
        console.log(`>> Generating ${mod.outputPath}${mod.isAsync ? " (async)" : ""}...`);
      }
    }

    console.log(`Compiled ${compiled.length} modules into ${outDir}`);
  },
});

if (require.main === module) {
  runMain(main).catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
