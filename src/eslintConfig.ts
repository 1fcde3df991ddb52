import type { Linter } from "eslint";
import type { EnvironmentName } from "./config";
import { RUNTIME } from "./runtime";

/**
 * Checks emitted modules: every free name must be a host global or part of
 * the chunk runtime, and hoisted bindings must not collide.
 */
export default function eslintConfig(environment: EnvironmentName): Linter.Config {
  const globals: Record<string, "readonly"> = {};
  for (const name of Object.values(RUNTIME)) {
    globals[name] = "readonly";
  }

  return {
    env: {
      es2022: true,
      node: environment === "node",
      browser: environment === "browser",
    },
    // espree stops at ES2022 here and cannot read import attributes
    parser: require.resolve("@babel/eslint-parser"),
    parserOptions: {
      ecmaVersion: 2022,
      sourceType: "module",
      requireConfigFile: false,
      babelOptions: {
        babelrc: false,
        configFile: false,
        parserOpts: {
          plugins: ["jsx", "importAttributes"],
        },
      },
    },
    globals,
    rules: {
      "no-undef": "error",
      "no-redeclare": "error",
      "no-dupe-keys": "error",
      "no-import-assign": "error",
      "no-console": "off",
    },
  };
}
