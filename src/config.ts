import fsExtra from "fs-extra";
import { ConfigError } from "./errors";

export type EnvironmentName = "node" | "browser";
export type ModuleIdStrategy = "named" | "numeric";

export interface Config {
  /** Directory scanned for modules. */
  root: string;
  /** Directory the compiled modules are written to. */
  out: string;
  /** Bare specifiers left to the host's module system. */
  externals: string[];
  /** Bare specifiers resolved to nothing. */
  ignore: string[];
  /** Load externals with `import()` semantics instead of `require`. */
  importExternals: boolean;
  environment: EnvironmentName;
  moduleIds: ModuleIdStrategy;
  /** Compute async modules and wrap them; off means no wrapping at all. */
  asyncModules: boolean;
  format: boolean;
  lint: boolean;
}

export const CONFIG_FILE = "esm-codegen.jsonc";

export const defaultConfig = (): Config => ({
  root: "src",
  out: "out",
  externals: [],
  ignore: [],
  importExternals: false,
  environment: "node",
  moduleIds: "named",
  asyncModules: true,
  format: true,
  lint: true,
});

/** Removes line and block comments that are not inside a string literal. */
export function stripJsonComments(raw: string): string {
  let out = "";
  let i = 0;
  while (i < raw.length) {
    const ch = raw[i];
    if (ch === '"') {
      let end = i + 1;
      while (end < raw.length && raw[end] !== '"') {
        end += raw[end] === "\\" ? 2 : 1;
      }
      out += raw.slice(i, end + 1);
      i = end + 1;
    } else if (raw.startsWith("//", i)) {
      const eol = raw.indexOf("\n", i);
      i = eol === -1 ? raw.length : eol;
    } else if (raw.startsWith("/*", i)) {
      const close = raw.indexOf("*/", i + 2);
      i = close === -1 ? raw.length : close + 2;
    } else {
      out += ch;
      i++;
    }
  }
  return out;
}

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

function expectString(key: string, v: unknown): string {
  if (typeof v !== "string") throw new ConfigError(`"${key}" must be a string`, key);
  return v;
}

function expectBoolean(key: string, v: unknown): boolean {
  if (typeof v !== "boolean") throw new ConfigError(`"${key}" must be a boolean`, key);
  return v;
}

function expectStrings(key: string, v: unknown): string[] {
  if (!Array.isArray(v) || !v.every((s): s is string => typeof s === "string")) {
    throw new ConfigError(`"${key}" must be an array of strings`, key);
  }
  return v;
}

function expectOneOf<T extends string>(key: string, v: unknown, allowed: readonly T[]): T {
  const found = allowed.find((a) => a === v);
  if (found === undefined) {
    throw new ConfigError(`"${key}" must be one of ${allowed.join(", ")}`, key);
  }
  return found;
}

/** Checks a parsed config object and fills in defaults for missing keys. */
export function resolveConfig(raw: unknown): Config {
  if (!isRecord(raw)) throw new ConfigError("config must be an object", "");
  const config = defaultConfig();

  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case "root":
      case "out":
        config[key] = expectString(key, value);
        break;
      case "externals":
      case "ignore":
        config[key] = expectStrings(key, value);
        break;
      case "importExternals":
      case "asyncModules":
      case "format":
      case "lint":
        config[key] = expectBoolean(key, value);
        break;
      case "environment":
        config.environment = expectOneOf(key, value, ["node", "browser"] as const);
        break;
      case "moduleIds":
        config.moduleIds = expectOneOf(key, value, ["named", "numeric"] as const);
        break;
      default:
        throw new ConfigError(`unknown config key "${key}"`, key);
    }
  }
  return config;
}

export async function loadConfig(filePath: string): Promise<Config> {
  if (!(await fsExtra.pathExists(filePath))) {
    return defaultConfig();
  }
  const raw = await fsExtra.readFile(filePath, "utf8");
  return resolveConfig(JSON.parse(stripJsonComments(raw)));
}
