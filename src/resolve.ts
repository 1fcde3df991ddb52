import type Module from "./module";

export type RequestKind = "relative" | "absolute" | "module" | "uri";

/** An import specifier as written in the source. */
export interface Request {
  readonly specifier: string;
  readonly kind: RequestKind;
}

export function parseRequest(specifier: string): Request {
  let kind: RequestKind = "module";
  if (specifier.startsWith("./") || specifier.startsWith("../") || specifier === "." || specifier === "..") {
    kind = "relative";
  } else if (specifier.startsWith("/")) {
    kind = "absolute";
  } else if (/^[a-z][a-z0-9+.-]*:/i.test(specifier)) {
    kind = "uri";
  }
  return { specifier, kind };
}

export type ModuleResolveResultItem =
  | { readonly type: "module"; readonly module: Module }
  | { readonly type: "external"; readonly request: string }
  | { readonly type: "ignore" }
  | { readonly type: "unresolvable" };

/** Resolver answer: entries keyed by request key, in resolver order. */
export interface ModuleResolveResult {
  readonly primary: ReadonlyArray<readonly [key: string, item: ModuleResolveResultItem]>;
}

export const ModuleResolveResult = {
  module: (module: Module, key = ""): ModuleResolveResult => ({
    primary: [[key, { type: "module", module }]],
  }),
  external: (request: string, key = ""): ModuleResolveResult => ({
    primary: [[key, { type: "external", request }]],
  }),
  ignored: (key = ""): ModuleResolveResult => ({ primary: [[key, { type: "ignore" }]] }),
  unresolvable: (): ModuleResolveResult => ({ primary: [] }),
};

export function isUnresolvable(result: ModuleResolveResult): boolean {
  return result.primary.every(([, item]) => item.type === "unresolvable");
}

export type ReferenceSubType =
  | { readonly type: "import" }
  | { readonly type: "import-part"; readonly exportName: string };

/** Where in a source file a reference was written (1-based line, 0-based column). */
export interface IssueSource {
  readonly path: string;
  readonly line: number;
  readonly column: number;
}

export interface ResolveOptions {
  readonly subType: ReferenceSubType;
  readonly issueSource?: IssueSource;
}

/** The module a request is resolved from, plus the resolver to use. */
export interface ResolveOrigin {
  readonly originPath: string;
  readonly transition?: string;
  withTransition(transition: string): ResolveOrigin;
  resolveAsset(request: Request, options: ResolveOptions): Promise<ModuleResolveResult>;
}
