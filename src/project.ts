import generator from "@babel/generator";
import fsExtra from "fs-extra";
import path from "path";
import { AsyncModule, asyncModuleOptions } from "./asyncModule";
import { wrapAsyncModuleBody } from "./asyncWrapper";
import { TaskCache } from "./cache";
import type { AsyncModuleInfo, ChunkItem, ChunkingContext, Environment } from "./chunking";
import { applyCodeGenerations, type CodeGeneration } from "./codeGen";
import type { Config } from "./config";
import { EsmAssetReference } from "./esmAssetReference";
import EsmParser, { isEcmascriptFile, type ModuleAnalysis } from "./esmParser";
import type Module from "./module";
import type { EcmascriptChunkPlaceable } from "./module";
import { referencedAssetFromResolveResult } from "./referencedAsset";
import {
  ModuleResolveResult,
  isUnresolvable,
  parseRequest,
  type Request,
  type ResolveOrigin,
} from "./resolve";
import type { ModuleId } from "./runtime";

const ASSET_EXTENSIONS = [".json", ".css"];
const RESOLVE_SUFFIXES = ["", ".js", ".mjs", ".jsx", "/index.js"];

export type ProjectOptions = Pick<
  Config,
  "externals" | "ignore" | "importExternals" | "environment" | "moduleIds" | "asyncModules"
>;

/** A source file of the project, optionally compiled under a transition. */
export class ProjectModule implements EcmascriptChunkPlaceable {
  readonly type = "ecmascript";

  constructor(
    readonly path: string,
    readonly transition?: string,
  ) {}

  ident(): string {
    const layer = this.transition ? `ecmascript, ${this.transition}` : "ecmascript";
    return `[project]/${this.path} (${layer})`;
  }
}

/** A file that is resolvable but cannot be placed into an ECMAScript chunk. */
export class AssetModule implements Module {
  readonly type = "asset";

  constructor(readonly path: string) {}

  ident(): string {
    return `[project]/${this.path} (asset)`;
  }
}

export interface CompiledModule {
  module: ProjectModule;
  /** Output path relative to the out directory. */
  outputPath: string;
  code: string;
  isAsync: boolean;
  warnings: string[];
}

class ProjectEnvironment implements Environment {
  constructor(private readonly name: Config["environment"]) {}

  async supportsCommonJsExternals(): Promise<boolean> {
    return this.name === "node";
  }
}

export class ProjectChunkingContext implements ChunkingContext {
  private readonly items = new Map<EcmascriptChunkPlaceable, ChunkItem>();
  private readonly ids = new Map<ChunkItem, number>();
  private readonly env: ProjectEnvironment;

  constructor(private readonly options: Pick<Config, "environment" | "moduleIds">) {
    this.env = new ProjectEnvironment(options.environment);
  }

  environment(): Environment {
    return this.env;
  }

  async chunkItem(module: EcmascriptChunkPlaceable): Promise<ChunkItem> {
    let item = this.items.get(module);
    if (!item) {
      item = { module };
      this.items.set(module, item);
    }
    return item;
  }

  /** Fixes numeric ids in the given order; items seen later get the next free id. */
  async assignIds(modules: readonly EcmascriptChunkPlaceable[]): Promise<void> {
    for (const module of modules) {
      const item = await this.chunkItem(module);
      if (!this.ids.has(item)) this.ids.set(item, this.ids.size);
    }
  }

  async chunkItemId(item: ChunkItem): Promise<ModuleId> {
    if (this.options.moduleIds === "named") {
      return item.module.ident();
    }
    let id = this.ids.get(item);
    if (id === undefined) {
      id = this.ids.size;
      this.ids.set(item, id);
    }
    return id;
  }
}

const isPathRequest = (specifier: string) => {
  const { kind } = parseRequest(specifier);
  return kind === "relative" || kind === "absolute";
};

const packageName = (specifier: string) => {
  const parts = specifier.split("/");
  return specifier.startsWith("@") ? parts.slice(0, 2).join("/") : parts[0];
};

/**
 * A directory of ES modules with a resolver, a chunking context and the
 * graph-wide async analysis on top of the code generation core.
 */
export default class Project {
  readonly chunkingContext: ProjectChunkingContext;
  private readonly parser = new EsmParser();
  private readonly modules = new Map<string, ProjectModule>();
  private readonly assets = new Map<string, AssetModule>();
  private readonly analyses = new Map<string, ModuleAnalysis>();
  private readonly asyncModules = new Map<ProjectModule, AsyncModule>();
  private readonly resolveCache = new TaskCache<ModuleResolveResult>();

  /**
   * @param sources file contents keyed by `/`-separated path relative to the root
   */
  private readonly sources: Map<string, string>;

  constructor(
    sources: ReadonlyMap<string, string>,
    private readonly options: ProjectOptions,
  ) {
    this.sources = new Map(sources);
    this.chunkingContext = new ProjectChunkingContext(options);
  }

  static async load(root: string, options: ProjectOptions): Promise<Project> {
    const sources = new Map<string, string>();

    const walk = async (dir: string) => {
      const entries = await fsExtra.readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          if (entry.name !== "node_modules") await walk(full);
        } else if (
          isEcmascriptFile(entry.name) ||
          ASSET_EXTENSIONS.includes(path.extname(entry.name))
        ) {
          const rel = path.relative(root, full).split(path.sep).join("/");
          sources.set(rel, await fsExtra.readFile(full, "utf-8"));
        }
      }
    };
    await walk(root);

    return new Project(sources, options);
  }

  /**
   * Replaces, adds or (with `undefined`) removes a source file. Cached
   * analyses of the file are dropped, and so are cached resolutions of path
   * requests when the set of files changes.
   */
  setSource(filePath: string, code: string | undefined): void {
    const existed = this.sources.has(filePath);
    if (code === undefined) {
      this.sources.delete(filePath);
    } else {
      this.sources.set(filePath, code);
    }

    this.analyses.delete(filePath);
    for (const module of [...this.asyncModules.keys()]) {
      if (module.path === filePath) this.asyncModules.delete(module);
    }
    if (existed !== (code !== undefined)) {
      this.resolveCache.invalidate((key) => isPathRequest(key.split("\0")[2] ?? ""));
    }
  }

  module(filePath: string, transition?: string): ProjectModule {
    const key = `${filePath}\0${transition ?? ""}`;
    let module = this.modules.get(key);
    if (!module) {
      module = new ProjectModule(filePath, transition);
      this.modules.set(key, module);
    }
    return module;
  }

  private asset(filePath: string): AssetModule {
    let asset = this.assets.get(filePath);
    if (!asset) {
      asset = new AssetModule(filePath);
      this.assets.set(filePath, asset);
    }
    return asset;
  }

  private analyze(filePath: string): ModuleAnalysis {
    let analysis = this.analyses.get(filePath);
    if (!analysis) {
      analysis = this.parser.parseSource(this.source(filePath), filePath);
      this.analyses.set(filePath, analysis);
    }
    return analysis;
  }

  private source(filePath: string): string {
    const code = this.sources.get(filePath);
    if (code === undefined) throw new Error(`no source for ${filePath}`);
    return code;
  }

  origin(module: ProjectModule): ResolveOrigin {
    return this.originAt(module.path, module.transition);
  }

  private originAt(originPath: string, transition?: string): ResolveOrigin {
    return {
      originPath,
      transition,
      withTransition: (name) => this.originAt(originPath, name),
      resolveAsset: (request, options) => {
        const subType =
          options.subType.type === "import-part" ? `part ${options.subType.exportName}` : "import";
        const key = [originPath, transition ?? "", request.specifier, subType].join("\0");
        return this.resolveCache.get(key, async () => this.resolve(originPath, transition, request));
      },
    };
  }

  private resolve(
    originPath: string,
    transition: string | undefined,
    request: Request,
  ): ModuleResolveResult {
    if (request.kind === "relative" || request.kind === "absolute") {
      const base =
        request.kind === "absolute"
          ? path.posix.normalize(request.specifier.slice(1))
          : path.posix.join(path.posix.dirname(originPath), request.specifier);
      for (const suffix of RESOLVE_SUFFIXES) {
        const candidate = base + suffix;
        if (!this.sources.has(candidate)) continue;
        return isEcmascriptFile(candidate)
          ? ModuleResolveResult.module(this.module(candidate, transition))
          : ModuleResolveResult.module(this.asset(candidate));
      }
      return ModuleResolveResult.unresolvable();
    }

    const name = packageName(request.specifier);
    const { externals, ignore } = this.options;
    if (externals.includes(request.specifier) || externals.includes(name)) {
      return ModuleResolveResult.external(request.specifier);
    }
    if (ignore.includes(request.specifier) || ignore.includes(name)) {
      return ModuleResolveResult.ignored();
    }
    return ModuleResolveResult.unresolvable();
  }

  references(module: ProjectModule): EsmAssetReference[] {
    const origin = this.origin(module);
    return this.analyze(module.path).imports.map(
      (record) =>
        new EsmAssetReference({
          origin,
          request: parseRequest(record.specifier),
          annotations: record.annotations,
          exportName: record.exportName,
          issueSource: { path: module.path, line: record.line, column: record.column },
          importExternals: this.options.importExternals,
        }),
    );
  }

  asyncModule(module: ProjectModule): AsyncModule {
    let asyncModule = this.asyncModules.get(module);
    if (!asyncModule) {
      asyncModule = new AsyncModule({
        placeable: module,
        references: this.references(module),
        hasTopLevelAwait: this.analyze(module.path).hasTopLevelAwait,
        importExternals: this.options.importExternals,
      });
      this.asyncModules.set(module, asyncModule);
    }
    return asyncModule;
  }

  /** Every ECMAScript file plus the transitioned modules reachable from them, sorted by ident. */
  async discover(): Promise<ProjectModule[]> {
    const found = new Set<ProjectModule>();
    const queue = [...this.sources.keys()]
      .filter(isEcmascriptFile)
      .sort()
      .map((p) => this.module(p));

    while (queue.length > 0) {
      const module = queue.shift();
      if (!module || found.has(module)) continue;
      found.add(module);
      for (const reference of this.asyncModule(module).references) {
        const asset = await reference.getReferencedAsset();
        if (asset.type === "some" && asset.module instanceof ProjectModule) {
          queue.push(asset.module);
        }
      }
    }

    const modules = [...found].sort((a, b) =>
      a.ident() < b.ident() ? -1 : a.ident() > b.ident() ? 1 : 0,
    );
    await this.chunkingContext.assignIds(modules);
    return modules;
  }

  /**
   * Graph-wide async analysis: self-async modules, then every module with an
   * eagerly chunked reference to an async module, until nothing changes.
   */
  async computeAsyncModuleInfo(modules: readonly ProjectModule[]): Promise<AsyncModuleInfo> {
    const edges = new Map<ProjectModule, ProjectModule[]>();
    const async = new Set<ProjectModule>();

    for (const module of modules) {
      const asyncModule = this.asyncModule(module);
      if (await asyncModule.isSelfAsync()) async.add(module);

      const targets: ProjectModule[] = [];
      for (const reference of asyncModule.references) {
        if (reference.chunkingType() !== "parallel-inherit-async") continue;
        const asset = await reference.getReferencedAsset();
        if (asset.type === "some" && asset.module instanceof ProjectModule) {
          targets.push(asset.module);
        }
      }
      edges.set(module, targets);
    }

    let changed = true;
    while (changed) {
      changed = false;
      for (const module of modules) {
        if (async.has(module)) continue;
        if ((edges.get(module) ?? []).some((target) => async.has(target))) {
          async.add(module);
          changed = true;
        }
      }
    }

    const items = await Promise.all([...async].map((m) => this.chunkingContext.chunkItem(m)));
    return { referencedAsyncModules: new Set(items) };
  }

  /**
   * Splices the generated code into a fresh parse of `module` and prints it.
   * Async modules are wrapped when `asyncModuleInfo` is given.
   */
  async compile(module: ProjectModule, asyncModuleInfo?: AsyncModuleInfo): Promise<CompiledModule> {
    const { ast } = this.parser.parseSource(this.source(module.path), module.path);
    const asyncModule = this.asyncModule(module);
    const item = await this.chunkingContext.chunkItem(module);
    const isAsync = asyncModuleInfo?.referencedAsyncModules.has(item) ?? false;
    const info = isAsync ? asyncModuleInfo : undefined;

    const warnings: string[] = [];
    const generations: CodeGeneration[] = [];
    for (const reference of asyncModule.references) {
      const resolved = await reference.resolveReference();
      if (isUnresolvable(resolved)) {
        const at = reference.issueSource;
        warnings.push(
          `Cannot find module '${reference.request.specifier}'` +
            (at ? ` (${at.path}:${at.line}:${at.column})` : ""),
        );
      } else if (
        referencedAssetFromResolveResult(resolved).type === "none" &&
        reference.annotations.moduleType() === undefined &&
        !resolved.primary.some(([, item]) => item.type === "ignore")
      ) {
        warnings.push(`'${reference.request.specifier}' does not resolve to an ECMAScript module`);
      }
      generations.push(await reference.codeGeneration(this.chunkingContext));
    }
    generations.push(await asyncModule.codeGeneration(this.chunkingContext, info));
    applyCodeGenerations(ast.program, generations);

    const options = asyncModuleOptions(asyncModule, info);
    if (options) {
      ast.program.body = wrapAsyncModuleBody(ast.program.body, options.hasTopLevelAwait);
    }

    const outputPath = module.transition
      ? `${module.path}.${module.transition}.js`
      : module.path;

    return { module, outputPath, code: generator(ast).code, isAsync, warnings };
  }

  /** Discovers, analyses and compiles every module of the project. */
  async compileAll(): Promise<CompiledModule[]> {
    const modules = await this.discover();
    const info = this.options.asyncModules ? await this.computeAsyncModuleInfo(modules) : undefined;
    const compiled: CompiledModule[] = [];
    for (const module of modules) {
      compiled.push(await this.compile(module, info));
    }
    return compiled;
  }
}
