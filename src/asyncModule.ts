import type { AsyncModuleInfo, ChunkingContext } from "./chunking";
import type { CodeGeneration, ProgramVisitor } from "./codeGen";
import type { EsmAssetReference } from "./esmAssetReference";
import { insertHoistedStmt } from "./hoisting";
import type { EcmascriptChunkPlaceable } from "./module";
import { referencedAssetIdent } from "./referencedAsset";
import { asyncDependenciesStmts } from "./runtime";

/** Options for the async wrapper of a chunk item. */
export interface AsyncModuleOptions {
  hasTopLevelAwait: boolean;
}

export interface AsyncModuleInit {
  placeable: EcmascriptChunkPlaceable;
  references: Iterable<EsmAssetReference>;
  hasTopLevelAwait: boolean;
  importExternals: boolean;
}

/**
 * Decides whether an ECMAScript module is async: it has a top-level await,
 * imports an external as ESM, or depends on an async module.
 */
export class AsyncModule {
  readonly placeable: EcmascriptChunkPlaceable;
  /** Distinct references in first-seen order. */
  readonly references: readonly EsmAssetReference[];
  readonly hasTopLevelAwait: boolean;
  readonly importExternals: boolean;

  constructor(init: AsyncModuleInit) {
    this.placeable = init.placeable;
    const seen = new Set<string>();
    const references: EsmAssetReference[] = [];
    for (const reference of init.references) {
      const key = reference.key();
      if (seen.has(key)) continue;
      seen.add(key);
      references.push(reference);
    }
    this.references = references;
    this.hasTopLevelAwait = init.hasTopLevelAwait;
    this.importExternals = init.importExternals;
  }

  async getAsyncIdents(
    chunkingContext: ChunkingContext,
    asyncModuleInfo: AsyncModuleInfo,
  ): Promise<Set<string>> {
    const idents = await Promise.all(
      this.references.map(async (reference) => {
        const asset = await reference.getReferencedAsset();
        switch (asset.type) {
          case "external":
            return this.importExternals ? referencedAssetIdent(asset) : undefined;
          case "some": {
            const item = await chunkingContext.chunkItem(asset.module);
            return asyncModuleInfo.referencedAsyncModules.has(item)
              ? referencedAssetIdent(asset)
              : undefined;
          }
          case "none":
            return undefined;
        }
      }),
    );

    // Set keeps the first occurrence, in reference order
    const result = new Set<string>();
    for (const ident of idents) {
      if (ident !== undefined) result.add(ident);
    }
    return result;
  }

  async isSelfAsync(): Promise<boolean> {
    if (this.hasTopLevelAwait) {
      return true;
    }
    if (!this.importExternals) {
      return false;
    }
    const assets = await Promise.all(this.references.map((r) => r.getReferencedAsset()));
    return assets.some((asset) => asset.type === "external");
  }

  /**
   * Options for the async wrapper, or `undefined` when the caller did not ask
   * for async modules in this compilation.
   */
  moduleOptions(asyncModuleInfo?: AsyncModuleInfo): AsyncModuleOptions | undefined {
    if (asyncModuleInfo === undefined) {
      return undefined;
    }
    // only the module's own await; ESM externals do not count here
    return { hasTopLevelAwait: this.hasTopLevelAwait };
  }

  async codeGeneration(
    chunkingContext: ChunkingContext,
    asyncModuleInfo?: AsyncModuleInfo,
  ): Promise<CodeGeneration> {
    const visitors: ProgramVisitor[] = [];

    if (asyncModuleInfo !== undefined) {
      const asyncIdents = await this.getAsyncIdents(chunkingContext, asyncModuleInfo);
      if (asyncIdents.size > 0) {
        const idents = [...asyncIdents];
        visitors.push((program) => {
          for (const stmt of asyncDependenciesStmts(idents)) {
            insertHoistedStmt(program, stmt);
          }
        });
      }
    }

    return { visitors };
  }
}

/** Wrapper options for a module that may not have an async descriptor at all. */
export function asyncModuleOptions(
  asyncModule: AsyncModule | undefined,
  asyncModuleInfo?: AsyncModuleInfo,
): AsyncModuleOptions | undefined {
  return asyncModule?.moduleOptions(asyncModuleInfo);
}
