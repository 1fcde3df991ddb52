import type { EcmascriptChunkPlaceable } from "./module";
import type { ModuleId } from "./runtime";

/** How an import reference takes part in chunking. */
export type ChunkingPolicy = "parallel-inherit-async" | "excluded";

/** A module materialized for one chunking context. */
export interface ChunkItem {
  readonly module: EcmascriptChunkPlaceable;
}

export interface Environment {
  /** Whether chunks may load unbundled modules through the host's `require`. */
  supportsCommonJsExternals(): Promise<boolean>;
}

export interface ChunkingContext {
  environment(): Environment;
  /** Must return the same item for the same module. */
  chunkItem(module: EcmascriptChunkPlaceable): Promise<ChunkItem>;
  chunkItemId(item: ChunkItem): Promise<ModuleId>;
}

/** Graph-wide result of the async analysis, computed by the caller. */
export interface AsyncModuleInfo {
  readonly referencedAsyncModules: ReadonlySet<ChunkItem>;
}
