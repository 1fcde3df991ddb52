import { mangle } from "./magicIdentifier";
import { isEcmascriptChunkPlaceable, type EcmascriptChunkPlaceable } from "./module";
import type { ModuleResolveResult } from "./resolve";

/** What a static import points at, as far as code generation cares. */
export type ReferencedAsset =
  | { readonly type: "some"; readonly module: EcmascriptChunkPlaceable }
  | { readonly type: "external"; readonly request: string }
  | { readonly type: "none" };

export const NO_ASSET: ReferencedAsset = { type: "none" };

/**
 * Picks the first entry of `result` that is an external or a chunkable
 * ECMAScript module. Ignored and non-chunkable entries are skipped.
 */
// TODO: entries after the first match are dropped; multi-keyed results need
// one referenced asset per key.
export function referencedAssetFromResolveResult(result: ModuleResolveResult): ReferencedAsset {
  for (const [, item] of result.primary) {
    switch (item.type) {
      case "external":
        return { type: "external", request: item.request };
      case "module":
        if (isEcmascriptChunkPlaceable(item.module)) {
          return { type: "some", module: item.module };
        }
        break;
      case "ignore":
      case "unresolvable":
        break;
    }
  }
  return NO_ASSET;
}

export function identFromPlaceable(module: EcmascriptChunkPlaceable): string {
  return mangle(`imported module ${module.ident()}`);
}

/** The synthetic binding that holds the namespace of `asset`. */
export function referencedAssetIdent(asset: ReferencedAsset): string | undefined {
  switch (asset.type) {
    case "some":
      return identFromPlaceable(asset.module);
    case "external":
      return mangle(`external ${asset.request}`);
    case "none":
      return undefined;
  }
}
