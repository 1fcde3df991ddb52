export default interface Module {
  /** What kind of source this module was created from. */
  readonly type: "ecmascript" | "asset";
  /** Fully qualified identity, e.g. `[project]/src/a.js (ecmascript)`. */
  ident(): string;
}

/** A module that can be placed into an ECMAScript chunk. */
export interface EcmascriptChunkPlaceable extends Module {
  readonly type: "ecmascript";
}

export function isEcmascriptChunkPlaceable(module: Module): module is EcmascriptChunkPlaceable {
  return module.type === "ecmascript";
}
