export { ImportAnnotations } from "./annotations";
export { AsyncModule, asyncModuleOptions } from "./asyncModule";
export type { AsyncModuleInit, AsyncModuleOptions } from "./asyncModule";
export { DEFAULT_EXPORT, wrapAsyncModuleBody } from "./asyncWrapper";
export { TaskCache } from "./cache";
export type {
  AsyncModuleInfo,
  ChunkItem,
  ChunkingContext,
  ChunkingPolicy,
  Environment,
} from "./chunking";
export { applyCodeGenerations } from "./codeGen";
export type { CodeGeneration, ProgramVisitor } from "./codeGen";
export { CONFIG_FILE, defaultConfig, loadConfig, resolveConfig } from "./config";
export type { Config } from "./config";
export { ConfigError, UnsupportedFeatureError } from "./errors";
export { EsmAssetReference } from "./esmAssetReference";
export type { EsmAssetReferenceOptions } from "./esmAssetReference";
export { default as EsmParser } from "./esmParser";
export type { ImportRecord, ModuleAnalysis } from "./esmParser";
export { ESM_HOISTING_LOCATION, insertHoistedStmt, isHoistingMarker } from "./hoisting";
export { mangle, unmangle } from "./magicIdentifier";
export { isEcmascriptChunkPlaceable } from "./module";
export type { default as Module, EcmascriptChunkPlaceable } from "./module";
export { default as Project, AssetModule, ProjectModule } from "./project";
export type { CompiledModule, ProjectOptions } from "./project";
export {
  NO_ASSET,
  identFromPlaceable,
  referencedAssetFromResolveResult,
  referencedAssetIdent,
} from "./referencedAsset";
export type { ReferencedAsset } from "./referencedAsset";
export { ModuleResolveResult, isUnresolvable, parseRequest } from "./resolve";
export type {
  IssueSource,
  ModuleResolveResultItem,
  ReferenceSubType,
  Request,
  ResolveOptions,
  ResolveOrigin,
} from "./resolve";
export { RUNTIME, throwModuleNotFoundExpr } from "./runtime";
export type { ModuleId } from "./runtime";
