import * as t from "@babel/types";
import { ImportAnnotations } from "./annotations";
import type { ChunkingContext, ChunkingPolicy } from "./chunking";
import type { CodeGeneration, ProgramVisitor } from "./codeGen";
import { ConfigError, UnsupportedFeatureError } from "./errors";
import { insertHoistedStmt } from "./hoisting";
import {
  referencedAssetFromResolveResult,
  referencedAssetIdent,
  type ReferencedAsset,
} from "./referencedAsset";
import {
  isUnresolvable,
  type IssueSource,
  type ModuleResolveResult,
  type ReferenceSubType,
  type Request,
  type ResolveOrigin,
} from "./resolve";
import {
  externalImportStmt,
  externalRequireStmt,
  importStmt,
  throwModuleNotFoundExpr,
} from "./runtime";

export interface EsmAssetReferenceOptions {
  origin: ResolveOrigin;
  request: Request;
  annotations?: ImportAnnotations;
  issueSource?: IssueSource;
  /** Set when only one named export of the target is needed. */
  exportName?: string;
  importExternals?: boolean;
}

/** One static `import`/`export ... from` edge of a module. */
export class EsmAssetReference {
  readonly origin: ResolveOrigin;
  readonly request: Request;
  readonly annotations: ImportAnnotations;
  readonly issueSource?: IssueSource;
  readonly exportName?: string;
  readonly importExternals: boolean;

  constructor(options: EsmAssetReferenceOptions) {
    this.origin = options.origin;
    this.request = options.request;
    this.annotations = options.annotations ?? new ImportAnnotations();
    this.issueSource = options.issueSource;
    this.exportName = options.exportName;
    this.importExternals = options.importExternals ?? false;
  }

  /** Stable key over every field; equal keys mean interchangeable references. */
  key(): string {
    const source = this.issueSource
      ? `${this.issueSource.path}:${this.issueSource.line}:${this.issueSource.column}`
      : "";
    return [
      this.origin.originPath,
      this.origin.transition ?? "",
      this.request.specifier,
      this.annotations.toString(),
      this.exportName ?? "",
      source,
      String(this.importExternals),
    ].join("\0");
  }

  toString(): string {
    return `import ${this.request.specifier} ${this.annotations}`;
  }

  private getOrigin(): ResolveOrigin {
    const transition = this.annotations.transition();
    return transition ? this.origin.withTransition(transition) : this.origin;
  }

  resolveReference(): Promise<ModuleResolveResult> {
    const subType: ReferenceSubType =
      this.exportName !== undefined
        ? { type: "import-part", exportName: this.exportName }
        : { type: "import" };
    return this.getOrigin().resolveAsset(this.request, {
      subType,
      issueSource: this.issueSource,
    });
  }

  async getReferencedAsset(): Promise<ReferencedAsset> {
    return referencedAssetFromResolveResult(await this.resolveReference());
  }

  /** Classification and synthetic identifier in one call. */
  async classify(): Promise<[ReferencedAsset, string | undefined]> {
    const asset = await this.getReferencedAsset();
    return [asset, referencedAssetIdent(asset)];
  }

  chunkingType(): ChunkingPolicy {
    const chunkingType = this.annotations.chunkingType();
    switch (chunkingType) {
      case undefined:
      case "parallel":
        return "parallel-inherit-async";
      case "none":
        return "excluded";
      default:
        throw new ConfigError(`unknown chunking_type: ${chunkingType}`, chunkingType);
    }
  }

  async codeGeneration(chunkingContext: ChunkingContext): Promise<CodeGeneration> {
    const visitors: ProgramVisitor[] = [];
    const chunkingType = this.chunkingType();
    const resolved = await this.resolveReference();

    // unresolvable requests throw when the importing module is evaluated
    if (isUnresolvable(resolved)) {
      const request = this.request.specifier;
      visitors.push((program) => {
        insertHoistedStmt(program, t.expressionStatement(throwModuleNotFoundExpr(request)));
      });
      return { visitors };
    }

    if (chunkingType === "excluded") {
      return { visitors };
    }

    const asset = referencedAssetFromResolveResult(resolved);
    const ident = referencedAssetIdent(asset);
    if (ident === undefined) {
      return { visitors };
    }

    switch (asset.type) {
      case "some": {
        const item = await chunkingContext.chunkItem(asset.module);
        const id = await chunkingContext.chunkItemId(item);
        visitors.push((program) => {
          insertHoistedStmt(program, importStmt(ident, id));
        });
        break;
      }
      case "external": {
        const { request } = asset;
        if (!(await chunkingContext.environment().supportsCommonJsExternals())) {
          throw new UnsupportedFeatureError(
            `the chunking context does not support external modules (request: ${request})`,
            request,
          );
        }
        const importExternals = this.importExternals;
        visitors.push((program) => {
          insertHoistedStmt(
            program,
            importExternals
              ? externalImportStmt(ident, request)
              : externalRequireStmt(ident, request),
          );
        });
        break;
      }
      case "none":
        break;
    }

    return { visitors };
  }
}
