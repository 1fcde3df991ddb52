import generator from "@babel/generator";
import * as t from "@babel/types";
import type { ChunkItem, ChunkingContext, Environment } from "../src/chunking";
import type Module from "../src/module";
import type { EcmascriptChunkPlaceable } from "../src/module";
import {
  ModuleResolveResult,
  type Request,
  type ResolveOptions,
  type ResolveOrigin,
} from "../src/resolve";
import type { ModuleId } from "../src/runtime";

export class FakeModule implements EcmascriptChunkPlaceable {
  readonly type = "ecmascript";

  constructor(private readonly name: string) {}

  ident(): string {
    return this.name;
  }
}

export class FakeAsset implements Module {
  readonly type = "asset";

  constructor(private readonly name: string) {}

  ident(): string {
    return this.name;
  }
}

export interface ResolveCall {
  transition?: string;
  request: Request;
  options: ResolveOptions;
}

/** Origin answering from a fixed table; unknown requests are unresolvable. */
export function fakeOrigin(
  results: Record<string, ModuleResolveResult>,
  calls: ResolveCall[] = [],
  transition?: string,
): ResolveOrigin {
  return {
    originPath: "entry.js",
    transition,
    withTransition: (name) => fakeOrigin(results, calls, name),
    resolveAsset: async (request, options) => {
      calls.push({ transition, request, options });
      return results[request.specifier] ?? ModuleResolveResult.unresolvable();
    },
  };
}

export class FakeChunkingContext implements ChunkingContext {
  private readonly items = new Map<EcmascriptChunkPlaceable, ChunkItem>();

  constructor(
    private readonly ids: Record<string, ModuleId> = {},
    private readonly supportsExternals = true,
  ) {}

  environment(): Environment {
    return { supportsCommonJsExternals: async () => this.supportsExternals };
  }

  async chunkItem(module: EcmascriptChunkPlaceable): Promise<ChunkItem> {
    let item = this.items.get(module);
    if (!item) {
      item = { module };
      this.items.set(module, item);
    }
    return item;
  }

  async chunkItemId(item: ChunkItem): Promise<ModuleId> {
    return this.ids[item.module.ident()] ?? item.module.ident();
  }
}

export const emptyProgram = (sourceType: "module" | "script" = "module") =>
  t.program([], [], sourceType);

export const print = (node: t.Node) => generator(node).code;
