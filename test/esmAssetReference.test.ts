import * as t from "@babel/types";
import { describe, expect, it } from "vitest";
import { ImportAnnotations } from "../src/annotations";
import { applyCodeGenerations } from "../src/codeGen";
import { ConfigError, UnsupportedFeatureError } from "../src/errors";
import { EsmAssetReference } from "../src/esmAssetReference";
import { ESM_HOISTING_LOCATION } from "../src/hoisting";
import { ModuleResolveResult, parseRequest } from "../src/resolve";
import { throwModuleNotFoundExpr } from "../src/runtime";
import {
  FakeAsset,
  FakeChunkingContext,
  FakeModule,
  emptyProgram,
  fakeOrigin,
  print,
  type ResolveCall,
} from "./helpers";

const a = new FakeModule("a");

const results: Record<string, ModuleResolveResult> = {
  "./a": ModuleResolveResult.module(a),
  fs: ModuleResolveResult.external("fs"),
  fsevents: ModuleResolveResult.ignored(),
  "./styles.css": ModuleResolveResult.module(new FakeAsset("styles.css")),
};

function reference(
  specifier: string,
  annotations: Record<string, string> = {},
  importExternals = false,
  calls: ResolveCall[] = [],
) {
  return new EsmAssetReference({
    origin: fakeOrigin(results, calls),
    request: parseRequest(specifier),
    annotations: new ImportAnnotations(Object.entries(annotations)),
    importExternals,
  });
}

async function generate(ref: EsmAssetReference, context = new FakeChunkingContext()) {
  const generation = await ref.codeGeneration(context);
  const program = emptyProgram();
  applyCodeGenerations(program, [generation]);
  return { generation, program };
}

describe("EsmAssetReference.chunkingType", () => {
  it("defaults to parallel", () => {
    expect(reference("./a").chunkingType()).toBe("parallel-inherit-async");
    expect(reference("./a", { "turbopack-chunking-type": "parallel" }).chunkingType()).toBe(
      "parallel-inherit-async",
    );
  });

  it("excludes references annotated with none", () => {
    expect(reference("./a", { "turbopack-chunking-type": "none" }).chunkingType()).toBe("excluded");
  });

  it("rejects unknown values and names them", () => {
    const ref = reference("./a", { "turbopack-chunking-type": "bogus" });
    expect(() => ref.chunkingType()).toThrow(ConfigError);
    expect(() => ref.chunkingType()).toThrow("unknown chunking_type: bogus");
    try {
      ref.chunkingType();
    } catch (err) {
      expect(err instanceof ConfigError && err.value).toBe("bogus");
    }
  });
});

describe("EsmAssetReference.resolveReference", () => {
  it("resolves through the transition named by the annotations", async () => {
    const calls: ResolveCall[] = [];
    await reference("./a", { "turbopack-transition": "client" }, false, calls).resolveReference();
    expect(calls).toHaveLength(1);
    expect(calls[0].transition).toBe("client");
    expect(calls[0].options.subType).toEqual({ type: "import" });
  });

  it("asks for a module part when an export name is set", async () => {
    const calls: ResolveCall[] = [];
    const ref = new EsmAssetReference({
      origin: fakeOrigin(results, calls),
      request: parseRequest("./a"),
      exportName: "b",
      issueSource: { path: "entry.js", line: 3, column: 0 },
    });
    await ref.resolveReference();
    expect(calls[0].options).toEqual({
      subType: { type: "import-part", exportName: "b" },
      issueSource: { path: "entry.js", line: 3, column: 0 },
    });
  });

  it("classifies and names the target", async () => {
    const [asset, ident] = await reference("fs").classify();
    expect(asset).toEqual({ type: "external", request: "fs" });
    expect(ident).toBe("__TURBOPACK__external__fs__");
  });
});

describe("EsmAssetReference.codeGeneration", () => {
  it("imports internal modules by chunk item id", async () => {
    const { program } = await generate(reference("./a"), new FakeChunkingContext({ a: 7 }));
    expect(program.body.map(print)).toEqual([
      "var __TURBOPACK__imported__module__a__ = __turbopack_import__(7);",
      `"${ESM_HOISTING_LOCATION}";`,
    ]);
  });

  it("encodes string ids as string literals", async () => {
    const { program } = await generate(reference("./a"), new FakeChunkingContext({ a: "[project]/a.js" }));
    expect(print(program.body[0])).toBe(
      'var __TURBOPACK__imported__module__a__ = __turbopack_import__("[project]/a.js");',
    );
  });

  it("requires externals by default", async () => {
    const { program } = await generate(reference("fs"));
    expect(print(program.body[0])).toBe(
      'var __TURBOPACK__external__fs__ = __turbopack_external_require__("fs", true);',
    );
  });

  it("imports externals when import externals is on", async () => {
    const { program } = await generate(reference("fs", {}, true));
    expect(print(program.body[0])).toBe(
      'var __TURBOPACK__external__fs__ = __turbopack_external_import__("fs");',
    );
  });

  it("fails for externals when the environment cannot load them", async () => {
    const context = new FakeChunkingContext({}, false);
    await expect(reference("fs").codeGeneration(context)).rejects.toThrow(UnsupportedFeatureError);
    await expect(reference("fs").codeGeneration(context)).rejects.toThrow(
      "the chunking context does not support external modules (request: fs)",
    );
  });

  it.each<Record<string, string>>([{}, { "turbopack-chunking-type": "none" }])(
    "throws at run time for unresolvable requests (%o)",
    async (annotations) => {
      const { generation, program } = await generate(reference("./missing", annotations));
      expect(generation.visitors).toHaveLength(1);
      expect(program.body).toHaveLength(2);
      expect(
        t.isNodesEquivalent(
          program.body[0],
          t.expressionStatement(throwModuleNotFoundExpr("./missing")),
        ),
      ).toBe(true);
      expect(print(program.body[0])).toContain(`new Error("Cannot find module './missing'")`);
    },
  );

  it("generates nothing for excluded references", async () => {
    const { generation } = await generate(reference("./a", { "turbopack-chunking-type": "none" }));
    expect(generation.visitors).toHaveLength(0);
  });

  it("generates nothing for ignored or non-chunkable targets", async () => {
    expect((await generate(reference("fsevents"))).generation.visitors).toHaveLength(0);
    expect((await generate(reference("./styles.css"))).generation.visitors).toHaveLength(0);
  });
});

describe("EsmAssetReference identity", () => {
  it("has equal keys for equal fields", () => {
    expect(reference("./a").key()).toBe(reference("./a").key());
    expect(reference("./a").key()).not.toBe(reference("./a", {}, true).key());
  });

  it("prints the request and annotations", () => {
    expect(reference("./a").toString()).toBe("import ./a {}");
    expect(reference("./a", { "turbopack-chunking-type": "none" }).toString()).toBe(
      "import ./a { turbopack-chunking-type: none }",
    );
  });
});
