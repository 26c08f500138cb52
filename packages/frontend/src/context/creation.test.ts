/**
 * Tests for analysis context creation
 */

import { describe, it, afterEach } from "mocha";
import { expect } from "chai";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ok, error } from "../types/result.js";
import { createDiagnosticsCollector } from "../types/diagnostic.js";
import { getImplicitEntryUri } from "../resolver/implicit-entry.js";
import { createSourceFactory } from "../resolver/source-factory.js";
import { toFileUri } from "../resolver/scheme.js";
import type { UriResolver } from "../resolver/types.js";
import type { ConfigurationInput } from "../configuration/types.js";
import { createAnalysisContext } from "./creation.js";
import { EngineContext } from "./engine.js";
import type { AnalysisContext, EngineContextFactory } from "./types.js";

const mockInput: ConfigurationInput = {
  useMockRuntime: true,
  mockRuntime: { "rt:core": "unit A" },
};

// Nothing exists here; mock-runtime contexts must never need it
const missingCwd = "/nonexistent/unitgraph-project";

const fixedResolver = (
  name: string,
  contents: string,
  claims: (uri: string) => boolean = () => true
): UriResolver => ({
  name,
  scheme: "*",
  canResolve: claims,
  resolve: (uri) => ok({ uri, contents }),
});

describe("createAnalysisContext", () => {
  const createdDirs: string[] = [];

  afterEach(() => {
    for (const dir of createdDirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  const createTempDir = (): string => {
    const dir = mkdtempSync(join(tmpdir(), "unitgraph-context-"));
    createdDirs.push(dir);
    return dir;
  };

  it("should serve mock runtime units and fail for absent ones", () => {
    const result = createAnalysisContext(mockInput, { cwd: missingCwd });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    const context = result.value;

    const core = context.resolve("rt:core");
    expect(core.ok && core.value.contents).to.equal("unit A");

    const missing = context.resolve("rt:missing");
    expect(missing.ok).to.equal(false);
    if (missing.ok) return;
    expect(missing.error.code).to.equal("UG2001");
  });

  it("should compose runtime, file and package resolvers by default", () => {
    const result = createAnalysisContext(mockInput, { cwd: missingCwd });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.sourceFactory?.describe()).to.deep.equal([
      "mock-runtime",
      "file",
      "package",
    ]);
  });

  it("should serve the implicit entry document ahead of the file resolver", () => {
    const result = createAnalysisContext(
      { ...mockInput, useImplicitEntry: true, entryPointFile: "main.src" },
      { cwd: "/proj" }
    );

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    const context = result.value;
    expect(context.sourceFactory?.describe()).to.deep.equal([
      "mock-runtime",
      "implicit-entry",
      "file",
      "package",
    ]);

    const entry = context.resolve(getImplicitEntryUri("/proj"));
    expect(entry.ok).to.equal(true);
    if (!entry.ok) return;
    expect(
      entry.value.contents.split('src="/proj/main.src"').length - 1
    ).to.equal(1);
  });

  it("should read package units from the first root that holds them", () => {
    const first = createTempDir();
    const second = createTempDir();
    mkdirSync(join(first, "util"));
    mkdirSync(join(second, "util"));
    writeFileSync(join(first, "util", "a.ts"), "from first");
    writeFileSync(join(second, "util", "a.ts"), "from second");
    writeFileSync(join(second, "util", "b.ts"), "only second");

    const result = createAnalysisContext(
      { ...mockInput, useMultiRoot: true, packageRoots: [first, second] },
      { cwd: missingCwd }
    );

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    const a = result.value.resolve("pkg:util/a.ts");
    const b = result.value.resolve("pkg:util/b.ts");
    expect(a.ok && a.value.contents).to.equal("from first");
    expect(b.ok && b.value.contents).to.equal("only second");
    expect(result.value.sourceFactory?.describe()).to.deep.equal([
      "mock-runtime",
      "file",
      "multi-package",
    ]);
  });

  it("should read file: units from disk", () => {
    const dir = createTempDir();
    const filePath = join(dir, "main.ts");
    writeFileSync(filePath, "export const x = 1;\n");

    const result = createAnalysisContext(mockInput, { cwd: dir });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    const source = result.value.resolve(toFileUri(filePath));
    expect(source.ok && source.value.contents).to.equal(
      "export const x = 1;\n"
    );
  });

  it("should keep runtime identifiers away from a catch-all file resolver", () => {
    const result = createAnalysisContext(mockInput, {
      cwd: missingCwd,
      fileResolvers: [fixedResolver("catch-all", "caught")],
    });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    const context = result.value;

    expect(context.sourceFactory?.describe()).to.deep.equal([
      "mock-runtime",
      "catch-all",
    ]);
    const core = context.resolve("rt:core");
    expect(core.ok && core.value.contents).to.equal("unit A");

    const missing = context.resolve("rt:missing");
    expect(missing.ok).to.equal(false);

    const other = context.resolve("file:///proj/a.ts");
    expect(other.ok && other.value.contents).to.equal("caught");
  });

  it("should keep the implicit entry in front of replacement file resolvers", () => {
    const result = createAnalysisContext(
      {
        ...mockInput,
        useImplicitEntry: true,
        entryPointFile: "/proj/main.src",
      },
      {
        cwd: "/proj",
        fileResolvers: [
          fixedResolver("memory", "m", (uri) => uri.startsWith("file:")),
        ],
      }
    );

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.sourceFactory?.describe()).to.deep.equal([
      "mock-runtime",
      "implicit-entry",
      "memory",
    ]);
    const entry = result.value.resolve(getImplicitEntryUri("/proj"));
    expect(entry.ok && entry.value.contents).to.equal(
      '<body><script type="module" src="/proj/main.src"></script></body>'
    );
  });

  it("should honor an explicitly supplied runtime resolver", () => {
    const custom = fixedResolver("custom-runtime", "custom unit", (uri) =>
      uri.startsWith("rt:")
    );

    const real = createAnalysisContext(
      { runtimePath: "/nonexistent/sdk" },
      { cwd: missingCwd, runtimeResolver: custom }
    );
    const mocked = createAnalysisContext(mockInput, {
      cwd: missingCwd,
      runtimeResolver: custom,
    });

    expect(real.ok && mocked.ok).to.equal(true);
    if (!real.ok || !mocked.ok) return;
    expect(real.value.sourceFactory?.describe()[0]).to.equal("custom-runtime");
    expect(mocked.value.sourceFactory?.describe()[0]).to.equal(
      "custom-runtime"
    );

    const core = mocked.value.resolve("rt:core");
    expect(core.ok && core.value.contents).to.equal("custom unit");
  });

  it("should build independent but equivalent contexts from the same input", () => {
    const first = createAnalysisContext(mockInput, { cwd: missingCwd });
    const second = createAnalysisContext(mockInput, { cwd: missingCwd });

    expect(first.ok && second.ok).to.equal(true);
    if (!first.ok || !second.ok) return;
    expect(first.value).to.not.equal(second.value);
    expect(first.value.sourceFactory?.describe()).to.deep.equal(
      second.value.sourceFactory?.describe()
    );

    first.value.dispose();
    const core = second.value.resolve("rt:core");
    expect(core.ok && core.value.contents).to.equal("unit A");
  });

  it("should return a configured context that seals on first use", () => {
    const result = createAnalysisContext(mockInput, { cwd: missingCwd });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    const context = result.value;
    expect(context.state).to.equal("configured");

    context.resolve("rt:core");
    expect(context.state).to.equal("sealed");

    const factory = createSourceFactory([fixedResolver("late", "x")]);
    expect(factory.ok).to.equal(true);
    if (!factory.ok) return;
    const replaced = context.setSourceFactory(factory.value);
    expect(replaced.ok).to.equal(false);
    if (replaced.ok) return;
    expect(replaced.error.code).to.equal("UG3001");
  });

  it("should size the unit cache with the default capacity", () => {
    const result = createAnalysisContext(mockInput, { cwd: missingCwd });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.options.cacheSize).to.equal(512);
  });

  it("should not create a context for an invalid configuration", () => {
    let created = 0;
    const countingFactory: EngineContextFactory = (options) => {
      created++;
      return new EngineContext(options);
    };

    const result = createAnalysisContext(
      { useMockRuntime: true },
      { cwd: missingCwd, contextFactory: countingFactory }
    );

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.diagnostics.map((d) => d.code)).to.deep.equal([
      "UG1001",
    ]);
    expect(created).to.equal(0);
  });

  it("should use an injected context factory", () => {
    const minted: { context?: AnalysisContext } = {};
    const result = createAnalysisContext(mockInput, {
      cwd: missingCwd,
      contextFactory: (options) => {
        const context = new EngineContext(options);
        minted.context = context;
        return context;
      },
    });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value).to.equal(minted.context);
  });

  it("should dispose the context and fail when attaching is refused", () => {
    const minted: { context?: AnalysisContext } = {};
    const preSealed: EngineContextFactory = (options) => {
      const context = new EngineContext(options);
      const factory = createSourceFactory([fixedResolver("stale", "x")]);
      if (factory.ok) {
        context.setSourceFactory(factory.value);
      }
      context.setLibraryResolverFactory(() => ({
        resolveLibrary: () => error(createDiagnosticsCollector()),
        resolveProgram: () => error(createDiagnosticsCollector()),
      }));
      context.resolve("rt:core");
      minted.context = context;
      return context;
    };

    const result = createAnalysisContext(mockInput, {
      cwd: missingCwd,
      contextFactory: preSealed,
    });

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.diagnostics[0]?.code).to.equal("UG3001");
    expect(minted.context?.state).to.equal("disposed");
  });

  it("should install the inference library resolver", () => {
    const result = createAnalysisContext(
      {
        useMockRuntime: true,
        mockRuntime: { "rt:core": "export const answer = 42;\n" },
      },
      { cwd: missingCwd }
    );

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    const resolver = result.value.getLibraryResolver();
    expect(resolver.ok).to.equal(true);
    if (!resolver.ok) return;

    const unit = resolver.value.resolveLibrary("rt:core");
    expect(unit.ok).to.equal(true);
    if (!unit.ok) return;
    expect(unit.value.declarations).to.deep.equal([
      {
        name: "answer",
        kind: "const",
        type: "number",
        inferred: true,
        exported: true,
      },
    ]);
  });

  it("should use a supplied library resolver factory", () => {
    let hookCalls = 0;
    const result = createAnalysisContext(mockInput, {
      cwd: missingCwd,
      libraryResolverFactory: () => {
        hookCalls++;
        return {
          resolveLibrary: () => error(createDiagnosticsCollector()),
          resolveProgram: () => error(createDiagnosticsCollector()),
        };
      },
    });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    result.value.getLibraryResolver();
    result.value.getLibraryResolver();
    expect(hookCalls).to.equal(1);
  });
});
