/**
 * Library resolution with inference
 *
 * The strategy installed into every analysis context created by
 * createAnalysisContext. Units are fetched through the context's source
 * factory, parsed, and their top-level declarations typed.
 */

import { Result, ok, error } from "../types/result.js";
import {
  DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
  formatDiagnostic,
  singleDiagnostic,
} from "../types/diagnostic.js";
import type { AnalysisConfiguration } from "../configuration/types.js";
import type {
  AnalysisContext,
  LibraryResolverFactory,
} from "../context/types.js";
import { extractScriptImports, isHostDocument } from "./host-document.js";
import { parseScript } from "./script.js";
import { inferDeclarations, UNKNOWN_TYPE } from "./inference.js";
import { UnitCache } from "./unit-cache.js";
import { importCandidates } from "./import-candidates.js";
import type { LibraryProgram, LibraryResolver, LibraryUnit } from "./types.js";

export class LibraryResolverWithInference implements LibraryResolver {
  private readonly units: UnitCache<LibraryUnit>;
  // import identifier as written -> identifier that served it
  private readonly aliases = new Map<string, string>();

  constructor(
    private readonly context: AnalysisContext,
    private readonly configuration: AnalysisConfiguration
  ) {
    this.units = new UnitCache(context.options.cacheSize);
  }

  resolveLibrary(uri: string): Result<LibraryUnit, DiagnosticsCollector> {
    return this.resolveUnit(uri, new Set());
  }

  /**
   * Resolve a unit and everything it imports. An import that cannot be
   * resolved is reported on the importing unit; the walk goes on.
   */
  resolveProgram(uri: string): Result<LibraryProgram, DiagnosticsCollector> {
    const entry = this.resolveLibrary(uri);
    if (!entry.ok) {
      return entry;
    }

    const units: LibraryUnit[] = [];
    const visited = new Set<string>([uri]);
    let diagnostics = createDiagnosticsCollector();

    const visit = (unit: LibraryUnit): void => {
      for (const diagnostic of unit.diagnostics) {
        diagnostics = addDiagnostic(diagnostics, diagnostic);
      }

      for (const imported of unit.imports) {
        if (visited.has(imported)) continue;
        visited.add(imported);

        const dependency = this.resolveImport(imported, new Set());
        if (dependency === undefined || !dependency.ok) {
          const [cause] = dependency?.error.diagnostics ?? [];
          diagnostics = addDiagnostic(
            diagnostics,
            createDiagnostic(
              "UG4001",
              "error",
              `Cannot resolve import "${imported}" of "${unit.uri}"`,
              undefined,
              cause ? formatDiagnostic(cause) : undefined
            )
          );
          continue;
        }
        const resolvedUri = dependency.value.uri;
        if (resolvedUri !== imported) {
          if (visited.has(resolvedUri)) continue;
          visited.add(resolvedUri);
        }
        visit(dependency.value);
      }

      units.push(unit);
    };

    visit(entry.value);
    return ok({ entry: uri, units, diagnostics });
  }

  private resolveUnit(
    uri: string,
    inProgress: Set<string>
  ): Result<LibraryUnit, DiagnosticsCollector> {
    const cached = this.units.get(uri);
    if (cached !== undefined) {
      return ok(cached);
    }

    const source = this.context.resolve(uri);
    if (!source.ok) {
      return error(singleDiagnostic(source.error));
    }

    const unit = isHostDocument(uri)
      ? this.buildHostDocument(uri, source.value.contents)
      : this.buildScript(uri, source.value.contents, inProgress);

    if (this.configuration.verbose) {
      console.log(
        `[unitgraph] Resolved ${unit.kind} ${uri}: ` +
          `${unit.imports.length} imports, ` +
          `${unit.declarations.length} declarations`
      );
    }

    this.units.set(uri, unit);
    return ok(unit);
  }

  /**
   * Resolve an import through its candidate identifiers. The first
   * failure is the one reported. Answers nothing when the import is a
   * unit still being built.
   */
  private resolveImport(
    uri: string,
    inProgress: Set<string>
  ): Result<LibraryUnit, DiagnosticsCollector> | undefined {
    const alias = this.aliases.get(uri);
    const candidates = alias === undefined ? importCandidates(uri) : [alias];

    let firstFailure: Result<LibraryUnit, DiagnosticsCollector> | undefined;
    for (const candidate of candidates) {
      if (inProgress.has(candidate)) {
        return undefined;
      }
      const unit = this.resolveUnit(candidate, inProgress);
      if (unit.ok) {
        this.aliases.set(uri, candidate);
        return unit;
      }
      firstFailure ??= unit;
    }
    return firstFailure;
  }

  private buildHostDocument(uri: string, contents: string): LibraryUnit {
    return {
      uri,
      kind: "host-document",
      imports: extractScriptImports(uri, contents),
      bindings: [],
      reExports: [],
      starExports: [],
      exports: new Map(),
      declarations: [],
      diagnostics: [],
    };
  }

  private buildScript(
    uri: string,
    contents: string,
    inProgress: Set<string>
  ): LibraryUnit {
    const parsed = parseScript(uri, contents);
    const { inference } = this.configuration;

    inProgress.add(uri);
    const declarations = inferDeclarations(
      parsed.sourceFile,
      new Set(parsed.exports.values()),
      inference,
      (localName) => {
        const binding = parsed.bindings.find((b) => b.localName === localName);
        if (binding === undefined) {
          return undefined;
        }
        if (!inference.inferTransitively) {
          return UNKNOWN_TYPE;
        }
        return this.lookupExport(
          binding.from,
          binding.importedName,
          inProgress,
          new Set()
        );
      }
    );
    inProgress.delete(uri);

    return {
      uri,
      kind: "script",
      imports: parsed.imports,
      bindings: parsed.bindings,
      reExports: parsed.reExports,
      starExports: parsed.starExports,
      exports: parsed.exports,
      declarations,
      diagnostics: parsed.diagnostics,
    };
  }

  /**
   * Type of an exported name, following named re-exports and then
   * `export *`. Units still being built (import cycles) answer nothing.
   */
  private lookupExport(
    uri: string,
    exportedName: string,
    inProgress: Set<string>,
    seen: Set<string>
  ): string | undefined {
    const key = `${uri}#${exportedName}`;
    if (seen.has(key)) {
      return undefined;
    }
    seen.add(key);

    const unit = this.resolveImport(uri, inProgress);
    if (unit === undefined || !unit.ok) {
      return undefined;
    }

    const localName = unit.value.exports.get(exportedName);
    if (localName !== undefined) {
      return unit.value.declarations.find((d) => d.name === localName)?.type;
    }

    const reExport = unit.value.reExports.find(
      (r) => r.exportedName === exportedName
    );
    if (reExport !== undefined) {
      return this.lookupExport(
        reExport.from,
        reExport.importedName,
        inProgress,
        seen
      );
    }

    // export * never forwards a default export
    if (exportedName === "default") {
      return undefined;
    }
    for (const from of unit.value.starExports) {
      const type = this.lookupExport(from, exportedName, inProgress, seen);
      if (type !== undefined) {
        return type;
      }
    }
    return undefined;
  }
}

/**
 * Library resolver hook parameterized by the configuration
 */
export const createInferenceLibraryResolverFactory =
  (configuration: AnalysisConfiguration): LibraryResolverFactory =>
  (context) =>
    new LibraryResolverWithInference(context, configuration);
