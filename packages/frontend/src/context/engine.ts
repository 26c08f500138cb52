/**
 * Engine context - holds the source factory and library-resolution hook of
 * one analysis session and enforces their lifecycle
 */

import { Result, ok, error } from "../types/result.js";
import { Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import type { ResolvedSource } from "../resolver/types.js";
import type { SourceFactory } from "../resolver/source-factory.js";
import type { LibraryResolver } from "../library/types.js";
import type { AnalysisOptions } from "./options.js";
import type {
  AnalysisContext,
  ContextState,
  EngineContextFactory,
  LibraryResolverFactory,
} from "./types.js";

const disposed = (): Diagnostic =>
  createDiagnostic("UG3002", "error", "Analysis context has been disposed");

const notConfigured = (missing: string): Diagnostic =>
  createDiagnostic(
    "UG3003",
    "error",
    `Analysis context has no ${missing} attached`,
    undefined,
    "Attach a source factory and a library resolver factory first"
  );

export class EngineContext implements AnalysisContext {
  private currentState: ContextState = "unconfigured";
  private factory: SourceFactory | undefined;
  private libraryResolverFactory: LibraryResolverFactory | undefined;
  private libraryResolver: LibraryResolver | undefined;

  constructor(readonly options: AnalysisOptions) {}

  get state(): ContextState {
    return this.currentState;
  }

  get sourceFactory(): SourceFactory | undefined {
    return this.factory;
  }

  setSourceFactory(sourceFactory: SourceFactory): Result<void, Diagnostic> {
    const blocked = this.checkMutable("resolver chain");
    if (blocked !== undefined) {
      return error(blocked);
    }
    this.factory = sourceFactory;
    this.updateConfigured();
    return ok(undefined);
  }

  setLibraryResolverFactory(
    factory: LibraryResolverFactory
  ): Result<void, Diagnostic> {
    const blocked = this.checkMutable("library resolver factory");
    if (blocked !== undefined) {
      return error(blocked);
    }
    this.libraryResolverFactory = factory;
    this.updateConfigured();
    return ok(undefined);
  }

  resolve(uri: string): Result<ResolvedSource, Diagnostic> {
    const sealed = this.seal();
    if (!sealed.ok) {
      return sealed;
    }
    return sealed.value.resolve(uri);
  }

  getLibraryResolver(): Result<LibraryResolver, Diagnostic> {
    const sealed = this.seal();
    if (!sealed.ok) {
      return sealed;
    }
    if (this.libraryResolver === undefined) {
      if (this.libraryResolverFactory === undefined) {
        return error(notConfigured("library resolver factory"));
      }
      this.libraryResolver = this.libraryResolverFactory(this);
    }
    return ok(this.libraryResolver);
  }

  dispose(): void {
    this.currentState = "disposed";
    this.libraryResolver = undefined;
  }

  private checkMutable(what: string): Diagnostic | undefined {
    switch (this.currentState) {
      case "sealed":
        return createDiagnostic(
          "UG3001",
          "error",
          `Cannot replace the ${what} of a sealed analysis context`,
          undefined,
          "Create a new context instead"
        );
      case "disposed":
        return disposed();
      default:
        return undefined;
    }
  }

  private updateConfigured(): void {
    if (
      this.factory !== undefined &&
      this.libraryResolverFactory !== undefined
    ) {
      this.currentState = "configured";
    }
  }

  /**
   * First use of a configured context seals it
   */
  private seal(): Result<SourceFactory, Diagnostic> {
    if (this.currentState === "disposed") {
      return error(disposed());
    }
    if (this.factory === undefined) {
      return error(notConfigured("source factory"));
    }
    if (this.currentState === "unconfigured") {
      return error(notConfigured("library resolver factory"));
    }
    this.currentState = "sealed";
    return ok(this.factory);
  }
}

export const createEngineContext: EngineContextFactory = (options) =>
  new EngineContext(options);
