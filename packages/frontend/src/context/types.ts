/**
 * Analysis context type definitions
 */

import type { Result } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { ResolvedSource } from "../resolver/types.js";
import type { SourceFactory } from "../resolver/source-factory.js";
import type { LibraryResolver } from "../library/types.js";
import type { AnalysisOptions } from "./options.js";

/**
 * unconfigured -> configured -> sealed -> disposed
 *
 * A context is configured once both a source factory and a library
 * resolver factory are attached, and sealed by its first use.
 */
export type ContextState =
  | "unconfigured"
  | "configured"
  | "sealed"
  | "disposed";

/**
 * Hook producing the library-resolution strategy of a context.
 * Invoked lazily, at most once per context.
 */
export type LibraryResolverFactory = (
  context: AnalysisContext
) => LibraryResolver;

export type AnalysisContext = {
  readonly options: AnalysisOptions;
  readonly state: ContextState;
  readonly sourceFactory: SourceFactory | undefined;
  readonly setSourceFactory: (
    sourceFactory: SourceFactory
  ) => Result<void, Diagnostic>;
  readonly setLibraryResolverFactory: (
    factory: LibraryResolverFactory
  ) => Result<void, Diagnostic>;
  readonly resolve: (uri: string) => Result<ResolvedSource, Diagnostic>;
  readonly getLibraryResolver: () => Result<LibraryResolver, Diagnostic>;
  readonly dispose: () => void;
};

/**
 * Mints raw contexts. Injected so tests can substitute their own.
 */
export type EngineContextFactory = (
  options: AnalysisOptions
) => AnalysisContext;
