/**
 * Analysis context creation
 */

import { Result, ok, error, flatMap } from "../types/result.js";
import {
  DiagnosticsCollector,
  singleDiagnostic,
} from "../types/diagnostic.js";
import { validateConfiguration } from "../configuration/validation.js";
import type {
  AnalysisConfiguration,
  ConfigurationInput,
} from "../configuration/types.js";
import type { UriResolver } from "../resolver/types.js";
import { createFileResolver } from "../resolver/file-resolver.js";
import { createPackageResolverFor } from "../resolver/package-resolver.js";
import { createImplicitEntryResolver } from "../resolver/implicit-entry.js";
import {
  createMockRuntimeResolver,
  createRuntimePathResolver,
} from "../resolver/runtime-library.js";
import {
  composeResolvers,
  createSourceFactory,
} from "../resolver/source-factory.js";
import {
  createInferenceLibraryResolverFactory,
} from "../library/library-resolver.js";
import { DEFAULT_CACHE_SIZE, createAnalysisOptions } from "./options.js";
import { createEngineContext } from "./engine.js";
import type {
  AnalysisContext,
  EngineContextFactory,
  LibraryResolverFactory,
} from "./types.js";

export type AnalysisContextOverrides = {
  /** Used in place of the mock or directory runtime library resolver */
  readonly runtimeResolver?: UriResolver;
  /** Replaces the default [file, package] resolvers entirely */
  readonly fileResolvers?: readonly UriResolver[];
  readonly contextFactory?: EngineContextFactory;
  readonly libraryResolverFactory?: LibraryResolverFactory;
  /** Base directory for relative paths and the implicit entry document */
  readonly cwd?: string;
};

/**
 * Runtime library resolver for the configured mode
 */
export const createRuntimeResolver = (
  configuration: AnalysisConfiguration
): UriResolver =>
  configuration.useMockRuntime
    ? createMockRuntimeResolver(configuration.mockRuntime)
    : createRuntimePathResolver(
        configuration.runtimePath,
        configuration.verbose
      );

export const createDefaultFileResolvers = (
  configuration: AnalysisConfiguration
): readonly UriResolver[] => [
  createFileResolver(),
  createPackageResolverFor(configuration),
];

/**
 * Create an analysis context with the configured resolver chain and the
 * inference library resolver installed.
 *
 * Either a fully assembled context comes back, or diagnostics and no
 * context at all.
 */
export const createAnalysisContext = (
  input: ConfigurationInput,
  overrides: AnalysisContextOverrides = {}
): Result<AnalysisContext, DiagnosticsCollector> => {
  const cwd = overrides.cwd ?? process.cwd();

  const configurationResult = validateConfiguration(input, cwd);
  if (!configurationResult.ok) {
    return configurationResult;
  }
  const configuration = configurationResult.value;

  const resolvers = composeResolvers({
    runtimeResolver:
      overrides.runtimeResolver ?? createRuntimeResolver(configuration),
    implicitEntryResolver: configuration.useImplicitEntry
      ? createImplicitEntryResolver(configuration.entryPointFile, cwd)
      : undefined,
    fileResolvers:
      overrides.fileResolvers ?? createDefaultFileResolvers(configuration),
  });

  const sourceFactoryResult = createSourceFactory(resolvers);
  if (!sourceFactoryResult.ok) {
    return error(singleDiagnostic(sourceFactoryResult.error));
  }
  const sourceFactory = sourceFactoryResult.value;

  const optionsResult = createAnalysisOptions({
    cacheSize: DEFAULT_CACHE_SIZE,
  });
  if (!optionsResult.ok) {
    return error(singleDiagnostic(optionsResult.error));
  }

  const contextFactory = overrides.contextFactory ?? createEngineContext;
  const context = contextFactory(optionsResult.value);

  const attached = flatMap(context.setSourceFactory(sourceFactory), () =>
    context.setLibraryResolverFactory(
      overrides.libraryResolverFactory ??
        createInferenceLibraryResolverFactory(configuration)
    )
  );
  if (!attached.ok) {
    context.dispose();
    return error(singleDiagnostic(attached.error));
  }

  if (configuration.verbose) {
    console.log(
      `[unitgraph] Resolver chain: ${sourceFactory.describe().join(" -> ")}`
    );
  }

  return ok(context);
};
