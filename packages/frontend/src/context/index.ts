/**
 * Analysis context - Public API
 */

export type {
  AnalysisContext,
  ContextState,
  EngineContextFactory,
  LibraryResolverFactory,
} from "./types.js";
export {
  DEFAULT_CACHE_SIZE,
  createAnalysisOptions,
  defaultAnalysisOptions,
  type AnalysisOptions,
} from "./options.js";
export { EngineContext, createEngineContext } from "./engine.js";
export {
  createAnalysisContext,
  createDefaultFileResolvers,
  createRuntimeResolver,
  type AnalysisContextOverrides,
} from "./creation.js";
