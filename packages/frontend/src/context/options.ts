/**
 * Analysis options
 *
 * Built once, before the engine context exists, and handed to it at
 * construction. Nothing sets options on a live context.
 */

import { Result, ok, error } from "../types/result.js";
import { Diagnostic, createDiagnostic } from "../types/diagnostic.js";

/**
 * Capacity bound for the engine's resolved-unit cache. The engine owns the
 * eviction policy.
 */
export const DEFAULT_CACHE_SIZE = 512;

export type AnalysisOptions = {
  readonly cacheSize: number;
};

export const defaultAnalysisOptions: AnalysisOptions = {
  cacheSize: DEFAULT_CACHE_SIZE,
};

export const createAnalysisOptions = (
  overrides: Partial<AnalysisOptions> = {}
): Result<AnalysisOptions, Diagnostic> => {
  const cacheSize = overrides.cacheSize ?? defaultAnalysisOptions.cacheSize;

  if (!Number.isInteger(cacheSize) || cacheSize <= 0) {
    return error(
      createDiagnostic(
        "UG1003",
        "error",
        `cacheSize must be a positive integer, got ${cacheSize}`
      )
    );
  }

  return ok(Object.freeze({ ...defaultAnalysisOptions, cacheSize }));
};
