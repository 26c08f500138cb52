/**
 * Resolver type definitions
 */

import type { Result } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";

export type ResolvedSource = {
  readonly uri: string;
  readonly contents: string;
  // Set for filesystem-backed sources
  readonly fullPath?: string;
};

/**
 * One entry of a resolver chain.
 *
 * canResolve is a scheme capability test. It must not look at whether the
 * content exists: the first entry that claims an identifier answers for it.
 */
export type UriResolver = {
  readonly name: string;
  readonly scheme: string;
  readonly canResolve: (uri: string) => boolean;
  readonly resolve: (uri: string) => Result<ResolvedSource, Diagnostic>;
};
