/**
 * In-memory runtime library
 *
 * Serves rt: identifiers from a fixed map of sources. Never touches the
 * filesystem.
 */

import { Result, ok, error } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { RUNTIME_SCHEME, hasScheme } from "./scheme.js";
import { notFound } from "./file-resolver.js";
import type { ResolvedSource, UriResolver } from "./types.js";

export type MockRuntimeOptions = {
  /**
   * Fail lookups of identifiers absent from the map instead of answering
   * with an empty unit
   */
  readonly reportMissing?: boolean;
};

export class MockRuntimeLibrary {
  private readonly sources: ReadonlyMap<string, string>;
  private readonly reportMissing: boolean;

  readonly resolver: UriResolver;

  constructor(
    sources: ReadonlyMap<string, string>,
    options: MockRuntimeOptions = {}
  ) {
    this.sources = new Map(sources);
    this.reportMissing = options.reportMissing ?? false;
    this.resolver = {
      name: "mock-runtime",
      scheme: RUNTIME_SCHEME,
      canResolve: (uri) => hasScheme(uri, RUNTIME_SCHEME),
      resolve: (uri) => this.lookup(uri),
    };
  }

  get identifiers(): readonly string[] {
    return [...this.sources.keys()];
  }

  lookup(uri: string): Result<ResolvedSource, Diagnostic> {
    const contents = this.sources.get(uri);
    if (contents !== undefined) {
      return ok({ uri, contents });
    }
    if (this.reportMissing) {
      return error(notFound(uri, "Not present in the mock runtime library"));
    }
    return ok({ uri, contents: "" });
  }
}
