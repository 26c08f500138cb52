/**
 * Runtime library resolver factories
 */

import * as path from "node:path";
import { Result, error } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { MockEnvironment } from "../configuration/types.js";
import { RUNTIME_SCHEME, hasScheme } from "./scheme.js";
import { notFound, readSourceFile } from "./file-resolver.js";
import { MockRuntimeLibrary } from "./mock-runtime.js";
import { RuntimeLayout, discoverRuntimeLayout } from "./runtime-layout.js";
import type { ResolvedSource, UriResolver } from "./types.js";

/**
 * Runtime library backed by a directory on disk.
 * The layout is discovered on the first lookup and never changes afterwards.
 */
export class DirectoryRuntimeLibrary {
  private layout: Result<RuntimeLayout, Diagnostic> | undefined;

  readonly resolver: UriResolver;

  constructor(
    readonly runtimePath: string,
    private readonly verbose: boolean = false
  ) {
    this.resolver = {
      name: "runtime-path",
      scheme: RUNTIME_SCHEME,
      canResolve: (uri) => hasScheme(uri, RUNTIME_SCHEME),
      resolve: (uri) => this.lookup(uri),
    };
  }

  private getLayout(): Result<RuntimeLayout, Diagnostic> {
    if (this.layout === undefined) {
      this.layout = discoverRuntimeLayout(this.runtimePath);
      if (this.verbose && this.layout.ok) {
        console.log(
          `[unitgraph] Runtime libraries in ${this.layout.value.root}: ${[...this.layout.value.libraries.keys()].join(", ")}`
        );
      }
    }
    return this.layout;
  }

  lookup(uri: string): Result<ResolvedSource, Diagnostic> {
    const layout = this.getLayout();
    if (!layout.ok) {
      return layout;
    }

    const [name = "", ...rest] = uri.slice(RUNTIME_SCHEME.length).split("/");
    const entryPath = layout.value.libraries.get(name);
    if (entryPath === undefined) {
      return error(
        notFound(
          uri,
          `Unknown runtime library '${name}'. Available: ${[...layout.value.libraries.keys()].join(", ")}`
        )
      );
    }

    if (rest.length === 0) {
      return readSourceFile(uri, entryPath);
    }

    const libraryDir = path.dirname(entryPath);
    const partPath = path.resolve(libraryDir, ...rest);
    const fromLibrary = path.relative(libraryDir, partPath);
    if (
      fromLibrary === ".." ||
      fromLibrary.startsWith(`..${path.sep}`) ||
      path.isAbsolute(fromLibrary)
    ) {
      return error(notFound(uri, `Part escapes library '${name}'`));
    }
    return readSourceFile(uri, partPath);
  }
}

/**
 * Resolver over mock rt: sources. Missing identifiers fail explicitly.
 */
export const createMockRuntimeResolver = (
  sources: MockEnvironment
): UriResolver =>
  new MockRuntimeLibrary(sources, { reportMissing: true }).resolver;

/**
 * Resolver over the runtime library directory at runtimePath
 */
export const createRuntimePathResolver = (
  runtimePath: string,
  verbose = false
): UriResolver => new DirectoryRuntimeLibrary(runtimePath, verbose).resolver;
