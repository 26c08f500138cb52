/**
 * In-memory file layer, fixed at construction
 */

import * as path from "node:path";
import { error, ok } from "../types/result.js";
import { FILE_SCHEME, filePathOf } from "./scheme.js";
import { notFound } from "./file-resolver.js";
import type { UriResolver } from "./types.js";

export class MemoryFileSystem {
  private readonly files: ReadonlyMap<string, string>;

  constructor(files: Iterable<readonly [string, string]>) {
    const normalized = new Map<string, string>();
    for (const [filePath, contents] of files) {
      normalized.set(path.resolve(filePath), contents);
    }
    this.files = normalized;
  }

  has(filePath: string): boolean {
    return this.files.has(path.resolve(filePath));
  }

  read(filePath: string): string | undefined {
    return this.files.get(path.resolve(filePath));
  }

  get paths(): readonly string[] {
    return [...this.files.keys()];
  }

  /**
   * Resolver claiming file: identifiers whose path this layer holds.
   * The set of paths never changes, so the claim is a fixed capability.
   */
  createResolver(name: string): UriResolver {
    const pathOf = (uri: string): string | undefined => {
      const filePath = filePathOf(uri);
      return filePath !== undefined && this.has(filePath)
        ? path.resolve(filePath)
        : undefined;
    };

    return {
      name,
      scheme: FILE_SCHEME,
      canResolve: (uri) => pathOf(uri) !== undefined,
      resolve: (uri) => {
        const filePath = pathOf(uri);
        const contents =
          filePath === undefined ? undefined : this.read(filePath);
        if (filePath === undefined || contents === undefined) {
          return error(notFound(uri, "Not held by the in-memory layer"));
        }
        return ok({ uri, contents, fullPath: filePath });
      },
    };
  }
}
