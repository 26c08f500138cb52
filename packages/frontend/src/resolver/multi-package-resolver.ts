/**
 * pkg: scheme resolver over several package roots.
 * Roots are tried in order; the first one holding the file wins.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { error } from "../types/result.js";
import { PACKAGE_SCHEME, hasScheme } from "./scheme.js";
import { notFound, readSourceFile } from "./file-resolver.js";
import { packageRelativePath } from "./package-path.js";
import type { UriResolver } from "./types.js";

export const createMultiPackageResolver = (
  packageRoots: readonly string[]
): UriResolver => {
  const roots = Object.freeze(packageRoots.map((root) => path.resolve(root)));

  return {
    name: "multi-package",
    scheme: PACKAGE_SCHEME,
    canResolve: (uri) => hasScheme(uri, PACKAGE_SCHEME),
    resolve: (uri) => {
      const relative = packageRelativePath(uri);
      if (!relative.ok) {
        return relative;
      }

      const candidates = roots.map((root) => path.join(root, relative.value));
      const match = candidates.find(
        (candidate) =>
          fs.existsSync(candidate) && fs.statSync(candidate).isFile()
      );
      if (match === undefined) {
        return error(notFound(uri, `Tried: ${candidates.join(", ")}`));
      }
      return readSourceFile(uri, match);
    },
  };
};
