/**
 * pkg: scheme resolver over a single package root
 */

import * as path from "node:path";
import type { PackageConfiguration } from "../configuration/types.js";
import { PACKAGE_SCHEME, hasScheme } from "./scheme.js";
import { readSourceFile } from "./file-resolver.js";
import { packageRelativePath } from "./package-path.js";
import { createMultiPackageResolver } from "./multi-package-resolver.js";
import type { UriResolver } from "./types.js";

export const createPackageResolver = (packageRoot: string): UriResolver => {
  const root = path.resolve(packageRoot);

  return {
    name: "package",
    scheme: PACKAGE_SCHEME,
    canResolve: (uri) => hasScheme(uri, PACKAGE_SCHEME),
    resolve: (uri) => {
      const relative = packageRelativePath(uri);
      if (!relative.ok) {
        return relative;
      }
      return readSourceFile(uri, path.join(root, relative.value));
    },
  };
};

/**
 * Pick the single-root or multi-root variant for a configuration
 */
export const createPackageResolverFor = (
  configuration: PackageConfiguration
): UriResolver =>
  configuration.useMultiRoot
    ? createMultiPackageResolver(configuration.packageRoots)
    : createPackageResolver(configuration.packageRoot);
