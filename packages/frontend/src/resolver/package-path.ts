/**
 * Package-relative paths of pkg: identifiers
 */

import * as path from "node:path";
import { Result, ok, error } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { PACKAGE_SCHEME } from "./scheme.js";
import { notFound } from "./file-resolver.js";

/**
 * Split pkg:name/path into the package-relative path, rejecting
 * identifiers that are empty or climb out of the package root
 */
export const packageRelativePath = (
  uri: string
): Result<string, Diagnostic> => {
  const relative = uri.slice(PACKAGE_SCHEME.length);
  const [name] = relative.split("/");
  if (!name || name === "." || name === "..") {
    return error(notFound(uri, "Expected pkg:<package>/<path>"));
  }

  const normalized = path.posix.normalize(relative);
  if (
    normalized === ".." ||
    normalized.startsWith("../") ||
    path.posix.isAbsolute(normalized)
  ) {
    return error(notFound(uri, "Package path escapes the package root"));
  }
  return ok(normalized);
};
