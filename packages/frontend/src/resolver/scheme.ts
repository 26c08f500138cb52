/**
 * Identifier schemes
 */

import * as path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";

export const RUNTIME_SCHEME = "rt:";
export const PACKAGE_SCHEME = "pkg:";
export const FILE_SCHEME = "file:";

/**
 * Scheme of an identifier, without the trailing colon.
 * Single letters are treated as Windows drive letters, not schemes.
 */
export const getScheme = (identifier: string): string | undefined => {
  const match = /^([A-Za-z][A-Za-z0-9+.-]*):/.exec(identifier);
  if (!match?.[1] || match[1].length === 1) {
    return undefined;
  }
  return match[1].toLowerCase();
};

export const hasScheme = (identifier: string, scheme: string): boolean =>
  identifier.toLowerCase().startsWith(scheme);

/**
 * Filesystem path of a file: identifier, or undefined when it is not one
 */
export const filePathOf = (uri: string): string | undefined => {
  if (!hasScheme(uri, FILE_SCHEME)) {
    return undefined;
  }
  try {
    return fileURLToPath(uri);
  } catch {
    return undefined;
  }
};

export const toFileUri = (filePath: string): string =>
  pathToFileURL(path.resolve(filePath)).href;

/**
 * Resolve a specifier written inside a unit against the unit's identifier.
 *
 * - scheme-qualified specifiers are returned unchanged
 * - absolute paths become file: identifiers
 * - relative specifiers resolve against the containing identifier
 * - bare specifiers are module-package identifiers
 */
export const resolveSpecifier = (
  specifier: string,
  containingUri: string
): string => {
  if (getScheme(specifier) !== undefined) {
    return specifier;
  }
  if (path.isAbsolute(specifier)) {
    return toFileUri(specifier);
  }
  if (specifier.startsWith("./") || specifier.startsWith("../")) {
    if (hasScheme(containingUri, FILE_SCHEME)) {
      return new URL(specifier, containingUri).href;
    }
    const scheme = getScheme(containingUri);
    if (scheme !== undefined) {
      const containingPath = containingUri.slice(scheme.length + 1);
      // rt:name is the library itself; its parts live under rt:name/
      const baseDir =
        `${scheme}:` === RUNTIME_SCHEME && !containingPath.includes("/")
          ? containingPath
          : path.posix.dirname(containingPath);
      const joined = path.posix.normalize(path.posix.join(baseDir, specifier));
      return `${scheme}:${joined}`;
    }
  }
  return `${PACKAGE_SCHEME}${specifier}`;
};
