/**
 * file: scheme resolver - reads straight from disk on every call
 */

import * as fs from "node:fs";
import { Result, ok, error } from "../types/result.js";
import { Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { FILE_SCHEME, filePathOf, hasScheme } from "./scheme.js";
import type { ResolvedSource, UriResolver } from "./types.js";

export const notFound = (uri: string, hint?: string): Diagnostic =>
  createDiagnostic(
    "UG2001",
    "error",
    `Cannot find source: "${uri}"`,
    undefined,
    hint
  );

/**
 * Read a source file backing an identifier
 */
export const readSourceFile = (
  uri: string,
  fullPath: string
): Result<ResolvedSource, Diagnostic> => {
  if (!fs.existsSync(fullPath)) {
    return error(notFound(uri, `File not found: ${fullPath}`));
  }

  try {
    if (!fs.statSync(fullPath).isFile()) {
      return error(notFound(uri, `Not a file: ${fullPath}`));
    }
    return ok({ uri, contents: fs.readFileSync(fullPath, "utf-8"), fullPath });
  } catch (err) {
    return error(
      createDiagnostic(
        "UG2003",
        "error",
        `Failed to read source "${uri}": ${err instanceof Error ? err.message : String(err)}`,
        undefined,
        `Path: ${fullPath}`
      )
    );
  }
};

export const createFileResolver = (): UriResolver => ({
  name: "file",
  scheme: FILE_SCHEME,
  canResolve: (uri) => hasScheme(uri, FILE_SCHEME),
  resolve: (uri) => {
    const fullPath = filePathOf(uri);
    if (fullPath === undefined) {
      return error(notFound(uri, "Not a valid file: identifier"));
    }
    return readSourceFile(uri, fullPath);
  },
});
