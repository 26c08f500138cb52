/**
 * unitgraph resolve command - print the source an identifier resolves to
 */

import { resolve } from "node:path";
import {
  error,
  getScheme,
  ok,
  singleDiagnostic,
  toFileUri,
  type AnalysisContext,
  type DiagnosticsCollector,
  type Result,
} from "@unitgraph/frontend";
import type { CommandOutput } from "../types.js";

/**
 * Command-line identifiers without a scheme are file paths
 */
export const toIdentifier = (arg: string, cwd: string): string =>
  getScheme(arg) !== undefined ? arg : toFileUri(resolve(cwd, arg));

export const resolveCommand = (
  context: AnalysisContext,
  identifier: string
): Result<CommandOutput, DiagnosticsCollector> => {
  const source = context.resolve(identifier);
  if (!source.ok) {
    return error(singleDiagnostic(source.error));
  }
  return ok({ text: source.value.contents, diagnostics: [] });
};
