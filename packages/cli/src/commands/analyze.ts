/**
 * unitgraph analyze command - resolve a unit with everything it imports and
 * print the inferred declarations, dependencies first
 */

import {
  error,
  ok,
  singleDiagnostic,
  type AnalysisContext,
  type DiagnosticsCollector,
  type InferredDeclaration,
  type LibraryUnit,
  type Result,
} from "@unitgraph/frontend";
import type { CommandOutput } from "../types.js";

const formatDeclaration = (declaration: InferredDeclaration): string => {
  const { name, kind, type } = declaration;
  const prefix = declaration.exported ? "export " : "";
  return `  ${prefix}${kind} ${name}: ${type}`;
};

const formatUnit = (unit: LibraryUnit): readonly string[] => [
  `${unit.uri} (${unit.kind})`,
  ...(unit.kind === "host-document"
    ? unit.imports.map((imported) => `  script ${imported}`)
    : unit.declarations.map(formatDeclaration)),
];

export const analyzeCommand = (
  context: AnalysisContext,
  identifier: string
): Result<CommandOutput, DiagnosticsCollector> => {
  const resolver = context.getLibraryResolver();
  if (!resolver.ok) {
    return error(singleDiagnostic(resolver.error));
  }

  const program = resolver.value.resolveProgram(identifier);
  if (!program.ok) {
    return program;
  }

  const { units, diagnostics } = program.value;
  return ok({
    text: units.flatMap(formatUnit).join("\n"),
    diagnostics: diagnostics.diagnostics,
    summary:
      `Analyzed ${units.length} unit${units.length === 1 ? "" : "s"} ` +
      `from ${identifier}`,
  });
};
