/**
 * unitgraph chain command - print the resolver chain in dispatch order
 */

import {
  createDiagnostic,
  error,
  ok,
  singleDiagnostic,
  type AnalysisContext,
  type DiagnosticsCollector,
  type Result,
} from "@unitgraph/frontend";
import type { CommandOutput } from "../types.js";

export const chainCommand = (
  context: AnalysisContext
): Result<CommandOutput, DiagnosticsCollector> => {
  const factory = context.sourceFactory;
  if (factory === undefined) {
    return error(
      singleDiagnostic(
        createDiagnostic(
          "UG3003",
          "error",
          "Analysis context has no source factory attached"
        )
      )
    );
  }

  const text = factory.resolvers
    .map(
      (resolver, index) =>
        `${index + 1}. ${resolver.name} (${resolver.scheme})`
    )
    .join("\n");
  return ok({ text, diagnostics: [] });
};
