/**
 * unitgraph frontend - source resolution and analysis context assembly
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  singleDiagnostic,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export * from "./configuration/index.js";
export * from "./resolver/index.js";
export * from "./context/index.js";
export * from "./library/index.js";
