/**
 * Diagnostic types for the unitgraph frontend
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Configuration errors (UG1001-UG1005)
  | "UG1001" // Required configuration field missing
  | "UG1002" // Conflicting configuration fields
  | "UG1003" // Invalid configuration value
  | "UG1004" // Configuration file not found
  | "UG1005" // Configuration file unreadable or not valid JSON
  // Resolution errors (UG2001-UG2004)
  | "UG2001" // Source not found by the claiming resolver
  | "UG2002" // No resolver claims the identifier's scheme
  | "UG2003" // Source could not be read
  | "UG2004" // Invalid runtime library layout
  // Context lifecycle errors (UG3001-UG3004)
  | "UG3001" // Resolver chain or hook replaced after sealing
  | "UG3002" // Context used after dispose
  | "UG3003" // Context resolved before a source factory was attached
  | "UG3004" // Empty resolver chain
  // Library resolution errors (UG4001-UG4002)
  | "UG4001" // Library import could not be resolved
  | "UG4002"; // Library unit could not be parsed

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (): DiagnosticsCollector => ({
  diagnostics: [],
  hasErrors: false,
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});

export const mergeDiagnostics = (
  collector1: DiagnosticsCollector,
  collector2: DiagnosticsCollector
): DiagnosticsCollector => ({
  diagnostics: [...collector1.diagnostics, ...collector2.diagnostics],
  hasErrors: collector1.hasErrors || collector2.hasErrors,
});

/**
 * Wrap a single diagnostic in a collector
 */
export const singleDiagnostic = (
  diagnostic: Diagnostic
): DiagnosticsCollector =>
  addDiagnostic(createDiagnosticsCollector(), diagnostic);
