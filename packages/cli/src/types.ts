/**
 * Type definitions for CLI
 */

import type { Diagnostic } from "@unitgraph/frontend";

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  runtime?: string;
  packageRoot?: string;
  packageRoots?: string[];
  entry?: string;
  noTransitive?: boolean;
  onlyConstants?: boolean;
};

export type ParsedArgs = {
  readonly command: string;
  readonly identifier?: string;
  readonly options: CliOptions;
};

/**
 * What a command prints: text for stdout, diagnostics that did not stop
 * it, and a closing line suppressed by --quiet
 */
export type CommandOutput = {
  readonly text: string;
  readonly diagnostics: readonly Diagnostic[];
  readonly summary?: string;
};
