/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import {
  createAnalysisContext,
  formatDiagnostic,
  isDiagnosticError,
  type AnalysisContext,
  type ConfigurationInput,
  type Diagnostic,
  type DiagnosticsCollector,
  type Result,
} from "@unitgraph/frontend";
import { findConfig, loadConfig, resolveInput } from "../config.js";
import { resolveCommand, toIdentifier } from "../commands/resolve.js";
import { chainCommand } from "../commands/chain.js";
import { analyzeCommand } from "../commands/analyze.js";
import type { CommandOutput } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

type Command = (
  context: AnalysisContext,
  identifier: string
) => Result<CommandOutput, DiagnosticsCollector>;

type CommandEntry = {
  readonly command: Command;
  readonly needsIdentifier: boolean;
};

const COMMANDS: ReadonlyMap<string, CommandEntry> = new Map<
  string,
  CommandEntry
>([
  ["resolve", { command: resolveCommand, needsIdentifier: true }],
  ["chain", { command: chainCommand, needsIdentifier: false }],
  ["analyze", { command: analyzeCommand, needsIdentifier: true }],
]);

const printDiagnostics = (
  diagnostics: readonly Diagnostic[],
  quiet: boolean
): void => {
  for (const diagnostic of diagnostics) {
    if (quiet && !isDiagnosticError(diagnostic)) continue;
    console.error(formatDiagnostic(diagnostic));
  }
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);
  const quiet = parsed.options.quiet ?? false;

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`unitgraph v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  const entry = COMMANDS.get(parsed.command);
  if (entry === undefined) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'unitgraph --help' for usage information");
    return 1;
  }

  if (entry.needsIdentifier && !parsed.identifier) {
    console.error("Error: Identifier required");
    console.error(`Usage: unitgraph ${parsed.command} <identifier>`);
    return 1;
  }

  // Load config; --runtime alone is enough to run without one
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  if (!configPath && parsed.options.runtime === undefined) {
    console.error("Error: No unitgraph.json found");
    console.error("Create one, or pass --runtime <dir>");
    return 3;
  }

  let fileInput: ConfigurationInput = {};
  let projectRoot = cwd;
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      printDiagnostics(configResult.error.diagnostics, false);
      return 1;
    }
    fileInput = configResult.value;
    // Project root is the directory containing unitgraph.json
    projectRoot = dirname(configPath);
  }

  const contextResult = createAnalysisContext(
    resolveInput(fileInput, parsed.options, cwd),
    { cwd: projectRoot }
  );
  if (!contextResult.ok) {
    printDiagnostics(contextResult.error.diagnostics, false);
    return 1;
  }

  const context = contextResult.value;
  try {
    const result = entry.command(
      context,
      toIdentifier(parsed.identifier ?? "", cwd)
    );
    if (!result.ok) {
      printDiagnostics(result.error.diagnostics, false);
      return 2;
    }

    console.log(result.value.text);
    printDiagnostics(result.value.diagnostics, quiet);
    if (result.value.summary !== undefined && !quiet) {
      console.log(`\n✓ ${result.value.summary}`);
    }
    return result.value.diagnostics.some(isDiagnosticError) ? 2 : 0;
  } finally {
    context.dispose();
  }
};
