/**
 * CLI argument parser
 */

import type { CliOptions, ParsedArgs } from "../types.js";

const splitList = (value: string): string[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  let identifier: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue; // Skip if undefined

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // First positional arg after command (identifier or path)
    if (command && !identifier && !arg.startsWith("-")) {
      identifier = arg;
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "--runtime":
        options.runtime = args[++i] ?? "";
        break;
      case "--package-root":
        options.packageRoot = args[++i] ?? "";
        break;
      case "--package-roots":
        options.packageRoots = splitList(args[++i] ?? "");
        break;
      case "--entry":
        options.entry = args[++i] ?? "";
        break;
      case "--no-transitive":
        options.noTransitive = true;
        break;
      case "--only-constants":
        options.onlyConstants = true;
        break;
    }
  }

  return { command, identifier, options };
};
