/**
 * Project configuration - unitgraph.json merged with CLI options
 */

import { resolve } from "node:path";
import {
  findConfigurationFile,
  loadConfigurationFile,
  type ConfigurationInput,
} from "@unitgraph/frontend";
import type { CliOptions } from "./types.js";

export const findConfig = findConfigurationFile;
export const loadConfig = loadConfigurationFile;

/**
 * Apply CLI options over the project file. Each option replaces the whole
 * mode it selects; paths are taken relative to cwd.
 */
export const resolveInput = (
  fileInput: ConfigurationInput,
  cliOptions: CliOptions,
  cwd: string
): ConfigurationInput => {
  let input: ConfigurationInput = fileInput;

  if (cliOptions.runtime !== undefined) {
    input = {
      ...input,
      useMockRuntime: false,
      runtimePath: resolve(cwd, cliOptions.runtime),
      mockRuntime: undefined,
    };
  }

  if (cliOptions.packageRoots !== undefined) {
    input = {
      ...input,
      useMultiRoot: true,
      packageRoots: cliOptions.packageRoots.map((root) => resolve(cwd, root)),
      packageRoot: undefined,
    };
  } else if (cliOptions.packageRoot !== undefined) {
    input = {
      ...input,
      useMultiRoot: false,
      packageRoot: resolve(cwd, cliOptions.packageRoot),
      packageRoots: undefined,
    };
  }

  if (cliOptions.entry !== undefined) {
    input = {
      ...input,
      useImplicitEntry: true,
      entryPointFile: resolve(cwd, cliOptions.entry),
    };
  }

  if (cliOptions.noTransitive || cliOptions.onlyConstants) {
    input = {
      ...input,
      inference: {
        ...input.inference,
        ...(cliOptions.noTransitive ? { inferTransitively: false } : {}),
        ...(cliOptions.onlyConstants ? { onlyInferConstants: true } : {}),
      },
    };
  }

  if (cliOptions.verbose) {
    input = { ...input, verbose: true };
  }

  return input;
};
