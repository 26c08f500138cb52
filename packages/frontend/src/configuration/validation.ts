/**
 * Configuration validation
 *
 * Turns a ConfigurationInput into an AnalysisConfiguration, or reports every
 * problem found. Nothing downstream ever sees a half-valid configuration.
 */

import * as path from "node:path";
import { Result, ok, error } from "../types/result.js";
import {
  Diagnostic,
  DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";
import { RUNTIME_SCHEME } from "../resolver/scheme.js";
import type {
  AnalysisConfiguration,
  ConfigurationInput,
  EntryConfiguration,
  InferenceOptions,
  MockEnvironment,
  PackageConfiguration,
  RuntimeConfiguration,
} from "./types.js";

export const DEFAULT_PACKAGE_ROOT = "packages";

export const defaultInferenceOptions: InferenceOptions = {
  inferTransitively: true,
  onlyInferConstants: false,
};

type Report = (diagnostic: Diagnostic) => void;

const isBlank = (value: string | undefined): boolean =>
  value === undefined || value.trim() === "";

const missing = (field: string, mode: string): Diagnostic =>
  createDiagnostic("UG1001", "error", `'${field}' is required when ${mode}`);

const conflicting = (field: string, mode: string): Diagnostic =>
  createDiagnostic(
    "UG1002",
    "error",
    `'${field}' cannot be used when ${mode}`,
    undefined,
    `Remove '${field}' or change the mode`
  );

const isMockEnvironment = (
  value: MockEnvironment | Readonly<Record<string, string>>
): value is MockEnvironment => value instanceof Map;

/**
 * Copy mock runtime contents into a map the caller does not hold
 */
const toMockEnvironment = (
  value: MockEnvironment | Readonly<Record<string, string>>,
  report: Report
): MockEnvironment => {
  const entries: readonly (readonly [string, unknown])[] = isMockEnvironment(
    value
  )
    ? [...value.entries()]
    : Object.entries(value);

  const sources = new Map<string, string>();
  for (const [identifier, contents] of entries) {
    if (!identifier.startsWith(RUNTIME_SCHEME)) {
      report(
        createDiagnostic(
          "UG1003",
          "error",
          `Mock runtime identifier "${identifier}" does not use the ${RUNTIME_SCHEME} scheme`
        )
      );
      continue;
    }
    if (typeof contents !== "string") {
      report(
        createDiagnostic(
          "UG1003",
          "error",
          `Mock runtime contents for "${identifier}" must be a string`
        )
      );
      continue;
    }
    sources.set(identifier, contents);
  }
  return sources;
};

const validateRuntime = (
  input: ConfigurationInput,
  cwd: string,
  report: Report
): RuntimeConfiguration | undefined => {
  if (input.useMockRuntime === true) {
    if (input.runtimePath !== undefined) {
      report(conflicting("runtimePath", "useMockRuntime is true"));
    }
    if (input.mockRuntime === undefined) {
      report(missing("mockRuntime", "useMockRuntime is true"));
      return undefined;
    }
    return {
      useMockRuntime: true,
      mockRuntime: toMockEnvironment(input.mockRuntime, report),
    };
  }

  if (input.mockRuntime !== undefined) {
    report(conflicting("mockRuntime", "useMockRuntime is false"));
  }
  if (input.runtimePath === undefined || isBlank(input.runtimePath)) {
    report(missing("runtimePath", "useMockRuntime is false"));
    return undefined;
  }
  return {
    useMockRuntime: false,
    runtimePath: path.resolve(cwd, input.runtimePath),
  };
};

const validatePackages = (
  input: ConfigurationInput,
  cwd: string,
  report: Report
): PackageConfiguration | undefined => {
  if (input.useMultiRoot === true) {
    if (input.packageRoot !== undefined) {
      report(conflicting("packageRoot", "useMultiRoot is true"));
    }
    if (input.packageRoots === undefined || input.packageRoots.length === 0) {
      report(missing("packageRoots", "useMultiRoot is true"));
      return undefined;
    }
    if (input.packageRoots.some((root) => isBlank(root))) {
      report(
        createDiagnostic(
          "UG1003",
          "error",
          "'packageRoots' entries must be non-empty paths"
        )
      );
      return undefined;
    }
    return {
      useMultiRoot: true,
      packageRoots: Object.freeze(
        input.packageRoots.map((root) => path.resolve(cwd, root))
      ),
    };
  }

  if (input.packageRoots !== undefined) {
    report(conflicting("packageRoots", "useMultiRoot is false"));
  }
  const packageRoot = input.packageRoot ?? DEFAULT_PACKAGE_ROOT;
  if (isBlank(packageRoot)) {
    report(
      createDiagnostic(
        "UG1003",
        "error",
        "'packageRoot' must be a non-empty path"
      )
    );
    return undefined;
  }
  return {
    useMultiRoot: false,
    packageRoot: path.resolve(cwd, packageRoot),
  };
};

const validateEntry = (
  input: ConfigurationInput,
  cwd: string,
  report: Report
): EntryConfiguration | undefined => {
  const entryPointFile =
    input.entryPointFile === undefined || isBlank(input.entryPointFile)
      ? undefined
      : path.resolve(cwd, input.entryPointFile);

  if (input.useImplicitEntry !== true) {
    return { useImplicitEntry: false, entryPointFile };
  }
  if (entryPointFile === undefined) {
    report(missing("entryPointFile", "useImplicitEntry is true"));
    return undefined;
  }
  return { useImplicitEntry: true, entryPointFile };
};

/**
 * Validate a configuration input eagerly, collecting every problem
 */
export const validateConfiguration = (
  input: ConfigurationInput,
  cwd: string = process.cwd()
): Result<AnalysisConfiguration, DiagnosticsCollector> => {
  let diagnostics = createDiagnosticsCollector();
  const report: Report = (diagnostic) => {
    diagnostics = addDiagnostic(diagnostics, diagnostic);
  };

  const runtime = validateRuntime(input, cwd, report);
  const packages = validatePackages(input, cwd, report);
  const entry = validateEntry(input, cwd, report);

  if (
    diagnostics.hasErrors ||
    runtime === undefined ||
    packages === undefined ||
    entry === undefined
  ) {
    return error(diagnostics);
  }

  const configuration: AnalysisConfiguration = {
    ...runtime,
    ...packages,
    ...entry,
    inference: {
      inferTransitively:
        input.inference?.inferTransitively ??
        defaultInferenceOptions.inferTransitively,
      onlyInferConstants:
        input.inference?.onlyInferConstants ??
        defaultInferenceOptions.onlyInferConstants,
    },
    verbose: input.verbose ?? false,
  };

  return ok(configuration);
};
