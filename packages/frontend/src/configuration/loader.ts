/**
 * Project file loader - reads unitgraph.json into a ConfigurationInput
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { Result, ok, error } from "../types/result.js";
import {
  Diagnostic,
  DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
  singleDiagnostic,
} from "../types/diagnostic.js";
import type { ConfigurationInput, InferenceOptions } from "./types.js";

export const CONFIG_FILE_NAME = "unitgraph.json";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const invalidField = (field: string, expected: string): Diagnostic =>
  createDiagnostic(
    "UG1003",
    "error",
    `${CONFIG_FILE_NAME}: '${field}' must be ${expected}`
  );

/**
 * Find unitgraph.json by walking up the directory tree
 */
export const findConfigurationFile = (startDir: string): string | null => {
  let currentDir = path.resolve(startDir);

  while (true) {
    const configPath = path.join(currentDir, CONFIG_FILE_NAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Check parsed JSON field by field. Relative paths are resolved against
 * the directory holding the file.
 */
export const parseConfigurationObject = (
  data: unknown,
  baseDir: string
): Result<ConfigurationInput, DiagnosticsCollector> => {
  if (!isRecord(data)) {
    return error(
      singleDiagnostic(
        createDiagnostic(
          "UG1005",
          "error",
          `${CONFIG_FILE_NAME} must contain an object, got ${Array.isArray(data) ? "array" : typeof data}`
        )
      )
    );
  }

  const fields: Record<string, unknown> = data;
  let diagnostics = createDiagnosticsCollector();
  const report = (diagnostic: Diagnostic): void => {
    diagnostics = addDiagnostic(diagnostics, diagnostic);
  };

  const readBoolean = (field: string): boolean | undefined => {
    const value = fields[field];
    if (value === undefined || typeof value === "boolean") return value;
    report(invalidField(field, "a boolean"));
    return undefined;
  };

  const readPath = (field: string): string | undefined => {
    const value = fields[field];
    if (value === undefined) return undefined;
    if (typeof value === "string") return path.resolve(baseDir, value);
    report(invalidField(field, "a string"));
    return undefined;
  };

  const readPathList = (field: string): readonly string[] | undefined => {
    const value = fields[field];
    if (value === undefined) return undefined;
    if (Array.isArray(value)) {
      const paths: string[] = [];
      for (const item of value) {
        if (typeof item !== "string") {
          report(invalidField(field, "an array of strings"));
          return undefined;
        }
        paths.push(path.resolve(baseDir, item));
      }
      return paths;
    }
    report(invalidField(field, "an array of strings"));
    return undefined;
  };

  const readMockRuntime = (): Readonly<Record<string, string>> | undefined => {
    const value = fields.mockRuntime;
    if (value === undefined) return undefined;
    if (!isRecord(value)) {
      report(invalidField("mockRuntime", "an object of strings"));
      return undefined;
    }
    const sources: Record<string, string> = {};
    for (const [identifier, contents] of Object.entries(value)) {
      if (typeof contents !== "string") {
        report(invalidField(`mockRuntime.${identifier}`, "a string"));
        continue;
      }
      sources[identifier] = contents;
    }
    return sources;
  };

  const readInference = (): Partial<InferenceOptions> | undefined => {
    const value = fields.inference;
    if (value === undefined) return undefined;
    if (!isRecord(value)) {
      report(invalidField("inference", "an object"));
      return undefined;
    }
    const options: { -readonly [K in keyof InferenceOptions]?: boolean } = {};
    for (const key of ["inferTransitively", "onlyInferConstants"] as const) {
      const option = value[key];
      if (option === undefined) continue;
      if (typeof option !== "boolean") {
        report(invalidField(`inference.${key}`, "a boolean"));
        continue;
      }
      options[key] = option;
    }
    return options;
  };

  const input: ConfigurationInput = {
    useMockRuntime: readBoolean("useMockRuntime"),
    runtimePath: readPath("runtimePath"),
    mockRuntime: readMockRuntime(),
    useImplicitEntry: readBoolean("useImplicitEntry"),
    entryPointFile: readPath("entryPointFile"),
    useMultiRoot: readBoolean("useMultiRoot"),
    packageRoots: readPathList("packageRoots"),
    packageRoot: readPath("packageRoot"),
    inference: readInference(),
    verbose: readBoolean("verbose"),
  };

  return diagnostics.hasErrors ? error(diagnostics) : ok(input);
};

/**
 * Load unitgraph.json from disk
 */
export const loadConfigurationFile = (
  configPath: string
): Result<ConfigurationInput, DiagnosticsCollector> => {
  if (!fs.existsSync(configPath)) {
    return error(
      singleDiagnostic(
        createDiagnostic(
          "UG1004",
          "error",
          `Config file not found: ${configPath}`
        )
      )
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    return error(
      singleDiagnostic(
        createDiagnostic(
          "UG1005",
          "error",
          `Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`
        )
      )
    );
  }

  return parseConfigurationObject(parsed, path.dirname(configPath));
};
