/**
 * Runtime library layout discovery
 *
 * A runtime library directory either carries a libraries.json manifest:
 *
 *   { "libraries": { "core": "core/core.ts", "collections": "collections/index.ts" } }
 *
 * or follows the lib/<name>/<name>.ts convention.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { Result, ok, error } from "../types/result.js";
import { Diagnostic, createDiagnostic } from "../types/diagnostic.js";

export const RUNTIME_MANIFEST = "libraries.json";

export type RuntimeLayout = {
  readonly root: string;
  // library name -> absolute path of its entry unit
  readonly libraries: ReadonlyMap<string, string>;
};

const invalidLayout = (message: string, hint?: string): Diagnostic =>
  createDiagnostic("UG2004", "error", message, undefined, hint);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readManifest = (
  root: string,
  manifestPath: string
): Result<RuntimeLayout, Diagnostic> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(manifestPath, "utf-8"));
  } catch (err) {
    return error(
      invalidLayout(
        `Failed to read runtime manifest: ${err instanceof Error ? err.message : String(err)}`,
        `Manifest: ${manifestPath}`
      )
    );
  }

  if (!isRecord(parsed) || !isRecord(parsed.libraries)) {
    return error(
      invalidLayout(
        "Runtime manifest must contain a 'libraries' object",
        `Manifest: ${manifestPath}`
      )
    );
  }

  const libraries = new Map<string, string>();
  for (const [name, entry] of Object.entries(parsed.libraries)) {
    if (typeof entry !== "string") {
      return error(
        invalidLayout(
          `Runtime manifest entry for '${name}' must be a string path`,
          `Manifest: ${manifestPath}`
        )
      );
    }
    libraries.set(name, path.resolve(root, entry));
  }

  return ok({ root, libraries });
};

const scanLibDirectory = (root: string, libDir: string): RuntimeLayout => {
  const libraries = new Map<string, string>();
  const entries = fs.readdirSync(libDir, { withFileTypes: true });

  for (const entry of [...entries].sort((a, b) =>
    a.name.localeCompare(b.name)
  )) {
    if (!entry.isDirectory()) continue;
    const entryPath = path.join(libDir, entry.name, `${entry.name}.ts`);
    if (fs.existsSync(entryPath)) {
      libraries.set(entry.name, entryPath);
    }
  }

  return { root, libraries };
};

/**
 * Discover the libraries of a runtime library directory
 */
export const discoverRuntimeLayout = (
  runtimePath: string
): Result<RuntimeLayout, Diagnostic> => {
  const root = path.resolve(runtimePath);

  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    return error(
      invalidLayout(
        `Runtime library directory not found: ${root}`,
        "Check 'runtimePath' or use a mock runtime"
      )
    );
  }

  const manifestPath = path.join(root, RUNTIME_MANIFEST);
  if (fs.existsSync(manifestPath)) {
    return readManifest(root, manifestPath);
  }

  const libDir = path.join(root, "lib");
  if (fs.existsSync(libDir) && fs.statSync(libDir).isDirectory()) {
    return ok(scanLibDirectory(root, libDir));
  }

  return error(
    invalidLayout(
      `No ${RUNTIME_MANIFEST} or lib/ directory in ${root}`,
      "A runtime library directory needs one of the two"
    )
  );
};
