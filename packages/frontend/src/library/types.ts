/**
 * Library resolution type definitions
 */

import type { Result } from "../types/result.js";
import type {
  Diagnostic,
  DiagnosticsCollector,
} from "../types/diagnostic.js";

export type DeclarationKind = "const" | "let" | "var" | "function" | "class";

export type InferredDeclaration = {
  readonly name: string;
  readonly kind: DeclarationKind;
  readonly type: string;
  // false when the type is read off an annotation or the declaration
  // form itself, or inference was skipped
  readonly inferred: boolean;
  readonly exported: boolean;
};

export type ImportBinding = {
  readonly localName: string;
  readonly importedName: string;
  readonly from: string;
};

export type ReExport = {
  readonly exportedName: string;
  readonly importedName: string;
  readonly from: string;
};

export type LibraryUnitKind = "script" | "host-document";

export type LibraryUnit = {
  readonly uri: string;
  readonly kind: LibraryUnitKind;
  // Resolved identifiers, in source order, without duplicates
  readonly imports: readonly string[];
  readonly bindings: readonly ImportBinding[];
  readonly reExports: readonly ReExport[];
  // Targets of `export * from`, in source order
  readonly starExports: readonly string[];
  // exported name -> local name
  readonly exports: ReadonlyMap<string, string>;
  readonly declarations: readonly InferredDeclaration[];
  readonly diagnostics: readonly Diagnostic[];
};

export type LibraryProgram = {
  readonly entry: string;
  // Dependencies before dependents
  readonly units: readonly LibraryUnit[];
  readonly diagnostics: DiagnosticsCollector;
};

export type LibraryResolver = {
  readonly resolveLibrary: (
    uri: string
  ) => Result<LibraryUnit, DiagnosticsCollector>;
  readonly resolveProgram: (
    uri: string
  ) => Result<LibraryProgram, DiagnosticsCollector>;
};
