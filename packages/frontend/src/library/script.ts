/**
 * Script unit parsing with the TypeScript compiler API
 */

import * as ts from "typescript";
import {
  Diagnostic,
  SourceLocation,
  createDiagnostic,
} from "../types/diagnostic.js";
import { resolveSpecifier } from "../resolver/scheme.js";
import type { ImportBinding, ReExport } from "./types.js";

export type ParsedScript = {
  readonly sourceFile: ts.SourceFile;
  readonly imports: readonly string[];
  readonly bindings: readonly ImportBinding[];
  readonly reExports: readonly ReExport[];
  readonly starExports: readonly string[];
  readonly exports: ReadonlyMap<string, string>;
  readonly diagnostics: readonly Diagnostic[];
};

const getSourceLocation = (
  file: ts.SourceFile,
  uri: string,
  start: number,
  length: number
): SourceLocation => {
  const { line, character } = file.getLineAndCharacterOfPosition(start);
  return { file: uri, line: line + 1, column: character + 1, length };
};

/**
 * Syntax errors of a unit. transpileModule is the public entry point that
 * reports them without building a program.
 */
const collectSyntaxDiagnostics = (
  uri: string,
  contents: string
): readonly Diagnostic[] => {
  const output = ts.transpileModule(contents, {
    fileName: "unit.ts",
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
    },
  });

  return (output.diagnostics ?? [])
    .filter((diag) => diag.category === ts.DiagnosticCategory.Error)
    .map((diag) =>
      createDiagnostic(
        "UG4002",
        "error",
        ts.flattenDiagnosticMessageText(diag.messageText, "\n"),
        diag.file && diag.start !== undefined
          ? getSourceLocation(diag.file, uri, diag.start, diag.length ?? 1)
          : undefined
      )
    );
};

const hasModifier = (
  statement: ts.Statement,
  kind: ts.SyntaxKind
): boolean =>
  ts.canHaveModifiers(statement) &&
  (ts.getModifiers(statement) ?? []).some(
    (modifier) => modifier.kind === kind
  );

const isExported = (statement: ts.Statement): boolean =>
  hasModifier(statement, ts.SyntaxKind.ExportKeyword);

/**
 * Local name of a function or class declaration. Only a default export
 * may leave it out; it is then known by "default".
 */
export const declaredName = (
  statement: ts.FunctionDeclaration | ts.ClassDeclaration
): string => statement.name?.text ?? "default";

export const parseScript = (uri: string, contents: string): ParsedScript => {
  const sourceFile = ts.createSourceFile(
    uri,
    contents,
    ts.ScriptTarget.Latest,
    false,
    ts.ScriptKind.TS
  );

  const imports: string[] = [];
  const bindings: ImportBinding[] = [];
  const reExports: ReExport[] = [];
  const starExports: string[] = [];
  const exports = new Map<string, string>();

  const addImport = (specifier: string): string => {
    const resolved = resolveSpecifier(specifier, uri);
    if (!imports.includes(resolved)) {
      imports.push(resolved);
    }
    return resolved;
  };

  for (const statement of sourceFile.statements) {
    if (
      ts.isImportDeclaration(statement) &&
      ts.isStringLiteral(statement.moduleSpecifier)
    ) {
      const from = addImport(statement.moduleSpecifier.text);
      const clause = statement.importClause;
      if (clause?.name) {
        bindings.push({
          localName: clause.name.text,
          importedName: "default",
          from,
        });
      }
      if (clause?.namedBindings && ts.isNamedImports(clause.namedBindings)) {
        for (const element of clause.namedBindings.elements) {
          bindings.push({
            localName: element.name.text,
            importedName: (element.propertyName ?? element.name).text,
            from,
          });
        }
      }
      continue;
    }

    if (ts.isExportDeclaration(statement)) {
      const clause = statement.exportClause;
      if (
        statement.moduleSpecifier &&
        ts.isStringLiteral(statement.moduleSpecifier)
      ) {
        const from = addImport(statement.moduleSpecifier.text);
        if (clause && ts.isNamedExports(clause)) {
          for (const element of clause.elements) {
            reExports.push({
              exportedName: element.name.text,
              importedName: (element.propertyName ?? element.name).text,
              from,
            });
          }
        } else if (clause === undefined && !starExports.includes(from)) {
          starExports.push(from);
        }
      } else if (clause && ts.isNamedExports(clause)) {
        for (const element of clause.elements) {
          exports.set(
            element.name.text,
            (element.propertyName ?? element.name).text
          );
        }
      }
      continue;
    }

    if (
      ts.isExportAssignment(statement) &&
      !statement.isExportEquals &&
      ts.isIdentifier(statement.expression)
    ) {
      exports.set("default", statement.expression.text);
      continue;
    }

    if (
      (ts.isFunctionDeclaration(statement) ||
        ts.isClassDeclaration(statement)) &&
      isExported(statement)
    ) {
      const localName = declaredName(statement);
      exports.set(
        hasModifier(statement, ts.SyntaxKind.DefaultKeyword)
          ? "default"
          : localName,
        localName
      );
      continue;
    }

    if (ts.isVariableStatement(statement) && isExported(statement)) {
      for (const declaration of statement.declarationList.declarations) {
        if (ts.isIdentifier(declaration.name)) {
          exports.set(declaration.name.text, declaration.name.text);
        }
      }
    }
  }

  return {
    sourceFile,
    imports,
    bindings,
    reExports,
    starExports,
    exports,
    diagnostics: collectSyntaxDiagnostics(uri, contents),
  };
};
