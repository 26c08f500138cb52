/**
 * Declaration type inference
 *
 * Infers the types of top-level variable declarations from their
 * initializers. Annotated declarations keep their annotation; function
 * and class declarations are typed by their form. Imported bindings are
 * answered by the caller through lookupImport.
 */

import * as ts from "typescript";
import type { InferenceOptions } from "../configuration/types.js";
import { declaredName } from "./script.js";
import type { DeclarationKind, InferredDeclaration } from "./types.js";

export const UNKNOWN_TYPE = "unknown";

export type InferenceScope = {
  readonly locals: ReadonlyMap<string, string>;
  readonly lookupImport: (localName: string) => string | undefined;
};

const ARITHMETIC_OPERATORS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.MinusToken,
  ts.SyntaxKind.AsteriskToken,
  ts.SyntaxKind.AsteriskAsteriskToken,
  ts.SyntaxKind.SlashToken,
  ts.SyntaxKind.PercentToken,
]);

const COMPARISON_OPERATORS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.EqualsEqualsToken,
  ts.SyntaxKind.EqualsEqualsEqualsToken,
  ts.SyntaxKind.ExclamationEqualsToken,
  ts.SyntaxKind.ExclamationEqualsEqualsToken,
  ts.SyntaxKind.LessThanToken,
  ts.SyntaxKind.LessThanEqualsToken,
  ts.SyntaxKind.GreaterThanToken,
  ts.SyntaxKind.GreaterThanEqualsToken,
  ts.SyntaxKind.InstanceOfKeyword,
  ts.SyntaxKind.InKeyword,
]);

const declarationKind = (list: ts.VariableDeclarationList): DeclarationKind =>
  list.flags & ts.NodeFlags.Const
    ? "const"
    : list.flags & ts.NodeFlags.Let
      ? "let"
      : "var";

const unionOf = (left: string, right: string): string =>
  left === right ? left : `${left} | ${right}`;

const inferArray = (
  node: ts.ArrayLiteralExpression,
  sourceFile: ts.SourceFile,
  scope: InferenceScope
): string => {
  const elementTypes = new Set(
    node.elements.map((element) =>
      ts.isSpreadElement(element)
        ? UNKNOWN_TYPE
        : inferExpressionType(element, sourceFile, scope)
    )
  );
  const [only] = [...elementTypes];
  if (elementTypes.size !== 1 || only === undefined) {
    return `${UNKNOWN_TYPE}[]`;
  }
  return only.includes(" ") ? `(${only})[]` : `${only}[]`;
};

const inferBinary = (
  node: ts.BinaryExpression,
  sourceFile: ts.SourceFile,
  scope: InferenceScope
): string => {
  const operator = node.operatorToken.kind;
  if (ARITHMETIC_OPERATORS.has(operator)) {
    const left = inferExpressionType(node.left, sourceFile, scope);
    const right = inferExpressionType(node.right, sourceFile, scope);
    return left === "bigint" && right === "bigint" ? "bigint" : "number";
  }
  if (COMPARISON_OPERATORS.has(operator)) {
    return "boolean";
  }
  if (operator === ts.SyntaxKind.PlusToken) {
    const left = inferExpressionType(node.left, sourceFile, scope);
    const right = inferExpressionType(node.right, sourceFile, scope);
    if (left === "string" || right === "string") return "string";
    if (left === "number" && right === "number") return "number";
  }
  return UNKNOWN_TYPE;
};

export const inferExpressionType = (
  node: ts.Expression,
  sourceFile: ts.SourceFile,
  scope: InferenceScope
): string => {
  if (ts.isParenthesizedExpression(node)) {
    return inferExpressionType(node.expression, sourceFile, scope);
  }
  if (ts.isSatisfiesExpression(node)) {
    return inferExpressionType(node.expression, sourceFile, scope);
  }
  if (ts.isAsExpression(node) || ts.isTypeAssertionExpression(node)) {
    return node.type.getText(sourceFile);
  }
  if (ts.isNumericLiteral(node)) {
    return "number";
  }
  if (ts.isBigIntLiteral(node)) {
    return "bigint";
  }
  if (
    ts.isStringLiteral(node) ||
    ts.isNoSubstitutionTemplateLiteral(node) ||
    ts.isTemplateExpression(node)
  ) {
    return "string";
  }
  if (ts.isPrefixUnaryExpression(node)) {
    if (node.operator === ts.SyntaxKind.ExclamationToken) {
      return "boolean";
    }
    const operand = inferExpressionType(node.operand, sourceFile, scope);
    return operand === "number" || operand === "bigint"
      ? operand
      : UNKNOWN_TYPE;
  }
  if (ts.isArrayLiteralExpression(node)) {
    return inferArray(node, sourceFile, scope);
  }
  if (ts.isObjectLiteralExpression(node)) {
    return "object";
  }
  if (ts.isArrowFunction(node) || ts.isFunctionExpression(node)) {
    return "Function";
  }
  if (ts.isNewExpression(node) && ts.isIdentifier(node.expression)) {
    return node.expression.text;
  }
  if (ts.isBinaryExpression(node)) {
    return inferBinary(node, sourceFile, scope);
  }
  if (ts.isConditionalExpression(node)) {
    return unionOf(
      inferExpressionType(node.whenTrue, sourceFile, scope),
      inferExpressionType(node.whenFalse, sourceFile, scope)
    );
  }
  if (ts.isIdentifier(node)) {
    if (node.text === "undefined") return "undefined";
    return (
      scope.locals.get(node.text) ??
      scope.lookupImport(node.text) ??
      UNKNOWN_TYPE
    );
  }

  switch (node.kind) {
    case ts.SyntaxKind.TrueKeyword:
    case ts.SyntaxKind.FalseKeyword:
      return "boolean";
    case ts.SyntaxKind.NullKeyword:
      return "null";
    default:
      return UNKNOWN_TYPE;
  }
};

/**
 * Infer every top-level variable declaration of a unit, in source order.
 * Earlier declarations are visible to later initializers.
 */
export const inferDeclarations = (
  sourceFile: ts.SourceFile,
  exportedLocals: ReadonlySet<string>,
  options: InferenceOptions,
  lookupImport: (localName: string) => string | undefined
): readonly InferredDeclaration[] => {
  const locals = new Map<string, string>();
  const scope: InferenceScope = { locals, lookupImport };
  const declarations: InferredDeclaration[] = [];

  for (const statement of sourceFile.statements) {
    if (
      ts.isFunctionDeclaration(statement) ||
      ts.isClassDeclaration(statement)
    ) {
      const name = declaredName(statement);
      const isFunction = ts.isFunctionDeclaration(statement);
      // Overloads repeat the name of the first signature
      if (isFunction && locals.has(name)) {
        continue;
      }
      const type =
        isFunction || statement.name === undefined
          ? "Function"
          : `typeof ${name}`;

      locals.set(name, type);
      declarations.push({
        name,
        kind: isFunction ? "function" : "class",
        type,
        inferred: false,
        exported: exportedLocals.has(name),
      });
      continue;
    }
    if (!ts.isVariableStatement(statement)) {
      continue;
    }

    const kind = declarationKind(statement.declarationList);
    for (const declaration of statement.declarationList.declarations) {
      if (!ts.isIdentifier(declaration.name)) {
        continue;
      }
      const name = declaration.name.text;

      const { type, inferred } = declaration.type
        ? { type: declaration.type.getText(sourceFile), inferred: false }
        : (options.onlyInferConstants && kind !== "const") ||
            declaration.initializer === undefined
          ? { type: UNKNOWN_TYPE, inferred: false }
          : {
              type: inferExpressionType(
                declaration.initializer,
                sourceFile,
                scope
              ),
              inferred: true,
            };

      locals.set(name, type);
      declarations.push({
        name,
        kind,
        type,
        inferred,
        exported: exportedLocals.has(name),
      });
    }
  }

  return declarations;
};
