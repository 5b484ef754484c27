/**
 * Checking helper functions
 */

import * as ts from "typescript";
import type {
  DeclaringClass,
  MethodCandidate,
  MethodLike,
} from "@typecheck-hooks/extensions";
import type { SourceLocation } from "../types/diagnostic.js";

export type ClosureLike = ts.ArrowFunction | ts.FunctionExpression;

/**
 * Get location information for a node
 */
export const getNodeLocation = (
  sourceFile: ts.SourceFile,
  node: ts.Node
): SourceLocation => {
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(
    node.getStart(sourceFile)
  );
  return {
    file: sourceFile.fileName,
    line: line + 1,
    column: character + 1,
    length: node.getWidth(sourceFile),
  };
};

export const isMethodLike = (node: ts.Node): node is MethodLike =>
  ts.isMethodDeclaration(node) ||
  ts.isConstructorDeclaration(node) ||
  ts.isFunctionDeclaration(node) ||
  ts.isGetAccessorDeclaration(node) ||
  ts.isSetAccessorDeclaration(node);

/**
 * Whether an identifier reads a value, as opposed to naming a declaration,
 * a member, a property key or a label
 */
export const isValueReference = (node: ts.Identifier): boolean => {
  const parent = node.parent;
  if ("name" in parent && parent.name === node) return false;
  if ("propertyName" in parent && parent.propertyName === node) return false;
  if ("label" in parent && parent.label === node) return false;
  if (ts.isQualifiedName(parent)) return false;
  return true;
};

/**
 * Receivers whose members the checker cannot judge
 */
export const isUncheckedType = (type: ts.Type): boolean =>
  (type.flags & (ts.TypeFlags.Any | ts.TypeFlags.Unknown)) !== 0;

const declarationName = (declaration: ts.SignatureDeclaration): string => {
  const name = declaration.name;
  if (
    name !== undefined &&
    (ts.isIdentifier(name) ||
      ts.isPrivateIdentifier(name) ||
      ts.isStringLiteral(name) ||
      ts.isNumericLiteral(name))
  ) {
    return name.text;
  }
  if (
    ts.isConstructorDeclaration(declaration) ||
    ts.isConstructSignatureDeclaration(declaration)
  ) {
    return "constructor";
  }
  return "<anonymous>";
};

const declaringClassOf = (
  checker: ts.TypeChecker,
  declaration: ts.SignatureDeclaration
): DeclaringClass | undefined => {
  const owner = declaration.parent;
  if (ts.isClassLike(owner) || ts.isInterfaceDeclaration(owner)) {
    return {
      name: owner.name?.text ?? "<anonymous>",
      type: checker.getTypeAtLocation(owner),
    };
  }
  return undefined;
};

/**
 * Candidate for a signature the TypeScript checker resolved
 */
export const candidateFromSignature = (
  checker: ts.TypeChecker,
  signature: ts.Signature,
  declaration: ts.SignatureDeclaration
): MethodCandidate => ({
  name: declarationName(declaration),
  parameters: signature.getParameters().map((parameter) => ({
    name: parameter.getName(),
    type: checker.getTypeOfSymbolAtLocation(parameter, declaration),
  })),
  returnType: checker.getReturnTypeOfSignature(signature),
  declaringClass: declaringClassOf(checker, declaration),
  declaration,
  synthetic: false,
});

/**
 * Render a candidate as `Owner#name(type, ...)`
 */
export const describeCandidate = (
  checker: ts.TypeChecker,
  candidate: MethodCandidate
): string => {
  const owner = candidate.declaringClass?.name ?? "Object";
  const parameters = candidate.parameters
    .map((parameter) =>
      parameter.type ? checker.typeToString(parameter.type) : "unknown"
    )
    .join(", ");
  return `${owner}#${candidate.name}(${parameters})`;
};

/**
 * Positions of nested functions and classes inside a node, which own the
 * diagnostics reported within them
 */
const nestedScopes = (node: ts.Node): readonly ts.Node[] => {
  const scopes: ts.Node[] = [];
  const visit = (child: ts.Node): void => {
    if (ts.isFunctionLike(child) || ts.isClassLike(child)) {
      scopes.push(child);
      return;
    }
    ts.forEachChild(child, visit);
  };
  ts.forEachChild(node, visit);
  return scopes;
};

/**
 * Whether any of `positions` falls inside `node` but outside the functions
 * and classes nested in it
 */
export const reportsWithin = (
  sourceFile: ts.SourceFile,
  node: ts.Node,
  positions: readonly number[]
): boolean => {
  const start = node.getStart(sourceFile);
  const end = node.getEnd();
  const inside = positions.filter((pos) => pos >= start && pos < end);
  if (inside.length === 0) return false;

  const scopes = nestedScopes(node);
  return inside.some(
    (pos) =>
      !scopes.some((scope) => pos >= scope.getStart(sourceFile) && pos < scope.getEnd())
  );
};
