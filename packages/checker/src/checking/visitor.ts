/**
 * Checking visitor - walks a source file and raises extension hooks
 */

import * as ts from "typescript";
import type { MethodCall, MethodLike, ReturnSite } from "@typecheck-hooks/extensions";
import type { CheckingSession } from "./session.js";
import {
  type ClosureLike,
  candidateFromSignature,
  describeCandidate,
  isMethodLike,
  isUncheckedType,
  isValueReference,
  reportsWithin,
} from "./helpers.js";

// "Type 'X' is not assignable to type 'Y'"
const NOT_ASSIGNABLE_CODE = 2322;

const incompatibilityPositions = (
  program: ts.Program,
  sourceFile: ts.SourceFile
): readonly number[] =>
  program
    .getSemanticDiagnostics(sourceFile)
    .filter((d) => d.code === NOT_ASSIGNABLE_CODE && d.file === sourceFile)
    .map((d) => d.start)
    .filter((start): start is number => start !== undefined);

const isCompoundAssignment = (node: ts.BinaryExpression): boolean =>
  node.operatorToken.kind >= ts.SyntaxKind.FirstCompoundAssignment &&
  node.operatorToken.kind <= ts.SyntaxKind.LastCompoundAssignment;

// The base class of `class X extends Base` is a value
const isClassExtendsClause = (
  node: ts.Node
): node is ts.ExpressionWithTypeArguments =>
  ts.isExpressionWithTypeArguments(node) &&
  ts.isHeritageClause(node.parent) &&
  node.parent.token === ts.SyntaxKind.ExtendsKeyword &&
  ts.isClassLike(node.parent.parent);

/**
 * Check one source file.
 *
 * Resolution is the TypeScript checker's: a name without a symbol is
 * unresolved, and a 2322 error on an assignment or return makes it
 * incompatible. Each such event goes to the extensions first; only events
 * no extension handles become diagnostics.
 */
export const visitSourceFile = (
  session: CheckingSession,
  sourceFile: ts.SourceFile
): void => {
  const { checker, dispatcher } = session;
  const incompatibleAt = incompatibilityPositions(
    session.program.program,
    sourceFile
  );

  if (session.verbose) {
    console.log(`Checking ${sourceFile.fileName}`);
  }

  const typeName = (type: ts.Type): string => checker.typeToString(type);

  const visitChildren = (node: ts.Node): void => {
    ts.forEachChild(node, visit);
  };

  const checkVariable = (node: ts.Identifier, symbol: ts.Symbol | undefined): void => {
    if (symbol !== undefined || session.hasStoredType(node)) return;
    if (!dispatcher.handleUnresolvedVariable(node)) {
      session.report("TCH2001", `Cannot find variable '${node.text}'`, node);
    }
  };

  const visitIdentifier = (node: ts.Identifier): void => {
    if (!isValueReference(node)) return;
    checkVariable(node, checker.getSymbolAtLocation(node));
  };

  const visitShorthandProperty = (node: ts.ShorthandPropertyAssignment): void => {
    checkVariable(node.name, checker.getShorthandAssignmentValueSymbol(node));
    if (node.objectAssignmentInitializer) {
      visit(node.objectAssignmentInitializer);
    }
  };

  const visitPropertyAccess = (node: ts.PropertyAccessExpression): void => {
    visit(node.expression);
    if (session.hasStoredType(node)) return;
    if (checker.getSymbolAtLocation(node.name) !== undefined) return;

    const receiver = session.getType(node.expression);
    if (isUncheckedType(receiver)) return;

    if (!dispatcher.handleUnresolvedProperty(node)) {
      session.report(
        "TCH2002",
        `No such property: ${node.name.text} for type ${typeName(receiver)}`,
        node.name
      );
    }
  };

  const visitElementAccess = (node: ts.ElementAccessExpression): void => {
    visit(node.expression);
    visit(node.argumentExpression);

    const key = node.argumentExpression;
    if (!ts.isStringLiteral(key) && !ts.isNoSubstitutionTemplateLiteral(key)) {
      return;
    }
    if (session.hasStoredType(node)) return;

    const receiver = session.getType(node.expression);
    if (isUncheckedType(receiver)) return;

    const apparent = checker.getApparentType(receiver);
    if (checker.getPropertyOfType(apparent, key.text) !== undefined) return;
    if (checker.getIndexInfosOfType(apparent).length > 0) return;

    if (!dispatcher.handleUnresolvedAttribute(node)) {
      session.report(
        "TCH2003",
        `No such attribute: ${key.text} for type ${typeName(receiver)}`,
        node
      );
    }
  };

  const selectResolvedSignature = (call: MethodCall): void => {
    const signature = checker.getResolvedSignature(call);
    const declaration = signature?.declaration;
    if (
      signature === undefined ||
      declaration === undefined ||
      ts.isJSDocSignature(declaration)
    ) {
      return;
    }
    session.selectMethod(
      call,
      candidateFromSignature(checker, signature, declaration)
    );
  };

  /**
   * A member call whose method does not exist on the receiver is offered to
   * the extensions; several candidates are narrowed before one is selected.
   */
  const resolveMemberCall = (
    call: ts.CallExpression,
    callee: ts.PropertyAccessExpression
  ): void => {
    if (checker.getSymbolAtLocation(callee.name) !== undefined) {
      selectResolvedSignature(call);
      return;
    }

    const receiver = session.getType(callee.expression);
    if (isUncheckedType(receiver)) return;

    const name = callee.name.text;
    const argumentTypes = call.arguments.map((arg) => session.getType(arg));
    const found = dispatcher.handleMissingMethod(
      receiver,
      name,
      call.arguments,
      argumentTypes,
      call
    );
    const chosen =
      found.length > 1 ? dispatcher.handleAmbiguousMethods(found, call) : found;

    const [target] = chosen;
    if (target === undefined) {
      session.report(
        "TCH2006",
        `Cannot find matching method ${typeName(receiver)}#${name}(${argumentTypes
          .map(typeName)
          .join(", ")})`,
        callee.name
      );
    } else if (chosen.length > 1) {
      session.report(
        "TCH2007",
        `Reference to method is ambiguous. Cannot choose between ${chosen
          .map((candidate) => describeCandidate(checker, candidate))
          .join(", ")}`,
        callee.name
      );
    } else {
      session.selectMethod(call, target);
    }
  };

  const visitCall = (call: MethodCall): void => {
    if (dispatcher.beforeMethodCall(call)) {
      dispatcher.afterMethodCall(call);
      return;
    }

    const callee = call.expression;
    if (ts.isCallExpression(call) && ts.isPropertyAccessExpression(callee)) {
      visit(callee.expression);
      call.arguments.forEach(visit);
      resolveMemberCall(call, callee);
    } else {
      visit(callee);
      call.arguments?.forEach(visit);
      selectResolvedSignature(call);
    }

    dispatcher.afterMethodCall(call);
  };

  const checkAssignment = (
    node: ts.Node,
    lhsType: ts.Type,
    value: ts.Expression
  ): void => {
    if (!reportsWithin(sourceFile, node, incompatibleAt)) return;

    const rhsType = session.getType(value);
    if (!dispatcher.handleIncompatibleAssignment(lhsType, rhsType, node)) {
      session.report(
        "TCH2004",
        `Cannot assign value of type ${typeName(rhsType)} to variable of type ${typeName(lhsType)}`,
        node
      );
    }
  };

  const visitDeclaration = (
    node: ts.VariableDeclaration | ts.PropertyDeclaration | ts.ParameterDeclaration
  ): void => {
    visitChildren(node);
    if (node.initializer === undefined) return;

    const lhsType = node.type
      ? checker.getTypeFromTypeNode(node.type)
      : checker.getTypeAtLocation(node.name);
    checkAssignment(node, lhsType, node.initializer);
  };

  const visitAssignment = (node: ts.BinaryExpression): void => {
    visitChildren(node);
    // a compound assignment stores the result of the whole operation
    const value = isCompoundAssignment(node) ? node : node.right;
    checkAssignment(node, checker.getTypeAtLocation(node.left), value);
  };

  const checkReturn = (
    node: ReturnSite,
    expression: ts.Expression,
    container: ts.SignatureDeclaration | undefined
  ): void => {
    if (!reportsWithin(sourceFile, node, incompatibleAt)) return;

    const inferred = session.getType(expression);
    if (dispatcher.handleIncompatibleReturnType(node, inferred)) return;

    const declared =
      container?.type !== undefined
        ? typeName(checker.getTypeFromTypeNode(container.type))
        : "unknown";
    session.report(
      "TCH2005",
      `Cannot return value of type ${typeName(inferred)} on method returning type ${declared}`,
      node
    );
  };

  const visitReturn = (node: ts.ReturnStatement): void => {
    visitChildren(node);
    if (node.expression === undefined) return;
    checkReturn(
      node,
      node.expression,
      ts.findAncestor(node.parent, ts.isFunctionLike)
    );
  };

  const visitClosureBody = (node: ClosureLike): void => {
    visitChildren(node);
    if (ts.isArrowFunction(node) && !ts.isBlock(node.body)) {
      checkReturn(node.body, node.body, node);
    }
  };

  const visitMethod = (node: MethodLike): void => {
    if (node.body === undefined) return;
    if (!dispatcher.beforeVisitMethod(node)) {
      visitChildren(node);
    }
    dispatcher.afterVisitMethod(node);
  };

  const visitClass = (node: ts.ClassLikeDeclaration): void => {
    if (!dispatcher.beforeVisitClass(node)) {
      visitChildren(node);
    }
    dispatcher.afterVisitClass(node);
  };

  /**
   * Closures may carry their own extensions, active only inside the body
   */
  const visitClosure = (node: ClosureLike): void => {
    const local = session.localExtensionsFor(node);
    if (local.length === 0) {
      visitClosureBody(node);
      return;
    }

    dispatcher.pushLocalExtensions(local);
    try {
      visitClosureBody(node);
    } finally {
      dispatcher.popLocalExtensions();
    }
  };

  const visit = (node: ts.Node): void => {
    if (isClassExtendsClause(node)) {
      visit(node.expression);
      return;
    }

    if (
      ts.isTypeNode(node) ||
      ts.isImportDeclaration(node) ||
      ts.isExportDeclaration(node) ||
      ts.isInterfaceDeclaration(node) ||
      ts.isTypeAliasDeclaration(node)
    ) {
      return;
    }

    if (ts.isClassDeclaration(node) || ts.isClassExpression(node)) {
      visitClass(node);
    } else if (isMethodLike(node)) {
      visitMethod(node);
    } else if (ts.isArrowFunction(node) || ts.isFunctionExpression(node)) {
      visitClosure(node);
    } else if (ts.isCallExpression(node) || ts.isNewExpression(node)) {
      visitCall(node);
    } else if (ts.isPropertyAccessExpression(node)) {
      visitPropertyAccess(node);
    } else if (ts.isElementAccessExpression(node)) {
      visitElementAccess(node);
    } else if (ts.isShorthandPropertyAssignment(node)) {
      visitShorthandProperty(node);
    } else if (ts.isIdentifier(node)) {
      visitIdentifier(node);
    } else if (
      ts.isVariableDeclaration(node) ||
      ts.isPropertyDeclaration(node) ||
      ts.isParameter(node)
    ) {
      visitDeclaration(node);
    } else if (
      ts.isBinaryExpression(node) &&
      (node.operatorToken.kind === ts.SyntaxKind.EqualsToken ||
        isCompoundAssignment(node))
    ) {
      visitAssignment(node);
    } else if (ts.isReturnStatement(node)) {
      visitReturn(node);
    } else {
      visitChildren(node);
    }
  };

  visitChildren(sourceFile);
};
