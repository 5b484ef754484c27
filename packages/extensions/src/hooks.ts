/**
 * Hook surface shared by extensions and the dispatcher
 */

import type * as ts from "typescript";
import type {
  ClassLike,
  MethodCall,
  MethodCandidate,
  MethodLike,
  ReturnSite,
} from "./types.js";

/**
 * Every hook the type checker raises.
 *
 * Boolean hooks answer "handled"; a `before*` hook answering true makes the
 * checker skip the node. List hooks either narrow the candidates they are
 * given or contribute new ones. Void hooks are notifications.
 */
export type TypeCheckingHooks = {
  setup(): void;
  finish(): void;

  handleUnresolvedVariable(node: ts.Identifier): boolean;
  handleUnresolvedProperty(node: ts.PropertyAccessExpression): boolean;
  handleUnresolvedAttribute(node: ts.ElementAccessExpression): boolean;
  handleIncompatibleAssignment(
    lhsType: ts.Type,
    rhsType: ts.Type,
    assignment: ts.Node
  ): boolean;
  handleIncompatibleReturnType(
    site: ReturnSite,
    inferredReturnType: ts.Type
  ): boolean;

  handleAmbiguousMethods(
    candidates: readonly MethodCandidate[],
    origin: ts.Expression
  ): readonly MethodCandidate[];
  handleMissingMethod(
    receiver: ts.Type,
    name: string,
    argumentList: readonly ts.Expression[],
    argumentTypes: readonly ts.Type[],
    call: MethodCall
  ): readonly MethodCandidate[];

  beforeVisitMethod(node: MethodLike): boolean;
  afterVisitMethod(node: MethodLike): void;
  beforeVisitClass(node: ClassLike): boolean;
  afterVisitClass(node: ClassLike): void;
  beforeMethodCall(call: MethodCall): boolean;
  afterMethodCall(call: MethodCall): void;
  onMethodSelection(expression: ts.Expression, target: MethodCandidate): void;
};

export type HookName = keyof TypeCheckingHooks;
