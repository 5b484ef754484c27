/**
 * Base class for type checking extensions
 */

import type * as ts from "typescript";
import type { TypeCheckingHooks } from "./hooks.js";
import type {
  CheckingContext,
  ClassLike,
  MethodCall,
  MethodCandidate,
  MethodLike,
  MethodParameter,
  ReturnSite,
} from "./types.js";

/**
 * Extension with a neutral answer for every hook.
 *
 * Subclasses override the hooks they care about. Anything left alone answers
 * "not handled", keeps ambiguous candidates as they are, contributes no
 * missing methods, and ignores notifications.
 */
export class TypeCheckingExtension implements TypeCheckingHooks {
  constructor(protected readonly context: CheckingContext) {}

  setup(): void {}

  finish(): void {}

  handleUnresolvedVariable(_node: ts.Identifier): boolean {
    return false;
  }

  handleUnresolvedProperty(_node: ts.PropertyAccessExpression): boolean {
    return false;
  }

  handleUnresolvedAttribute(_node: ts.ElementAccessExpression): boolean {
    return false;
  }

  handleIncompatibleAssignment(
    _lhsType: ts.Type,
    _rhsType: ts.Type,
    _assignment: ts.Node
  ): boolean {
    return false;
  }

  handleIncompatibleReturnType(
    _site: ReturnSite,
    _inferredReturnType: ts.Type
  ): boolean {
    return false;
  }

  handleAmbiguousMethods(
    candidates: readonly MethodCandidate[],
    _origin: ts.Expression
  ): readonly MethodCandidate[] {
    return candidates;
  }

  handleMissingMethod(
    _receiver: ts.Type,
    _name: string,
    _argumentList: readonly ts.Expression[],
    _argumentTypes: readonly ts.Type[],
    _call: MethodCall
  ): readonly MethodCandidate[] {
    return [];
  }

  beforeVisitMethod(_node: MethodLike): boolean {
    return false;
  }

  afterVisitMethod(_node: MethodLike): void {}

  beforeVisitClass(_node: ClassLike): boolean {
    return false;
  }

  afterVisitClass(_node: ClassLike): void {}

  beforeMethodCall(_call: MethodCall): boolean {
    return false;
  }

  afterMethodCall(_call: MethodCall): void {}

  onMethodSelection(_expression: ts.Expression, _target: MethodCandidate): void {}

  // Helpers over the checking context

  /**
   * Type of a node, preferring a type stored by an extension
   */
  protected getType(node: ts.Node): ts.Type {
    return this.context.getType(node);
  }

  protected storeType(node: ts.Node, type: ts.Type): void {
    this.context.storeType(node, type);
  }

  protected addStaticTypeError(message: string, node: ts.Node): void {
    this.context.reportError(message, node);
  }

  protected typeToString(type: ts.Type): string {
    return this.context.checker.typeToString(type);
  }

  protected getTargetMethod(call: MethodCall): MethodCandidate | undefined {
    return this.context.getTargetMethod(call);
  }

  /**
   * Build a synthetic method for handleMissingMethod.
   * The dispatcher assigns OBJECT_CLASS when no declaring class is given.
   */
  protected newMethod(
    name: string,
    returnType?: ts.Type,
    parameters: readonly MethodParameter[] = []
  ): MethodCandidate {
    return { name, parameters, returnType, synthetic: true };
  }

  /**
   * Register another extension globally. During setup the new extension
   * still receives the setup call that is in progress.
   */
  protected registerExtension(extension: TypeCheckingHooks): void {
    this.context.registrar.addGlobal(extension);
  }

  protected unregisterExtension(extension: TypeCheckingHooks): void {
    this.context.registrar.removeGlobal(extension);
  }
}
