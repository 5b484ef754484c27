/**
 * Shared types for type checking extensions
 */

import type * as ts from "typescript";
import type { TypeCheckingHooks } from "./hooks.js";

/**
 * Call sites the checker raises method-call hooks for
 */
export type MethodCall = ts.CallExpression | ts.NewExpression;

/**
 * Declarations the checker raises method-visit hooks for
 */
export type MethodLike =
  | ts.MethodDeclaration
  | ts.ConstructorDeclaration
  | ts.FunctionDeclaration
  | ts.GetAccessorDeclaration
  | ts.SetAccessorDeclaration;

export type ClassLike = ts.ClassLikeDeclaration;

/**
 * Where a function hands back a value: a return statement, or the
 * expression body of an arrow function
 */
export type ReturnSite = ts.ReturnStatement | ts.Expression;

export type DeclaringClass = {
  readonly name: string;
  readonly type?: ts.Type;
};

/**
 * Owner given to synthesized methods that arrive without one
 */
export const OBJECT_CLASS: DeclaringClass = { name: "Object" };

export type MethodParameter = {
  readonly name: string;
  readonly type?: ts.Type;
};

/**
 * A method the checker may select for a call site.
 *
 * Candidates built from source declarations carry `declaration`; candidates
 * synthesized by extensions are flagged `synthetic` and may leave
 * `declaringClass` unset until the dispatcher assigns OBJECT_CLASS.
 */
export type MethodCandidate = {
  readonly name: string;
  readonly parameters: readonly MethodParameter[];
  readonly returnType?: ts.Type;
  readonly declaringClass?: DeclaringClass;
  readonly declaration?: ts.SignatureDeclaration;
  readonly synthetic: boolean;
};

/**
 * The only registry operations extensions may reach
 */
export type ExtensionRegistrar = {
  readonly addGlobal: (extension: TypeCheckingHooks) => void;
  readonly removeGlobal: (extension: TypeCheckingHooks) => void;
};

/**
 * What a checking session hands to each extension it instantiates
 */
export type CheckingContext = {
  readonly checker: ts.TypeChecker;
  readonly registrar: ExtensionRegistrar;
  readonly getType: (node: ts.Node) => ts.Type;
  readonly storeType: (node: ts.Node, type: ts.Type) => void;
  readonly reportError: (message: string, node: ts.Node) => void;
  readonly getTargetMethod: (call: MethodCall) => MethodCandidate | undefined;
};
