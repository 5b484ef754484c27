/**
 * Extension Dispatcher - combines extension answers per hook
 */

import type * as ts from "typescript";
import type { HookName, TypeCheckingHooks } from "./hooks.js";
import { HandlerRegistry } from "./handler-registry.js";
import {
  OBJECT_CLASS,
  type ClassLike,
  type MethodCall,
  type MethodCandidate,
  type MethodLike,
  type ReturnSite,
} from "./types.js";

export type DispatcherOptions = {
  /** Log which extension claims each short-circuit hook */
  readonly verbose?: boolean;
};

export const describeExtension = (extension: TypeCheckingHooks): string =>
  extension.constructor === Object || extension.constructor.name === ""
    ? "anonymous extension"
    : extension.constructor.name;

/**
 * The single hook surface the type checker calls.
 *
 * Fans every hook out over the registry's current view:
 * - boolean hooks stop at the first extension answering true
 * - handleAmbiguousMethods threads the candidates through extensions until
 *   one or none remain
 * - handleMissingMethod concatenates every extension's candidates
 * - void hooks reach every extension
 *
 * Errors thrown by an extension propagate to the caller unchanged.
 * The dispatcher implements the hooks itself, so it can also be registered
 * inside another registry.
 */
export class ExtensionDispatcher implements TypeCheckingHooks {
  constructor(
    readonly registry: HandlerRegistry<TypeCheckingHooks> = new HandlerRegistry(),
    private readonly options: DispatcherOptions = {}
  ) {}

  addExtension(extension: TypeCheckingHooks): void {
    this.registry.addGlobal(extension);
  }

  removeExtension(extension: TypeCheckingHooks): void {
    this.registry.removeGlobal(extension);
  }

  pushLocalExtensions(extensions: readonly TypeCheckingHooks[]): void {
    this.registry.pushLocal(extensions);
  }

  popLocalExtensions(): void {
    this.registry.popLocal();
  }

  private firstResponder(
    hook: HookName,
    ask: (extension: TypeCheckingHooks) => boolean
  ): boolean {
    for (const extension of this.registry.currentView()) {
      if (ask(extension)) {
        if (this.options.verbose) {
          console.log(`${hook} handled by ${describeExtension(extension)}`);
        }
        return true;
      }
    }
    return false;
  }

  private broadcast(notify: (extension: TypeCheckingHooks) => void): void {
    for (const extension of this.registry.currentView()) {
      notify(extension);
    }
  }

  /**
   * Extensions registered by a setup call are appended to the globals and
   * set up within this same broadcast.
   */
  setup(): void {
    let count = 0;
    this.broadcast((extension) => {
      count++;
      extension.setup();
    });
    if (this.options.verbose) {
      console.log(`Set up ${count} type checking extension(s)`);
    }
  }

  finish(): void {
    let count = 0;
    this.broadcast((extension) => {
      count++;
      extension.finish();
    });
    if (this.options.verbose) {
      console.log(`Finished ${count} type checking extension(s)`);
    }
  }

  handleUnresolvedVariable(node: ts.Identifier): boolean {
    return this.firstResponder("handleUnresolvedVariable", (extension) =>
      extension.handleUnresolvedVariable(node)
    );
  }

  handleUnresolvedProperty(node: ts.PropertyAccessExpression): boolean {
    return this.firstResponder("handleUnresolvedProperty", (extension) =>
      extension.handleUnresolvedProperty(node)
    );
  }

  handleUnresolvedAttribute(node: ts.ElementAccessExpression): boolean {
    return this.firstResponder("handleUnresolvedAttribute", (extension) =>
      extension.handleUnresolvedAttribute(node)
    );
  }

  handleIncompatibleAssignment(
    lhsType: ts.Type,
    rhsType: ts.Type,
    assignment: ts.Node
  ): boolean {
    return this.firstResponder("handleIncompatibleAssignment", (extension) =>
      extension.handleIncompatibleAssignment(lhsType, rhsType, assignment)
    );
  }

  handleIncompatibleReturnType(
    site: ReturnSite,
    inferredReturnType: ts.Type
  ): boolean {
    return this.firstResponder("handleIncompatibleReturnType", (extension) =>
      extension.handleIncompatibleReturnType(site, inferredReturnType)
    );
  }

  handleAmbiguousMethods(
    candidates: readonly MethodCandidate[],
    origin: ts.Expression
  ): readonly MethodCandidate[] {
    let result = candidates;
    for (const extension of this.registry.currentView()) {
      if (result.length <= 1) {
        break;
      }
      result = extension.handleAmbiguousMethods(result, origin);
    }
    return result;
  }

  handleMissingMethod(
    receiver: ts.Type,
    name: string,
    argumentList: readonly ts.Expression[],
    argumentTypes: readonly ts.Type[],
    call: MethodCall
  ): readonly MethodCandidate[] {
    const result: MethodCandidate[] = [];
    for (const extension of this.registry.currentView()) {
      const contributed = extension.handleMissingMethod(
        receiver,
        name,
        argumentList,
        argumentTypes,
        call
      );
      for (const candidate of contributed) {
        result.push(
          candidate.declaringClass === undefined
            ? { ...candidate, declaringClass: OBJECT_CLASS }
            : candidate
        );
      }
    }
    return result;
  }

  beforeVisitMethod(node: MethodLike): boolean {
    return this.firstResponder("beforeVisitMethod", (extension) =>
      extension.beforeVisitMethod(node)
    );
  }

  afterVisitMethod(node: MethodLike): void {
    this.broadcast((extension) => extension.afterVisitMethod(node));
  }

  beforeVisitClass(node: ClassLike): boolean {
    return this.firstResponder("beforeVisitClass", (extension) =>
      extension.beforeVisitClass(node)
    );
  }

  afterVisitClass(node: ClassLike): void {
    this.broadcast((extension) => extension.afterVisitClass(node));
  }

  beforeMethodCall(call: MethodCall): boolean {
    return this.firstResponder("beforeMethodCall", (extension) =>
      extension.beforeMethodCall(call)
    );
  }

  afterMethodCall(call: MethodCall): void {
    this.broadcast((extension) => extension.afterMethodCall(call));
  }

  onMethodSelection(expression: ts.Expression, target: MethodCandidate): void {
    this.broadcast((extension) =>
      extension.onMethodSelection(expression, target)
    );
  }
}
