/**
 * Checking session - owns the extension registry for one checking run
 */

import type * as ts from "typescript";
import {
  ExtensionDispatcher,
  HandlerRegistry,
  type CheckingContext,
  type MethodCall,
  type MethodCandidate,
  type TypeCheckingHooks,
} from "@typecheck-hooks/extensions";
import type { CheckingProgram } from "../program/types.js";
import {
  type DiagnosticCode,
  type DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";
import { type ClosureLike, getNodeLocation } from "./helpers.js";
import type { CheckOptions } from "./types.js";

/**
 * State of one checking run.
 *
 * Global extensions are created from the option factories when the session
 * starts and discarded with it. Nothing here outlives the session.
 */
export class CheckingSession {
  readonly dispatcher: ExtensionDispatcher;
  readonly context: CheckingContext;

  private readonly storedTypes = new Map<ts.Node, ts.Type>();
  private readonly targets = new Map<MethodCall, MethodCandidate>();
  private collector: DiagnosticsCollector = createDiagnosticsCollector();

  constructor(
    readonly program: CheckingProgram,
    private readonly options: CheckOptions = {}
  ) {
    const registry = new HandlerRegistry<TypeCheckingHooks>();
    this.dispatcher = new ExtensionDispatcher(registry, {
      verbose: options.verbose,
    });

    this.context = {
      checker: program.checker,
      registrar: {
        addGlobal: (extension) => registry.addGlobal(extension),
        removeGlobal: (extension) => registry.removeGlobal(extension),
      },
      getType: (node) => this.getType(node),
      storeType: (node, type) => this.storeType(node, type),
      reportError: (message, node) => this.report("TCH3001", message, node),
      getTargetMethod: (call) => this.targets.get(call),
    };

    for (const factory of options.extensions ?? []) {
      registry.addGlobal(factory(this.context));
    }
  }

  get checker(): ts.TypeChecker {
    return this.program.checker;
  }

  get diagnostics(): DiagnosticsCollector {
    return this.collector;
  }

  get inferredTypes(): ReadonlyMap<ts.Node, ts.Type> {
    return this.storedTypes;
  }

  get selectedMethods(): ReadonlyMap<MethodCall, MethodCandidate> {
    return this.targets;
  }

  get verbose(): boolean {
    return this.options.verbose ?? false;
  }

  getType(node: ts.Node): ts.Type {
    return this.storedTypes.get(node) ?? this.checker.getTypeAtLocation(node);
  }

  hasStoredType(node: ts.Node): boolean {
    return this.storedTypes.has(node);
  }

  storeType(node: ts.Node, type: ts.Type): void {
    this.storedTypes.set(node, type);
  }

  /**
   * Record the method chosen for a call and tell every extension
   */
  selectMethod(call: MethodCall, target: MethodCandidate): void {
    this.targets.set(call, target);
    if (target.returnType !== undefined) {
      this.storedTypes.set(call, target.returnType);
    }
    this.dispatcher.onMethodSelection(call, target);
  }

  localExtensionsFor(closure: ClosureLike): readonly TypeCheckingHooks[] {
    return this.options.localExtensions?.(closure, this.context) ?? [];
  }

  report(code: DiagnosticCode, message: string, node: ts.Node): void {
    this.collector = addDiagnostic(
      this.collector,
      createDiagnostic(
        code,
        "error",
        message,
        getNodeLocation(node.getSourceFile(), node)
      )
    );
  }
}
