/**
 * Checking session type definitions
 */

import type * as ts from "typescript";
import type {
  CheckingContext,
  MethodCall,
  MethodCandidate,
  TypeCheckingHooks,
} from "@typecheck-hooks/extensions";
import type { CheckingProgram } from "../program/types.js";
import type { DiagnosticsCollector } from "../types/diagnostic.js";
import type { ClosureLike } from "./helpers.js";

/**
 * Builds one global extension for a checking session
 */
export type ExtensionFactory = (context: CheckingContext) => TypeCheckingHooks;

/**
 * Extensions scoped to the body of one closure; empty for none
 */
export type LocalExtensionProvider = (
  closure: ClosureLike,
  context: CheckingContext
) => readonly TypeCheckingHooks[];

export type CheckOptions = {
  /** Global extensions, in priority order */
  readonly extensions?: readonly ExtensionFactory[];
  readonly localExtensions?: LocalExtensionProvider;
  readonly verbose?: boolean;
};

export type CheckedProgram = {
  readonly program: CheckingProgram;
  /** Warnings and infos; errors fail the check */
  readonly diagnostics: DiagnosticsCollector;
  /** Types extensions stored for nodes, plus return types of selected methods */
  readonly inferredTypes: ReadonlyMap<ts.Node, ts.Type>;
  readonly selectedMethods: ReadonlyMap<MethodCall, MethodCandidate>;
};
