/**
 * Test harness for checker tests.
 * Builds in-memory programs and finds nodes in them.
 */

import * as ts from "typescript";
import { createProgramFromSources } from "./program/creation.js";
import type { CheckingProgram } from "./program/types.js";
import { checkProgram } from "./checking/check.js";
import type { CheckOptions, CheckedProgram } from "./checking/types.js";
import {
  type Diagnostic,
  type DiagnosticsCollector,
  formatDiagnostic,
} from "./types/diagnostic.js";
import type { Result } from "./types/result.js";

export const TEST_FILE = "/test/main.ts";

export const createTestProgram = (source: string): CheckingProgram => {
  const result = createProgramFromSources({ [TEST_FILE]: source });
  if (!result.ok) {
    throw new Error(
      result.error.diagnostics.map(formatDiagnostic).join("\n")
    );
  }
  return result.value;
};

export type CheckRun = {
  readonly program: CheckingProgram;
  readonly result: Result<CheckedProgram, DiagnosticsCollector>;
  readonly diagnostics: readonly Diagnostic[];
};

export const runCheck = (source: string, options: CheckOptions = {}): CheckRun => {
  const program = createTestProgram(source);
  const result = checkProgram(program, options);
  const diagnostics = result.ok
    ? result.value.diagnostics.diagnostics
    : result.error.diagnostics;
  return { program, result, diagnostics };
};

/**
 * Short form of a diagnostic for assertions: `line:column CODE message`
 */
export const summarize = (diagnostic: Diagnostic): string =>
  `${diagnostic.location?.line}:${diagnostic.location?.column} ${diagnostic.code} ${diagnostic.message}`;

export const findNode = <T extends ts.Node>(
  root: ts.Node,
  predicate: (node: ts.Node) => node is T,
  matches: (node: T) => boolean = () => true
): T => {
  let found: T | undefined;
  const visit = (node: ts.Node): void => {
    if (found !== undefined) return;
    if (predicate(node) && matches(node)) {
      found = node;
      return;
    }
    ts.forEachChild(node, visit);
  };
  visit(root);
  if (found === undefined) {
    throw new Error("No matching node in test source");
  }
  return found;
};

export const sourceFileOf = (program: CheckingProgram): ts.SourceFile => {
  const [sourceFile] = program.sourceFiles;
  if (sourceFile === undefined) {
    throw new Error("Test program has no root file");
  }
  return sourceFile;
};
