/**
 * Checker - static checking pass that defers to type checking extensions
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./program/index.js";
export * from "./checking/index.js";

import { createProgram, type ProgramOptions } from "./program/index.js";
import { checkProgram, type CheckOptions, type CheckedProgram } from "./checking/index.js";
import type { DiagnosticsCollector } from "./types/diagnostic.js";
import { type Result, flatMap } from "./types/result.js";

/**
 * Create a program from files on disk and check it
 */
export const checkFiles = (
  filePaths: readonly string[],
  options: CheckOptions & ProgramOptions = {}
): Result<CheckedProgram, DiagnosticsCollector> =>
  flatMap(createProgram(filePaths, options), (program) =>
    checkProgram(program, options)
  );
