/**
 * TypeScript diagnostics conversion
 */

import * as ts from "typescript";
import {
  type Diagnostic,
  type DiagnosticsCollector,
  type SourceLocation,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";

/**
 * Collect the diagnostics that make a program unusable for checking.
 * Semantic errors are left to the checking pass.
 */
export const collectProgramDiagnostics = (
  program: ts.Program
): DiagnosticsCollector => {
  const tsDiagnostics = [
    ...program.getOptionsDiagnostics(),
    ...program.getSyntacticDiagnostics(),
  ];

  return tsDiagnostics.reduce((collector, tsDiag) => {
    const diagnostic = convertTsDiagnostic(tsDiag);
    return diagnostic ? addDiagnostic(collector, diagnostic) : collector;
  }, createDiagnosticsCollector());
};

export const convertTsDiagnostic = (
  tsDiag: ts.Diagnostic
): Diagnostic | null => {
  if (tsDiag.category === ts.DiagnosticCategory.Suggestion) {
    return null;
  }

  const severity =
    tsDiag.category === ts.DiagnosticCategory.Error
      ? "error"
      : tsDiag.category === ts.DiagnosticCategory.Warning
        ? "warning"
        : "info";

  const message = ts.flattenDiagnosticMessageText(tsDiag.messageText, "\n");

  const location =
    tsDiag.file && tsDiag.start !== undefined
      ? getSourceLocation(tsDiag.file, tsDiag.start, tsDiag.length ?? 1)
      : undefined;

  return createDiagnostic("TCH1002", severity, message, location);
};

export const getSourceLocation = (
  file: ts.SourceFile,
  start: number,
  length: number
): SourceLocation => {
  const { line, character } = file.getLineAndCharacterOfPosition(start);
  return {
    file: file.fileName,
    line: line + 1,
    column: character + 1,
    length,
  };
};
