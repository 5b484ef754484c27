/**
 * Checking entry point
 */

import type { CheckingProgram } from "../program/types.js";
import type { DiagnosticsCollector } from "../types/diagnostic.js";
import { type Result, ok, error } from "../types/result.js";
import { CheckingSession } from "./session.js";
import type { CheckOptions, CheckedProgram } from "./types.js";
import { visitSourceFile } from "./visitor.js";

/**
 * Run one checking session over every root file of a program.
 *
 * Extensions are set up before the first file and finished after the last.
 * Errors thrown by an extension abort the session and reach the caller.
 */
export const checkProgram = (
  program: CheckingProgram,
  options: CheckOptions = {}
): Result<CheckedProgram, DiagnosticsCollector> => {
  const session = new CheckingSession(program, options);

  session.dispatcher.setup();
  for (const sourceFile of program.sourceFiles) {
    visitSourceFile(session, sourceFile);
  }
  session.dispatcher.finish();

  const diagnostics = session.diagnostics;
  if (diagnostics.hasErrors) {
    return error(diagnostics);
  }

  return ok({
    program,
    diagnostics,
    inferredTypes: session.inferredTypes,
    selectedMethods: session.selectedMethods,
  });
};
