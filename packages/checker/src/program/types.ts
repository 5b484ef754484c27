/**
 * Program type definitions
 */

import type * as ts from "typescript";

export type ProgramOptions = {
  readonly compilerOptions?: ts.CompilerOptions;
  readonly verbose?: boolean;
};

/**
 * A TypeScript program ready for checking. `sourceFiles` are the root files
 * the checker visits; library and imported files are not visited.
 */
export type CheckingProgram = {
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  readonly sourceFiles: readonly ts.SourceFile[];
};
