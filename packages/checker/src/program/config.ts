/**
 * TypeScript compiler configuration
 */

import * as ts from "typescript";

/**
 * Default compiler options for checked programs.
 * Callers override individual settings through ProgramOptions.
 */
export const defaultTsConfig: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
  // Only the ES library; DOM and @types packages stay out of checked programs
  lib: ["lib.es2022.d.ts"],
  types: [],
  strict: true,
  skipLibCheck: true,
  noEmit: true,
  allowImportingTsExtensions: true,
};
