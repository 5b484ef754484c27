/**
 * Program - Public API
 */

export { createProgram, createProgramFromSources, createCompilerOptions } from "./creation.js";
export { defaultTsConfig } from "./config.js";
export { convertTsDiagnostic, getSourceLocation } from "./diagnostics.js";
export type { CheckingProgram, ProgramOptions } from "./types.js";
