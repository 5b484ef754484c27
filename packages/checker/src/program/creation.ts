/**
 * Program creation
 */

import * as ts from "typescript";
import * as path from "node:path";
import * as fs from "node:fs";
import { type Result, ok, error } from "../types/result.js";
import {
  type DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";
import type { CheckingProgram, ProgramOptions } from "./types.js";
import { defaultTsConfig } from "./config.js";
import { collectProgramDiagnostics } from "./diagnostics.js";

export const createCompilerOptions = (
  options: ProgramOptions
): ts.CompilerOptions => ({
  ...defaultTsConfig,
  ...options.compilerOptions,
});

const finishProgram = (
  program: ts.Program,
  rootNames: readonly string[],
  options: ProgramOptions
): Result<CheckingProgram, DiagnosticsCollector> => {
  const diagnostics = collectProgramDiagnostics(program);
  if (diagnostics.hasErrors) {
    return error(diagnostics);
  }

  const sourceFiles = rootNames
    .map((fileName) => program.getSourceFile(fileName))
    .filter((sourceFile): sourceFile is ts.SourceFile => sourceFile !== undefined);

  if (options.verbose) {
    console.log(`Created program with ${sourceFiles.length} root file(s)`);
  }

  return ok({
    program,
    checker: program.getTypeChecker(),
    sourceFiles,
  });
};

/**
 * Create a checking program from files on disk
 */
export const createProgram = (
  filePaths: readonly string[],
  options: ProgramOptions = {}
): Result<CheckingProgram, DiagnosticsCollector> => {
  const absolutePaths = filePaths.map((fp) => path.resolve(fp));

  const missing = absolutePaths.filter((fp) => !fs.existsSync(fp));
  if (missing.length > 0) {
    return error(
      missing.reduce(
        (collector, fp) =>
          addDiagnostic(
            collector,
            createDiagnostic("TCH1001", "error", `Source file not found: ${fp}`)
          ),
        createDiagnosticsCollector()
      )
    );
  }

  const program = ts.createProgram(absolutePaths, createCompilerOptions(options));
  return finishProgram(program, absolutePaths, options);
};

// Library files are parsed once and shared by every in-memory program
const libraryFiles = new Map<string, ts.SourceFile>();

/**
 * Create a checking program from in-memory sources keyed by file name.
 * Files may import each other; anything else comes from the default host.
 */
export const createProgramFromSources = (
  sources: Readonly<Record<string, string>>,
  options: ProgramOptions = {}
): Result<CheckingProgram, DiagnosticsCollector> => {
  const tsOptions = createCompilerOptions(options);
  const host = ts.createCompilerHost(tsOptions);
  const virtualFiles = new Map(Object.entries(sources));
  const libraryLocation = host.getDefaultLibLocation?.();

  const originalGetSourceFile = host.getSourceFile;
  host.getSourceFile = (
    fileName: string,
    languageVersionOrOptions: ts.ScriptTarget | ts.CreateSourceFileOptions,
    onError?: (message: string) => void,
    shouldCreateNewSourceFile?: boolean
  ): ts.SourceFile | undefined => {
    const text = virtualFiles.get(fileName);
    if (text !== undefined) {
      return ts.createSourceFile(fileName, text, languageVersionOrOptions, true);
    }

    const isLibrary =
      libraryLocation !== undefined && fileName.startsWith(libraryLocation);
    const cached = isLibrary ? libraryFiles.get(fileName) : undefined;
    if (cached !== undefined) {
      return cached;
    }

    const sourceFile = originalGetSourceFile.call(
      host,
      fileName,
      languageVersionOrOptions,
      onError,
      shouldCreateNewSourceFile
    );
    if (isLibrary && sourceFile !== undefined) {
      libraryFiles.set(fileName, sourceFile);
    }
    return sourceFile;
  };

  const originalDirectoryExists = host.directoryExists;
  host.directoryExists = (directoryName: string): boolean =>
    [...virtualFiles.keys()].some((fileName) =>
      fileName.startsWith(`${directoryName}/`)
    ) || (originalDirectoryExists?.call(host, directoryName) ?? false);

  const originalFileExists = host.fileExists;
  host.fileExists = (fileName: string): boolean =>
    virtualFiles.has(fileName) || originalFileExists.call(host, fileName);

  const originalReadFile = host.readFile;
  host.readFile = (fileName: string): string | undefined =>
    virtualFiles.get(fileName) ?? originalReadFile.call(host, fileName);

  const rootNames = [...virtualFiles.keys()];
  const program = ts.createProgram(rootNames, tsOptions, host);
  return finishProgram(program, rootNames, options);
};
