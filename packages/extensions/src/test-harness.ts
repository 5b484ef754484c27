/**
 * Test harness for extension tests.
 * Builds a small in-memory TypeScript program to obtain real ts.Type values,
 * plus a context stub and a recording extension.
 */

import * as ts from "typescript";
import { HandlerRegistry } from "./handler-registry.js";
import { TypeCheckingExtension } from "./extension.js";
import type { TypeCheckingHooks } from "./hooks.js";
import type {
  CheckingContext,
  MethodCall,
  MethodCandidate,
} from "./types.js";

const HARNESS_FILE = "/harness/types.ts";

const HARNESS_SOURCE = `
const aNumber: number = 1;
const aString: string = "text";
const aBoolean: boolean = true;
`;

export type TypeHarness = {
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  readonly sourceFile: ts.SourceFile;
  readonly typeOf: (variableName: string) => ts.Type;
};

export const createTypeHarness = (source = HARNESS_SOURCE): TypeHarness => {
  const sourceFile = ts.createSourceFile(
    HARNESS_FILE,
    source,
    ts.ScriptTarget.ES2022,
    true,
    ts.ScriptKind.TS
  );

  const compilerOptions: ts.CompilerOptions = {
    target: ts.ScriptTarget.ES2022,
    noLib: true,
    types: [],
    noEmit: true,
  };

  const host = ts.createCompilerHost(compilerOptions);
  const originalGetSourceFile = host.getSourceFile;
  host.getSourceFile = (
    name: string,
    languageVersionOrOptions: ts.ScriptTarget | ts.CreateSourceFileOptions,
    onError?: (message: string) => void,
    shouldCreateNewSourceFile?: boolean
  ) =>
    name === HARNESS_FILE
      ? sourceFile
      : originalGetSourceFile.call(
          host,
          name,
          languageVersionOrOptions,
          onError,
          shouldCreateNewSourceFile
        );

  const program = ts.createProgram([HARNESS_FILE], compilerOptions, host);
  const checker = program.getTypeChecker();

  const typeOf = (variableName: string): ts.Type => {
    for (const statement of sourceFile.statements) {
      if (!ts.isVariableStatement(statement)) continue;
      for (const declaration of statement.declarationList.declarations) {
        if (
          ts.isIdentifier(declaration.name) &&
          declaration.name.text === variableName
        ) {
          return checker.getTypeAtLocation(declaration.name);
        }
      }
    }
    throw new Error(`No variable '${variableName}' in harness source`);
  };

  return { program, checker, sourceFile, typeOf };
};

export type StubContext = CheckingContext & {
  readonly registry: HandlerRegistry<TypeCheckingHooks>;
  readonly errors: readonly { readonly message: string; readonly node: ts.Node }[];
  readonly storedTypes: ReadonlyMap<ts.Node, ts.Type>;
};

/**
 * Context backed by plain maps, for exercising extensions without a session
 */
export const createStubContext = (
  checker: ts.TypeChecker,
  registry: HandlerRegistry<TypeCheckingHooks> = new HandlerRegistry()
): StubContext => {
  const errors: { readonly message: string; readonly node: ts.Node }[] = [];
  const storedTypes = new Map<ts.Node, ts.Type>();
  const targets = new Map<MethodCall, MethodCandidate>();

  return {
    checker,
    registry,
    errors,
    storedTypes,
    registrar: {
      addGlobal: (extension) => registry.addGlobal(extension),
      removeGlobal: (extension) => registry.removeGlobal(extension),
    },
    getType: (node) => storedTypes.get(node) ?? checker.getTypeAtLocation(node),
    storeType: (node, type) => {
      storedTypes.set(node, type);
    },
    reportError: (message, node) => {
      errors.push({ message, node });
    },
    getTargetMethod: (call) => targets.get(call),
  };
};

/**
 * Extension that appends `${label}.${hook}` to a shared log for every call
 * and answers from per-hook overrides
 */
export class RecordingExtension extends TypeCheckingExtension {
  constructor(
    context: CheckingContext,
    readonly label: string,
    private readonly log: string[],
    private readonly answers: {
      readonly handled?: boolean;
      readonly missing?: readonly MethodCandidate[];
      readonly narrow?: (
        candidates: readonly MethodCandidate[]
      ) => readonly MethodCandidate[];
    } = {}
  ) {
    super(context);
  }

  private record(hook: string): void {
    this.log.push(`${this.label}.${hook}`);
  }

  override setup(): void {
    this.record("setup");
  }

  override finish(): void {
    this.record("finish");
  }

  override handleUnresolvedVariable(_node: ts.Identifier): boolean {
    this.record("handleUnresolvedVariable");
    return this.answers.handled ?? false;
  }

  override handleUnresolvedProperty(_node: ts.PropertyAccessExpression): boolean {
    this.record("handleUnresolvedProperty");
    return this.answers.handled ?? false;
  }

  override handleUnresolvedAttribute(_node: ts.ElementAccessExpression): boolean {
    this.record("handleUnresolvedAttribute");
    return this.answers.handled ?? false;
  }

  override handleIncompatibleAssignment(): boolean {
    this.record("handleIncompatibleAssignment");
    return this.answers.handled ?? false;
  }

  override handleIncompatibleReturnType(): boolean {
    this.record("handleIncompatibleReturnType");
    return this.answers.handled ?? false;
  }

  override handleAmbiguousMethods(
    candidates: readonly MethodCandidate[]
  ): readonly MethodCandidate[] {
    this.record("handleAmbiguousMethods");
    return this.answers.narrow ? this.answers.narrow(candidates) : candidates;
  }

  override handleMissingMethod(): readonly MethodCandidate[] {
    this.record("handleMissingMethod");
    return this.answers.missing ?? [];
  }

  override beforeVisitMethod(): boolean {
    this.record("beforeVisitMethod");
    return this.answers.handled ?? false;
  }

  override afterVisitMethod(): void {
    this.record("afterVisitMethod");
  }

  override beforeVisitClass(): boolean {
    this.record("beforeVisitClass");
    return this.answers.handled ?? false;
  }

  override afterVisitClass(): void {
    this.record("afterVisitClass");
  }

  override beforeMethodCall(): boolean {
    this.record("beforeMethodCall");
    return this.answers.handled ?? false;
  }

  override afterMethodCall(): void {
    this.record("afterMethodCall");
  }

  override onMethodSelection(): void {
    this.record("onMethodSelection");
  }
}

export const candidate = (
  name: string,
  declaringClass?: string
): MethodCandidate => ({
  name,
  parameters: [],
  declaringClass:
    declaringClass === undefined ? undefined : { name: declaringClass },
  synthetic: true,
});
