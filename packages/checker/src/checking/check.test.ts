/**
 * Tests for the checking pass
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as ts from "typescript";
import {
  OBJECT_CLASS,
  TypeCheckingExtension,
  type CheckingContext,
  type MethodCall,
  type MethodCandidate,
  type ReturnSite,
  type TypeCheckingHooks,
} from "@typecheck-hooks/extensions";
import { checkProgram } from "./check.js";
import {
  createTestProgram,
  findNode,
  runCheck,
  sourceFileOf,
  summarize,
} from "../test-harness.js";

/**
 * Records hook names and claims unresolved variables listed in `known`
 */
class KnownVariables extends TypeCheckingExtension {
  constructor(
    context: CheckingContext,
    private readonly known: readonly string[],
    private readonly log: string[] = []
  ) {
    super(context);
  }

  override handleUnresolvedVariable(node: ts.Identifier): boolean {
    this.log.push(`variable:${node.text}`);
    return this.known.includes(node.text);
  }
}

class HookLog extends TypeCheckingExtension {
  constructor(
    context: CheckingContext,
    private readonly log: string[],
    private readonly skip: {
      readonly classes?: boolean;
      readonly methods?: boolean;
    } = {}
  ) {
    super(context);
  }

  override setup(): void {
    this.log.push("setup");
  }

  override finish(): void {
    this.log.push("finish");
  }

  override beforeVisitClass(node: ts.ClassLikeDeclaration): boolean {
    this.log.push(`beforeVisitClass:${node.name?.text}`);
    return this.skip.classes ?? false;
  }

  override afterVisitClass(node: ts.ClassLikeDeclaration): void {
    this.log.push(`afterVisitClass:${node.name?.text}`);
  }

  override beforeVisitMethod(): boolean {
    this.log.push("beforeVisitMethod");
    return this.skip.methods ?? false;
  }

  override afterVisitMethod(): void {
    this.log.push("afterVisitMethod");
  }
}

/**
 * Synthesizes `name` on any receiver, returning the first argument's type
 */
class SynthesizesMethod extends TypeCheckingExtension {
  constructor(
    context: CheckingContext,
    private readonly methodName: string,
    private readonly ownerName?: string
  ) {
    super(context);
  }

  override handleMissingMethod(
    _receiver: ts.Type,
    name: string,
    _argumentList: readonly ts.Expression[],
    argumentTypes: readonly ts.Type[]
  ): readonly MethodCandidate[] {
    if (name !== this.methodName) return [];
    const method = this.newMethod(name, argumentTypes[0]);
    return [
      this.ownerName === undefined
        ? method
        : { ...method, declaringClass: { name: this.ownerName } },
    ];
  }
}

class PrefersOwner extends TypeCheckingExtension {
  constructor(
    context: CheckingContext,
    private readonly ownerName: string
  ) {
    super(context);
  }

  override handleAmbiguousMethods(
    candidates: readonly MethodCandidate[]
  ): readonly MethodCandidate[] {
    return candidates.filter((m) => m.declaringClass?.name === this.ownerName);
  }
}

describe("checkProgram", () => {
  describe("unresolved variables", () => {
    const source = "const total = missing + 1;\n";

    it("should report a variable no extension handles", () => {
      const { result, diagnostics } = runCheck(source);

      expect(result.ok).to.equal(false);
      expect(diagnostics.map(summarize)).to.deep.equal([
        "1:15 TCH2001 Cannot find variable 'missing'",
      ]);
    });

    it("should accept a variable an extension handles", () => {
      const log: string[] = [];
      const { result } = runCheck(source, {
        extensions: [(context) => new KnownVariables(context, ["missing"], log)],
      });

      expect(result.ok).to.equal(true);
      expect(log).to.deep.equal(["variable:missing"]);
    });

    it("should ask extensions in registration order until one handles it", () => {
      const log: string[] = [];
      const { result } = runCheck("const a = x;\nconst b = y;\n", {
        extensions: [
          (context) => new KnownVariables(context, [], log),
          (context) => new KnownVariables(context, ["x"], log),
        ],
      });

      expect(log).to.deep.equal([
        "variable:x",
        "variable:x",
        "variable:y",
        "variable:y",
      ]);
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.diagnostics.map(summarize)).to.deep.equal([
          "2:11 TCH2001 Cannot find variable 'y'",
        ]);
      }
    });

    it("should check the base class of a class", () => {
      const { diagnostics } = runCheck("export class Robot extends Missing {}\n");

      expect(diagnostics.map(summarize)).to.deep.equal([
        "1:28 TCH2001 Cannot find variable 'Missing'",
      ]);
    });

    it("should check shorthand properties", () => {
      const { diagnostics } = runCheck("const box = { ghost };\n");

      expect(diagnostics.map(summarize)).to.deep.equal([
        "1:15 TCH2001 Cannot find variable 'ghost'",
      ]);
    });

    it("should not treat declarations or member names as references", () => {
      const { result } = runCheck(
        [
          "class Counter {",
          "  count = 0;",
          "  increment(step: number): void {",
          "    this.count += step;",
          "  }",
          "}",
          "const counter = new Counter();",
          "counter.increment(2);",
          "const { count } = counter;",
          "const shape = { size: count };",
          "",
        ].join("\n")
      );

      expect(result.ok).to.equal(true);
    });
  });

  describe("unresolved properties and attributes", () => {
    it("should report a missing property", () => {
      const { diagnostics } = runCheck(
        "const point = { x: 1 };\nconst y = point.y;\n"
      );

      expect(diagnostics.map(summarize)).to.deep.equal([
        "2:17 TCH2002 No such property: y for type { x: number; }",
      ]);
    });

    it("should let an extension handle a missing property", () => {
      class DynamicProperties extends TypeCheckingExtension {
        override handleUnresolvedProperty(
          node: ts.PropertyAccessExpression
        ): boolean {
          return node.name.text === "y";
        }
      }

      const { result } = runCheck(
        "const point = { x: 1 };\nconst y = point.y;\n",
        { extensions: [(context) => new DynamicProperties(context)] }
      );

      expect(result.ok).to.equal(true);
    });

    it("should report a missing attribute", () => {
      const { diagnostics } = runCheck(
        'const point = { x: 1 };\nconst x = point["x"];\nconst z = point["z"];\n'
      );

      expect(diagnostics.map(summarize)).to.deep.equal([
        "3:11 TCH2003 No such attribute: z for type { x: number; }",
      ]);
    });

    it("should accept attributes of indexed types", () => {
      const { result } = runCheck(
        'const table: Record<string, number> = {};\nconst z = table["z"];\n'
      );

      expect(result.ok).to.equal(true);
    });

    it("should let an extension handle a missing attribute", () => {
      class AnyAttribute extends TypeCheckingExtension {
        override handleUnresolvedAttribute(): boolean {
          return true;
        }
      }

      const { result } = runCheck(
        'const point = { x: 1 };\nconst z = point["z"];\n',
        { extensions: [(context) => new AnyAttribute(context)] }
      );

      expect(result.ok).to.equal(true);
    });
  });

  describe("incompatible assignments and returns", () => {
    it("should report an incompatible initializer", () => {
      const { diagnostics } = runCheck(
        'const label: string = "a";\nconst count: number = label;\n'
      );

      expect(diagnostics.map(summarize)).to.deep.equal([
        "2:7 TCH2004 Cannot assign value of type string to variable of type number",
      ]);
    });

    it("should report an incompatible compound assignment", () => {
      const { diagnostics } = runCheck(
        'const label: string = "a";\nlet total = 0;\ntotal += label;\n'
      );

      expect(diagnostics.map(summarize)).to.deep.equal([
        "3:1 TCH2004 Cannot assign value of type string to variable of type number",
      ]);
    });

    it("should report an incompatible assignment", () => {
      const { diagnostics } = runCheck(
        'const label: string = "a";\nlet total = 0;\ntotal = label;\n'
      );

      expect(diagnostics.map(summarize)).to.deep.equal([
        "3:1 TCH2004 Cannot assign value of type string to variable of type number",
      ]);
    });

    it("should pass both types to extensions", () => {
      const seen: string[] = [];

      class LenientAssignments extends TypeCheckingExtension {
        override handleIncompatibleAssignment(
          lhsType: ts.Type,
          rhsType: ts.Type
        ): boolean {
          seen.push(`${this.typeToString(lhsType)} <- ${this.typeToString(rhsType)}`);
          return true;
        }
      }

      const { result } = runCheck(
        'const label: string = "a";\nconst count: number = label;\n',
        { extensions: [(context) => new LenientAssignments(context)] }
      );

      expect(result.ok).to.equal(true);
      expect(seen).to.deep.equal(["number <- string"]);
    });

    const returnSource = [
      "function size(): number {",
      '  const label: string = "a";',
      "  return label;",
      "}",
      "",
    ].join("\n");

    it("should report an incompatible return", () => {
      const { diagnostics } = runCheck(returnSource);

      expect(diagnostics.map(summarize)).to.deep.equal([
        "3:3 TCH2005 Cannot return value of type string on method returning type number",
      ]);
    });

    it("should let an extension accept an incompatible return", () => {
      const seen: string[] = [];

      class LenientReturns extends TypeCheckingExtension {
        override handleIncompatibleReturnType(
          _site: ReturnSite,
          inferred: ts.Type
        ): boolean {
          seen.push(this.typeToString(inferred));
          return true;
        }
      }

      const { result } = runCheck(returnSource, {
        extensions: [(context) => new LenientReturns(context)],
      });

      expect(result.ok).to.equal(true);
      expect(seen).to.deep.equal(["string"]);
    });

    it("should leave returns inside nested closures to the closure", () => {
      const { diagnostics } = runCheck(
        [
          'const label: string = "a";',
          "const make = () => {",
          "  const inner = (): number => {",
          "    return label;",
          "  };",
          "  return inner;",
          "};",
          "",
        ].join("\n")
      );

      expect(diagnostics.map(summarize)).to.deep.equal([
        "4:5 TCH2005 Cannot return value of type string on method returning type number",
      ]);
    });
    const arrowSource = [
      'const label: string = "a";',
      "export const size = (): number => label;",
      "",
    ].join("\n");

    it("should report an incompatible expression-bodied arrow", () => {
      const { diagnostics } = runCheck(arrowSource);

      expect(diagnostics.map(summarize)).to.deep.equal([
        "2:35 TCH2005 Cannot return value of type string on method returning type number",
      ]);
    });

    it("should offer the arrow body as the return site", () => {
      const sites: string[] = [];

      class ArrowReturns extends TypeCheckingExtension {
        override handleIncompatibleReturnType(site: ReturnSite): boolean {
          sites.push(ts.isIdentifier(site) ? site.text : "other");
          return true;
        }
      }

      const { result } = runCheck(arrowSource, {
        extensions: [(context) => new ArrowReturns(context)],
      });

      expect(result.ok).to.equal(true);
      expect(sites).to.deep.equal(["label"]);
    });
  });

  describe("method calls", () => {
    const robotSource = [
      "class Robot {}",
      "const robot = new Robot();",
      "const steps: number = 3;",
      "robot.walk(steps);",
      "",
    ].join("\n");

    it("should report a missing method", () => {
      const { diagnostics } = runCheck(robotSource);

      expect(diagnostics.map(summarize)).to.deep.equal([
        "4:7 TCH2006 Cannot find matching method Robot#walk(number)",
      ]);
    });

    it("should select a method synthesized by an extension", () => {
      const selections: string[] = [];

      class SelectionLog extends TypeCheckingExtension {
        override onMethodSelection(
          _expression: ts.Expression,
          target: MethodCandidate
        ): void {
          selections.push(`${target.declaringClass?.name}#${target.name}`);
        }
      }

      const { program, result } = runCheck(robotSource, {
        extensions: [
          (context) => new SynthesizesMethod(context, "walk"),
          (context) => new SelectionLog(context),
        ],
      });

      expect(result.ok).to.equal(true);
      expect(selections).to.include("Object#walk");
      if (result.ok) {
        const call = findNode(
          sourceFileOf(program),
          ts.isCallExpression,
          (node) => node.getText() === "robot.walk(steps)"
        );
        const target = result.value.selectedMethods.get(call);
        expect(target?.name).to.equal("walk");
        expect(target?.synthetic).to.equal(true);
        expect(target?.declaringClass).to.equal(OBJECT_CLASS);
        expect(
          program.checker.typeToString(
            result.value.inferredTypes.get(call) ?? program.checker.getTypeAtLocation(call)
          )
        ).to.equal("number");
      }
    });

    it("should report candidates no extension can narrow", () => {
      const { diagnostics } = runCheck(robotSource, {
        extensions: [
          (context) => new SynthesizesMethod(context, "walk", "Legs"),
          (context) => new SynthesizesMethod(context, "walk", "Wheels"),
        ],
      });

      expect(diagnostics.map(summarize)).to.deep.equal([
        "4:7 TCH2007 Reference to method is ambiguous. Cannot choose between Legs#walk(), Wheels#walk()",
      ]);
    });

    it("should select the candidate left after narrowing", () => {
      const { program, result } = runCheck(robotSource, {
        extensions: [
          (context) => new SynthesizesMethod(context, "walk", "Legs"),
          (context) => new SynthesizesMethod(context, "walk", "Wheels"),
          (context) => new PrefersOwner(context, "Wheels"),
        ],
      });

      expect(result.ok).to.equal(true);
      if (result.ok) {
        const call = findNode(sourceFileOf(program), ts.isCallExpression);
        expect(result.value.selectedMethods.get(call)?.declaringClass?.name).to.equal(
          "Wheels"
        );
      }
    });

    it("should select resolved declarations", () => {
      const { program, result } = runCheck(
        [
          "class Greeter {",
          "  greet(name: string): string {",
          "    return name;",
          "  }",
          "}",
          'new Greeter().greet("a");',
          "",
        ].join("\n")
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        const call = findNode(sourceFileOf(program), ts.isCallExpression);
        const target = result.value.selectedMethods.get(call);
        expect(target?.name).to.equal("greet");
        expect(target?.synthetic).to.equal(false);
        expect(target?.declaringClass?.name).to.equal("Greeter");
        expect(target?.parameters.map((p) => p.name)).to.deep.equal(["name"]);
      }
    });

    it("should skip calls an extension claims before checking", () => {
      const log: string[] = [];

      class AuditCalls extends TypeCheckingExtension {
        override beforeMethodCall(call: MethodCall): boolean {
          const claimed =
            ts.isIdentifier(call.expression) && call.expression.text === "audit";
          log.push(`before:${claimed}`);
          return claimed;
        }

        override afterMethodCall(): void {
          log.push("after");
        }
      }

      const { result } = runCheck("audit(secret);\n", {
        extensions: [(context) => new AuditCalls(context)],
      });

      expect(result.ok).to.equal(true);
      expect(log).to.deep.equal(["before:true", "after"]);
    });

    it("should expose the selected method to extensions", () => {
      const targets: string[] = [];

      class TargetReader extends TypeCheckingExtension {
        override afterMethodCall(call: MethodCall): void {
          targets.push(this.getTargetMethod(call)?.name ?? "none");
        }
      }

      runCheck("function ping(): void {}\nping();\n", {
        extensions: [(context) => new TargetReader(context)],
      });

      expect(targets).to.deep.equal(["ping"]);
    });
  });

  describe("classes and methods", () => {
    const source = [
      "class Legacy {",
      "  run() {",
      "    return ghost;",
      "  }",
      "}",
      "",
    ].join("\n");

    it("should visit class bodies between the class hooks", () => {
      const log: string[] = [];
      const { diagnostics } = runCheck(source, {
        extensions: [(context) => new HookLog(context, log)],
      });

      expect(log).to.deep.equal([
        "setup",
        "beforeVisitClass:Legacy",
        "beforeVisitMethod",
        "afterVisitMethod",
        "afterVisitClass:Legacy",
        "finish",
      ]);
      expect(diagnostics.map(summarize)).to.deep.equal([
        "3:12 TCH2001 Cannot find variable 'ghost'",
      ]);
    });

    it("should skip a class body an extension claims", () => {
      const log: string[] = [];
      const { result } = runCheck(source, {
        extensions: [(context) => new HookLog(context, log, { classes: true })],
      });

      expect(result.ok).to.equal(true);
      expect(log).to.deep.equal([
        "setup",
        "beforeVisitClass:Legacy",
        "afterVisitClass:Legacy",
        "finish",
      ]);
    });

    it("should skip a method body an extension claims", () => {
      const log: string[] = [];
      const { result } = runCheck(source, {
        extensions: [(context) => new HookLog(context, log, { methods: true })],
      });

      expect(result.ok).to.equal(true);
      expect(log).to.deep.equal([
        "setup",
        "beforeVisitClass:Legacy",
        "beforeVisitMethod",
        "afterVisitMethod",
        "afterVisitClass:Legacy",
        "finish",
      ]);
    });
  });

  describe("local extensions", () => {
    it("should apply only inside the closure they were provided for", () => {
      const provided: TypeCheckingHooks[] = [];
      const { diagnostics } = runCheck(
        "const first = () => ghost;\nconst second = () => ghost;\n",
        {
          localExtensions: (closure, context) => {
            const owner = closure.parent;
            if (
              ts.isVariableDeclaration(owner) &&
              ts.isIdentifier(owner.name) &&
              owner.name.text === "first"
            ) {
              const extension = new KnownVariables(context, ["ghost"]);
              provided.push(extension);
              return [extension];
            }
            return [];
          },
        }
      );

      expect(provided).to.have.length(1);
      expect(diagnostics.map(summarize)).to.deep.equal([
        "2:22 TCH2001 Cannot find variable 'ghost'",
      ]);
    });

    it("should rank local extensions below globals", () => {
      const log: string[] = [];
      runCheck("const first = () => ghost;\n", {
        extensions: [(context) => new KnownVariables(context, ["ghost"], log)],
        localExtensions: (_closure, context) => [
          new KnownVariables(context, ["ghost"], log),
        ],
      });

      expect(log).to.deep.equal(["variable:ghost"]);
    });
  });

  describe("session lifecycle", () => {
    it("should set up extensions registered during setup", () => {
      class Installer extends TypeCheckingExtension {
        override setup(): void {
          this.registerExtension(new KnownVariables(this.context, ["ghost"]));
        }
      }

      const { result } = runCheck("const seen = ghost;\n", {
        extensions: [(context) => new Installer(context)],
      });

      expect(result.ok).to.equal(true);
    });

    it("should report errors raised by extensions", () => {
      class DeprecatedFunctions extends TypeCheckingExtension {
        override afterVisitMethod(node: ts.FunctionLikeDeclaration): void {
          if (node.name !== undefined && ts.isIdentifier(node.name) && node.name.text === "legacy") {
            this.addStaticTypeError("legacy() is deprecated", node);
          }
        }
      }

      const { diagnostics } = runCheck("function legacy(): void {}\n", {
        extensions: [(context) => new DeprecatedFunctions(context)],
      });

      expect(diagnostics.map(summarize)).to.deep.equal([
        "1:1 TCH3001 legacy() is deprecated",
      ]);
    });

    it("should propagate extension failures", () => {
      const failure = new Error("extension crashed");

      class Crashes extends TypeCheckingExtension {
        override handleUnresolvedVariable(): boolean {
          throw failure;
        }
      }

      const program = createTestProgram("const seen = ghost;\n");
      expect(() =>
        checkProgram(program, {
          extensions: [(context) => new Crashes(context)],
        })
      ).to.throw(failure);
    });

    it("should keep stored types in the result", () => {
      class TypesGhost extends TypeCheckingExtension {
        override handleUnresolvedVariable(node: ts.Identifier): boolean {
          const declaration = findNode(
            node.getSourceFile(),
            ts.isVariableDeclaration,
            (candidate) => candidate.name.getText() === "seed"
          );
          this.storeType(node, this.getType(declaration.name));
          return true;
        }
      }

      const { program, result } = runCheck(
        "const seed: number = 1;\nconst total = ghost;\n",
        { extensions: [(context) => new TypesGhost(context)] }
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        const ghost = findNode(
          sourceFileOf(program),
          ts.isIdentifier,
          (node) => node.text === "ghost"
        );
        const stored = result.value.inferredTypes.get(ghost);
        expect(stored && program.checker.typeToString(stored)).to.equal("number");
      }
    });
  });
});
