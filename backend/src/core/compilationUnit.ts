import { classifyFunctionType } from "../analysis/roleClassifier";
import type { SierraProgram, Statement } from "../types/sierra";
import { ProgramLoadError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { type ProgramContext, ProgramFunction } from "./function";
import { LibfuncRegistry } from "./registry";

const log = createLogger("compilation-unit");

/**
 * A loaded program. Construction assigns every function's type; `analyze`
 * then runs `analyze` on all functions before `runAnalyses` on any of them.
 */
export class CompilationUnit {
  private analyzed = false;

  private constructor(
    private readonly functionList: readonly ProgramFunction[],
    readonly registry: LibfuncRegistry
  ) {}

  static fromProgram(program: SierraProgram): CompilationUnit {
    const registry = new LibfuncRegistry(program.libfuncDeclarations);
    const functions = splitFunctions(program);

    for (const f of functions) {
      f.setTy(classifyFunctionType(f.name(), program.abi));
    }

    log.debug({ functions: functions.length }, "loaded program");
    return new CompilationUnit(functions, registry);
  }

  functions(): readonly ProgramFunction[] {
    return this.functionList;
  }

  findFunction(name: string): ProgramFunction | undefined {
    return this.functionList.find((f) => f.name() === name);
  }

  context(): ProgramContext {
    return { functions: this.functionList, registry: this.registry };
  }

  analyze(): void {
    if (this.analyzed) {
      return;
    }
    const context = this.context();
    for (const f of this.functionList) {
      f.analyze(context);
    }
    for (const f of this.functionList) {
      f.runAnalyses(context);
    }
    this.analyzed = true;

    const external = this.functionList.filter((f) => f.ty() === "External").length;
    log.info({ functions: this.functionList.length, external }, "analysis complete");
  }
}

/** Each function owns the statements from its entry point up to the next function's. */
function splitFunctions(program: SierraProgram): ProgramFunction[] {
  const total = program.statements.length;
  const entryPoints = Array.from(new Set(program.funcs.map((f) => f.entryPoint))).sort((a, b) => a - b);

  return program.funcs.map((data) => {
    if (data.entryPoint < 0 || data.entryPoint >= total) {
      throw new ProgramLoadError(
        `Entry point ${data.entryPoint} of function ${data.id.id} is outside the ${total} program statements`
      );
    }
    const end = entryPoints.find((pc) => pc > data.entryPoint) ?? total;
    const statements: Statement[] = program.statements.slice(data.entryPoint, end);
    return new ProgramFunction(data, statements);
  });
}
