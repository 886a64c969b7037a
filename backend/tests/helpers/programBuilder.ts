import type {
  BranchInfo,
  ConcreteTypeId,
  ContractAbi,
  FunctionData,
  LibfuncDeclaration,
  Param,
  SierraProgram,
  Statement
} from "../../src/types/sierra";

export function fallthrough(results: number[] = []): BranchInfo {
  return { target: "fallthrough", results };
}

export function to(target: number, results: number[] = []): BranchInfo {
  return { target, results };
}

export function invoke(libfuncId: number, branches: BranchInfo[] = [fallthrough()], args: number[] = []): Statement {
  return { kind: "invocation", invocation: { libfuncId, args, branches } };
}

export function ret(vars: number[] = []): Statement {
  return { kind: "return", vars };
}

interface FunctionOptions {
  params?: Param[];
  retTypes?: ConcreteTypeId[];
}

/** Lays out functions one after the other in a single statement list. */
export class ProgramBuilder {
  private readonly libfuncs: LibfuncDeclaration[] = [];
  private readonly libfuncIds = new Map<string, number>();
  private readonly functionIds = new Map<string, number>();
  private readonly statements: Statement[] = [];
  private readonly funcs: FunctionData[] = [];
  private abi: ContractAbi = {};

  /** `function_call` libfunc targeting `callee` */
  call(callee: string): number {
    return this.libfunc(`function_call<user@${callee}>`, "function_call", [
      { kind: "userFunc", function: { id: this.functionId(callee), debugName: callee } }
    ]);
  }

  /** Any other libfunc */
  op(name: string): number {
    return this.libfunc(name, name);
  }

  /** Adds a function at the end of the program and returns its entry point. */
  addFunction(name: string, body: Statement[] | ((entry: number) => Statement[]), opts: FunctionOptions = {}): number {
    const entryPoint = this.statements.length;
    const statements = typeof body === "function" ? body(entryPoint) : body;
    const params = opts.params ?? [];
    const retTypes = opts.retTypes ?? [];

    this.statements.push(...statements);
    this.funcs.push({
      id: { id: this.functionId(name), debugName: name },
      signature: { paramTypes: params.map((p) => p.ty), retTypes },
      params,
      entryPoint
    });
    return entryPoint;
  }

  withAbi(abi: ContractAbi): this {
    this.abi = abi;
    return this;
  }

  build(): SierraProgram {
    return {
      libfuncDeclarations: [...this.libfuncs],
      statements: [...this.statements],
      funcs: [...this.funcs],
      abi: this.abi
    };
  }

  private libfunc(debugName: string, genericId: string, genericArgs?: LibfuncDeclaration["genericArgs"]): number {
    const existing = this.libfuncIds.get(debugName);
    if (existing !== undefined) {
      return existing;
    }
    const id = this.libfuncs.length;
    this.libfuncs.push({ id, debugName, genericId, genericArgs });
    this.libfuncIds.set(debugName, id);
    return id;
  }

  private functionId(name: string): number {
    const existing = this.functionIds.get(name);
    if (existing !== undefined) {
      return existing;
    }
    const id = this.functionIds.size;
    this.functionIds.set(name, id);
    return id;
  }
}
