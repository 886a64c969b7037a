import type { ConcreteLibfunc, FunctionId, LibfuncDeclaration, ProgramRegistry } from "../types/sierra";
import { ProgramLoadError } from "../utils/errors";

const FUNCTION_CALL = "function_call";

export function functionDisplayName(id: FunctionId): string {
  return id.debugName ?? `[${id.id}]`;
}

/** Registry over a program's libfunc declarations. */
export class LibfuncRegistry implements ProgramRegistry {
  private readonly libfuncs = new Map<number, ConcreteLibfunc>();
  private readonly names = new Map<number, string>();

  constructor(declarations: readonly LibfuncDeclaration[]) {
    for (const decl of declarations) {
      if (this.libfuncs.has(decl.id)) {
        throw new ProgramLoadError(`Duplicate libfunc declaration id ${decl.id}`);
      }
      this.libfuncs.set(decl.id, resolveDeclaration(decl));
      this.names.set(decl.id, decl.debugName ?? `[${decl.id}]`);
    }
  }

  getLibfunc(id: number): ConcreteLibfunc | undefined {
    return this.libfuncs.get(id);
  }

  getLibfuncName(id: number): string {
    return this.names.get(id) ?? `[${id}]`;
  }
}

function resolveDeclaration(decl: LibfuncDeclaration): ConcreteLibfunc {
  if (decl.genericId !== FUNCTION_CALL) {
    return { kind: "other", genericId: decl.genericId };
  }
  const [arg] = decl.genericArgs ?? [];
  if (!arg || arg.kind !== "userFunc") {
    throw new ProgramLoadError(`Libfunc ${decl.id} is a function_call without a user function argument`);
  }
  return { kind: "functionCall", function: arg.function };
}
