import type { BranchInfo, ProgramRegistry, Statement } from "../types/sierra";

// Implicit values the compiler threads through every signature
export const BUILTINS: ReadonlySet<string> = new Set([
  "Pedersen",
  "RangeCheck",
  "Bitwise",
  "EcOp",
  "Poseidon",
  "SegmentArena",
  "GasBuiltin",
  "System"
]);

/**
 * True when control can leave the statement other than by falling through to
 * the next one: a return, a jump, a conditional branch or a diverging call.
 */
export function isTerminator(statement: Statement): boolean {
  if (statement.kind === "return") {
    return true;
  }
  const { branches } = statement.invocation;
  return branches.length !== 1 || branches[0]?.target !== "fallthrough";
}

/** Statement targets in the order the branch lists them. */
export function branchTargets(statement: Statement): number[] {
  if (statement.kind === "return") {
    return [];
  }
  return statement.invocation.branches
    .map((b) => b.target)
    .filter((t): t is number => typeof t === "number");
}

export function hasFallthrough(statement: Statement): boolean {
  return statement.kind === "invocation" && statement.invocation.branches.some((b) => b.target === "fallthrough");
}

function formatVars(vars: number[]): string {
  return vars.map((v) => `[${v}]`).join(", ");
}

function formatBranch(branch: BranchInfo): string {
  const target = branch.target === "fallthrough" ? "fallthrough" : String(branch.target);
  return `${target}(${formatVars(branch.results)})`;
}

/** Sierra text form, e.g. `felt252_add([0], [1]) -> ([2]);` */
export function formatStatement(statement: Statement, registry: ProgramRegistry): string {
  if (statement.kind === "return") {
    return `return(${formatVars(statement.vars)});`;
  }

  const { libfuncId, args, branches } = statement.invocation;
  const call = `${registry.getLibfuncName(libfuncId)}(${formatVars(args)})`;
  const [only] = branches;
  if (branches.length === 1 && only && only.target === "fallthrough") {
    return `${call} -> (${formatVars(only.results)});`;
  }
  return `${call} { ${branches.map(formatBranch).join(" ")} };`;
}
