import { branchTargets, hasFallthrough, isTerminator } from "../core/statements";
import type { Statement } from "../types/sierra";
import { InvariantViolationError } from "../utils/errors";
import { createLogger } from "../utils/logger";

const log = createLogger("cfg");

export interface BasicBlock {
  id: number; // absolute offset of the first statement
  start: number;
  end: number; // inclusive
  statements: readonly Statement[];
  successors: readonly number[];
  predecessors: readonly number[];
}

export interface ControlFlowGraph {
  blocks: ReadonlyMap<number, BasicBlock>; // keyed by start offset, ascending
  entryBlock: BasicBlock | null;
}

/** What the builder needs from a function. */
export interface CfgSource {
  name(): string;
  getStatements(): readonly Statement[];
  /** Suffix of the statement list starting at a local index. */
  getStatementsAt(at: number): readonly Statement[];
}

export const EMPTY_CFG: ControlFlowGraph = { blocks: new Map(), entryBlock: null };

export function buildCFG(source: CfgSource, entryPoint: number): ControlFlowGraph {
  const statements = source.getStatements();
  if (statements.length === 0) {
    return EMPTY_CFG;
  }

  const last = entryPoint + statements.length - 1;
  const checkInRange = (target: number, from: number): void => {
    if (target < entryPoint || target > last) {
      throw new InvariantViolationError(
        `Statement ${from} of ${source.name()} branches to ${target}, outside [${entryPoint}, ${last}]`
      );
    }
  };

  // First pass: leaders are the entry, every branch target and every statement after a terminator
  const leaders = new Set<number>([entryPoint]);
  statements.forEach((statement, i) => {
    const pc = entryPoint + i;
    for (const target of branchTargets(statement)) {
      checkInRange(target, pc);
      leaders.add(target);
    }
    if (isTerminator(statement) && pc < last) {
      leaders.add(pc + 1);
    }
  });

  // Second pass: cut the statement list at the leaders
  const sortedLeaders = Array.from(leaders).sort((a, b) => a - b);
  const successors = new Map<number, number[]>();
  const predecessors = new Map<number, number[]>(sortedLeaders.map((pc) => [pc, []]));
  const slices = new Map<number, readonly Statement[]>();

  sortedLeaders.forEach((start, i) => {
    const next = sortedLeaders[i + 1] ?? last + 1;
    const slice = source.getStatementsAt(start - entryPoint).slice(0, next - start);
    slices.set(start, slice);

    const end = next - 1;
    const lastStatement = slice[slice.length - 1];
    const succ: number[] = [];
    if (lastStatement && isTerminator(lastStatement)) {
      for (const target of branchTargets(lastStatement)) {
        if (!succ.includes(target)) {
          succ.push(target);
        }
      }
      if (hasFallthrough(lastStatement)) {
        checkInRange(end + 1, end);
        if (!succ.includes(end + 1)) {
          succ.push(end + 1);
        }
      }
    } else {
      // Plain fallthrough into the next leader
      checkInRange(end + 1, end);
      succ.push(end + 1);
    }
    successors.set(start, succ);
  });

  // Third pass: connect blocks
  for (const [from, succ] of successors) {
    for (const to of succ) {
      predecessors.get(to)?.push(from);
    }
  }

  const blocks = new Map<number, BasicBlock>();
  sortedLeaders.forEach((start, i) => {
    const next = sortedLeaders[i + 1] ?? last + 1;
    blocks.set(start, {
      id: start,
      start,
      end: next - 1,
      statements: slices.get(start) ?? [],
      successors: successors.get(start) ?? [],
      predecessors: predecessors.get(start) ?? []
    });
  });

  log.debug({ function: source.name(), blocks: blocks.size }, "built CFG");

  return {
    blocks,
    entryBlock: blocks.get(entryPoint) ?? null
  };
}

export function getBlockContaining(blocks: ReadonlyMap<number, BasicBlock>, pc: number): BasicBlock | null {
  for (const block of blocks.values()) {
    if (pc >= block.start && pc <= block.end) {
      return block;
    }
  }
  return null;
}

/** Blocks reachable from the entry block, entry included. */
export function reachableBlocks(cfg: ControlFlowGraph): Set<number> {
  const seen = new Set<number>();
  if (!cfg.entryBlock) {
    return seen;
  }

  const worklist: number[] = [cfg.entryBlock.id];
  while (worklist.length > 0) {
    const id = worklist.pop();
    if (id === undefined || seen.has(id)) continue;
    seen.add(id);
    for (const succ of cfg.blocks.get(id)?.successors ?? []) {
      worklist.push(succ);
    }
  }
  return seen;
}
