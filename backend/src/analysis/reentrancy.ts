import type { ReentrancyFinding, ReentrancyState } from "../types/analysis";
import type { Statement } from "../types/sierra";
import { classifyCall } from "./callClassifier";
import { type ControlFlowGraph, reachableBlocks } from "./cfg";
import type { Analysis, AnalysisContext } from "./dataflow";

const ORDER: readonly ReentrancyState[] = ["Unvisited", "Clean", "CallMade", "WriteAfterCall"];

function rank(state: ReentrancyState): number {
  return ORDER.indexOf(state);
}

export function joinReentrancy(a: ReentrancyState, b: ReentrancyState): ReentrancyState {
  return rank(a) >= rank(b) ? a : b;
}

/**
 * Flags a storage write that can follow a call through an ABI dispatcher on
 * some path. Unreachable code stays `Unvisited`.
 */
export const reentrancyAnalysis: Analysis<ReentrancyState> = {
  name: "reentrancy",

  bottom: () => "Unvisited",

  initial: () => "Clean",

  join: joinReentrancy,

  lessOrEqual: (a, b) => rank(a) <= rank(b),

  transfer(state: ReentrancyState, statement: Statement, context: AnalysisContext): ReentrancyState {
    if (state === "Unvisited") {
      return state;
    }
    const call = classifyCall(statement, context.functions, context.registry);
    if (!call) {
      return state;
    }
    if (call.bucket === "externalFunctionsCalls" || call.bucket === "libraryFunctionsCalls") {
      return joinReentrancy(state, "CallMade");
    }
    if (call.bucket === "storageVarsWritten" && rank(state) >= rank("CallMade")) {
      return "WriteAfterCall";
    }
    return state;
  }
};

export function isReentrant(cfg: ControlFlowGraph, states: ReadonlyMap<number, ReentrancyState>): boolean {
  for (const id of reachableBlocks(cfg)) {
    if (states.get(id) === "WriteAfterCall") {
      return true;
    }
  }
  return false;
}

/** Replays each reachable block from its entry state and records the flagged writes. */
export function collectFindings(
  functionName: string,
  cfg: ControlFlowGraph,
  entryStates: ReadonlyMap<number, ReentrancyState>,
  context: AnalysisContext
): ReentrancyFinding[] {
  const findings: ReentrancyFinding[] = [];
  const reachable = reachableBlocks(cfg);

  for (const block of cfg.blocks.values()) {
    if (!reachable.has(block.id)) continue;

    let state = entryStates.get(block.id) ?? "Unvisited";
    block.statements.forEach((statement, i) => {
      const call = classifyCall(statement, context.functions, context.registry);
      if (call?.bucket === "storageVarsWritten" && rank(state) >= rank("CallMade")) {
        findings.push({
          functionName,
          blockId: block.id,
          statementOffset: block.start + i,
          callee: call.callee
        });
      }
      state = reentrancyAnalysis.transfer(state, statement, context);
    });
  }

  return findings;
}
