import type { ProgramRegistry, Statement } from "../types/sierra";
import type { CalleeInfo } from "./callClassifier";
import type { ControlFlowGraph } from "./cfg";

/** Whole-program context handed, unchanged, to every transfer call. */
export interface AnalysisContext {
  functions: readonly CalleeInfo[];
  registry: ProgramRegistry;
}

/**
 * A forward analysis over a join-semilattice of finite height.
 *
 * `join` must be commutative, associative and idempotent, `lessOrEqual` must
 * agree with it, and `transfer` must be monotone. The engine does not check
 * any of this.
 */
export interface Analysis<S> {
  readonly name: string;
  bottom(): S;
  initial(): S;
  join(a: S, b: S): S;
  lessOrEqual(a: S, b: S): boolean;
  transfer(state: S, statement: Statement, context: AnalysisContext): S;
}

/** Worklist fixpoint solver, one instance per CFG and analysis. */
export class Engine<S> {
  private readonly inStates = new Map<number, S>();
  private readonly outStates = new Map<number, S>();

  constructor(
    private readonly cfg: ControlFlowGraph,
    private readonly analysis: Analysis<S>
  ) {
    for (const id of cfg.blocks.keys()) {
      const isEntry = id === cfg.entryBlock?.id;
      this.inStates.set(id, isEntry ? analysis.initial() : analysis.bottom());
      this.outStates.set(id, analysis.bottom());
    }
  }

  runAnalysis(context: AnalysisContext): void {
    const worklist: number[] = Array.from(this.cfg.blocks.keys());

    while (worklist.length > 0) {
      const blockId = worklist.shift();
      if (blockId === undefined) continue;

      const block = this.cfg.blocks.get(blockId);
      if (!block) continue;

      const incoming = this.incomingState(blockId, block.predecessors);
      this.inStates.set(blockId, incoming);

      const outgoing = block.statements.reduce(
        (state, statement) => this.analysis.transfer(state, statement, context),
        incoming
      );

      const previous = this.outStates.get(blockId) ?? this.analysis.bottom();
      if (!this.sameState(previous, outgoing)) {
        this.outStates.set(blockId, outgoing);
        for (const succ of block.successors) {
          if (!worklist.includes(succ)) {
            worklist.push(succ);
          }
        }
      }
    }
  }

  /** Final out-state of every block. */
  result(): ReadonlyMap<number, S> {
    return this.outStates;
  }

  /** State on entry to every block. */
  entryStates(): ReadonlyMap<number, S> {
    return this.inStates;
  }

  private incomingState(blockId: number, predecessors: readonly number[]): S {
    // The entry keeps its initial state even when a loop leads back to it
    let state = blockId === this.cfg.entryBlock?.id ? this.analysis.initial() : this.analysis.bottom();

    for (const pred of predecessors) {
      state = this.analysis.join(state, this.outStates.get(pred) ?? this.analysis.bottom());
    }
    return state;
  }

  private sameState(a: S, b: S): boolean {
    return this.analysis.lessOrEqual(a, b) && this.analysis.lessOrEqual(b, a);
  }
}
