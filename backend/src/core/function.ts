import { type CallBuckets, classifyCalls, emptyCallBuckets } from "../analysis/callClassifier";
import { type CfgSource, type ControlFlowGraph, EMPTY_CFG, buildCFG } from "../analysis/cfg";
import { type AnalysisContext, Engine } from "../analysis/dataflow";
import { reentrancyAnalysis } from "../analysis/reentrancy";
import type { FunctionType, ReentrancyState } from "../types/analysis";
import type { ConcreteTypeId, FunctionData, Param, ProgramRegistry, Statement } from "../types/sierra";
import { InvariantViolationError } from "../utils/errors";
import { functionDisplayName } from "./registry";
import { BUILTINS } from "./statements";

export interface Analyses {
  /** Out-state per basic block */
  reentrancy: ReadonlyMap<number, ReentrancyState>;
  /** In-state per basic block */
  reentrancyEntry: ReadonlyMap<number, ReentrancyState>;
}

export interface ProgramContext {
  functions: readonly ProgramFunction[];
  registry: ProgramRegistry;
}

type RoleSlot = { assigned: false } | { assigned: true; ty: FunctionType };

function isBuiltin(ty: ConcreteTypeId): boolean {
  return ty.debugName !== undefined && BUILTINS.has(ty.debugName);
}

export class ProgramFunction implements CfgSource {
  private role: RoleSlot = { assigned: false };
  private cfg: ControlFlowGraph = EMPTY_CFG;
  private analyzed = false;
  // NOTE the buckets miss reads, writes, events and calls made with the syscall directly
  private buckets: CallBuckets = emptyCallBuckets();
  private analyses: Analyses = { reentrancy: new Map(), reentrancyEntry: new Map() };

  constructor(
    private readonly data: FunctionData,
    private readonly statements: readonly Statement[]
  ) {}

  name(): string {
    return functionDisplayName(this.data.id);
  }

  entryPoint(): number {
    return this.data.entryPoint;
  }

  hasTy(): boolean {
    return this.role.assigned;
  }

  ty(): FunctionType {
    if (!this.role.assigned) {
      throw new InvariantViolationError(`Type of ${this.name()} read before it was assigned`);
    }
    return this.role.ty;
  }

  /** Called once per function by the role classification pass. */
  setTy(ty: FunctionType): void {
    if (this.role.assigned) {
      throw new InvariantViolationError(`Type of ${this.name()} is already ${this.role.ty}`);
    }
    this.role = { assigned: true, ty };
  }

  /** Parameters without the builtins */
  params(): Param[] {
    return this.data.params.filter((p) => !isBuiltin(p.ty));
  }

  paramsAll(): readonly Param[] {
    return this.data.params;
  }

  /** Return types without the builtins */
  returns(): ConcreteTypeId[] {
    return this.data.signature.retTypes.filter((r) => !isBuiltin(r));
  }

  returnsAll(): readonly ConcreteTypeId[] {
    return this.data.signature.retTypes;
  }

  getStatements(): readonly Statement[] {
    return this.statements;
  }

  getStatementsAt(at: number): readonly Statement[] {
    return this.statements.slice(at);
  }

  getCfg(): ControlFlowGraph {
    return this.cfg;
  }

  storageVarsRead(): readonly Statement[] {
    return this.buckets.storageVarsRead;
  }

  storageVarsWritten(): readonly Statement[] {
    return this.buckets.storageVarsWritten;
  }

  coreFunctionsCalls(): readonly Statement[] {
    return this.buckets.coreFunctionsCalls;
  }

  privateFunctionsCalls(): readonly Statement[] {
    return this.buckets.privateFunctionsCalls;
  }

  eventsEmitted(): readonly Statement[] {
    return this.buckets.eventsEmitted;
  }

  externalFunctionsCalls(): readonly Statement[] {
    return this.buckets.externalFunctionsCalls;
  }

  libraryFunctionsCalls(): readonly Statement[] {
    return this.buckets.libraryFunctionsCalls;
  }

  getAnalyses(): Analyses {
    return this.analyses;
  }

  isAnalyzed(): boolean {
    return this.analyzed;
  }

  /**
   * Builds the CFG and fills the call buckets. Every function in
   * `context.functions` must already have its type.
   */
  analyze(context: ProgramContext): void {
    if (this.analyzed) {
      throw new InvariantViolationError(`${this.name()} was already analyzed`);
    }
    const untyped = context.functions.find((f) => !f.hasTy());
    if (untyped) {
      throw new InvariantViolationError(`Cannot analyze ${this.name()}: ${untyped.name()} has no type yet`);
    }

    this.cfg = buildCFG(this, this.data.entryPoint);
    this.buckets = classifyCalls(this.statements, context.functions, context.registry);
    this.analyzed = true;
  }

  /** Runs the dataflow analyses; only external functions are entry points an attacker reaches. */
  runAnalyses(context: AnalysisContext): void {
    if (this.ty() !== "External") {
      return;
    }
    if (!this.analyzed) {
      throw new InvariantViolationError(`${this.name()} must be analyzed before running analyses`);
    }

    const engine = new Engine(this.cfg, reentrancyAnalysis);
    engine.runAnalysis(context);
    this.analyses = {
      reentrancy: engine.result(),
      reentrancyEntry: engine.entryStates()
    };
  }
}
