import crypto from "crypto";
import { CompilationUnit } from "../core/compilationUnit";
import type { ProgramFunction } from "../core/function";
import type { FunctionReport, ReentrancyReport, ReentrancyState } from "../types/analysis";
import type { SierraProgram } from "../types/sierra";
import { createLogger } from "../utils/logger";
import { collectFindings, isReentrant } from "./reentrancy";

const log = createLogger("scanner");

interface ScanOptions {
  functionFilter?: string; // only report functions whose name contains this
}

export function scanProgram(program: SierraProgram, opts: ScanOptions = {}): ReentrancyReport {
  const unit = CompilationUnit.fromProgram(program);
  unit.analyze();
  return buildReport(unit, JSON.stringify(program), opts);
}

export function buildReport(unit: CompilationUnit, source: string, opts: ScanOptions = {}): ReentrancyReport {
  const selected = unit
    .functions()
    .filter((f) => opts.functionFilter === undefined || f.name().includes(opts.functionFilter));

  const functions = selected.map((f) => reportFunction(unit, f));
  const reentrantFunctions = functions.filter((f) => f.reentrant).map((f) => f.name);

  if (reentrantFunctions.length > 0) {
    log.warn({ functions: reentrantFunctions }, "write after external call detected");
  }

  return {
    programHash: crypto.createHash("sha256").update(source).digest("hex"),
    functionCount: functions.length,
    analyzedCount: functions.filter((f) => f.analyzed).length,
    reentrantFunctions,
    functions
  };
}

function reportFunction(unit: CompilationUnit, fn: ProgramFunction): FunctionReport {
  const cfg = fn.getCfg();
  const { reentrancy, reentrancyEntry } = fn.getAnalyses();
  const analyzed = fn.ty() === "External";

  const calls = {
    storageVarsRead: fn.storageVarsRead().length,
    storageVarsWritten: fn.storageVarsWritten().length,
    coreFunctionsCalls: fn.coreFunctionsCalls().length,
    privateFunctionsCalls: fn.privateFunctionsCalls().length,
    eventsEmitted: fn.eventsEmitted().length,
    externalFunctionsCalls: fn.externalFunctionsCalls().length,
    libraryFunctionsCalls: fn.libraryFunctionsCalls().length
  };

  const blockStates: Record<string, ReentrancyState> = {};
  for (const [id, state] of reentrancy) {
    blockStates[String(id)] = state;
  }

  return {
    name: fn.name(),
    type: fn.ty(),
    entryPoint: fn.entryPoint(),
    blockCount: cfg.blocks.size,
    calls,
    analyzed,
    reentrant: analyzed && isReentrant(cfg, reentrancy),
    blockStates,
    findings: analyzed ? collectFindings(fn.name(), cfg, reentrancyEntry, unit.context()) : []
  };
}
