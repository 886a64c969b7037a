export { buildCFG, getBlockContaining, reachableBlocks } from "./analysis/cfg";
export type { BasicBlock, CfgSource, ControlFlowGraph } from "./analysis/cfg";
export { classifyCall, classifyCalls } from "./analysis/callClassifier";
export type { CallBuckets, CalleeInfo, ClassifiedCall } from "./analysis/callClassifier";
export { Engine } from "./analysis/dataflow";
export type { Analysis, AnalysisContext } from "./analysis/dataflow";
export { reentrancyAnalysis, isReentrant, collectFindings } from "./analysis/reentrancy";
export { classifyFunctionType } from "./analysis/roleClassifier";
export { scanProgram, buildReport } from "./analysis/reentrancyScanner";
export { generateCfgGraph, cfgToDot, dotFileName } from "./analysis/graphGenerator";
export { CompilationUnit } from "./core/compilationUnit";
export { ProgramFunction } from "./core/function";
export type { Analyses, ProgramContext } from "./core/function";
export { LibfuncRegistry } from "./core/registry";
export { parseProgram, loadProgramFromFile } from "./services/programLoader";
export { ScannerError, InvariantViolationError, ProgramLoadError, ConfigError } from "./utils/errors";
export type * from "./types/analysis";
export type * from "./types/sierra";
