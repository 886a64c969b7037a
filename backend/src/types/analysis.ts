export type FunctionType =
  | "External"
  | "View"
  | "Private"
  | "Constructor"
  | "Event"
  | "Storage" // compiler-made accessors: address, read, write
  | "Wrapper" // compiler-made shim around an external function
  | "Core"
  | "AbiCallContract"
  | "AbiLibraryCall"
  | "L1Handler";

export type CallBucket =
  | "storageVarsRead"
  | "storageVarsWritten"
  | "coreFunctionsCalls"
  | "privateFunctionsCalls"
  | "eventsEmitted"
  | "externalFunctionsCalls"
  | "libraryFunctionsCalls";

export const CALL_BUCKETS: readonly CallBucket[] = [
  "storageVarsRead",
  "storageVarsWritten",
  "coreFunctionsCalls",
  "privateFunctionsCalls",
  "eventsEmitted",
  "externalFunctionsCalls",
  "libraryFunctionsCalls"
];

/** Ordered from bottom to top. */
export type ReentrancyState = "Unvisited" | "Clean" | "CallMade" | "WriteAfterCall";

export interface ReentrancyFinding {
  functionName: string;
  blockId: number;
  statementOffset: number;
  callee: string;
}

export interface FunctionReport {
  name: string;
  type: FunctionType;
  entryPoint: number;
  blockCount: number;
  calls: Record<CallBucket, number>;
  analyzed: boolean;
  reentrant: boolean;
  blockStates: Record<string, ReentrancyState>;
  findings: ReentrancyFinding[];
}

export interface ReentrancyReport {
  programHash: string;
  functionCount: number;
  analyzedCount: number;
  reentrantFunctions: string[];
  functions: FunctionReport[];
}

export interface GraphNode {
  id: string;
  label: string;
  kind: "entry" | "block" | "exit";
  metadata?: Record<string, string | number>;
}

export interface GraphEdge {
  id: string;
  from: string;
  to: string;
}

export interface GraphOutput {
  nodes: GraphNode[];
  edges: GraphEdge[];
}
