export type VarId = number;

export interface ConcreteTypeId {
  id: number;
  debugName?: string;
}

export interface FunctionId {
  id: number;
  debugName?: string;
}

export interface Param {
  id: VarId;
  ty: ConcreteTypeId;
}

export interface FunctionSignature {
  paramTypes: ConcreteTypeId[];
  retTypes: ConcreteTypeId[];
}

export interface FunctionData {
  id: FunctionId;
  signature: FunctionSignature;
  params: Param[];
  entryPoint: number; // absolute statement index
}

export interface BranchInfo {
  target: "fallthrough" | number; // number = absolute statement index
  results: VarId[];
}

export interface Invocation {
  libfuncId: number;
  args: VarId[];
  branches: BranchInfo[];
}

export type Statement =
  | { kind: "invocation"; invocation: Invocation }
  | { kind: "return"; vars: VarId[] };

export type GenericArg =
  | { kind: "userFunc"; function: FunctionId }
  | { kind: "type"; type: ConcreteTypeId }
  | { kind: "value"; value: string };

export interface LibfuncDeclaration {
  id: number;
  debugName?: string;
  genericId: string;
  genericArgs?: GenericArg[];
}

export interface ContractAbi {
  external?: string[];
  view?: string[];
  constructors?: string[];
  l1Handler?: string[];
  event?: string[];
}

export interface SierraProgram {
  libfuncDeclarations: LibfuncDeclaration[];
  statements: Statement[];
  funcs: FunctionData[];
  abi?: ContractAbi;
}

export type ConcreteLibfunc =
  | { kind: "functionCall"; function: FunctionId }
  | { kind: "other"; genericId: string };

/** Resolves what a statement's libfunc does. */
export interface ProgramRegistry {
  getLibfunc(id: number): ConcreteLibfunc | undefined;
  getLibfuncName(id: number): string;
}
