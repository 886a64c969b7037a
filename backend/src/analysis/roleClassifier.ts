import type { FunctionType } from "../types/analysis";
import type { ContractAbi } from "../types/sierra";

const STORAGE_ACCESSORS = new Set(["address", "read", "write"]);

function listed(names: string[] | undefined, name: string): boolean {
  return names !== undefined && names.includes(name);
}

/**
 * Decides a function's role from its Sierra debug name and the contract ABI.
 * Rules are tried in order; a user function that matches nothing is private.
 */
export function classifyFunctionType(name: string, abi: ContractAbi = {}): FunctionType {
  if (name.startsWith("core::")) {
    return "Core";
  }
  if (name.includes("__wrapper")) {
    return "Wrapper";
  }
  if (listed(abi.constructors, name)) {
    return "Constructor";
  }
  if (listed(abi.l1Handler, name)) {
    return "L1Handler";
  }
  if (listed(abi.external, name)) {
    return "External";
  }
  if (listed(abi.view, name)) {
    return "View";
  }
  if (listed(abi.event, name)) {
    return "Event";
  }

  const segments = stripGenerics(name).split("::");
  if (segments.some((s) => s.includes("LibraryDispatcher"))) {
    return "AbiLibraryCall";
  }
  if (segments.some((s) => s.includes("Dispatcher"))) {
    return "AbiCallContract";
  }
  if (STORAGE_ACCESSORS.has(segments[segments.length - 1] ?? "")) {
    return "Storage";
  }

  return "Private";
}

function stripGenerics(name: string): string {
  const idx = name.indexOf("<");
  return idx === -1 ? name : name.slice(0, idx);
}
