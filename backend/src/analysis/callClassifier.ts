import { functionDisplayName } from "../core/registry";
import type { CallBucket, FunctionType } from "../types/analysis";
import type { ProgramRegistry, Statement } from "../types/sierra";

const STORAGE_READ_SUFFIX = "read";
const STORAGE_WRITE_SUFFIX = "write";

/** The slice of a program function the classifier looks at. */
export interface CalleeInfo {
  name(): string;
  ty(): FunctionType;
}

export interface ClassifiedCall {
  bucket: CallBucket;
  callee: string;
}

export type CallBuckets = Record<CallBucket, Statement[]>;

export function emptyCallBuckets(): CallBuckets {
  return {
    storageVarsRead: [],
    storageVarsWritten: [],
    coreFunctionsCalls: [],
    privateFunctionsCalls: [],
    eventsEmitted: [],
    externalFunctionsCalls: [],
    libraryFunctionsCalls: []
  };
}

function bucketFor(callee: CalleeInfo): CallBucket | null {
  switch (callee.ty()) {
    case "Storage": {
      const name = callee.name();
      if (name.endsWith(STORAGE_READ_SUFFIX)) return "storageVarsRead";
      if (name.endsWith(STORAGE_WRITE_SUFFIX)) return "storageVarsWritten";
      return null;
    }
    case "Event":
      return "eventsEmitted";
    case "Core":
      return "coreFunctionsCalls";
    case "Private":
      return "privateFunctionsCalls";
    case "AbiCallContract":
      return "externalFunctionsCalls";
    case "AbiLibraryCall":
      return "libraryFunctionsCalls";
    default:
      return null;
  }
}

/**
 * Classifies one statement. Only `function_call` invocations whose callee is
 * found in `functions` are classified; calls made through a raw syscall are
 * invisible here. With duplicate names the first function in program order
 * wins.
 */
export function classifyCall(
  statement: Statement,
  functions: readonly CalleeInfo[],
  registry: ProgramRegistry
): ClassifiedCall | null {
  if (statement.kind !== "invocation") {
    return null;
  }
  const libfunc = registry.getLibfunc(statement.invocation.libfuncId);
  if (!libfunc || libfunc.kind !== "functionCall") {
    return null;
  }

  const calleeName = functionDisplayName(libfunc.function);
  const callee = functions.find((f) => f.name() === calleeName);
  if (!callee) {
    return null;
  }

  const bucket = bucketFor(callee);
  return bucket ? { bucket, callee: calleeName } : null;
}

export function classifyCalls(
  statements: readonly Statement[],
  functions: readonly CalleeInfo[],
  registry: ProgramRegistry
): CallBuckets {
  const buckets = emptyCallBuckets();
  for (const statement of statements) {
    const call = classifyCall(statement, functions, registry);
    if (call) {
      buckets[call.bucket].push(statement);
    }
  }
  return buckets;
}
