import { describe, it, expect } from "vitest";
import { classifyCall, classifyCalls } from "../../src/analysis/callClassifier";
import { CompilationUnit } from "../../src/core/compilationUnit";
import { ProgramFunction } from "../../src/core/function";
import { LibfuncRegistry } from "../../src/core/registry";
import { InvariantViolationError } from "../../src/utils/errors";
import { ProgramBuilder, invoke, ret } from "../helpers/programBuilder";

const READ = "token::Token::balance::read";
const WRITE = "token::Token::balance::write";
const ADDRESS = "token::Token::balance::address";
const EVENT = "token::Token::Transfer";
const CORE = "core::integer::u256_add";
const HELPER = "token::Token::helper";
const DISPATCH = "token::IERC20DispatcherImpl::transfer";
const LIBRARY = "token::IERC20LibraryDispatcherImpl::transfer";
const WRAPPER = "token::Token::__wrapper_withdraw";
const WITHDRAW = "token::Token::withdraw";

function tokenProgram(): CompilationUnit {
  const b = new ProgramBuilder();
  for (const name of [READ, WRITE, ADDRESS, EVENT, CORE, HELPER, DISPATCH, LIBRARY, WRAPPER]) {
    b.addFunction(name, [ret()]);
  }
  b.addFunction(WITHDRAW, [
    invoke(b.call(READ)),
    invoke(b.call(ADDRESS)),
    invoke(b.call(HELPER)),
    invoke(b.call(CORE)),
    invoke(b.call(EVENT)),
    invoke(b.call(DISPATCH)),
    invoke(b.call(LIBRARY)),
    invoke(b.call(WRAPPER)),
    invoke(b.call("token::Token::missing")),
    invoke(b.op("felt252_add")),
    invoke(b.call(WRITE)),
    invoke(b.call(READ)),
    invoke(99),
    ret()
  ]);
  b.withAbi({ external: [WITHDRAW], event: [EVENT] });

  const unit = CompilationUnit.fromProgram(b.build());
  unit.analyze();
  return unit;
}

function withdraw(unit: CompilationUnit): ProgramFunction {
  const fn = unit.findFunction(WITHDRAW);
  if (!fn) throw new Error("withdraw not found");
  return fn;
}

describe("call classification", () => {
  it("buckets each call by the callee's type, in statement order", () => {
    const fn = withdraw(tokenProgram());
    const s = fn.getStatements();

    expect(fn.storageVarsRead()).toEqual([s[0], s[11]]);
    expect(fn.storageVarsRead()[0]).toBe(s[0]);
    expect(fn.storageVarsWritten()).toEqual([s[10]]);
    expect(fn.privateFunctionsCalls()).toEqual([s[2]]);
    expect(fn.coreFunctionsCalls()).toEqual([s[3]]);
    expect(fn.eventsEmitted()).toEqual([s[4]]);
    expect(fn.externalFunctionsCalls()).toEqual([s[5]]);
    expect(fn.libraryFunctionsCalls()).toEqual([s[6]]);
  });

  it("leaves address accessors, wrappers, unknown callees and other libfuncs uncategorised", () => {
    const fn = withdraw(tokenProgram());
    const s = fn.getStatements();
    const all = [
      ...fn.storageVarsRead(),
      ...fn.storageVarsWritten(),
      ...fn.privateFunctionsCalls(),
      ...fn.coreFunctionsCalls(),
      ...fn.eventsEmitted(),
      ...fn.externalFunctionsCalls(),
      ...fn.libraryFunctionsCalls()
    ];

    expect(all).toHaveLength(8);
    for (const i of [1, 7, 8, 9, 12, 13]) {
      expect(all).not.toContain(s[i]);
    }
  });

  it("gives the same buckets on every run", () => {
    const unit = tokenProgram();
    const fn = withdraw(unit);

    const first = classifyCalls(fn.getStatements(), unit.functions(), unit.registry);
    const second = classifyCalls(fn.getStatements(), unit.functions(), unit.registry);

    expect(second).toEqual(first);
    expect(first.storageVarsRead).toEqual(fn.storageVarsRead());
  });

  it("reports the callee name", () => {
    const unit = tokenProgram();
    const statement = withdraw(unit).getStatements()[5];
    if (!statement) throw new Error("missing statement");

    expect(classifyCall(statement, unit.functions(), unit.registry)).toEqual({
      bucket: "externalFunctionsCalls",
      callee: DISPATCH
    });
  });

  it("resolves a duplicated name to the first function in program order", () => {
    const registry = new LibfuncRegistry([
      {
        id: 0,
        debugName: `function_call<user@${READ}>`,
        genericId: "function_call",
        genericArgs: [{ kind: "userFunc", function: { id: 0, debugName: READ } }]
      }
    ]);
    const signature = { paramTypes: [], retTypes: [] };
    const storage = new ProgramFunction({ id: { id: 0, debugName: READ }, signature, params: [], entryPoint: 0 }, [ret()]);
    const core = new ProgramFunction({ id: { id: 1, debugName: READ }, signature, params: [], entryPoint: 1 }, [ret()]);
    storage.setTy("Storage");
    core.setTy("Core");

    const statement = invoke(0);
    expect(classifyCall(statement, [storage, core], registry)?.bucket).toBe("storageVarsRead");
    expect(classifyCall(statement, [core, storage], registry)?.bucket).toBe("coreFunctionsCalls");
  });

  it("fails when the callee has no type yet", () => {
    const registry = new LibfuncRegistry([
      {
        id: 0,
        genericId: "function_call",
        genericArgs: [{ kind: "userFunc", function: { id: 0, debugName: HELPER } }]
      }
    ]);
    const helper = new ProgramFunction(
      { id: { id: 0, debugName: HELPER }, signature: { paramTypes: [], retTypes: [] }, params: [], entryPoint: 0 },
      [ret()]
    );

    expect(() => classifyCall(invoke(0), [helper], registry)).toThrow(InvariantViolationError);
  });
});
