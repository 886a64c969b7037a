import { describe, it, expect } from "vitest";
import { classifyFunctionType } from "../../src/analysis/roleClassifier";
import type { ContractAbi } from "../../src/types/sierra";

const abi: ContractAbi = {
  external: ["vault::Vault::withdraw"],
  view: ["vault::Vault::get_balance"],
  constructors: ["vault::Vault::constructor"],
  l1Handler: ["vault::Vault::on_deposit"],
  event: ["vault::Vault::Withdrawn"]
};

describe("classifyFunctionType", () => {
  it.each([
    ["core::integer::u256_add", "Core"],
    ["vault::Vault::__wrapper_withdraw", "Wrapper"],
    ["vault::Vault::constructor", "Constructor"],
    ["vault::Vault::on_deposit", "L1Handler"],
    ["vault::Vault::withdraw", "External"],
    ["vault::Vault::get_balance", "View"],
    ["vault::Vault::Withdrawn", "Event"],
    ["vault::IERC20LibraryDispatcherImpl::transfer", "AbiLibraryCall"],
    ["vault::IERC20DispatcherImpl::transfer", "AbiCallContract"],
    ["vault::Vault::balance::read", "Storage"],
    ["vault::Vault::balance::write", "Storage"],
    ["vault::Vault::balance::address", "Storage"],
    ["vault::Vault::compute_fee", "Private"]
  ])("classifies %s as %s", (name, expected) => {
    expect(classifyFunctionType(name, abi)).toBe(expected);
  });

  it("looks at the path before generic arguments", () => {
    expect(classifyFunctionType("vault::IERC20DispatcherImpl::transfer<core::felt252>")).toBe("AbiCallContract");
    expect(classifyFunctionType("vault::Helper::apply<vault::Dispatcher>")).toBe("Private");
  });

  it("prefers the ABI over the storage accessor naming", () => {
    expect(classifyFunctionType("vault::Vault::read", { external: ["vault::Vault::read"] })).toBe("External");
    expect(classifyFunctionType("vault::Vault::read")).toBe("Storage");
  });
});
