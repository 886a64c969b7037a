#!/usr/bin/env node
/* eslint-disable no-console */
import { Command } from "commander";
import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { cfgToDot, dotFileName } from "../analysis/graphGenerator";
import { buildReport } from "../analysis/reentrancyScanner";
import { CompilationUnit } from "../core/compilationUnit";
import { loadProgramFromFile } from "../services/programLoader";
import { CALL_BUCKETS, type ReentrancyReport } from "../types/analysis";

interface CliOptions {
  program?: string;
  json: boolean;
  dot?: string;
  function?: string;
}

const program = new Command();

program
  .name("sierra-scan")
  .description("Sierra reentrancy scanner - find storage writes reachable after external calls")
  .version("1.0.0");

program
  .option("--program <file>", "Sierra program JSON to analyze")
  .option("--function <name>", "Only report functions whose name contains this")
  .option("--dot <dir>", "Write the CFG of every reported function as Graphviz DOT into this directory")
  .option("--json", "Output JSON report", false);

program.action(async (opts: CliOptions) => {
  try {
    if (!opts.program) {
      console.error("--program is required.");
      process.exitCode = 1;
      return;
    }

    const sierra = await loadProgramFromFile(opts.program);
    const unit = CompilationUnit.fromProgram(sierra);
    unit.analyze();

    const report = buildReport(unit, JSON.stringify(sierra), { functionFilter: opts.function });

    if (opts.dot) {
      const dir = opts.dot;
      await mkdir(dir, { recursive: true });
      for (const f of report.functions) {
        const fn = unit.findFunction(f.name);
        if (!fn) continue;
        const file = path.join(dir, dotFileName(fn));
        await writeFile(file, cfgToDot(fn, unit.registry));
        console.error(`Wrote ${file}`);
      }
    }

    if (opts.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printHumanReadable(report);
    }

    if (report.reentrantFunctions.length > 0) {
      process.exitCode = 2;
    }
  } catch (err) {
    console.error("Analysis failed:", err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});

function printHumanReadable(report: ReentrancyReport): void {
  console.log("Reentrancy Summary");
  console.log("====================================\n");

  console.log(`Program hash: ${report.programHash}`);
  console.log(`Functions: ${report.functionCount} (${report.analyzedCount} external analyzed)`);
  console.log(`Reentrant functions: ${report.reentrantFunctions.length}\n`);

  for (const fn of report.functions.filter((f) => f.analyzed)) {
    console.log(`${fn.name} @ statement ${fn.entryPoint}`);
    console.log(`  Blocks: ${fn.blockCount}`);
    const calls = CALL_BUCKETS.filter((b) => fn.calls[b] > 0).map((b) => `${b}=${fn.calls[b]}`);
    if (calls.length > 0) {
      console.log(`  Calls: ${calls.join(", ")}`);
    }
    console.log(`  Verdict: ${fn.reentrant ? "REENTRANT" : "ok"}`);
    for (const finding of fn.findings) {
      console.log(`    write ${finding.callee} at statement ${finding.statementOffset} (block ${finding.blockId})`);
    }
    console.log("");
  }
}
