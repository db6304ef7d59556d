#!/usr/bin/env node
/**
 * pendraw - PenDraw Language CLI
 */
import { createRequire } from "node:module";
import { Command, InvalidArgumentError, Option } from "commander";
import { runCheck } from "./cmd-check.js";
import { runRun, isOutputFormat, OUTPUT_FORMATS } from "./cmd-run.js";
import { runFmt } from "./cmd-fmt.js";
import { runRepl } from "./cmd-repl.js";
import { runTrace } from "./cmd-trace.js";
import { runConfig } from "./cmd-config.js";
import { runHelp, QUICKREF } from "./cmd-help.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

function parseMilliseconds(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError("Expected a positive whole number of milliseconds.");
  }
  return ms;
}

const program = new Command();

program
  .name("pendraw")
  .description("PenDraw: a turtle-style drawing language")
  .version(pkg.version)
  .addHelpText("after", "\n" + QUICKREF);

program
  .command("run")
  .description("Run a PenDraw program")
  .argument("<file>", "PenDraw source file to run (or - for stdin)")
  .option("--out <path>", "Write the drawing to a file instead of stdout")
  .addOption(new Option("--format <format>", "Output format").choices([...OUTPUT_FORMATS]).default("svg"))
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--pretty", "Human-readable error output", false)
  .option("--time-limit <ms>", "Stop the run after this many milliseconds", parseMilliseconds)
  .action(
    async (
      file: string,
      opts: { out?: string; format: string; trace?: string; pretty?: boolean; timeLimit?: number }
    ) => {
      if (!isOutputFormat(opts.format)) {
        console.error(`Unknown output format: ${opts.format}`);
        process.exit(1);
      }
      const code = await runRun(file, { ...opts, format: opts.format });
      process.exit(code);
    }
  );

program
  .command("check")
  .description("Static validation without execution")
  .argument("<file>", "PenDraw source file to check")
  .option("--pretty", "Human-readable output", false)
  .action(async (file: string, opts: { pretty?: boolean }) => {
    const code = await runCheck(file, opts);
    process.exit(code);
  });

program
  .command("fmt")
  .description("Canonical formatter")
  .argument("<file>", "PenDraw source file to format")
  .option("--write", "Overwrite file in place", false)
  .action(async (file: string, opts: { write?: boolean }) => {
    const code = await runFmt(file, opts);
    process.exit(code);
  });

program
  .command("repl")
  .description("Interactive drawing session")
  .option("--out <path>", "Write the drawing as SVG when the session ends")
  .action(async (opts: { out?: string }) => {
    const code = await runRepl(opts);
    process.exit(code);
  });

program
  .command("trace")
  .description("Display trace summary")
  .argument("<file>", "JSONL trace file")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean }) => {
    const code = await runTrace(file, opts);
    process.exit(code);
  });

program
  .command("config")
  .description("Display effective configuration and its source")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runConfig(opts);
    process.exit(code);
  });

program
  .command("help")
  .description("Language reference: run 'pendraw help <topic>' for details")
  .argument("[topic]", "Topic: syntax, drawing, math, flow, functions, errors, examples")
  .option("--index", "For drawing and math, print every built-in signature", false)
  .action((topic: string | undefined, opts: { index?: boolean }) => {
    runHelp(topic, opts);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(["run", "check", "fmt", "repl", "trace", "config", "help"]);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

await program.parseAsync();
