/**
 * pendraw repl - interactive drawing session
 */
import * as fs from "node:fs";
import * as readline from "node:readline";
import {
  createSession,
  resetSession,
  evalStatement,
  formatDiagnostic,
  formatValue,
  resolveConfig,
  ConfigError,
} from "@pendraw/core";
import type { RunResult, Session, SessionOptions } from "@pendraw/core";
import { getBuiltins } from "@pendraw/std";
import { SvgSurface, surfaceOptionsFromConfig, type RenderSurface } from "@pendraw/surfaces";
import { REPL_HELP } from "./help-content.js";

export const PROMPT = "draw> ";
export const CONTINUATION_PROMPT = "... ";

export interface ReplOutput {
  log(text: string): void;
  error(text: string): void;
}

/**
 * Line-at-a-time evaluator behind the interactive prompt. A line ending in
 * a backslash is held until a line without one completes the input.
 */
export class Repl {
  private session: Session;
  private buffer: string[] = [];
  closed = false;

  constructor(
    readonly surface: RenderSurface,
    private readonly output: ReplOutput,
    private readonly options: SessionOptions = {}
  ) {
    this.session = createSession(surface, options);
  }

  get prompt(): string {
    return this.buffer.length > 0 ? CONTINUATION_PROMPT : PROMPT;
  }

  /** Drop any partially entered input. */
  interrupt(): void {
    this.buffer = [];
  }

  handleLine(raw: string): void {
    const line = raw.trim();
    if (!line) return;

    if (this.buffer.length === 0 && this.handleMeta(line.toLowerCase())) return;

    if (line.endsWith("\\")) {
      this.buffer.push(line.slice(0, -1));
      return;
    }

    this.buffer.push(line);
    const source = this.buffer.join("\n");
    this.buffer = [];

    let result: RunResult;
    try {
      result = evalStatement(source, this.session);
    } catch (e) {
      // A failing surface or host callback ends the input, not the session.
      const message = e instanceof Error ? e.message : String(e);
      this.output.error(formatDiagnostic({ code: "E_HOST", message }, true));
      return;
    }
    if (result.status === "error") {
      this.output.error(formatDiagnostic(result.error, true));
      return;
    }
    if (result.value !== undefined && result.value !== null) {
      this.output.log(formatValue(result.value));
    }
  }

  private handleMeta(command: string): boolean {
    switch (command) {
      case "exit":
      case "quit":
      case "q":
        this.closed = true;
        return true;
      case "help":
        this.output.log(REPL_HELP);
        return true;
      case "vars":
        this.listVars();
        return true;
      case "functions":
        this.listFunctions();
        return true;
      case "clear":
        this.surface.clear();
        return true;
      case "reset":
        this.session = resetSession(this.session);
        this.surface.resetState();
        this.output.log("Session reset.");
        return true;
      default:
        return false;
    }
  }

  private listVars(): void {
    const names = this.session.globals.names();
    if (names.length === 0) {
      this.output.log("(no variables)");
      return;
    }
    for (const name of names) {
      const value = this.session.globals.lookup(name);
      this.output.log(`${name} = ${value === undefined ? "null" : formatValue(value)}`);
    }
  }

  private listFunctions(): void {
    const fns = [...this.session.functions.values()];
    if (fns.length === 0) {
      this.output.log("(no functions)");
      return;
    }
    for (const fn of fns) {
      this.output.log(`${fn.decl.name}(${fn.decl.params.join(", ")})`);
    }
  }
}

export interface ReplCommandOptions {
  /** Write the drawing as SVG here when the session ends. */
  out?: string;
  cwd?: string;
  homeDir?: string;
}

export async function runRepl(opts: ReplCommandOptions = {}): Promise<number> {
  let options: SessionOptions;
  let surface: RenderSurface;
  try {
    const config = resolveConfig(opts.cwd, opts.homeDir).config;
    surface = new SvgSurface(surfaceOptionsFromConfig(config));
    options = {
      builtins: getBuiltins(),
      limits: { timeMs: config.limits.timeMs, maxCallDepth: config.limits.maxCallDepth },
    };
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(formatDiagnostic({ code: "E_CONFIG", message: e.message }, true));
      return 4;
    }
    throw e;
  }

  const repl = new Repl(surface, { log: console.log, error: console.error }, options);
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: PROMPT });

  console.log("PenDraw interactive mode");
  console.log("Type 'help' for commands, 'exit' or 'quit' to leave.");
  console.log("End a line with '\\' to continue it on the next line.");
  rl.prompt();

  await new Promise<void>((resolve) => {
    rl.on("line", (line) => {
      repl.handleLine(line);
      if (repl.closed) {
        rl.close();
        return;
      }
      rl.setPrompt(repl.prompt);
      rl.prompt();
    });
    rl.on("SIGINT", () => {
      repl.interrupt();
      console.log("\nInterrupted. Type 'exit' to quit.");
      rl.setPrompt(repl.prompt);
      rl.prompt();
    });
    rl.on("close", () => resolve());
  });

  console.log("Goodbye!");

  if (opts.out) {
    try {
      fs.writeFileSync(opts.out, surface.render(), "utf-8");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      console.error(formatDiagnostic({ code: "E_IO", message: `Error writing output file: ${msg}` }, true));
      return 4;
    }
  }
  return 0;
}
