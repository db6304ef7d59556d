/**
 * pendraw run - execute PenDraw programs
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import {
  parse,
  validate,
  execute,
  formatValue,
  formatDiagnostics,
  formatDiagnostic,
  resolveConfig,
  ConfigError,
} from "@pendraw/core";
import type { DiagnosticCode, PenConfig, TraceEvent } from "@pendraw/core";
import { getBuiltins } from "@pendraw/std";
import { registerBuiltinSurfaces, getSurface, surfaceOptionsFromConfig } from "@pendraw/surfaces";

export const OUTPUT_FORMATS = ["svg", "json", "none"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

const BLOCKING_CHECKS: ReadonlySet<DiagnosticCode> = new Set<DiagnosticCode>(["E_DUP_PARAM"]);

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

function traceWriter(fd: number): (event: TraceEvent) => void {
  return (event) => {
    try {
      fs.writeSync(fd, JSON.stringify(event) + "\n");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new CliIoError(`Error writing trace file: ${msg}`);
    }
  };
}

export interface RunOptions {
  out?: string;
  format?: OutputFormat;
  trace?: string;
  pretty?: boolean;
  /** Overrides limits.timeMs from the configuration. */
  timeLimit?: number;
  cwd?: string;
  homeDir?: string;
}

export async function runRun(file: string, opts: RunOptions): Promise<number> {
  const pretty = !!opts.pretty;
  const emitCliError = (code: DiagnosticCode, message: string): void => {
    console.error(formatDiagnostic({ code, message }, pretty));
  };

  let config: PenConfig;
  try {
    config = resolveConfig(opts.cwd, opts.homeDir).config;
  } catch (e) {
    if (e instanceof ConfigError) {
      emitCliError("E_CONFIG", e.message);
      return 4;
    }
    throw e;
  }

  // Read source
  let source: string;
  try {
    source = fs.readFileSync(file === "-" ? 0 : file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_IO", `Error reading file: ${msg}`);
    return 4;
  }

  const fileName = file === "-" ? "<stdin>" : file;
  const parseResult = parse(source, fileName);
  if (parseResult.diagnostics.length > 0 || !parseResult.program) {
    console.error(formatDiagnostics(parseResult.diagnostics, pretty));
    return 2;
  }

  // Calls are resolved when they run, so only checks that fail whatever
  // path the program takes stop it here; `pendraw check` reports the rest.
  const builtins = getBuiltins();
  const validationDiags = validate(parseResult.program).filter((d) => BLOCKING_CHECKS.has(d.code));
  if (validationDiags.length > 0) {
    console.error(formatDiagnostics(validationDiags, pretty));
    return 2;
  }

  const format = opts.format ?? "svg";
  registerBuiltinSurfaces();
  const factory = getSurface(format === "none" ? "null" : format);
  if (!factory) {
    emitCliError("E_CONFIG", `No surface is registered for format '${format}'.`);
    return 4;
  }
  const surface = factory.create(surfaceOptionsFromConfig(config));

  // Trace setup
  let traceFd: number | null = null;
  if (opts.trace) {
    try {
      traceFd = fs.openSync(opts.trace, "w");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error opening trace file: ${msg}`);
      return 4;
    }
  }

  const traceHandler = traceFd !== null ? traceWriter(traceFd) : undefined;

  try {
    const result = execute(parseResult.program, surface, {
      builtins,
      trace: traceHandler,
      runId: crypto.randomUUID(),
      limits: {
        timeMs: opts.timeLimit ?? config.limits.timeMs,
        maxCallDepth: config.limits.maxCallDepth,
      },
    });

    // The drawing made before a runtime error is still written.
    const drawingOnStdout = format !== "none" && !opts.out;
    if (format !== "none") {
      const rendered = surface.render();
      if (opts.out) {
        try {
          fs.writeFileSync(opts.out, rendered, "utf-8");
        } catch (e) {
          const msg = e instanceof Error ? e.message : String(e);
          emitCliError("E_IO", `Error writing output file: ${msg}`);
          return 4;
        }
      } else {
        process.stdout.write(rendered);
      }
    }

    if (result.status === "error") {
      console.error(formatDiagnostic(result.error, pretty));
      return 4;
    }

    if (!drawingOnStdout && result.value !== undefined && result.value !== null) {
      console.log(formatValue(result.value));
    }
    return 0;
  } catch (e) {
    if (e instanceof CliIoError) {
      emitCliError("E_IO", e.message);
      return 4;
    }
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_HOST", msg);
    return 4;
  } finally {
    if (traceFd !== null) {
      try {
        fs.closeSync(traceFd);
      } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        emitCliError("E_IO", `Error closing trace file: ${msg}`);
        return 4;
      }
    }
  }
}
