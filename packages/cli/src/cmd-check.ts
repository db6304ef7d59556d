/**
 * pendraw check - static validation command
 */
import * as fs from "node:fs";
import { parse, validate, formatDiagnostics, formatDiagnostic } from "@pendraw/core";
import { getBuiltins } from "@pendraw/std";

export async function runCheck(file: string, opts: { pretty?: boolean }): Promise<number> {
  let source: string;
  try {
    source = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${msg}` }, !!opts.pretty));
    return 4;
  }

  const parseResult = parse(source, file);
  if (parseResult.diagnostics.length > 0 || !parseResult.program) {
    console.error(formatDiagnostics(parseResult.diagnostics, !!opts.pretty));
    return 2;
  }

  const validationDiags = validate(parseResult.program, { builtins: getBuiltins() });
  if (validationDiags.length > 0) {
    console.error(formatDiagnostics(validationDiags, !!opts.pretty));
    return 2;
  }

  console.log(opts.pretty ? "No errors found." : "[]");
  return 0;
}
