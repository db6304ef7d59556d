/**
 * @pendraw/cli - CLI entry point re-exports
 */
export { runCheck } from "./cmd-check.js";
export { runRun, isOutputFormat, OUTPUT_FORMATS } from "./cmd-run.js";
export type { RunOptions, OutputFormat } from "./cmd-run.js";
export { runFmt } from "./cmd-fmt.js";
export { runRepl, Repl } from "./cmd-repl.js";
export { runTrace, summarizeTrace } from "./cmd-trace.js";
export { runConfig } from "./cmd-config.js";
export { runHelp } from "./cmd-help.js";
