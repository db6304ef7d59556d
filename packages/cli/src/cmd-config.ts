/**
 * pendraw config - effective configuration summary command
 */
import { resolveConfig, formatDiagnostic, ConfigError } from "@pendraw/core";
import type { ResolvedConfig } from "@pendraw/core";

export async function runConfig(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  let resolved: ResolvedConfig;
  try {
    resolved = resolveConfig(opts.cwd, opts.homeDir);
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(formatDiagnostic({ code: "E_CONFIG", message: e.message }, !opts.json));
      return 4;
    }
    throw e;
  }

  if (opts.json) {
    console.log(JSON.stringify(resolved, null, 2));
    return 0;
  }

  const { canvas, pen, limits } = resolved.config;
  console.log("Effective PenDraw configuration");
  console.log(`  Source:  ${resolved.source}`);
  console.log(`  Path:    ${resolved.path ?? "(none)"}`);
  console.log(`  Canvas:  ${canvas.width}x${canvas.height}, background ${canvas.background}`);
  console.log(`  Pen:     ${pen.color}, width ${pen.width}`);
  console.log(`  Limits:  timeMs ${limits.timeMs}, maxCallDepth ${limits.maxCallDepth}`);
  return 0;
}
