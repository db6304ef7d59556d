/**
 * PenDraw configuration loader.
 * Precedence: ./.pendrawrc.json > ~/.pendraw/config.json > defaults
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import { DEFAULT_MAX_CALL_DEPTH } from "./evaluator.js";

/** Deepest recursion a config may ask for; more overflows the host stack. */
export const MAX_CALL_DEPTH = 500;

export const ConfigSchema = z
  .object({
    canvas: z
      .object({
        width: z.number().int().positive().default(800),
        height: z.number().int().positive().default(600),
        background: z.string().min(1).default("white"),
      })
      .strict()
      .default({}),
    pen: z
      .object({
        color: z.string().min(1).default("black"),
        width: z.number().positive().default(1),
      })
      .strict()
      .default({}),
    limits: z
      .object({
        timeMs: z.number().int().positive().default(10000),
        maxCallDepth: z.number().int().positive().max(MAX_CALL_DEPTH).default(DEFAULT_MAX_CALL_DEPTH),
      })
      .strict()
      .default({}),
  })
  .strict();

export type PenConfig = z.infer<typeof ConfigSchema>;

export interface ResolvedConfig {
  config: PenConfig;
  source: "project" | "user" | "default";
  path: string | null;
}

export const PROJECT_CONFIG_FILE = ".pendrawrc.json";

export class ConfigError extends Error {
  path: string;

  constructor(filePath: string, message: string) {
    super(`Invalid config '${filePath}': ${message}`);
    this.name = "ConfigError";
    this.path = filePath;
  }
}

export function defaultConfig(): PenConfig {
  return ConfigSchema.parse({});
}

/**
 * Find and validate the effective configuration.
 * Throws ConfigError when the file that wins is unreadable or invalid.
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
  const userPath = path.join(homeDir ?? os.homedir(), ".pendraw", "config.json");

  const projectConfig = tryLoadConfigFile(projectPath);
  if (projectConfig) {
    return { config: projectConfig, source: "project", path: projectPath };
  }

  const userConfig = tryLoadConfigFile(userPath);
  if (userConfig) {
    return { config: userConfig, source: "user", path: userPath };
  }

  return { config: defaultConfig(), source: "default", path: null };
}

export function loadConfig(cwd?: string, homeDir?: string): PenConfig {
  return resolveConfig(cwd, homeDir).config;
}

function tryLoadConfigFile(filePath: string): PenConfig | null {
  if (!fs.existsSync(filePath)) return null;

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    throw new ConfigError(filePath, e instanceof Error ? e.message : String(e));
  }

  const parsed = ConfigSchema.safeParse(data);
  if (!parsed.success) {
    const msg = parsed.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ConfigError(filePath, msg);
  }
  return parsed.data;
}
