/**
 * Tests for configuration loading.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  ConfigError,
  defaultConfig,
  loadConfig,
  resolveConfig,
  MAX_CALL_DEPTH,
  PROJECT_CONFIG_FILE,
} from "./config.js";

function withDirs(fn: (cwd: string, home: string) => void): void {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "pendraw-config-"));
  const cwd = path.join(root, "project");
  const home = path.join(root, "home");
  fs.mkdirSync(cwd);
  fs.mkdirSync(path.join(home, ".pendraw"), { recursive: true });
  try {
    fn(cwd, home);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
}

describe("config", () => {
  it("falls back to defaults", () => {
    withDirs((cwd, home) => {
      const resolved = resolveConfig(cwd, home);
      assert.equal(resolved.source, "default");
      assert.equal(resolved.path, null);
      assert.deepEqual(resolved.config, {
        canvas: { width: 800, height: 600, background: "white" },
        pen: { color: "black", width: 1 },
        limits: { timeMs: 10000, maxCallDepth: 200 },
      });
      assert.deepEqual(resolved.config, defaultConfig());
    });
  });

  it("reads the user config and fills in missing fields", () => {
    withDirs((cwd, home) => {
      const userPath = path.join(home, ".pendraw", "config.json");
      fs.writeFileSync(userPath, JSON.stringify({ canvas: { width: 400 } }));
      const resolved = resolveConfig(cwd, home);
      assert.equal(resolved.source, "user");
      assert.equal(resolved.path, userPath);
      assert.deepEqual(resolved.config.canvas, { width: 400, height: 600, background: "white" });
    });
  });

  it("prefers the project config over the user config", () => {
    withDirs((cwd, home) => {
      fs.writeFileSync(path.join(home, ".pendraw", "config.json"), JSON.stringify({ pen: { color: "blue" } }));
      fs.writeFileSync(path.join(cwd, PROJECT_CONFIG_FILE), JSON.stringify({ pen: { color: "red" } }));
      const resolved = resolveConfig(cwd, home);
      assert.equal(resolved.source, "project");
      assert.equal(resolved.config.pen.color, "red");
      assert.equal(loadConfig(cwd, home).pen.color, "red");
    });
  });

  it("rejects invalid values with the offending path", () => {
    withDirs((cwd, home) => {
      const file = path.join(cwd, PROJECT_CONFIG_FILE);
      fs.writeFileSync(file, JSON.stringify({ limits: { timeMs: -1 } }));
      assert.throws(
        () => resolveConfig(cwd, home),
        (e: unknown) => e instanceof ConfigError && e.path === file && e.message.includes("limits.timeMs")
      );
    });
  });

  it("caps the call depth a config may ask for", () => {
    withDirs((cwd, home) => {
      const file = path.join(cwd, PROJECT_CONFIG_FILE);
      fs.writeFileSync(file, JSON.stringify({ limits: { maxCallDepth: MAX_CALL_DEPTH } }));
      assert.equal(resolveConfig(cwd, home).config.limits.maxCallDepth, MAX_CALL_DEPTH);

      fs.writeFileSync(file, JSON.stringify({ limits: { maxCallDepth: MAX_CALL_DEPTH + 1 } }));
      assert.throws(
        () => resolveConfig(cwd, home),
        (e: unknown) => e instanceof ConfigError && e.message.includes("limits.maxCallDepth")
      );
    });
  });

  it("rejects unknown keys and malformed JSON", () => {
    withDirs((cwd, home) => {
      const file = path.join(cwd, PROJECT_CONFIG_FILE);
      fs.writeFileSync(file, JSON.stringify({ colour: "red" }));
      assert.throws(() => resolveConfig(cwd, home), ConfigError);
      fs.writeFileSync(file, "{ not json");
      assert.throws(() => resolveConfig(cwd, home), /^ConfigError: Invalid config/);
    });
  });
});
