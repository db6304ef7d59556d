/**
 * Tests for CLI command I/O error behavior.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { createRequire, syncBuiltinESMExports } from "node:module";
import { runCheck } from "./cmd-check.js";
import { runFmt } from "./cmd-fmt.js";
import { runRun } from "./cmd-run.js";
import { runTrace } from "./cmd-trace.js";

const require = createRequire(import.meta.url);

async function captureCmd(
  fn: () => Promise<number>
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await fn();
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

function missingPath(label: string): string {
  return path.join(os.tmpdir(), `pendraw-missing-${label}-${Date.now()}.pen`);
}

describe("CLI I/O errors", () => {
  it("pendraw check returns exit code 4 with E_IO on file read failure", async () => {
    const result = await captureCmd(() => runCheck(missingPath("check"), {}));
    assert.equal(result.code, 4);
    const diag: { code: string; message: string } = JSON.parse(result.stderr);
    assert.equal(diag.code, "E_IO");
    assert.ok(diag.message.startsWith("Error reading file: "));
  });

  it("pendraw fmt returns exit code 4 with E_IO on file read failure", async () => {
    const result = await captureCmd(() => runFmt(missingPath("fmt"), {}));
    assert.equal(result.code, 4);
    assert.ok(result.stderr.startsWith("error[E_IO]: Error reading file: "));
  });

  it("pendraw run --pretty returns exit code 4 with pretty E_IO on file read failure", async () => {
    const home = fs.mkdtempSync(path.join(os.tmpdir(), "pendraw-io-home-"));
    try {
      const result = await captureCmd(() =>
        runRun(missingPath("run"), { pretty: true, cwd: home, homeDir: home })
      );
      assert.equal(result.code, 4);
      assert.ok(result.stderr.startsWith("error[E_IO]: Error reading file: "));
    } finally {
      fs.rmSync(home, { recursive: true, force: true });
    }
  });

  it("pendraw run returns E_IO when the output file cannot be written", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "pendraw-io-out-"));
    const programPath = path.join(tmpDir, "art.pen");
    fs.writeFileSync(programPath, "forward(10)\n", "utf-8");

    try {
      const result = await captureCmd(() =>
        runRun(programPath, {
          out: path.join(tmpDir, "no-such-dir", "art.svg"),
          cwd: tmpDir,
          homeDir: tmpDir,
        })
      );
      assert.equal(result.code, 4);
      const diag: { code: string; message: string } = JSON.parse(result.stderr);
      assert.equal(diag.code, "E_IO");
      assert.ok(diag.message.startsWith("Error writing output file: "));
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("pendraw run returns E_IO when the trace file cannot be opened", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "pendraw-io-trace-"));
    const programPath = path.join(tmpDir, "art.pen");
    fs.writeFileSync(programPath, "forward(10)\n", "utf-8");

    try {
      const result = await captureCmd(() =>
        runRun(programPath, {
          format: "none",
          trace: path.join(tmpDir, "no-such-dir", "trace.jsonl"),
          cwd: tmpDir,
          homeDir: tmpDir,
        })
      );
      assert.equal(result.code, 4);
      const diag: { code: string; message: string } = JSON.parse(result.stderr);
      assert.equal(diag.code, "E_IO");
      assert.ok(diag.message.startsWith("Error opening trace file: "));
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("pendraw trace returns exit code 4 on file read failure", async () => {
    const result = await captureCmd(() => runTrace(missingPath("trace"), {}));
    assert.equal(result.code, 4);
    assert.ok(result.stderr.startsWith("Error reading trace file: "));
  });

  it("pendraw fmt --write returns exit code 4 with E_IO on file write failure", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "pendraw-fmt-write-fail-"));
    const filePath = path.join(tmpDir, "format-me.pen");
    fs.writeFileSync(filePath, "forward( 10 )\n", "utf-8");

    const fsCjs = require("fs") as typeof import("node:fs");
    const originalWriteFileSync = fsCjs.writeFileSync;
    fsCjs.writeFileSync = (() => {
      throw new Error("simulated fmt write failure");
    }) as typeof fsCjs.writeFileSync;
    syncBuiltinESMExports();

    try {
      const result = await captureCmd(() => runFmt(filePath, { write: true }));
      assert.equal(result.code, 4);
      assert.equal(result.stderr, "error[E_IO]: Error writing file: simulated fmt write failure\n  --> <unknown>");
    } finally {
      fsCjs.writeFileSync = originalWriteFileSync;
      syncBuiltinESMExports();
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("pendraw fmt --write rewrites the file and warns about comments", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "pendraw-fmt-write-"));
    const filePath = path.join(tmpDir, "format-me.pen");
    fs.writeFileSync(filePath, "# square\nfor i=1 to 4 { forward( 10 ); right(90) }\n", "utf-8");

    try {
      const result = await captureCmd(() => runFmt(filePath, { write: true }));
      assert.equal(result.code, 0);
      assert.equal(result.stderr, "warning: formatting will remove comments from the output.");
      assert.equal(
        fs.readFileSync(filePath, "utf-8"),
        "for i = 1 to 4 {\n  forward(10)\n  right(90)\n}\n"
      );
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
