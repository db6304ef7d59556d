/**
 * Tests for pendraw trace command behavior.
 */
import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runTrace, summarizeTrace } from "./cmd-trace.js";

async function captureTrace(
  file: string,
  opts: { json?: boolean }
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runTrace(file, opts);
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

const EVENTS = [
  { ts: "2026-01-01T00:00:00.000Z", runId: "r1", event: "run_start", data: { file: "art.pen" } },
  { ts: "2026-01-01T00:00:00.001Z", runId: "r1", event: "stmt_start", data: { kind: "ExprStmt" } },
  { ts: "2026-01-01T00:00:00.002Z", runId: "r1", event: "fn_call_start", data: { fn: "square" } },
  { ts: "2026-01-01T00:00:00.003Z", runId: "r1", event: "stmt_start", data: { kind: "ExprStmt" } },
  { ts: "2026-01-01T00:00:00.004Z", runId: "r1", event: "draw", data: { command: "forward" } },
  { ts: "2026-01-01T00:00:00.005Z", runId: "r1", event: "draw", data: { command: "forward" } },
  { ts: "2026-01-01T00:00:00.006Z", runId: "r1", event: "draw", data: { command: "right" } },
  { ts: "2026-01-01T00:00:00.007Z", runId: "r1", event: "fn_call_end", data: { fn: "square" } },
  { ts: "2026-01-01T00:00:00.042Z", runId: "r1", event: "run_end", data: { durationMs: 42 } },
];

function toJsonl(events: object[]): string {
  return events.map((e) => JSON.stringify(e)).join("\n") + "\n";
}

describe("summarizeTrace", () => {
  it("counts statements, function calls and draw commands", () => {
    const summary = summarizeTrace(toJsonl(EVENTS));
    assert.deepEqual(summary, {
      runId: "r1",
      totalEvents: 9,
      statements: 2,
      functionCalls: 1,
      functionsByName: { square: 1 },
      drawCommands: 3,
      drawsByName: { forward: 2, right: 1 },
      errors: 0,
      malformedLines: 0,
      startTime: "2026-01-01T00:00:00.000Z",
      endTime: "2026-01-01T00:00:00.042Z",
      durationMs: 42,
    });
  });

  it("counts a run_end carrying an error", () => {
    const summary = summarizeTrace(
      toJsonl([
        { ts: "2026-01-01T00:00:00.000Z", runId: "r2", event: "run_start" },
        { ts: "2026-01-01T00:00:00.010Z", runId: "r2", event: "run_end", data: { error: "E_DIV_ZERO" } },
      ])
    );
    assert.equal(summary?.errors, 1);
    assert.equal(summary?.durationMs, 10);
  });

  it("counts malformed lines instead of failing", () => {
    const content = "not json\n" + toJsonl(EVENTS.slice(0, 2)) + '{"event":"draw"}\n\n';
    const summary = summarizeTrace(content);
    assert.equal(summary?.totalEvents, 2);
    assert.equal(summary?.malformedLines, 2);
    assert.equal(summary?.durationMs, undefined);
  });

  it("returns null when no line is a trace event", () => {
    assert.equal(summarizeTrace("garbage\n[]\n"), null);
    assert.equal(summarizeTrace(""), null);
  });
});

describe("pendraw trace", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "pendraw-cli-trace-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("prints a text summary", async () => {
    const tracePath = path.join(tmpDir, "trace.jsonl");
    fs.writeFileSync(tracePath, toJsonl(EVENTS), "utf-8");

    const result = await captureTrace(tracePath, {});
    assert.equal(result.code, 0);
    assert.deepEqual(result.stdout.split("\n"), [
      "Trace Summary",
      "  Run ID:          r1",
      "  Total events:    9",
      "  Statements:      2",
      "  Function calls:  1",
      "    square: 1",
      "  Draw commands:   3",
      "    forward: 2",
      "    right: 1",
      "  Errors:          0",
      "  Duration:        42ms",
    ]);
  });

  it("prints the summary as JSON with --json", async () => {
    const tracePath = path.join(tmpDir, "trace.jsonl");
    fs.writeFileSync(tracePath, "oops\n" + toJsonl(EVENTS), "utf-8");

    const result = await captureTrace(tracePath, { json: true });
    assert.equal(result.code, 0);
    const summary: { drawCommands: number; malformedLines: number } = JSON.parse(result.stdout);
    assert.equal(summary.drawCommands, 3);
    assert.equal(summary.malformedLines, 1);
  });

  it("mentions skipped lines in the text summary", async () => {
    const tracePath = path.join(tmpDir, "trace.jsonl");
    fs.writeFileSync(tracePath, "oops\n" + toJsonl(EVENTS.slice(0, 1)), "utf-8");

    const result = await captureTrace(tracePath, {});
    assert.equal(result.code, 0);
    assert.ok(result.stdout.split("\n").includes("  Skipped lines:   1"));
  });

  it("exits 4 when the file holds no trace events", async () => {
    const tracePath = path.join(tmpDir, "trace.jsonl");
    fs.writeFileSync(tracePath, "oops\n", "utf-8");

    const result = await captureTrace(tracePath, {});
    assert.equal(result.code, 4);
    assert.equal(result.stderr, "No valid trace events found.");
  });
});
