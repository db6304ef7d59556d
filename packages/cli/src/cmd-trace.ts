/**
 * pendraw trace - trace summary command
 */
import * as fs from "node:fs";
import { z } from "zod";

const TraceLineSchema = z.object({
  ts: z.string(),
  runId: z.string(),
  event: z.string(),
  span: z.unknown().optional(),
  data: z.record(z.unknown()).optional(),
});

type TraceLine = z.infer<typeof TraceLineSchema>;

export interface TraceSummary {
  runId: string;
  totalEvents: number;
  statements: number;
  functionCalls: number;
  functionsByName: Record<string, number>;
  drawCommands: number;
  drawsByName: Record<string, number>;
  errors: number;
  malformedLines: number;
  startTime?: string;
  endTime?: string;
  durationMs?: number;
}

function parseLine(line: string): TraceLine | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = TraceLineSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function stringField(ev: TraceLine, key: string): string {
  const value = ev.data?.[key];
  return typeof value === "string" ? value : "unknown";
}

function bump(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export function summarizeTrace(content: string): TraceSummary | null {
  const lines = content.split("\n").filter((l) => l.trim());
  const events: TraceLine[] = [];
  let malformedLines = 0;

  for (const line of lines) {
    const ev = parseLine(line);
    if (ev) {
      events.push(ev);
    } else {
      malformedLines++;
    }
  }

  if (events.length === 0) return null;

  const summary: TraceSummary = {
    runId: events[0].runId,
    totalEvents: events.length,
    statements: 0,
    functionCalls: 0,
    functionsByName: {},
    drawCommands: 0,
    drawsByName: {},
    errors: 0,
    malformedLines,
  };

  for (const ev of events) {
    switch (ev.event) {
      case "run_start":
        summary.startTime = ev.ts;
        break;
      case "run_end":
        summary.endTime = ev.ts;
        if (ev.data?.["error"]) summary.errors++;
        break;
      case "stmt_start":
        summary.statements++;
        break;
      case "fn_call_start":
        summary.functionCalls++;
        bump(summary.functionsByName, stringField(ev, "fn"));
        break;
      case "draw":
        summary.drawCommands++;
        bump(summary.drawsByName, stringField(ev, "command"));
        break;
    }
  }

  if (summary.startTime && summary.endTime) {
    summary.durationMs =
      new Date(summary.endTime).getTime() - new Date(summary.startTime).getTime();
  }

  return summary;
}

function printCounts(counts: Record<string, number>): void {
  for (const [name, count] of Object.entries(counts)) {
    console.log(`    ${name}: ${count}`);
  }
}

export async function runTrace(file: string, opts: { json?: boolean }): Promise<number> {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error reading trace file: ${msg}`);
    return 4;
  }

  const summary = summarizeTrace(content);
  if (!summary) {
    console.error("No valid trace events found.");
    return 4;
  }

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
    return 0;
  }

  console.log(`Trace Summary`);
  console.log(`  Run ID:          ${summary.runId}`);
  console.log(`  Total events:    ${summary.totalEvents}`);
  console.log(`  Statements:      ${summary.statements}`);
  console.log(`  Function calls:  ${summary.functionCalls}`);
  printCounts(summary.functionsByName);
  console.log(`  Draw commands:   ${summary.drawCommands}`);
  printCounts(summary.drawsByName);
  console.log(`  Errors:          ${summary.errors}`);
  if (summary.malformedLines > 0) {
    console.log(`  Skipped lines:   ${summary.malformedLines}`);
  }
  if (summary.durationMs !== undefined) {
    console.log(`  Duration:        ${summary.durationMs}ms`);
  }
  return 0;
}
