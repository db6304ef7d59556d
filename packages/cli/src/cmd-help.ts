/**
 * pendraw help - progressive-discovery help system
 */
import { QUICKREF, TOPICS, TOPIC_LIST } from "./help-content.js";
import { getBuiltins } from "@pendraw/std";

export { QUICKREF };

const INDEX_TOPICS: Record<string, "draw" | "math"> = { drawing: "draw", math: "math" };

function resolveTopic(topic: string): string | null {
  const normalized = topic.toLowerCase().trim();

  // Guard against prototype-chain keys like "constructor" or "__proto__".
  if (Object.prototype.hasOwnProperty.call(TOPICS, normalized)) {
    return normalized;
  }

  // Prefix matching: "err" -> "errors", "ex" -> "examples"
  const matches = TOPIC_LIST.filter((t) => t.startsWith(normalized));
  if (matches.length === 1) {
    return matches[0];
  }

  return null;
}

function renderBuiltinIndex(topic: string, kind: "draw" | "math"): string {
  const signatures = [...getBuiltins().values()]
    .filter((b) => b.kind === kind)
    .map((b) => b.signature)
    .sort((a, b) => a.localeCompare(b));
  const numWidth = String(signatures.length).length;
  const title = `PENDRAW ${topic.toUpperCase()} INDEX`;
  return [
    title,
    "=".repeat(title.length),
    "",
    ...signatures.map((sig, idx) => `  ${String(idx + 1).padStart(numWidth, " ")}. ${sig}`),
    "",
    `Total: ${signatures.length}`,
    "",
    "More details:",
    `  pendraw help ${topic}`,
  ].join("\n");
}

function renderUsage(commands: string[]): string {
  return ["Usage:", ...commands.map((command) => `  ${command}`)].join("\n");
}

function renderTopicList(): string {
  return ["Available topics:", ...TOPIC_LIST.map((name) => `  - ${name}`)].join("\n");
}

export function runHelp(topic?: string, opts: { index?: boolean } = {}): void {
  if (opts.index) {
    const resolved = topic ? resolveTopic(topic) : null;
    const kind = resolved && Object.prototype.hasOwnProperty.call(INDEX_TOPICS, resolved)
      ? INDEX_TOPICS[resolved]
      : undefined;
    if (!resolved || !kind) {
      console.error("The --index flag is only supported with the drawing and math topics.");
      console.error(renderUsage(["pendraw help drawing --index", "pendraw help math --index"]));
      process.exitCode = 1;
      return;
    }

    console.log(renderBuiltinIndex(resolved, kind));
    return;
  }

  if (!topic) {
    console.log(QUICKREF);
    return;
  }

  const resolved = resolveTopic(topic);
  if (resolved) {
    console.log(TOPICS[resolved]);
    return;
  }

  console.error(`Unknown help topic: "${topic}"`);
  console.error(renderTopicList());
  console.error(renderUsage(["pendraw help <topic>", "pendraw help drawing --index"]));
  process.exitCode = 1;
}
