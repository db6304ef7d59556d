/**
 * Helpers for declaring built-ins with zod-checked arguments.
 */
import type { z } from "zod";
import { formatValue, PenRuntimeError, typeName } from "@pendraw/core";
import type { Arity, Builtin, BuiltinContext, PenValue } from "@pendraw/core";

export interface BuiltinSpec<A> {
  /** Canonical name first, then aliases. */
  names: string[];
  /** Parameter list shown in the usage line, e.g. "radius [, x, y]". */
  params: string;
  arity: Arity;
  args: z.ZodType<A, z.ZodTypeDef, unknown>;
  run(args: A, ctx: BuiltinContext): PenValue;
}

/**
 * Validate evaluated arguments against a schema. Failures become
 * E_ARG_TYPE without a span; the evaluator attaches the call's span.
 */
export function parseArgs<A>(
  name: string,
  signature: string,
  schema: z.ZodType<A, z.ZodTypeDef, unknown>,
  args: PenValue[]
): A {
  const parsed = schema.safeParse(args);
  if (parsed.success) return parsed.data;

  const issue = parsed.error.issues[0];
  const index = issue?.path[0];
  const value = typeof index === "number" ? args[index] : undefined;
  let got = "";
  if (value !== undefined) {
    if (issue?.code === "invalid_type") {
      got = `, got ${typeName(value)}`;
    } else {
      got = `, got ${typeof value === "string" ? JSON.stringify(value) : formatValue(value)}`;
    }
  }
  throw new PenRuntimeError(
    "E_ARG_TYPE",
    `${name}: ${issue?.message ?? "invalid arguments"}${got}.`,
    undefined,
    `Usage: ${signature}`
  );
}

export function defineBuiltins<A>(kind: Builtin["kind"], spec: BuiltinSpec<A>): Builtin[] {
  return spec.names.map((name) => {
    const signature = `${name}(${spec.params})`;
    return {
      name,
      kind,
      arity: spec.arity,
      signature,
      execute: (args, ctx) => spec.run(parseArgs(name, signature, spec.args, args), ctx),
    };
  });
}
