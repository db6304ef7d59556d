import { z } from "zod";

export const SurfaceOptionsSchema = z
  .object({
    width: z.number({ invalid_type_error: "width must be a number" }).int().positive().default(800),
    height: z.number({ invalid_type_error: "height must be a number" }).int().positive().default(600),
    background: z.string({ invalid_type_error: "background must be a string" }).min(1).default("white"),
    color: z.string({ invalid_type_error: "color must be a string" }).min(1).default("black"),
    penWidth: z.number({ invalid_type_error: "penWidth must be a number" }).positive().default(1),
  })
  .strict();

export type SurfaceOptions = z.infer<typeof SurfaceOptionsSchema>;
export type SurfaceOptionsInput = z.input<typeof SurfaceOptionsSchema>;

export class SurfaceOptionsError extends Error {
  constructor(surface: string, message: string) {
    super(`Invalid options for surface '${surface}': ${message}`);
    this.name = "SurfaceOptionsError";
  }
}

export function parseSurfaceOptions(surface: string, input: unknown): SurfaceOptions {
  const parsed = SurfaceOptionsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const msg = parsed.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new SurfaceOptionsError(surface, msg);
  }
  return parsed.data;
}
