import type { DrawingSurface } from "@pendraw/core";

/** A drawing surface whose result can be written out after a run. */
export interface RenderSurface extends DrawingSurface {
  /** Serialized drawing; empty when the surface keeps nothing. */
  render(): string;
}

export interface SurfaceFactory {
  description: string;
  /** File extension for written output, or null when there is none. */
  extension: string | null;
  create(options?: unknown): RenderSurface;
}
