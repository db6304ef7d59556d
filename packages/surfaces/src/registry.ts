/**
 * PenDraw surface registry
 */
import type { SurfaceFactory } from "./types.js";

const registry = new Map<string, SurfaceFactory>();

export function registerSurface(name: string, factory: SurfaceFactory): void {
  registry.set(name, factory);
}

export function getSurface(name: string): SurfaceFactory | undefined {
  return registry.get(name);
}

export function getAllSurfaces(): Map<string, SurfaceFactory> {
  return new Map(registry);
}
