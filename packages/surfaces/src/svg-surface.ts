/**
 * PenDraw SVG surface
 * Drawing coordinates have the origin at the canvas centre and y pointing up;
 * they are mapped to SVG user space when elements are emitted.
 */
import type { RenderSurface } from "./types.js";
import { parseSurfaceOptions, type SurfaceOptions } from "./schemas.js";

const MIN_PEN_WIDTH = 0.1;

function num(v: number): string {
  return String(Math.round(v * 1000) / 1000);
}

function escapeAttr(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export class SvgSurface implements RenderSurface {
  readonly options: SurfaceOptions;
  private elements: string[] = [];
  private x = 0;
  private y = 0;
  private penDown = true;
  private color: string;
  private penWidth: number;
  private filled = false;

  constructor(options?: unknown) {
    this.options = parseSurfaceOptions("svg", options);
    this.color = this.options.color;
    this.penWidth = Math.max(MIN_PEN_WIDTH, this.options.penWidth);
  }

  private sx(x: number): string {
    return num(this.options.width / 2 + x);
  }

  private sy(y: number): string {
    return num(this.options.height / 2 - y);
  }

  private stroke(): string {
    return `stroke="${escapeAttr(this.color)}" stroke-width="${num(this.penWidth)}"`;
  }

  private fillAttr(): string {
    return `fill="${this.filled ? escapeAttr(this.color) : "none"}"`;
  }

  moveTo(x: number, y: number): void {
    this.x = x;
    this.y = y;
  }

  lineTo(x: number, y: number): void {
    if (this.penDown) {
      this.elements.push(
        `<line x1="${this.sx(this.x)}" y1="${this.sy(this.y)}" x2="${this.sx(x)}" y2="${this.sy(y)}" ${this.stroke()} stroke-linecap="round"/>`
      );
    }
    this.x = x;
    this.y = y;
  }

  setPenDown(down: boolean): void {
    this.penDown = down;
  }

  setColor(color: string): void {
    this.color = color;
  }

  setWidth(width: number): void {
    this.penWidth = Math.max(MIN_PEN_WIDTH, width);
  }

  setFill(fill: boolean): void {
    this.filled = fill;
  }

  drawCircle(radius: number, cx: number = this.x, cy: number = this.y): void {
    this.elements.push(
      `<circle cx="${this.sx(cx)}" cy="${this.sy(cy)}" r="${num(Math.abs(radius))}" ${this.fillAttr()} ${this.stroke()}/>`
    );
  }

  /** (x, y) is the lower-left corner; the rectangle extends right and up. */
  drawRectangle(width: number, height: number, x: number = this.x, y: number = this.y): void {
    const left = Math.min(x, x + width);
    const top = Math.max(y, y + height);
    this.elements.push(
      `<rect x="${this.sx(left)}" y="${this.sy(top)}" width="${num(Math.abs(width))}" height="${num(Math.abs(height))}" ${this.fillAttr()} ${this.stroke()}/>`
    );
  }

  drawLine(x1: number, y1: number, x2: number, y2: number): void {
    this.elements.push(
      `<line x1="${this.sx(x1)}" y1="${this.sy(y1)}" x2="${this.sx(x2)}" y2="${this.sy(y2)}" ${this.stroke()} stroke-linecap="round"/>`
    );
  }

  drawPolygon(points: ReadonlyArray<readonly [number, number]>): void {
    const list = points.map(([x, y]) => `${this.sx(x)},${this.sy(y)}`).join(" ");
    this.elements.push(`<polygon points="${list}" ${this.fillAttr()} ${this.stroke()}/>`);
  }

  /**
   * Upper half of the ellipse `width` x `height` centred on the pen,
   * rotated counter-clockwise by `angle` degrees.
   */
  drawArc(width: number, height: number, angle: number): void {
    const rx = Math.abs(width) / 2;
    const ry = Math.abs(height) / 2;
    const rad = (angle * Math.PI) / 180;
    const dx = rx * Math.cos(rad);
    const dy = rx * Math.sin(rad);
    const start = `${this.sx(this.x + dx)} ${this.sy(this.y + dy)}`;
    const end = `${this.sx(this.x - dx)} ${this.sy(this.y - dy)}`;
    // SVG rotates clockwise because its y axis points down.
    this.elements.push(
      `<path d="M ${start} A ${num(rx)} ${num(ry)} ${num(-angle)} 0 0 ${end}" fill="none" ${this.stroke()}/>`
    );
  }

  clear(): void {
    this.elements = [];
  }

  resetState(): void {
    this.x = 0;
    this.y = 0;
    this.penDown = true;
    this.color = this.options.color;
    this.penWidth = Math.max(MIN_PEN_WIDTH, this.options.penWidth);
    this.filled = false;
  }

  present(): void {}

  /** Number of elements drawn since the last clear. */
  get size(): number {
    return this.elements.length;
  }

  toSvg(): string {
    const { width, height, background } = this.options;
    const lines = [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
      `  <rect width="100%" height="100%" fill="${escapeAttr(background)}"/>`,
      ...this.elements.map((e) => `  ${e}`),
      "</svg>",
    ];
    return lines.join("\n") + "\n";
  }

  render(): string {
    return this.toSvg();
  }
}
