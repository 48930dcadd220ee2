import { loadDefaultFont, type BitmapFont } from './font.js';

export const PANEL_WIDTH = 250;
export const PANEL_HEIGHT = 122;

/** 1 is white paper, 0 is black ink, as the panel buffer encodes them. */
export type Color = 0 | 1;
export const WHITE: Color = 1;
export const BLACK: Color = 0;

export interface ShapeStyle {
  fill?: Color;
  outline?: Color;
}

export interface TextOptions {
  scale?: number;
  font?: BitmapFont;
}

/** A 1-bit image. Coordinates of shapes are inclusive bounding boxes. */
export class Frame {
  private readonly pixels: Uint8Array;

  constructor(
    readonly width: number = PANEL_WIDTH,
    readonly height: number = PANEL_HEIGHT,
    background: Color = WHITE,
  ) {
    this.pixels = new Uint8Array(width * height).fill(background);
  }

  getPixel(x: number, y: number): Color {
    if (!this.contains(x, y)) return WHITE;
    return this.pixels[y * this.width + x] === 0 ? BLACK : WHITE;
  }

  setPixel(x: number, y: number, color: Color): void {
    const px = Math.round(x);
    const py = Math.round(y);
    if (!this.contains(px, py)) return;
    this.pixels[py * this.width + px] = color;
  }

  fill(color: Color): void {
    this.pixels.fill(color);
  }

  line(x0: number, y0: number, x1: number, y1: number, color: Color): void {
    let x = Math.round(x0);
    let y = Math.round(y0);
    const xEnd = Math.round(x1);
    const yEnd = Math.round(y1);
    const dx = Math.abs(xEnd - x);
    const dy = -Math.abs(yEnd - y);
    const sx = x < xEnd ? 1 : -1;
    const sy = y < yEnd ? 1 : -1;
    let error = dx + dy;

    for (;;) {
      this.setPixel(x, y, color);
      if (x === xEnd && y === yEnd) return;
      const doubled = 2 * error;
      if (doubled >= dy) {
        error += dy;
        x += sx;
      }
      if (doubled <= dx) {
        error += dx;
        y += sy;
      }
    }
  }

  rect(x0: number, y0: number, x1: number, y1: number, style: ShapeStyle): void {
    const [left, right] = x0 <= x1 ? [x0, x1] : [x1, x0];
    const [top, bottom] = y0 <= y1 ? [y0, y1] : [y1, y0];

    if (style.fill !== undefined) {
      for (let y = top; y <= bottom; y += 1) {
        for (let x = left; x <= right; x += 1) this.setPixel(x, y, style.fill);
      }
    }
    if (style.outline !== undefined) {
      this.line(left, top, right, top, style.outline);
      this.line(left, bottom, right, bottom, style.outline);
      this.line(left, top, left, bottom, style.outline);
      this.line(right, top, right, bottom, style.outline);
    }
  }

  ellipse(x0: number, y0: number, x1: number, y1: number, style: ShapeStyle): void {
    const inside = this.ellipseTest(x0, y0, x1, y1);

    for (let y = Math.min(y0, y1); y <= Math.max(y0, y1); y += 1) {
      for (let x = Math.min(x0, x1); x <= Math.max(x0, x1); x += 1) {
        if (!inside(x, y)) continue;
        const edge = !inside(x - 1, y) || !inside(x + 1, y) || !inside(x, y - 1) || !inside(x, y + 1);
        if (edge && style.outline !== undefined) {
          this.setPixel(x, y, style.outline);
        } else if (style.fill !== undefined) {
          this.setPixel(x, y, style.fill);
        }
      }
    }
  }

  /** Angles in degrees, 0 at three o'clock, growing clockwise. */
  arc(x0: number, y0: number, x1: number, y1: number, start: number, end: number, color: Color): void {
    const cx = (x0 + x1) / 2;
    const cy = (y0 + y1) / 2;
    const rx = Math.abs(x1 - x0) / 2;
    const ry = Math.abs(y1 - y0) / 2;
    const sweep = end > start ? end - start : end - start + 360;

    for (let step = 0; step <= sweep; step += 1) {
      const angle = ((start + step) * Math.PI) / 180;
      this.setPixel(cx + rx * Math.cos(angle), cy + ry * Math.sin(angle), color);
    }
  }

  /** Draws `text` with its top-left corner at (x, y) and returns the width used. */
  text(x: number, y: number, text: string, color: Color, options: TextOptions = {}): number {
    const font = options.font ?? loadDefaultFont();
    const scale = options.scale ?? 1;
    let cursor = x;

    for (const char of text) {
      font.glyph(char).forEach((column, columnIndex) => {
        for (let row = 0; row < font.height; row += 1) {
          if ((column >> row) & 1) {
            this.rect(
              cursor + columnIndex * scale,
              y + row * scale,
              cursor + (columnIndex + 1) * scale - 1,
              y + (row + 1) * scale - 1,
              { fill: color },
            );
          }
        }
      });
      cursor += font.advance(scale);
    }

    return font.measure(text, scale);
  }

  /** Row-major, MSB first, one bit per pixel with 1 for white. */
  toBuffer(): Buffer {
    return this.pack((color) => color === WHITE);
  }

  /** Binary PBM (P4), where a set bit is black. */
  toPbm(comment?: string): Buffer {
    const header = [`P4`, ...(comment ? [`# ${comment}`] : []), `${this.width} ${this.height}`, ''].join('\n');
    return Buffer.concat([Buffer.from(header, 'ascii'), this.pack((color) => color === BLACK)]);
  }

  private pack(isSet: (color: Color) => boolean): Buffer {
    const bytesPerRow = Math.ceil(this.width / 8);
    const buffer = Buffer.alloc(bytesPerRow * this.height);
    for (let y = 0; y < this.height; y += 1) {
      for (let x = 0; x < this.width; x += 1) {
        if (isSet(this.getPixel(x, y))) {
          buffer[y * bytesPerRow + (x >> 3)] |= 0x80 >> (x & 7);
        }
      }
    }
    return buffer;
  }

  private contains(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  private ellipseTest(x0: number, y0: number, x1: number, y1: number) {
    const cx = (x0 + x1) / 2;
    const cy = (y0 + y1) / 2;
    const rx = Math.abs(x1 - x0) / 2 + 0.5;
    const ry = Math.abs(y1 - y0) / 2 + 0.5;
    return (x: number, y: number) => ((x - cx) / rx) ** 2 + ((y - cy) / ry) ** 2 <= 1;
  }
}
