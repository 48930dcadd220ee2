import { readFileSync } from 'fs';

import { z } from 'zod';

const fontSchema = z
  .object({
    width: z.number().int().positive(),
    height: z.number().int().positive().max(8),
    firstCode: z.number().int().nonnegative(),
    glyphs: z.array(z.array(z.number().int().min(0).max(255))),
  })
  .refine((font) => font.glyphs.every((glyph) => glyph.length === font.width), {
    message: 'every glyph needs one byte per column',
  });

/**
 * Column-major bitmap font: each glyph is `width` bytes, one per column, with
 * bit 0 as the top row.
 */
export class BitmapFont {
  readonly width: number;
  readonly height: number;
  private readonly firstCode: number;
  private readonly glyphs: number[][];

  constructor(source: unknown) {
    const font = fontSchema.parse(source);
    this.width = font.width;
    this.height = font.height;
    this.firstCode = font.firstCode;
    this.glyphs = font.glyphs;
  }

  /** Columns for a character; characters outside the table render as `?`. */
  glyph(char: string): readonly number[] {
    const code = char.codePointAt(0) ?? 0;
    return this.glyphs[code - this.firstCode] ?? this.glyphs['?'.charCodeAt(0) - this.firstCode] ?? [];
  }

  /** Advance of one character including the one-column gap. */
  advance(scale = 1): number {
    return (this.width + 1) * scale;
  }

  measure(text: string, scale = 1): number {
    const length = Array.from(text).length;
    return length === 0 ? 0 : length * this.advance(scale) - scale;
  }
}

let defaultFont: BitmapFont | null = null;

export const loadDefaultFont = (): BitmapFont => {
  if (!defaultFont) {
    const source: unknown = JSON.parse(readFileSync(new URL('./assets/font-5x7.json', import.meta.url), 'utf8'));
    defaultFont = new BitmapFont(source);
  }
  return defaultFont;
};
