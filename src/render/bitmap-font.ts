import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { PixelColor, PixelSurface } from './bitmap';

export interface Glyph {
  readonly width: number;
  readonly rows: ReadonlyArray<ReadonlyArray<boolean>>;
}

export interface TextSize {
  width: number;
  height: number;
}

export interface DrawTextOptions {
  scale?: number;
  color: PixelColor;
}

/** Horizontal gap between glyphs, in font pixels. */
export const CHAR_SPACING = 1;

const SYNTHETIC_WIDTH = 7;

const FontTableSchema = z
  .array(
    z.object({
      char: z.string().length(1),
      width: z.number().int().positive(),
      pixels: z.array(z.string()).min(1),
    }),
  )
  .min(1);

export type FontTable = z.infer<typeof FontTableSchema>;

export class FontTableError extends Error {
  constructor(message: string) {
    super(`Malformed font table: ${message}`);
    this.name = 'FontTableError';
  }
}

export class UnknownGlyphError extends Error {
  constructor(readonly char: string) {
    super(`No glyph for character ${JSON.stringify(char)}`);
    this.name = 'UnknownGlyphError';
  }
}

type Point = readonly [x: number, y: number];

function range(from: number, to: number): number[] {
  const out: number[] = [];
  for (let i = from; i <= to; i += 1) {
    out.push(i);
  }
  return out;
}

// Drawn on a 7-wide cell, rows counted from the top of an 11-row font.
const SYNTHETIC_PATTERNS: Record<string, () => Point[]> = {
  ' ': () => [],
  ':': () => [2, 3, 6, 7].map((y): Point => [3, y]),
  '-': () => range(1, 5).map((x): Point => [x, 4]),
  '>': () => [
    [1, 1],
    [2, 2],
    [3, 3],
    [4, 4],
    [3, 5],
    [2, 6],
    [1, 7],
  ],
  '#': () => [
    ...range(1, 7).flatMap((y): Point[] => [
      [2, y],
      [4, y],
    ]),
    ...range(1, 5).flatMap((x): Point[] => [
      [x, 3],
      [x, 5],
    ]),
  ],
};

function freezeGlyph(width: number, rows: boolean[][]): Glyph {
  return Object.freeze({
    width,
    rows: Object.freeze(rows.map((row) => Object.freeze(row))),
  });
}

function synthesize(points: Point[], height: number): Glyph {
  const rows = Array.from({ length: height }, () => new Array<boolean>(SYNTHETIC_WIDTH).fill(false));
  for (const [x, y] of points) {
    if (y < height) {
      rows[y][x] = true;
    }
  }
  return freezeGlyph(SYNTHETIC_WIDTH, rows);
}

/**
 * Fixed-pixel font. Glyphs come from a table of `X`/space rows; upper-case letters and a
 * handful of punctuation marks are derived at construction when the table lacks them.
 * Instances are immutable.
 */
export class BitmapFont {
  private constructor(
    private readonly glyphs: ReadonlyMap<string, Glyph>,
    readonly height: number,
  ) {}

  static fromTable(input: unknown): BitmapFont {
    const parsed = FontTableSchema.safeParse(input);
    if (!parsed.success) {
      throw new FontTableError(parsed.error.issues.map((issue) => issue.message).join('; '));
    }
    const table = parsed.data;
    const height = table[0].pixels.length;
    const glyphs = new Map<string, Glyph>();

    for (const entry of table) {
      if (glyphs.has(entry.char)) {
        throw new FontTableError(`duplicate glyph ${JSON.stringify(entry.char)}`);
      }
      if (entry.pixels.length !== height) {
        throw new FontTableError(
          `glyph ${JSON.stringify(entry.char)} has ${entry.pixels.length} rows, expected ${height}`,
        );
      }
      const rows = entry.pixels.map((row) => {
        if (row.length !== entry.width || /[^X ]/.test(row)) {
          throw new FontTableError(`glyph ${JSON.stringify(entry.char)} has a bad row ${JSON.stringify(row)}`);
        }
        return Array.from(row, (cell) => cell === 'X');
      });
      glyphs.set(entry.char, freezeGlyph(entry.width, rows));
    }

    for (const upper of 'ABCDEFGHIJKLMNOPQRSTUVWXYZ') {
      const lower = glyphs.get(upper.toLowerCase());
      if (!glyphs.has(upper) && lower) {
        glyphs.set(upper, lower);
      }
    }
    for (const [char, pattern] of Object.entries(SYNTHETIC_PATTERNS)) {
      if (!glyphs.has(char)) {
        glyphs.set(char, synthesize(pattern(), height));
      }
    }

    return new BitmapFont(glyphs, height);
  }

  static fromFile(path: string): BitmapFont {
    let table: unknown;
    try {
      table = JSON.parse(readFileSync(path, 'utf8'));
    } catch (error) {
      throw new FontTableError(`cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return BitmapFont.fromTable(table);
  }

  has(char: string): boolean {
    return this.glyphs.has(char);
  }

  glyph(char: string): Glyph {
    const glyph = this.glyphs.get(char);
    if (!glyph) {
      throw new UnknownGlyphError(char);
    }
    return glyph;
  }

  /** Replaces every character the font cannot draw with a space. */
  sanitize(text: string): string {
    return Array.from(text, (char) => (this.has(char) ? char : ' ')).join('');
  }

  /** Size of `text` in font pixels. */
  measure(text: string): TextSize {
    const chars = Array.from(text);
    if (chars.length === 0) {
      return { width: 0, height: this.height };
    }
    const glyphWidth = chars.reduce((sum, char) => sum + this.glyph(char).width, 0);
    return { width: glyphWidth + (chars.length - 1) * CHAR_SPACING, height: this.height };
  }

  textWidth(text: string, scale = 1): number {
    return this.measure(text).width * scale;
  }

  /** Drops trailing characters until `text` fits into `maxWidth` device pixels. */
  fit(text: string, maxWidth: number, scale = 1): string {
    let chars = Array.from(text);
    while (chars.length > 0 && this.textWidth(chars.join(''), scale) > maxWidth) {
      chars = chars.slice(0, -1);
    }
    return chars.join('').trimEnd();
  }

  /**
   * Blits `text` with its top-left corner at (x, y). Each font pixel becomes a
   * `scale`×`scale` block; pixels off the surface are dropped by the surface.
   */
  draw(surface: PixelSurface, text: string, x: number, y: number, options: DrawTextOptions): void {
    const scale = options.scale ?? 1;
    let penX = x;
    for (const char of text) {
      const glyph = this.glyph(char);
      glyph.rows.forEach((row, rowIdx) => {
        row.forEach((isSet, colIdx) => {
          if (!isSet) {
            return;
          }
          surface.fillRect(
            penX + colIdx * scale,
            y + rowIdx * scale,
            penX + (colIdx + 1) * scale,
            y + (rowIdx + 1) * scale,
            options.color,
          );
        });
      });
      penX += (glyph.width + CHAR_SPACING) * scale;
    }
  }
}
