/** 1-bit pixel values: 0 is ink, 1 is paper. */
export type PixelColor = 0 | 1;

export const BLACK: PixelColor = 0;
export const WHITE: PixelColor = 1;

export interface PixelSurface {
  readonly width: number;
  readonly height: number;
  setPixel(x: number, y: number, color: PixelColor): void;
  /** Fills the half-open box [x1, x2) × [y1, y2). */
  fillRect(x1: number, y1: number, x2: number, y2: number, color: PixelColor): void;
}

/**
 * Fixed-size 1-bit raster. Writes outside the canvas are ignored, so callers can
 * draw partially visible shapes without clipping them first.
 */
export class Bitmap implements PixelSurface {
  private readonly pixels: Uint8Array;

  constructor(
    readonly width: number,
    readonly height: number,
    background: PixelColor = WHITE,
  ) {
    this.pixels = new Uint8Array(width * height).fill(background);
  }

  getPixel(x: number, y: number): PixelColor {
    if (!this.contains(x, y)) {
      throw new RangeError(`Pixel (${x}, ${y}) is outside the ${this.width}x${this.height} canvas`);
    }
    return this.pixels[y * this.width + x] === BLACK ? BLACK : WHITE;
  }

  setPixel(x: number, y: number, color: PixelColor): void {
    if (this.contains(x, y)) {
      this.pixels[y * this.width + x] = color;
    }
  }

  fillRect(x1: number, y1: number, x2: number, y2: number, color: PixelColor): void {
    const left = Math.max(0, x1);
    const right = Math.min(this.width, x2);
    for (let y = Math.max(0, y1); y < Math.min(this.height, y2); y += 1) {
      this.pixels.fill(color, y * this.width + left, Math.max(y * this.width + left, y * this.width + right));
    }
  }

  hline(x1: number, x2: number, y: number, color: PixelColor): void {
    this.fillRect(x1, y, x2, y + 1, color);
  }

  /** Vertical line over [y1, y2); `dashed` leaves gaps of four pixels every four pixels. */
  vline(x: number, y1: number, y2: number, color: PixelColor, dashed = false): void {
    for (let y = y1; y < y2; y += 1) {
      if (dashed && Math.floor(y / 4) % 2 === 1) {
        continue;
      }
      this.setPixel(x, y, color);
    }
  }

  /** One-pixel checkerboard with a solid ink border, over [x1, x2) × [y1, y2). */
  checkerboard(x1: number, y1: number, x2: number, y2: number): void {
    for (let y = y1; y < y2; y += 1) {
      for (let x = x1; x < x2; x += 1) {
        const onBorder = y === y1 || y === y2 - 1 || x === x1 || x === x2 - 1;
        this.setPixel(x, y, onBorder || (x + y) % 2 === 0 ? BLACK : WHITE);
      }
    }
  }

  /** Count of ink pixels inside [x1, x2) × [y1, y2). */
  countInk(x1 = 0, y1 = 0, x2 = this.width, y2 = this.height): number {
    let count = 0;
    for (let y = Math.max(0, y1); y < Math.min(this.height, y2); y += 1) {
      for (let x = Math.max(0, x1); x < Math.min(this.width, x2); x += 1) {
        if (this.pixels[y * this.width + x] === BLACK) {
          count += 1;
        }
      }
    }
    return count;
  }

  /** Row-major copy of the raster, one byte per pixel. */
  toBytes(): Uint8Array {
    return this.pixels.slice();
  }

  private contains(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.width && y < this.height;
  }
}
