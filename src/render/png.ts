import { PNG } from 'pngjs';
import { BLACK, Bitmap } from './bitmap';

/** Encodes a 1-bit raster as an 8-bit greyscale PNG (ink 0, paper 255). */
export function encodePng(bitmap: Bitmap): Buffer {
  const png = new PNG({ width: bitmap.width, height: bitmap.height });
  const bytes = bitmap.toBytes();
  for (let i = 0; i < bytes.length; i += 1) {
    const level = bytes[i] === BLACK ? 0 : 255;
    const offset = i * 4;
    png.data[offset] = level;
    png.data[offset + 1] = level;
    png.data[offset + 2] = level;
    png.data[offset + 3] = 255;
  }
  return PNG.sync.write(png, { colorType: 0 });
}
