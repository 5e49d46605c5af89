import bundledFontTable from './fonts/pixel-font.json';
import { BitmapFont } from './bitmap-font';

/** Builds the font once; `fontPath` overrides the pixel font shipped with the renderer. */
export function loadFont(fontPath: string | null = null): BitmapFont {
  return fontPath ? BitmapFont.fromFile(fontPath) : BitmapFont.fromTable(bundledFontTable);
}
