import { TrainStatus, parseTrainStatus } from '../timetable/train-status';
import { BLACK, Bitmap, PixelColor, WHITE } from './bitmap';

export type BarFill = 'solid' | 'framed' | 'outline';

export interface BarStyle {
  fill: BarFill;
  /** Colour of text drawn on the bar. */
  ink: PixelColor;
  /** Colour of the chip behind an intermediate station code. */
  chip: PixelColor;
}

const SOLID: BarStyle = { fill: 'solid', ink: WHITE, chip: BLACK };

export const BAR_STYLES: Record<TrainStatus, BarStyle> = {
  active: SOLID,
  predeparture: { fill: 'framed', ink: WHITE, chip: BLACK },
  completed: { fill: 'outline', ink: BLACK, chip: WHITE },
  unknown: SOLID,
};

export function barStyleFor(status: string): BarStyle {
  return BAR_STYLES[parseTrainStatus(status)];
}

/** Paints one bar over [x1, x2) × [y1, y2) in the given style. */
export function paintBar(bitmap: Bitmap, x1: number, y1: number, x2: number, y2: number, style: BarStyle): void {
  switch (style.fill) {
    case 'solid':
      bitmap.fillRect(x1, y1, x2, y2, BLACK);
      return;
    case 'framed':
      bitmap.fillRect(x1, y1, x2, y2, BLACK);
      if (x2 - x1 > 4) {
        bitmap.hline(x1 + 2, x2 - 2, y1 + 2, WHITE);
        bitmap.hline(x1 + 2, x2 - 2, y2 - 3, WHITE);
        bitmap.fillRect(x1 + 2, y1 + 2, x1 + 3, y2 - 2, WHITE);
        bitmap.fillRect(x2 - 3, y1 + 2, x2 - 2, y2 - 2, WHITE);
      }
      return;
    case 'outline':
      bitmap.fillRect(x1, y1, x2, y2, WHITE);
      bitmap.hline(x1, x2, y1, BLACK);
      bitmap.hline(x1, x2, y2 - 1, BLACK);
      bitmap.fillRect(x1, y1, x1 + 1, y2, BLACK);
      bitmap.fillRect(x2 - 1, y1, x2, y2, BLACK);
      return;
  }
}
