export const CANVAS_WIDTH = 800;
export const CANVAS_HEIGHT = 480;
export const LEFT_MARGIN = 50;
export const RIGHT_MARGIN = 40;
export const TOP_MARGIN = 16;
export const BOTTOM_MARGIN = 40;

export const CHART_TOP = TOP_MARGIN;
export const CHART_BOTTOM = CANVAS_HEIGHT - BOTTOM_MARGIN;
export const CHART_HEIGHT = CHART_BOTTOM - CHART_TOP;

/** Scale of train names and axis labels; times and station codes use scale 1. */
export const LARGE_SCALE = 2;
export const FONT_HEIGHT = 11;

// station codes + gap + train name + padding
export const BAR_HEIGHT = FONT_HEIGHT + 2 + FONT_HEIGHT * LARGE_SCALE + 4;
export const MIN_ROW_HEIGHT = 56;
const LABEL_BAND = FONT_HEIGHT + 4;

export interface RowGeometry {
  index: number;
  top: number;
  barTop: number;
  barBottom: number;
  timeLabelY: number;
}

/**
 * Splits the chart band into rows. Few trains share the band evenly; beyond
 * `CHART_HEIGHT / MIN_ROW_HEIGHT` trains the extra rows are dropped.
 */
export function planRows(count: number): RowGeometry[] {
  if (count <= 0) {
    return [];
  }
  const pitch = Math.max(MIN_ROW_HEIGHT, Math.floor(CHART_HEIGHT / count));
  const capacity = Math.floor(CHART_HEIGHT / pitch);
  const rows: RowGeometry[] = [];
  for (let index = 0; index < Math.min(count, capacity); index += 1) {
    const top = CHART_TOP + index * pitch;
    const center = top + Math.floor(pitch / 2);
    // the time labels above the bar stay inside the row, clear of the header and the row above
    const barTop = Math.max(center - Math.floor(BAR_HEIGHT / 2), top + LABEL_BAND);
    rows.push({
      index,
      top,
      barTop,
      barBottom: barTop + BAR_HEIGHT,
      timeLabelY: barTop - FONT_HEIGHT - 3,
    });
  }
  return rows;
}
