import { MS_IN_MINUTE, formatClock, formatStamp } from '../shared/time-math';
import { Segment, StationSet, Train, normalizeStationCode } from '../timetable/timetable.model';
import { BarStyle, barStyleFor, paintBar } from './bar-style';
import { BLACK, Bitmap, PixelColor, WHITE } from './bitmap';
import { BitmapFont } from './bitmap-font';
import {
  CANVAS_HEIGHT,
  CANVAS_WIDTH,
  CHART_BOTTOM,
  CHART_TOP,
  FONT_HEIGHT,
  LARGE_SCALE,
  LEFT_MARGIN,
  RIGHT_MARGIN,
  RowGeometry,
  planRows,
} from './layout';
import { TimeAxis } from './time-axis';

export interface RenderRequest {
  trains: readonly Train[];
  stations: StationSet;
  now: Date;
  /** Minutes of slack drawn before each train's first departure. */
  bufferBeforeMinutes?: number;
  /** Minutes of slack drawn after each train's last arrival. */
  bufferAfterMinutes?: number;
  /** Age of the stalest cached data, shown after the render stamp when present. */
  dataAgeSeconds?: number | null;
}

export interface TimelineRendererOptions {
  timeZone: string;
}

export class RenderInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RenderInvariantError';
  }
}

interface PlacedSegment {
  segment: Segment;
  depMs: number;
  arrMs: number;
  x1: number;
  x2: number;
}

interface TimeLabel {
  left: number;
  right: number;
  text: string;
}

const STATION_PADDING = 4;
const NAME_PADDING = 8;
const LABEL_MIN_GAP = 4;
const HEADER_Y = 3;
const HEADER_INSET = 4;

/** `age 4m` for cached data, empty when the age is unknown. */
export function formatDataAge(seconds: number | null | undefined): string {
  if (seconds === null || seconds === undefined || !Number.isFinite(seconds) || seconds < 0) {
    return '';
  }
  return `age ${Math.floor(seconds / 60)}m`;
}

const ROUTE_ABBREVIATIONS: ReadonlyMap<string, string> = new Map([['Northeast Regional', 'NE Regional']]);

/**
 * Lays out trains against a three-hour window on a fixed 800×480 1-bit canvas.
 * Stateless apart from the font and the display time zone; `render` is a pure
 * function of its request.
 */
export class TimelineRenderer {
  constructor(
    private readonly font: BitmapFont,
    private readonly options: TimelineRendererOptions,
  ) {}

  render(request: RenderRequest): Bitmap {
    const slots = this.headerSlots(request.stations);
    this.assertStationsHaveSlots(request.trains, slots);

    const bitmap = new Bitmap(CANVAS_WIDTH, CANVAS_HEIGHT, WHITE);
    const axis = new TimeAxis(request.now, {
      canvasWidth: CANVAS_WIDTH,
      leftMargin: LEFT_MARGIN,
      rightMargin: RIGHT_MARGIN,
    });

    this.drawHeader(bitmap, request);
    this.drawGrid(bitmap, axis);
    bitmap.vline(Math.round(axis.toX(request.now)), CHART_TOP, CHART_BOTTOM, BLACK, true);

    const placed = request.trains
      .map((train) => ({ train, segments: this.placeSegments(train, axis) }))
      .filter((entry) => entry.segments.length > 0);
    const rows = planRows(placed.length);

    rows.forEach((row, index) => {
      const { train, segments } = placed[index];
      const style = barStyleFor(train.status);
      for (const seg of segments) {
        paintBar(bitmap, seg.x1, row.barTop, seg.x2, row.barBottom, style);
      }
      this.drawBuffers(bitmap, axis, row, segments, request);
      this.drawTimeLabels(bitmap, axis, row, segments);
      this.drawStationCodes(bitmap, row, segments, style);
      this.drawTrainName(bitmap, row, segments, train, style.ink);
    });

    return bitmap;
  }

  private headerSlots(stations: StationSet): Map<string, number> {
    const slots = new Map<string, number>();
    stations.forEach((code, index) => {
      const normalized = normalizeStationCode(code);
      if (!slots.has(normalized)) {
        slots.set(normalized, index);
      }
    });
    return slots;
  }

  private assertStationsHaveSlots(trains: readonly Train[], slots: ReadonlyMap<string, number>): void {
    for (const train of trains) {
      for (const segment of train.segments) {
        for (const stop of [segment.from, segment.to]) {
          if (!slots.has(normalizeStationCode(stop.stationCode))) {
            throw new RenderInvariantError(
              `Train ${train.trainId} stops at ${stop.stationCode}, which is not among the requested stations`,
            );
          }
        }
      }
    }
  }

  private drawHeader(bitmap: Bitmap, request: RenderRequest): void {
    const stamp = this.font.sanitize(
      [formatStamp(request.now, this.options.timeZone), formatDataAge(request.dataAgeSeconds)].join(' ').trim(),
    );
    const stampWidth = this.font.textWidth(stamp);
    const stampLeft = CANVAS_WIDTH - HEADER_INSET - stampWidth;
    this.font.draw(bitmap, stamp, stampLeft, HEADER_Y, { color: BLACK });

    const route = this.font.sanitize(request.stations.map(normalizeStationCode).join(' > '));
    const fitted = this.font.fit(route, stampLeft - 3 * HEADER_INSET);
    this.font.draw(bitmap, fitted, HEADER_INSET, HEADER_Y, { color: BLACK });
  }

  private drawGrid(bitmap: Bitmap, axis: TimeAxis): void {
    bitmap.hline(0, CANVAS_WIDTH, CHART_BOTTOM, BLACK);
    for (const tick of axis.ticks()) {
      const x = Math.round(tick.x);
      for (let y = CHART_TOP; y < CHART_BOTTOM; y += 1) {
        if (y % 3 === 0) {
          bitmap.setPixel(x, y, BLACK);
        }
      }
      const label = formatClock(tick.time, this.options.timeZone);
      const width = this.font.textWidth(label, LARGE_SCALE);
      this.font.draw(bitmap, label, x - Math.floor(width / 2), CHART_BOTTOM + 8, {
        color: BLACK,
        scale: LARGE_SCALE,
      });
    }
  }

  private placeSegments(train: Train, axis: TimeAxis): PlacedSegment[] {
    const startMs = axis.windowStart.getTime();
    const endMs = axis.windowEnd.getTime();
    const placed: PlacedSegment[] = [];
    for (const segment of train.segments) {
      const depMs = segment.from.effectiveMs();
      const arrMs = segment.to.effectiveMs();
      if (depMs === null || arrMs === null) {
        continue;
      }
      const visibleDep = Math.max(depMs, startMs);
      const visibleArr = Math.min(arrMs, endMs);
      if (visibleArr <= startMs || visibleDep >= endMs) {
        continue;
      }
      const x1 = Math.round(axis.toX(visibleDep));
      // bars running past the window end reach the canvas edge
      const x2 = arrMs >= endMs ? CANVAS_WIDTH : Math.round(axis.toX(visibleArr));
      placed.push({ segment, depMs, arrMs, x1, x2: Math.max(x2, x1 + 1) });
    }
    return placed;
  }

  private drawBuffers(
    bitmap: Bitmap,
    axis: TimeAxis,
    row: RowGeometry,
    segments: PlacedSegment[],
    request: RenderRequest,
  ): void {
    const first = segments[0];
    const last = segments[segments.length - 1];
    const before = request.bufferBeforeMinutes ?? 0;
    const after = request.bufferAfterMinutes ?? 0;

    if (before > 0) {
      const bufferStart = Math.max(first.depMs - before * MS_IN_MINUTE, axis.windowStart.getTime());
      const startX = Math.round(axis.toX(bufferStart));
      if (startX < first.x1) {
        bitmap.checkerboard(startX, row.barTop, first.x1, row.barBottom);
      }
    }
    if (after > 0 && last.x2 < CANVAS_WIDTH) {
      const bufferEnd = Math.min(last.arrMs + after * MS_IN_MINUTE, axis.windowEnd.getTime());
      const endX = Math.round(axis.toX(bufferEnd));
      if (endX > last.x2) {
        bitmap.checkerboard(last.x2, row.barTop, endX, row.barBottom);
      }
    }
  }

  private drawTimeLabels(bitmap: Bitmap, axis: TimeAxis, row: RowGeometry, segments: PlacedSegment[]): void {
    const labels: TimeLabel[] = [];
    const clock = (ms: number) => formatClock(ms, this.options.timeZone);

    segments.forEach((seg, index) => {
      const isLast = index === segments.length - 1;
      if (index === 0) {
        const text = clock(seg.depMs);
        labels.push({ left: seg.x1, right: seg.x1 + this.font.textWidth(text), text });
      }
      if (!isLast) {
        const text = clock(seg.arrMs);
        const width = this.font.textWidth(text);
        const left = Math.floor((seg.x2 + segments[index + 1].x1) / 2) - Math.floor(width / 2);
        labels.push({ left, right: left + width, text });
      } else if (seg.arrMs <= axis.windowEnd.getTime()) {
        const text = clock(seg.arrMs);
        labels.push({ left: seg.x2 - this.font.textWidth(text), right: seg.x2, text });
      }
    });

    let lastRight = Number.NEGATIVE_INFINITY;
    for (const label of labels) {
      if (label.left <= lastRight + LABEL_MIN_GAP) {
        continue;
      }
      const y = row.timeLabelY;
      bitmap.fillRect(label.left - 1, y - 1, label.right + 1, y + FONT_HEIGHT + 1, WHITE);
      this.font.draw(bitmap, label.text, label.left, y, { color: BLACK });
      lastRight = label.right;
    }
  }

  private drawStationCodes(bitmap: Bitmap, row: RowGeometry, segments: PlacedSegment[], style: BarStyle): void {
    const y = row.barTop + 2;
    const minBarWidth = this.font.textWidth('XXX') + STATION_PADDING * 2;

    segments.forEach((seg, index) => {
      const isLast = index === segments.length - 1;
      const fromCode = this.font.sanitize(seg.segment.from.stationCode);
      const toCode = this.font.sanitize(seg.segment.to.stationCode);

      if (seg.x2 - seg.x1 > minBarWidth) {
        if (index === 0) {
          this.font.draw(bitmap, fromCode, seg.x1 + STATION_PADDING, y, { color: style.ink });
        }
        if (isLast) {
          const width = this.font.textWidth(toCode);
          this.font.draw(bitmap, toCode, seg.x2 - STATION_PADDING - width, y, { color: style.ink });
        }
      }

      if (!isLast) {
        const width = this.font.textWidth(toCode);
        const left = Math.floor((seg.x2 + segments[index + 1].x1) / 2) - Math.floor(width / 2);
        bitmap.fillRect(left - 2, y - 1, left + width + 2, y + FONT_HEIGHT + 1, style.chip);
        this.font.draw(bitmap, toCode, left, y, { color: style.ink });
      }
    });
  }

  private drawTrainName(
    bitmap: Bitmap,
    row: RowGeometry,
    segments: PlacedSegment[],
    train: Train,
    color: PixelColor,
  ): void {
    const route = train.routeName.trim() || 'Train';
    const raw = `${ROUTE_ABBREVIATIONS.get(route) ?? route} ${train.trainNum}`.trim();
    const label = this.font.fit(this.font.sanitize(raw), CANVAS_WIDTH - 2 * NAME_PADDING, LARGE_SCALE);
    const width = this.font.textWidth(label, LARGE_SCALE);
    const blockLeft = segments[0].x1;
    const blockRight = segments[segments.length - 1].x2;
    const center = Math.floor((blockLeft + blockRight) / 2);
    const y = row.barBottom - FONT_HEIGHT * LARGE_SCALE - 2;

    let left = center - Math.floor(width / 2);
    if (left + width > CANVAS_WIDTH) {
      left = blockLeft + NAME_PADDING;
    } else if (left < 0) {
      left = blockRight - NAME_PADDING - width;
    }
    const fitted = this.font.fit(label, CANVAS_WIDTH - left, LARGE_SCALE);
    this.font.draw(bitmap, fitted, left, y, { color, scale: LARGE_SCALE });
  }
}
