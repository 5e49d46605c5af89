import { parseTimestamp } from '../shared/time-math';

/**
 * One side (departure or arrival) of a train's call at a station.
 * `actual` is absent until the provider reports a real or estimated time.
 */
export class StationStop {
  constructor(
    readonly stationCode: string,
    readonly stationName: string,
    readonly scheduled: string,
    readonly actual: string | null = null,
  ) {
    Object.freeze(this);
  }

  effectiveTime(): string {
    return this.actual ?? this.scheduled;
  }

  effectiveMs(): number | null {
    return parseTimestamp(this.actual) ?? parseTimestamp(this.scheduled);
  }
}

export interface Segment {
  readonly from: StationStop;
  readonly to: StationStop;
}

export interface Train {
  readonly trainId: string;
  readonly trainNum: string;
  readonly routeName: string;
  readonly status: string;
  readonly segments: readonly Segment[];
}

/** Ordered station codes; the order is the direction of travel a train must match. */
export type StationSet = readonly string[];

export interface Timetable {
  readonly stations: StationSet;
  readonly trains: readonly Train[];
}

/** A call in a train's full route, as reported by the provider. */
export interface RouteStop {
  code: string;
  name: string;
  scheduledArrival: string | null;
  scheduledDeparture: string | null;
  actualArrival: string | null;
  actualDeparture: string | null;
}

export function normalizeStationCode(code: string): string {
  return code.trim().toUpperCase();
}
