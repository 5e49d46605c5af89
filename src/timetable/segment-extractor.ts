import { RouteStop, Segment, StationSet, StationStop, normalizeStationCode } from './timetable.model';

interface MatchedStop {
  requestedCode: string;
  stop: RouteStop;
}

function departureSide(code: string, stop: RouteStop): StationStop | null {
  const scheduled = stop.scheduledDeparture ?? stop.scheduledArrival;
  if (!scheduled) {
    return null;
  }
  return new StationStop(code, stop.name, scheduled, stop.actualDeparture);
}

function arrivalSide(code: string, stop: RouteStop): StationStop | null {
  const scheduled = stop.scheduledArrival ?? stop.scheduledDeparture;
  if (!scheduled) {
    return null;
  }
  return new StationStop(code, stop.name, scheduled, stop.actualArrival);
}

function isMatchable(stop: RouteStop): boolean {
  return !!(stop.scheduledArrival ?? stop.scheduledDeparture);
}

/**
 * Walks the requested stations in order and pins each one to the first call of the
 * route that comes after the previously pinned call. Requested stations the train does
 * not serve in that direction are skipped; each pair of consecutive pinned stations
 * becomes one segment. Fewer than two pins yields no segments.
 */
export function extractSegments(route: readonly RouteStop[], requested: StationSet): Segment[] {
  const codes = route.map((stop) => normalizeStationCode(stop.code));
  const matched: MatchedStop[] = [];
  let cursor = -1;

  for (const rawCode of requested) {
    const code = normalizeStationCode(rawCode);
    let found = -1;
    for (let i = cursor + 1; i < route.length; i += 1) {
      if (codes[i] === code && isMatchable(route[i])) {
        found = i;
        break;
      }
    }
    if (found === -1) {
      continue;
    }
    matched.push({ requestedCode: code, stop: route[found] });
    cursor = found;
  }

  const segments: Segment[] = [];
  for (let i = 0; i + 1 < matched.length; i += 1) {
    const from = departureSide(matched[i].requestedCode, matched[i].stop);
    const to = arrivalSide(matched[i + 1].requestedCode, matched[i + 1].stop);
    if (from && to) {
      segments.push({ from, to });
    }
  }
  return segments;
}
