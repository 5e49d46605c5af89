import { formatClock, parseTimestamp } from '../shared/time-math';
import { Timetable, Train } from './timetable.model';

function firstScheduledDeparture(train: Train): number {
  return parseTimestamp(train.segments[0]?.from.scheduled) ?? Number.POSITIVE_INFINITY;
}

function clockOf(timestamp: string, timeZone: string): string {
  const ms = parseTimestamp(timestamp);
  return ms === null ? 'N/A' : formatClock(ms, timeZone);
}

/** Plain-text listing of a timetable, earliest scheduled departure first. */
export function formatTimetableSummary(timetable: Timetable, timeZone: string): string {
  const route = timetable.stations.join(' -> ');
  if (timetable.trains.length === 0) {
    return `No trains found connecting ${route}\n`;
  }
  const lines = [`Trains: ${route}`, '-'.repeat(70)];
  const sorted = [...timetable.trains].sort((a, b) => {
    const left = firstScheduledDeparture(a);
    const right = firstScheduledDeparture(b);
    return left === right ? 0 : left - right;
  });
  for (const train of sorted) {
    lines.push(`${train.routeName || 'Unknown'} #${train.trainNum} (${train.status || 'Unknown'})`);
    for (const segment of train.segments) {
      const dep = clockOf(segment.from.effectiveTime(), timeZone);
      const arr = clockOf(segment.to.effectiveTime(), timeZone);
      lines.push(`  ${segment.from.stationCode} ${dep} -> ${segment.to.stationCode} ${arr}`);
    }
    lines.push('');
  }
  return `${lines.join('\n')}\n`;
}
