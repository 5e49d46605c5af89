import { BadRequestException } from '@nestjs/common';
import { normalizeStationCode } from '../timetable/timetable.model';

export function parseStationList(raw: string | undefined, separator: string | RegExp): string[] {
  const stations = (raw ?? '')
    .split(separator)
    .map(normalizeStationCode)
    .filter((code) => code.length > 0);
  if (stations.length < 2) {
    throw new BadRequestException('Need at least 2 stations');
  }
  return stations;
}

export function assertBufferMinutes(value: number, name: string): number {
  if (value < 0) {
    throw new BadRequestException(`${name} must not be negative`);
  }
  return value;
}
