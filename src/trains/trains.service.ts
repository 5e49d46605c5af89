import { Injectable } from '@nestjs/common';
import { encodePng } from '../render/png';
import { TimelineRenderer } from '../render/timeline-renderer';
import { StationSet, Timetable } from '../timetable/timetable.model';
import { RouteCacheService } from './route-cache.service';

export interface TimelineImageOptions {
  bufferBeforeMinutes: number;
  bufferAfterMinutes: number;
}

@Injectable()
export class TrainsService {
  constructor(
    private readonly cache: RouteCacheService,
    private readonly renderer: TimelineRenderer,
  ) {}

  timetable(stations: StationSet): Promise<Timetable> {
    return this.cache.get(stations);
  }

  /** Cached train data, always drawn against the current time and labelled with its age. */
  async timelinePng(stations: StationSet, options: TimelineImageOptions): Promise<Buffer> {
    const timetable = await this.cache.get(stations);
    const bitmap = this.renderer.render({
      trains: timetable.trains,
      stations: timetable.stations,
      now: new Date(),
      bufferBeforeMinutes: options.bufferBeforeMinutes,
      bufferAfterMinutes: options.bufferAfterMinutes,
      dataAgeSeconds: this.cache.maxCacheAge(),
    });
    return encodePng(bitmap);
  }
}
