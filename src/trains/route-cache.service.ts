import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { StationSet, Timetable } from '../timetable/timetable.model';
import { TrainFinderService } from '../timetable/train-finder.service';

interface CacheEntry {
  fetchedAt: number;
  timetable: Timetable;
}

/**
 * Keeps one timetable per requested route. The first request for a route fetches
 * synchronously; afterwards every known route is refreshed on a fixed interval and
 * requests are answered from memory.
 */
@Injectable()
export class RouteCacheService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RouteCacheService.name);
  private readonly entries = new Map<string, CacheEntry>();
  private readonly routes = new Map<string, StationSet>();
  private readonly inFlight = new Map<string, Promise<Timetable>>();
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly finder: TrainFinderService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  static keyOf(stations: StationSet): string {
    return stations.join('_');
  }

  onModuleInit(): void {
    this.timer = setInterval(() => {
      this.refreshAll().catch((error: unknown) => this.logger.error('Background refresh crashed', error));
    }, this.config.refreshIntervalMs);
    this.timer.unref();
    this.logger.log(`Background refresh every ${Math.round(this.config.refreshIntervalMs / 1000)}s`);
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  async get(stations: StationSet): Promise<Timetable> {
    const key = RouteCacheService.keyOf(stations);
    this.routes.set(key, stations);

    const cached = this.entries.get(key);
    if (cached) {
      this.logger.debug(`Cache hit for ${key} (age ${Math.round((Date.now() - cached.fetchedAt) / 1000)}s)`);
      return cached.timetable;
    }
    this.logger.log(`Cold start for ${key}, fetching`);
    return this.refresh(key, stations);
  }

  /** Age in seconds of the stalest entry, 0 when nothing is cached. */
  maxCacheAge(now: number = Date.now()): number {
    let oldest = 0;
    this.entries.forEach((entry) => {
      oldest = Math.max(oldest, (now - entry.fetchedAt) / 1000);
    });
    return oldest;
  }

  async refreshAll(): Promise<void> {
    for (const [key, stations] of Array.from(this.routes.entries())) {
      try {
        await this.refresh(key, stations);
      } catch (error) {
        this.logger.error(`Background refresh failed for ${key}, keeping previous data`, error);
      }
    }
  }

  private refresh(key: string, stations: StationSet): Promise<Timetable> {
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }
    const request = this.finder
      .buildTimetable(stations)
      .then((timetable) => {
        this.entries.set(key, { fetchedAt: Date.now(), timetable });
        return timetable;
      })
      .finally(() => this.inFlight.delete(key));
    this.inFlight.set(key, request);
    return request;
  }
}
