import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { StationSet, Timetable } from '../timetable/timetable.model';
import { TrainFinderService } from '../timetable/train-finder.service';
import { RouteCacheService } from './route-cache.service';

const config: AppConfig = {
  port: 0,
  providerBaseUrl: 'http://provider.test/v3',
  refreshIntervalMs: 60_000,
  timeZone: 'America/New_York',
  fontPath: null,
};

function timetableWith(...trainIds: string[]): Timetable {
  return {
    stations: ['NYP', 'PHL'],
    trains: trainIds.map((trainId) => ({ trainId, trainNum: trainId, routeName: 'Keystone', status: 'Active', segments: [] })),
  };
}

describe('RouteCacheService', () => {
  let cache: RouteCacheService;
  const finder = {
    buildTimetable: jest.fn<Promise<Timetable>, [StationSet]>(),
  };
  let errorSpy: jest.SpyInstance;

  beforeEach(async () => {
    finder.buildTimetable.mockReset();
    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    const moduleRef = await Test.createTestingModule({
      providers: [
        RouteCacheService,
        { provide: TrainFinderService, useValue: finder },
        { provide: APP_CONFIG, useValue: config },
      ],
    }).compile();
    cache = moduleRef.get(RouteCacheService);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('fetches a route on first use and serves it from memory afterwards', async () => {
    finder.buildTimetable.mockResolvedValue(timetableWith('641-18'));

    const first = await cache.get(['NYP', 'PHL']);
    const second = await cache.get(['NYP', 'PHL']);

    expect(second).toBe(first);
    expect(finder.buildTimetable).toHaveBeenCalledTimes(1);
  });

  it('shares one provider round trip between concurrent cold requests', async () => {
    let resolve: (timetable: Timetable) => void = () => undefined;
    finder.buildTimetable.mockReturnValue(
      new Promise<Timetable>((done) => {
        resolve = done;
      }),
    );

    const pending = Promise.all([cache.get(['NYP', 'PHL']), cache.get(['NYP', 'PHL'])]);
    resolve(timetableWith('641-18'));
    const [a, b] = await pending;

    expect(a).toBe(b);
    expect(finder.buildTimetable).toHaveBeenCalledTimes(1);
  });

  it('replaces cached data on refresh', async () => {
    finder.buildTimetable.mockResolvedValueOnce(timetableWith('641-18')).mockResolvedValueOnce(timetableWith('643-18'));
    await cache.get(['NYP', 'PHL']);

    await cache.refreshAll();

    const refreshed = await cache.get(['NYP', 'PHL']);
    expect(refreshed.trains.map((train) => train.trainId)).toEqual(['643-18']);
  });

  it('keeps the previous data when a refresh fails', async () => {
    finder.buildTimetable
      .mockResolvedValueOnce(timetableWith('641-18'))
      .mockRejectedValueOnce(new Error('provider down'));
    await cache.get(['NYP', 'PHL']);

    await expect(cache.refreshAll()).resolves.toBeUndefined();

    const kept = await cache.get(['NYP', 'PHL']);
    expect(kept.trains.map((train) => train.trainId)).toEqual(['641-18']);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('propagates a failed cold start and retries on the next request', async () => {
    finder.buildTimetable.mockRejectedValueOnce(new Error('provider down')).mockResolvedValueOnce(timetableWith('641-18'));

    await expect(cache.get(['NYP', 'PHL'])).rejects.toThrow('provider down');
    await expect(cache.get(['NYP', 'PHL'])).resolves.toEqual(timetableWith('641-18'));
  });

  it('reports the age of the stalest entry in seconds', async () => {
    const clock = jest.spyOn(Date, 'now').mockReturnValue(1_000_000);
    finder.buildTimetable.mockResolvedValue(timetableWith());

    expect(cache.maxCacheAge(1_000_000)).toBe(0);
    await cache.get(['NYP', 'PHL']);
    expect(cache.maxCacheAge(1_005_000)).toBe(5);
    clock.mockRestore();
  });

  it('keys routes by their joined station codes', () => {
    expect(RouteCacheService.keyOf(['NYP', 'NWK', 'PHL'])).toBe('NYP_NWK_PHL');
  });
});
