import { Test } from '@nestjs/testing';
import { PNG } from 'pngjs';
import { loadFont } from '../render/font-loader';
import { TimelineRenderer } from '../render/timeline-renderer';
import { Timetable } from '../timetable/timetable.model';
import { RouteCacheService } from './route-cache.service';
import { TrainsService } from './trains.service';

describe('TrainsService', () => {
  let service: TrainsService;
  const timetable: Timetable = { stations: ['NYP', 'PHL'], trains: [] };
  const cache = { get: jest.fn(() => Promise.resolve(timetable)), maxCacheAge: jest.fn(() => 312) };
  const renderer = new TimelineRenderer(loadFont(), { timeZone: 'UTC' });

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        TrainsService,
        { provide: RouteCacheService, useValue: cache },
        { provide: TimelineRenderer, useValue: renderer },
      ],
    }).compile();
    service = moduleRef.get(TrainsService);
  });

  it('serves timetables from the route cache', async () => {
    await expect(service.timetable(['NYP', 'PHL'])).resolves.toBe(timetable);
    expect(cache.get).toHaveBeenCalledWith(['NYP', 'PHL']);
  });

  it('renders the cached route as an 800x480 png', async () => {
    const png = await service.timelinePng(['NYP', 'PHL'], { bufferBeforeMinutes: 0, bufferAfterMinutes: 0 });

    const decoded = PNG.sync.read(png);
    expect(decoded.width).toBe(800);
    expect(decoded.height).toBe(480);
  });

  it('labels the image with the age of the cached data', async () => {
    const render = jest.spyOn(renderer, 'render');

    await service.timelinePng(['NYP', 'PHL'], { bufferBeforeMinutes: 5, bufferAfterMinutes: 0 });

    expect(render).toHaveBeenCalledWith(
      expect.objectContaining({ stations: ['NYP', 'PHL'], bufferBeforeMinutes: 5, dataAgeSeconds: 312 }),
    );
    render.mockRestore();
  });
});
