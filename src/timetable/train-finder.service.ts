import { Injectable, Logger } from '@nestjs/common';
import { ProviderTrain } from '../provider/provider.types';
import { TrainDataClient } from '../provider/train-data.client';
import { extractSegments } from './segment-extractor';
import { RouteStop, StationSet, Timetable, Train, normalizeStationCode } from './timetable.model';

export function toRouteStops(train: ProviderTrain): RouteStop[] {
  return train.stations.map((stop) => ({
    code: stop.code,
    name: stop.name,
    scheduledArrival: stop.schArr,
    scheduledDeparture: stop.schDep,
    actualArrival: stop.arr,
    actualDeparture: stop.dep,
  }));
}

@Injectable()
export class TrainFinderService {
  private readonly logger = new Logger(TrainFinderService.name);

  constructor(private readonly client: TrainDataClient) {}

  /**
   * Trains serving at least two of `stations` in the requested order, in the order the
   * provider listed them. Provider faults propagate.
   */
  async findConnectingTrains(stations: StationSet): Promise<Train[]> {
    const requested = stations.map(normalizeStationCode);
    if (requested.length < 2) {
      return [];
    }

    // every station contributes ids so that trains covering part of the route are found
    const infos = await Promise.all(requested.map((code) => this.client.fetchStation(code)));
    const trainIds = [...new Set(infos.flatMap((info) => info?.trains ?? []))];
    if (infos.every((info) => info === null)) {
      this.logger.warn(`No station info for any of ${requested.join(', ')}`);
      return [];
    }

    const details = await Promise.all(trainIds.map((id) => this.client.fetchTrain(id)));
    const trains: Train[] = [];
    details.forEach((detail, index) => {
      if (!detail) {
        this.logger.debug(`Train ${trainIds[index]} is no longer reported`);
        return;
      }
      const segments = extractSegments(toRouteStops(detail), requested);
      if (segments.length === 0) {
        return;
      }
      trains.push({
        trainId: detail.trainID,
        trainNum: detail.trainNum,
        routeName: detail.routeName,
        status: detail.trainState,
        segments,
      });
    });

    this.logger.log(`Found ${trains.length} of ${trainIds.length} trains for ${requested.join(' > ')}`);
    return trains;
  }

  async buildTimetable(stations: StationSet): Promise<Timetable> {
    const requested = stations.map(normalizeStationCode);
    return { stations: requested, trains: await this.findConnectingTrains(requested) };
  }
}
