import { Inject, Injectable } from '@nestjs/common';
import { z } from 'zod';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { ProviderFaultError } from './provider-fault.error';
import {
  ProviderTrain,
  StationInfo,
  StationResponseSchema,
  TrainResponseSchema,
} from './provider.types';

@Injectable()
export class TrainDataClient {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async fetchStation(code: string): Promise<StationInfo | null> {
    const body = await this.getJson(`/stations/${encodeURIComponent(code)}`);
    // the provider answers an unknown code with an empty array or a 404
    if (body === null || Array.isArray(body)) {
      return null;
    }
    const stations = this.decode(StationResponseSchema, body, `/stations/${code}`);
    return stations[code] ?? null;
  }

  async fetchTrain(trainId: string): Promise<ProviderTrain | null> {
    const body = await this.getJson(`/trains/${encodeURIComponent(trainId)}`);
    if (body === null || Array.isArray(body)) {
      return null;
    }
    const runs = this.decode(TrainResponseSchema, body, `/trains/${trainId}`);
    for (const trains of Object.values(runs)) {
      const match = trains.find((train) => train.trainID === trainId);
      if (match) {
        return match;
      }
    }
    return null;
  }

  /** Decoded body, or `null` when the provider no longer knows the resource. */
  private async getJson(path: string): Promise<unknown> {
    const url = `${this.config.providerBaseUrl}${path}`;
    let response: Response;
    try {
      response = await fetch(url, { headers: { Accept: 'application/json' } });
    } catch (error) {
      throw new ProviderFaultError(`Request to ${url} failed`, url, null, { cause: error });
    }
    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw new ProviderFaultError(`Got ${response.status} from ${url}`, url, response.status);
    }
    try {
      return await response.json();
    } catch (error) {
      throw new ProviderFaultError(`Undecodable JSON from ${url}`, url, response.status, { cause: error });
    }
  }

  private decode<T extends z.ZodTypeAny>(schema: T, body: unknown, path: string): z.infer<T> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const url = `${this.config.providerBaseUrl}${path}`;
      throw new ProviderFaultError(`Unexpected payload from ${url}: ${parsed.error.message}`, url, 200, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
