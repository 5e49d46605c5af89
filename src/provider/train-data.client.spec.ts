import { Test } from '@nestjs/testing';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { ProviderFaultError } from './provider-fault.error';
import { TrainDataClient } from './train-data.client';

const config: AppConfig = {
  port: 0,
  providerBaseUrl: 'http://provider.test/v3',
  refreshIntervalMs: 60_000,
  timeZone: 'America/New_York',
  fontPath: null,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('TrainDataClient', () => {
  let client: TrainDataClient;
  let fetchMock: jest.SpiedFunction<typeof fetch>;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [TrainDataClient, { provide: APP_CONFIG, useValue: config }],
    }).compile();
    client = moduleRef.get(TrainDataClient);
    fetchMock = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  it('reads the train ids serving a station', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ NWK: { code: 'NWK', name: 'Newark Penn', trains: ['171-18', '2151-18'] } }),
    );

    const info = await client.fetchStation('NWK');

    expect(fetchMock).toHaveBeenCalledWith('http://provider.test/v3/stations/NWK', {
      headers: { Accept: 'application/json' },
    });
    expect(info).toEqual({ code: 'NWK', name: 'Newark Penn', trains: ['171-18', '2151-18'] });
  });

  it('returns null for a station the provider does not know', async () => {
    fetchMock.mockResolvedValue(jsonResponse([]));

    await expect(client.fetchStation('XYZ')).resolves.toBeNull();
  });

  it('picks the requested run out of the grouped train response', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        '171': [
          { trainID: '171-17', trainNum: 171, routeName: 'Northeast Regional', trainState: 'Completed', stations: [] },
          {
            trainID: '171-18',
            trainNum: 171,
            routeName: 'Northeast Regional',
            trainState: 'Active',
            stations: [{ code: 'NYP', name: 'New York Penn', schDep: '2026-10-18T06:02:00-04:00', arr: '' }],
          },
        ],
      }),
    );

    const train = await client.fetchTrain('171-18');

    expect(train?.trainNum).toBe('171');
    expect(train?.trainState).toBe('Active');
    expect(train?.stations[0]).toEqual({
      code: 'NYP',
      name: 'New York Penn',
      schArr: null,
      schDep: '2026-10-18T06:02:00-04:00',
      arr: null,
      dep: null,
    });
  });

  it('returns null when no run carries the id', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ '171': [] }));

    await expect(client.fetchTrain('171-18')).resolves.toBeNull();
  });

  it('returns null for resources the provider answers with 404', async () => {
    fetchMock.mockResolvedValueOnce(new Response('gone', { status: 404 }));
    fetchMock.mockResolvedValueOnce(new Response('gone', { status: 404 }));

    await expect(client.fetchTrain('99-18')).resolves.toBeNull();
    await expect(client.fetchStation('XYZ')).resolves.toBeNull();
  });

  it('reports error statuses as provider faults', async () => {
    fetchMock.mockResolvedValue(new Response('busy', { status: 503 }));

    const failure = client.fetchStation('NYP');

    await expect(failure).rejects.toBeInstanceOf(ProviderFaultError);
    await expect(failure).rejects.toMatchObject({ status: 503, url: 'http://provider.test/v3/stations/NYP' });
  });

  it('reports transport failures as provider faults', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    await expect(client.fetchTrain('171-18')).rejects.toMatchObject({ name: 'ProviderFaultError', status: null });
  });

  it('reports bodies that are not JSON as provider faults', async () => {
    fetchMock.mockResolvedValue(new Response('<html>', { status: 200 }));

    await expect(client.fetchStation('NYP')).rejects.toBeInstanceOf(ProviderFaultError);
  });

  it('reports payloads of the wrong shape as provider faults', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ NYP: { code: 'NYP', trains: 'all of them' } }));

    await expect(client.fetchStation('NYP')).rejects.toMatchObject({ status: 200 });
  });
});
