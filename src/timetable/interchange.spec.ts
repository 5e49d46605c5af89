import { InterchangeFormatError, fromTimetableDocument, parseTimetable, serializeTimetable, toTimetableDocument } from './interchange';
import { StationStop, Timetable } from './timetable.model';

describe('timetable interchange document', () => {
  const timetable: Timetable = {
    stations: ['NYP', 'NWK', 'PHL'],
    trains: [
      {
        trainId: '171-18',
        trainNum: '171',
        routeName: 'Northeast Regional',
        status: 'Active',
        segments: [
          {
            from: new StationStop('NYP', 'New York Penn', '2026-10-18T06:02:00-04:00'),
            to: new StationStop('NWK', 'Newark Penn', '2026-10-18T06:16:00-04:00', '2026-10-18T06:17:00-04:00'),
          },
          {
            from: new StationStop('NWK', 'Newark Penn', '2026-10-18T06:16:00-04:00', '2026-10-18T06:17:00-04:00'),
            to: new StationStop('PHL', 'Philadelphia', '2026-10-18T07:40:00-04:00'),
          },
        ],
      },
    ],
  };

  it('writes snake_case keys with explicit null actual times', () => {
    const doc = toTimetableDocument(timetable);

    expect(doc.stations).toEqual(['NYP', 'NWK', 'PHL']);
    expect(doc.trains[0]).toMatchObject({ train_id: '171-18', train_num: '171', route_name: 'Northeast Regional' });
    expect(doc.trains[0].segments[0].from).toEqual({
      station_code: 'NYP',
      station_name: 'New York Penn',
      scheduled: '2026-10-18T06:02:00-04:00',
      actual: null,
    });
  });

  it('reads back what it wrote', () => {
    const restored = parseTimetable(serializeTimetable(timetable));

    expect(restored.stations).toEqual(timetable.stations);
    expect(restored.trains).toHaveLength(1);
    expect(restored.trains[0].trainId).toBe('171-18');
    expect(restored.trains[0].segments[0].to.effectiveTime()).toBe('2026-10-18T06:17:00-04:00');
    expect(restored.trains[0].segments[1].to.actual).toBeNull();
    expect(toTimetableDocument(restored)).toEqual(toTimetableDocument(timetable));
  });

  it('serializes with two-space indentation', () => {
    expect(serializeTimetable({ stations: ['NYP'], trains: [] })).toBe('{\n  "stations": [\n    "NYP"\n  ],\n  "trains": []\n}');
  });

  it('rejects documents missing required fields', () => {
    const doc = toTimetableDocument(timetable);
    const broken = { ...doc, trains: [{ ...doc.trains[0], train_num: undefined }] };

    expect(() => fromTimetableDocument(broken)).toThrow(InterchangeFormatError);
    expect(() => fromTimetableDocument(broken)).toThrow(/trains\.0\.train_num/);
  });

  it('rejects a document that is not an object', () => {
    expect(() => fromTimetableDocument(['NYP'])).toThrow(InterchangeFormatError);
  });

  it('reports text that is not JSON as a format error', () => {
    expect(() => parseTimetable('{"stations": [')).toThrow(InterchangeFormatError);
  });
});
