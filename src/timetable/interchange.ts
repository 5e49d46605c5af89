import { z } from 'zod';
import { Segment, StationStop, Timetable, Train } from './timetable.model';

export const StationStopSchema = z.object({
  station_code: z.string(),
  station_name: z.string(),
  scheduled: z.string(),
  actual: z.string().nullable(),
});

export const SegmentSchema = z.object({
  from: StationStopSchema,
  to: StationStopSchema,
});

export const TrainSchema = z.object({
  train_id: z.string(),
  train_num: z.string(),
  route_name: z.string(),
  status: z.string(),
  segments: z.array(SegmentSchema),
});

export const TimetableDocumentSchema = z.object({
  stations: z.array(z.string()),
  trains: z.array(TrainSchema),
});

export type StationStopDocument = z.infer<typeof StationStopSchema>;
export type SegmentDocument = z.infer<typeof SegmentSchema>;
export type TrainDocument = z.infer<typeof TrainSchema>;
export type TimetableDocument = z.infer<typeof TimetableDocumentSchema>;

export class InterchangeFormatError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(
      `Invalid timetable document: ${issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ')}`,
    );
    this.name = 'InterchangeFormatError';
  }
}

function stopToDocument(stop: StationStop): StationStopDocument {
  return {
    station_code: stop.stationCode,
    station_name: stop.stationName,
    scheduled: stop.scheduled,
    actual: stop.actual,
  };
}

function stopFromDocument(doc: StationStopDocument): StationStop {
  return new StationStop(doc.station_code, doc.station_name, doc.scheduled, doc.actual);
}

export function toTimetableDocument(timetable: Timetable): TimetableDocument {
  return {
    stations: [...timetable.stations],
    trains: timetable.trains.map((train) => ({
      train_id: train.trainId,
      train_num: train.trainNum,
      route_name: train.routeName,
      status: train.status,
      segments: train.segments.map((segment) => ({
        from: stopToDocument(segment.from),
        to: stopToDocument(segment.to),
      })),
    })),
  };
}

export function fromTimetableDocument(input: unknown): Timetable {
  const parsed = TimetableDocumentSchema.safeParse(input);
  if (!parsed.success) {
    throw new InterchangeFormatError(parsed.error.issues);
  }
  const trains: Train[] = parsed.data.trains.map((train) => ({
    trainId: train.train_id,
    trainNum: train.train_num,
    routeName: train.route_name,
    status: train.status,
    segments: train.segments.map(
      (segment): Segment => ({
        from: stopFromDocument(segment.from),
        to: stopFromDocument(segment.to),
      }),
    ),
  }));
  return { stations: parsed.data.stations, trains };
}

export function serializeTimetable(timetable: Timetable): string {
  return JSON.stringify(toTimetableDocument(timetable), null, 2);
}

export function parseTimetable(json: string): Timetable {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new InterchangeFormatError([
      {
        code: z.ZodIssueCode.custom,
        path: [],
        message: error instanceof Error ? error.message : String(error),
      },
    ]);
  }
  return fromTimetableDocument(raw);
}
