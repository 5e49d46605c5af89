import { z } from 'zod';

const optionalTime = z
  .string()
  .nullish()
  .transform((value) => (value ? value : null));

export const ProviderStopSchema = z.object({
  code: z.string(),
  name: z.string().nullish().transform((value) => value ?? ''),
  schArr: optionalTime,
  schDep: optionalTime,
  arr: optionalTime,
  dep: optionalTime,
});

export const ProviderTrainSchema = z.object({
  trainID: z.string(),
  trainNum: z.union([z.string(), z.number()]).transform(String),
  routeName: z.string().nullish().transform((value) => value ?? ''),
  trainState: z.string().nullish().transform((value) => value ?? ''),
  stations: z.array(ProviderStopSchema).default([]),
});

export const ProviderStationSchema = z.object({
  code: z.string(),
  name: z.string().nullish().transform((value) => value ?? ''),
  trains: z.array(z.string()).default([]),
});

/** `/stations/{code}` answers with an object keyed by station code. */
export const StationResponseSchema = z.record(z.string(), ProviderStationSchema);

/** `/trains/{id}` answers with runs grouped by train number. */
export const TrainResponseSchema = z.record(z.string(), z.array(ProviderTrainSchema));

export type ProviderStop = z.infer<typeof ProviderStopSchema>;
export type ProviderTrain = z.infer<typeof ProviderTrainSchema>;
export type StationInfo = z.infer<typeof ProviderStationSchema>;
