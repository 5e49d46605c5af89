export type TrainStatus = 'active' | 'predeparture' | 'completed' | 'unknown';

const KNOWN_STATUSES: ReadonlyMap<string, TrainStatus> = new Map<string, TrainStatus>([
  ['active', 'active'],
  ['predeparture', 'predeparture'],
  ['completed', 'completed'],
]);

/** Maps the provider's free-text train state onto the closed set; anything else is `unknown`. */
export function parseTrainStatus(raw: string | null | undefined): TrainStatus {
  if (!raw) {
    return 'unknown';
  }
  return KNOWN_STATUSES.get(raw.trim().toLowerCase()) ?? 'unknown';
}
