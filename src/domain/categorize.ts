import { addDays } from './calendar.js';
import {
  RELEASE_TYPES,
  type CategorizedReleases,
  type ReleaseBucket,
  type ReleaseEvent,
  type ReleaseType,
} from './types.js';

const BUCKET_BY_TYPE: Record<ReleaseType, ReleaseBucket> = {
  premiere: 'theatrical',
  theatrical_limited: 'theatrical',
  theatrical: 'theatrical',
  digital: 'streaming',
  physical: 'streaming',
  tv: 'streaming',
};

export function bucketOf(releaseType: ReleaseType): ReleaseBucket {
  return BUCKET_BY_TYPE[releaseType];
}

/** Total order on events: date, type, country, note. */
export function compareReleaseEvents(a: ReleaseEvent, b: ReleaseEvent): number {
  if (a.releaseDate !== b.releaseDate) return a.releaseDate < b.releaseDate ? -1 : 1;
  const typeOrder = RELEASE_TYPES.indexOf(a.releaseType) - RELEASE_TYPES.indexOf(b.releaseType);
  if (typeOrder !== 0) return typeOrder;
  if (a.country !== b.country) return a.country < b.country ? -1 : 1;
  return (a.note ?? '').localeCompare(b.note ?? '');
}

/**
 * Buckets release events into theatrical and streaming, keeping events on or
 * after `asOfDate - recencyWindowDays`. Each film keeps only its earliest
 * event per bucket. Output order does not depend on input order.
 */
export function categorize(
  events: readonly ReleaseEvent[],
  asOfDate: string,
  recencyWindowDays: number
): CategorizedReleases {
  const earliestDate = addDays(asOfDate, -recencyWindowDays);
  const picks: Record<ReleaseBucket, Map<number, ReleaseEvent>> = {
    theatrical: new Map(),
    streaming: new Map(),
  };

  for (const event of events) {
    if (event.releaseDate < earliestDate) continue;

    const bucket = picks[bucketOf(event.releaseType)];
    const current = bucket.get(event.catalogId);
    if (!current || compareReleaseEvents(event, current) < 0) {
      bucket.set(event.catalogId, event);
    }
  }

  const ordered = (bucket: Map<number, ReleaseEvent>) =>
    [...bucket.values()].sort(
      (a, b) => compareReleaseEvents(a, b) || a.catalogId - b.catalogId
    );

  return {
    theatrical: ordered(picks.theatrical),
    streaming: ordered(picks.streaming),
  };
}
