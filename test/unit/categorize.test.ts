import { describe, it, expect } from 'vitest';
import { bucketOf, categorize } from '../../src/domain/categorize.js';
import type { ReleaseEvent, ReleaseType } from '../../src/domain/types.js';

const cachedAt = new Date('2024-05-31T12:00:00Z');

function event(
  catalogId: number,
  releaseDate: string,
  releaseType: ReleaseType,
  country = 'US',
  note: string | null = null
): ReleaseEvent {
  return { catalogId, country, releaseDate, releaseType, note, cachedAt };
}

describe('bucketOf', () => {
  it('should map cinema releases to theatrical and the rest to streaming', () => {
    expect(bucketOf('premiere')).toBe('theatrical');
    expect(bucketOf('theatrical_limited')).toBe('theatrical');
    expect(bucketOf('theatrical')).toBe('theatrical');
    expect(bucketOf('digital')).toBe('streaming');
    expect(bucketOf('physical')).toBe('streaming');
    expect(bucketOf('tv')).toBe('streaming');
  });
});

describe('categorize', () => {
  const events = [
    event(1, '2024-05-20', 'theatrical'),
    event(1, '2024-07-01', 'theatrical'),
    event(1, '2024-06-15', 'premiere', 'US', 'Los Angeles'),
    event(1, '2024-09-01', 'digital'),
    event(2, '2024-06-01', 'digital'),
    event(2, '2024-08-01', 'tv'),
  ];

  it('should keep the earliest upcoming event per film and bucket', () => {
    const result = categorize(events, '2024-06-01', 0);

    expect(result.theatrical).toEqual([event(1, '2024-06-15', 'premiere', 'US', 'Los Angeles')]);
    expect(result.streaming).toEqual([event(2, '2024-06-01', 'digital'), event(1, '2024-09-01', 'digital')]);
  });

  it('should include past releases inside the recency window', () => {
    const result = categorize(events, '2024-06-01', 30);

    expect(result.theatrical).toEqual([event(1, '2024-05-20', 'theatrical')]);
  });

  it('should prefer the earlier release type on the same date', () => {
    const result = categorize(
      [event(3, '2024-07-01', 'theatrical'), event(3, '2024-07-01', 'theatrical_limited')],
      '2024-06-01',
      0
    );

    expect(result.theatrical).toEqual([event(3, '2024-07-01', 'theatrical_limited')]);
  });

  it('should return empty buckets when nothing is upcoming', () => {
    expect(categorize([event(1, '2020-01-01', 'digital')], '2024-06-01', 0)).toEqual({
      theatrical: [],
      streaming: [],
    });
  });

  it('should be idempotent and independent of input order', () => {
    const first = categorize(events, '2024-06-01', 7);

    expect(categorize(events, '2024-06-01', 7)).toEqual(first);
    expect(categorize([...events].reverse(), '2024-06-01', 7)).toEqual(first);
  });
});
