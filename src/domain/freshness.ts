export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const HOUR_MS = 60 * 60 * 1000;

/**
 * Single staleness rule shared by film identities and the release ledger:
 * a timestamp is fresh while `now - timestamp <= ttlMs`.
 */
export function isFresh(timestamp: Date, ttlMs: number, now: Date): boolean {
  return now.getTime() - timestamp.getTime() <= ttlMs;
}
