/**
 * Clock abstraction
 * Services read time only through an injected Clock so tests can pin "now".
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Clock frozen at the given instant
 */
export function fixedClock(at: Date | string): Clock {
  const instant = new Date(at);
  return () => new Date(instant.getTime());
}

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function fromEpochSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}
