/** Supplies the "current" time used to stamp modification times. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** A clock frozen at `at`; handy for deterministic tests. */
export function fixedClock(at: Date | number = 0): Clock {
  const ms = typeof at === 'number' ? at : at.getTime();
  return () => new Date(ms);
}
