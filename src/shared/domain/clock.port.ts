/**
 * Source of "now" for scheduling, claiming and retry backoff. Injected so
 * tests can pin time instead of faking Date.
 */
export interface Clock {
  now(): Date;
}

export const CLOCK = Symbol('CLOCK');
