import { now } from '../utils/platform';

export interface TimeSource {
  now(): number;
}

/** Wall clock in epoch milliseconds. */
export class TimeSourceService implements TimeSource {
  now(): number {
    return now();
  }
}
