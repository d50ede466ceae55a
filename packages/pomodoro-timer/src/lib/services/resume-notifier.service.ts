import { Observable, filter, interval, map, share } from 'rxjs';

import type { TimeSource } from './time-source.service';

/** Signals that the system came back from suspend. */
export interface ResumeNotifier {
  readonly resumed$: Observable<void>;
}

export interface ClockJumpOptions {
  checkIntervalMs: number;
  /** Extra wall-clock time between two checks that counts as a suspend. */
  thresholdMs: number;
}

export const DEFAULT_CLOCK_JUMP_OPTIONS: ClockJumpOptions = {
  checkIntervalMs: 5_000,
  thresholdMs: 30_000
};

/**
 * Detects a suspend as a wall-clock jump: timers do not run while the machine
 * sleeps, so the gap between two checks grows by the time spent asleep.
 */
export class ClockJumpResumeNotifier implements ResumeNotifier {
  readonly resumed$: Observable<void>;

  constructor(timeSource: TimeSource, options: Partial<ClockJumpOptions> = {}) {
    const { checkIntervalMs, thresholdMs } = { ...DEFAULT_CLOCK_JUMP_OPTIONS, ...options };

    this.resumed$ = new Observable<number>(subscriber => {
      let last = timeSource.now();
      const sub = interval(checkIntervalMs)
        .pipe(
          map(() => {
            const current = timeSource.now();
            const gap = current - last;
            last = current;
            return gap;
          })
        )
        .subscribe(subscriber);
      return () => sub.unsubscribe();
    }).pipe(
      filter(gap => gap - checkIntervalMs >= thresholdMs),
      map((): void => undefined),
      share()
    );
  }
}
