import { SESSION_ACCEPTANCE, SHORT_LONG_PAUSE_ACCEPTANCE, SHORT_PAUSE_ACCEPTANCE } from './defaults';
import type { TimerSettings } from './models/timer-config';
import type { TimerState } from './models/timer-state';

type PauseSettings = Pick<TimerSettings, 'shortPauseTime' | 'longPauseTime'>;

/** Break length past which a pause counts as the long one. */
export function longPauseAcceptanceMs(settings: PauseSettings): number {
  return (
    (1 - SHORT_LONG_PAUSE_ACCEPTANCE) * settings.shortPauseTime * 1000 +
    SHORT_LONG_PAUSE_ACCEPTANCE * settings.longPauseTime * 1000
  );
}

export function isPomodoroAccepted(elapsedMs: number, settings: Pick<TimerSettings, 'pomodoroTime'>): boolean {
  return elapsedMs >= SESSION_ACCEPTANCE * settings.pomodoroTime * 1000;
}

export function isPauseSkipped(elapsedMs: number, settings: Pick<TimerSettings, 'shortPauseTime'>): boolean {
  return elapsedMs < SHORT_PAUSE_ACCEPTANCE * settings.shortPauseTime * 1000;
}

export interface PomodoroEntryContext {
  from: TimerState;
  session: number;
  /** Time spent in the state being left. */
  elapsedMs: number;
  /** Time since the previous state began; only read when leaving `null`. */
  stoppedForMs: number | null;
}

/** Session count after leaving a pomodoro. */
export function sessionAfterPomodoro(session: number, elapsedMs: number, settings: TimerSettings): number {
  return isPomodoroAccepted(elapsedMs, settings) ? session + 1 : session;
}

/** Session count on entering a pomodoro. */
export function sessionOnPomodoroEntry(context: PomodoroEntryContext, settings: TimerSettings): number {
  const acceptanceMs = longPauseAcceptanceMs(settings);
  let session = context.session;

  if (context.from === 'pause' || context.from === 'idle') {
    // a skipped break brings the long one closer
    if (isPauseSkipped(context.elapsedMs, settings)) {
      session += 1;
    }
    // long enough to count as the long break; an unfinished long break is due again
    if (context.elapsedMs >= acceptanceMs) {
      session = 0;
    }
  }

  if (context.from === 'null' && context.stoppedForMs != null && context.stoppedForMs >= acceptanceMs) {
    session = 0;
  }

  return session;
}

export function pauseLengthMs(session: number, sessionLimit: number, settings: TimerSettings): number {
  return (session >= sessionLimit ? settings.longPauseTime : settings.shortPauseTime) * 1000;
}
