import type { LifecycleSignal } from './models/timer-event';
import type { TimerOptionKey, TimerSettings } from './models/timer-config';
import type { TimerSnapshot, TimerState } from './models/timer-state';
import { pauseLengthMs, sessionAfterPomodoro, sessionOnPomodoroEntry } from './session-accountant';

/** `requested` for explicit operations, `auto` for limit-driven or activity-driven moves. */
export type TransitionTrigger = 'requested' | 'auto';

export interface TransitionResult {
  snapshot: TimerSnapshot;
  /** False when the target equals the current state; nothing else changes then. */
  changed: boolean;
  signals: LifecycleSignal[];
}

export function createInitialSnapshot(sessionLimit: number): TimerSnapshot {
  return {
    state: 'null',
    elapsedMs: 0,
    elapsedLimitMs: 0,
    session: 0,
    sessionLimit,
    stateTimestamp: 0
  };
}

/**
 * Computes the snapshot after moving to `to` at `timestamp`. The returned
 * `stateTimestamp` is backdated by any elapsed time carried into the new state.
 */
export function commitTransition(
  current: TimerSnapshot,
  to: TimerState,
  timestamp: number,
  settings: TimerSettings,
  trigger: TransitionTrigger
): TransitionResult {
  const from = current.state;
  if (from === to) {
    return { snapshot: current, changed: false, signals: [] };
  }

  let session = current.session;
  let isCompleted = false;

  if (from === 'pomodoro') {
    const next = sessionAfterPomodoro(session, current.elapsedMs, settings);
    isCompleted = next !== session;
    session = next;
  }

  let elapsedMs = 0;
  let elapsedLimitMs = 0;

  switch (to) {
    case 'idle':
    case 'null':
      break;

    case 'pomodoro':
      session = sessionOnPomodoroEntry(
        {
          from,
          session,
          elapsedMs: current.elapsedMs,
          stoppedForMs: from === 'null' && current.stateTimestamp > 0 ? timestamp - current.stateTimestamp : null
        },
        settings
      );
      elapsedLimitMs = settings.pomodoroTime * 1000;
      break;

    case 'pause':
      if (from === 'pomodoro' && current.elapsedMs > current.elapsedLimitMs) {
        elapsedMs = current.elapsedMs - current.elapsedLimitMs;
      }
      elapsedLimitMs = pauseLengthMs(session, current.sessionLimit, settings);
      break;
  }

  return {
    snapshot: {
      state: to,
      elapsedMs,
      elapsedLimitMs,
      session,
      sessionLimit: current.sessionLimit,
      stateTimestamp: timestamp - elapsedMs
    },
    changed: true,
    signals: lifecycleSignals(from, to, trigger === 'requested', isCompleted, settings.pauseWhenIdle)
  };
}

export function lifecycleSignals(
  from: TimerState,
  to: TimerState,
  isRequested: boolean,
  isCompleted: boolean,
  pauseWhenIdle: boolean
): LifecycleSignal[] {
  const signals: LifecycleSignal[] = [];
  if (to === 'pomodoro') {
    signals.push({ type: 'PomodoroStart', isRequested });
  }
  if (to === 'pomodoro' || (to === 'idle' && pauseWhenIdle)) {
    signals.push({ type: 'NotifyPomodoroStart', isRequested });
  }
  if (from === 'pomodoro') {
    signals.push({ type: 'PomodoroEnd', isCompleted });
    if (to === 'pause') {
      signals.push({ type: 'NotifyPomodoroEnd', isCompleted });
    }
  }
  return signals;
}

/** Target of the limit-driven transition, or null for states that never leave on their own. */
export function autoTransitionTarget(state: TimerState, settings: Pick<TimerSettings, 'pauseWhenIdle'>): TimerState | null {
  switch (state) {
    case 'pomodoro':
      return 'pause';
    case 'pause':
      return settings.pauseWhenIdle ? 'idle' : 'pomodoro';
    default:
      return null;
  }
}

export function isLimitReached(snapshot: TimerSnapshot): boolean {
  return (snapshot.state === 'pomodoro' || snapshot.state === 'pause') && snapshot.elapsedMs >= snapshot.elapsedLimitMs;
}

/**
 * New limit for the current state when `key` governs it, otherwise null.
 */
export function limitForOptionChange(
  key: TimerOptionKey,
  snapshot: TimerSnapshot,
  settings: TimerSettings
): number | null {
  switch (key) {
    case 'pomodoro-time':
      return snapshot.state === 'pomodoro' ? settings.pomodoroTime * 1000 : null;
    case 'short-pause-time':
      return snapshot.state === 'pause' && snapshot.session < snapshot.sessionLimit
        ? settings.shortPauseTime * 1000
        : null;
    case 'long-pause-time':
      return snapshot.state === 'pause' && snapshot.session >= snapshot.sessionLimit
        ? settings.longPauseTime * 1000
        : null;
    case 'pause-when-idle':
      return null;
  }
}
