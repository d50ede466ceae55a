import { MAX_RECOVERY_TRANSITIONS } from './defaults';
import type { PersistedTimerState } from './models/persisted-state';
import type { TimerSettings } from './models/timer-config';
import type { LifecycleSignal } from './models/timer-event';
import { isTimerState, stringToState, type TimerSnapshot } from './models/timer-state';
import { autoTransitionTarget, commitTransition, isLimitReached } from './state-machine';
import { createNoopLogger, type Logger } from './utils/logging';

export interface RecoveryResult {
  snapshot: TimerSnapshot;
  /** Transitions replayed silently between the persisted state and `now`. */
  replayed: number;
  signals: LifecycleSignal[];
}

/**
 * Rebuilds the timer from persisted fields as it would be at `now`, replaying
 * every limit-driven transition that was missed. Each replayed state is taken
 * as having run its full length; the remainder carries into the next one.
 */
export function recoverTimer(
  persisted: PersistedTimerState,
  now: number,
  settings: TimerSettings,
  sessionLimit: number,
  logger: Logger = createNoopLogger()
): RecoveryResult {
  const state = parseState(persisted.state, logger);
  const session = parseSession(persisted.session, logger);
  const stateChangedAt = parseTimestamp(persisted.stateChangedDate, now, logger);

  const base: TimerSnapshot = {
    state: 'null',
    elapsedMs: 0,
    elapsedLimitMs: 0,
    session,
    sessionLimit,
    stateTimestamp: stateChangedAt
  };

  let current = commitTransition(base, state, stateChangedAt, settings, 'auto').snapshot;

  if (current.state === 'null') {
    // keeps the stop time so a later start can tell how long the timer was off
    return { snapshot: current, replayed: 0, signals: [] };
  }

  current = { ...current, elapsedMs: Math.max(0, now - current.stateTimestamp) };

  let replayed = 0;
  while (isLimitReached(current)) {
    if (replayed >= MAX_RECOVERY_TRANSITIONS) {
      logger.warn('Stopped replaying missed transitions after ' + replayed + ' steps');
      break;
    }
    const target = autoTransitionTarget(current.state, settings);
    if (target == null) {
      break;
    }
    const remainder = current.elapsedMs - current.elapsedLimitMs;
    const finished: TimerSnapshot = { ...current, elapsedMs: current.elapsedLimitMs };
    const { snapshot } = commitTransition(
      finished,
      target,
      current.stateTimestamp + current.elapsedLimitMs,
      settings,
      'auto'
    );
    current = { ...snapshot, elapsedMs: remainder };
    replayed += 1;
  }

  current = { ...current, stateTimestamp: now - current.elapsedMs };

  return { snapshot: current, replayed, signals: restoredSignals(current, settings) };
}

function restoredSignals(snapshot: TimerSnapshot, settings: TimerSettings): LifecycleSignal[] {
  // a session completed while the process was away is never reported as completed
  if (snapshot.state === 'pomodoro' || (snapshot.state === 'idle' && settings.pauseWhenIdle)) {
    return [
      { type: 'PomodoroStart', isRequested: false },
      { type: 'NotifyPomodoroStart', isRequested: false }
    ];
  }
  if (snapshot.state === 'pause') {
    return [
      { type: 'PomodoroEnd', isCompleted: false },
      { type: 'NotifyPomodoroEnd', isCompleted: false }
    ];
  }
  return [];
}

function parseState(raw: string | null, logger: Logger): TimerSnapshot['state'] {
  if (raw != null && !isTimerState(raw)) {
    logger.warn('Unknown persisted state "' + raw + '", treating as stopped');
  }
  return stringToState(raw);
}

function parseSession(raw: string | null, logger: Logger): number {
  if (raw == null || raw === '') {
    return 0;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    logger.warn('Could not restore session count from "' + raw + '"');
    return 0;
  }
  return Math.trunc(value);
}

function parseTimestamp(raw: string | null, now: number, logger: Logger): number {
  if (raw == null) {
    return now;
  }
  const parsed = Date.parse(raw);
  if (Number.isNaN(parsed)) {
    // elapsed time of the persisted state is lost
    logger.warn('Could not restore state time');
    return now;
  }
  return parsed;
}
