import type { TimerSettings } from './models/timer-config';
import {
  isPauseSkipped,
  isPomodoroAccepted,
  longPauseAcceptanceMs,
  pauseLengthMs,
  sessionAfterPomodoro,
  sessionOnPomodoroEntry
} from './session-accountant';

const settings: TimerSettings = {
  pomodoroTime: 1500,
  shortPauseTime: 300,
  longPauseTime: 900,
  pauseWhenIdle: false
};

describe('session accountant', () => {
  it('places the long pause acceptance halfway between short and long pause', () => {
    expect(longPauseAcceptanceMs(settings)).toBe(600_000);
  });

  it('accepts a pomodoro stopped at 80% of its length', () => {
    expect(isPomodoroAccepted(1_200_000, settings)).toBe(true);
    expect(isPomodoroAccepted(1_199_000, settings)).toBe(false);
    expect(sessionAfterPomodoro(2, 1_300_000, settings)).toBe(3);
    expect(sessionAfterPomodoro(2, 600_000, settings)).toBe(2);
  });

  it('treats a pause shorter than 20% of the short pause as skipped', () => {
    expect(isPauseSkipped(59_000, settings)).toBe(true);
    expect(isPauseSkipped(60_000, settings)).toBe(false);
  });

  it('counts a skipped pause towards the next long pause', () => {
    expect(sessionOnPomodoroEntry({ from: 'pause', session: 2, elapsedMs: 30_000, stoppedForMs: null }, settings)).toBe(3);
    expect(sessionOnPomodoroEntry({ from: 'idle', session: 1, elapsedMs: 0, stoppedForMs: null }, settings)).toBe(2);
  });

  it('keeps the session after a regular short pause', () => {
    expect(sessionOnPomodoroEntry({ from: 'pause', session: 2, elapsedMs: 300_000, stoppedForMs: null }, settings)).toBe(2);
  });

  it('resets the session once a break reaches the long pause acceptance', () => {
    expect(sessionOnPomodoroEntry({ from: 'pause', session: 4, elapsedMs: 600_000, stoppedForMs: null }, settings)).toBe(0);
    expect(sessionOnPomodoroEntry({ from: 'idle', session: 2, elapsedMs: 3_600_000, stoppedForMs: null }, settings)).toBe(0);
  });

  it('resets the session after the timer was stopped for long enough', () => {
    expect(sessionOnPomodoroEntry({ from: 'null', session: 3, elapsedMs: 0, stoppedForMs: 600_000 }, settings)).toBe(0);
    expect(sessionOnPomodoroEntry({ from: 'null', session: 3, elapsedMs: 0, stoppedForMs: 599_999 }, settings)).toBe(3);
    expect(sessionOnPomodoroEntry({ from: 'null', session: 3, elapsedMs: 0, stoppedForMs: null }, settings)).toBe(3);
  });

  it('picks the long pause once the session limit is reached', () => {
    expect(pauseLengthMs(3, 4, settings)).toBe(300_000);
    expect(pauseLengthMs(4, 4, settings)).toBe(900_000);
    expect(pauseLengthMs(5, 4, settings)).toBe(900_000);
  });
});
