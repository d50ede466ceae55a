import { createPomodoroTimer } from './provide-pomodoro-timer';
import type { PomodoroTimerService } from './services/pomodoro-timer.service';
import { createMemoryStorage } from './utils/storage';

describe('createPomodoroTimer', () => {
  const now = Date.UTC(2026, 2, 3, 14, 0, 0);
  let timer: PomodoroTimerService | undefined;

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(now);
  });

  afterEach(() => {
    timer?.destroy();
    timer = undefined;
    jest.useRealTimers();
  });

  it('picks up a running pause from the store', () => {
    const storage = createMemoryStorage({
      'pomodoro-timer:session-count': '1',
      'pomodoro-timer:state': 'pause',
      'pomodoro-timer:state-changed-date': new Date(now - 90_000).toISOString()
    });

    timer = createPomodoroTimer({ storage });

    expect(timer.state).toBe('pause');
    expect(timer.elapsed).toBe(90);
    expect(timer.elapsedLimit).toBe(300);
    expect(timer.session).toBe(1);
  });

  it('resolves a config factory', () => {
    const factory = jest.fn(() => ({ pomodoroTime: 3000 }));

    timer = createPomodoroTimer({ config: factory });

    expect(factory).toHaveBeenCalledTimes(1);
    expect(timer.getConfig().pomodoroTime).toBe(3000);
    expect(timer.state).toBe('null');
  });
});
