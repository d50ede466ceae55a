import { ClockJumpResumeNotifier } from './resume-notifier.service';

class MockTimeSourceService {
  private current = 0;

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

describe('ClockJumpResumeNotifier', () => {
  let time: MockTimeSourceService;
  let notifier: ClockJumpResumeNotifier;

  beforeEach(() => {
    jest.useFakeTimers();
    time = new MockTimeSourceService();
    notifier = new ClockJumpResumeNotifier(time, { checkIntervalMs: 1000, thresholdMs: 10_000 });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  const check = (wallClockMs: number): void => {
    time.advance(wallClockMs);
    jest.advanceTimersByTime(1000);
  };

  it('stays quiet while the clock keeps pace with the checks', () => {
    const resumed = jest.fn();
    const sub = notifier.resumed$.subscribe(resumed);

    check(1000);
    check(1200);
    check(10_500);

    expect(resumed).not.toHaveBeenCalled();
    sub.unsubscribe();
  });

  it('emits when the wall clock jumps past the threshold', () => {
    const resumed = jest.fn();
    const sub = notifier.resumed$.subscribe(resumed);

    check(1000);
    check(11_000);
    check(1000);

    expect(resumed).toHaveBeenCalledTimes(1);
    sub.unsubscribe();
  });

  it('stops checking once nobody listens', () => {
    const sub = notifier.resumed$.subscribe();
    expect(jest.getTimerCount()).toBe(1);

    sub.unsubscribe();

    expect(jest.getTimerCount()).toBe(0);
  });
});
