import { TickerService } from './ticker.service';

describe('TickerService', () => {
  let onTick: jest.Mock;
  let ticker: TickerService;

  beforeEach(() => {
    jest.useFakeTimers();
    onTick = jest.fn();
    ticker = new TickerService(1000, onTick);
  });

  afterEach(() => {
    ticker.stop();
    jest.useRealTimers();
  });

  it('does nothing until started', () => {
    jest.advanceTimersByTime(5000);

    expect(ticker.running).toBe(false);
    expect(onTick).not.toHaveBeenCalled();
  });

  it('ticks once per period and ignores repeated starts', () => {
    ticker.ensureStarted();
    ticker.ensureStarted();

    jest.advanceTimersByTime(3500);

    expect(ticker.running).toBe(true);
    expect(onTick).toHaveBeenCalledTimes(3);
  });

  it('stops ticking when stopped', () => {
    ticker.ensureStarted();
    jest.advanceTimersByTime(1000);

    ticker.stop();
    jest.advanceTimersByTime(5000);

    expect(ticker.running).toBe(false);
    expect(onTick).toHaveBeenCalledTimes(1);
  });

  it('restarts a running ticker with the new period', () => {
    ticker.ensureStarted();

    ticker.setPeriod(250);
    jest.advanceTimersByTime(1000);

    expect(onTick).toHaveBeenCalledTimes(4);
  });

  it('keeps a stopped ticker stopped when the period changes', () => {
    ticker.setPeriod(250);
    jest.advanceTimersByTime(1000);

    expect(ticker.running).toBe(false);
    expect(onTick).not.toHaveBeenCalled();
  });
});
