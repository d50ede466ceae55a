import { formatMs } from './format-ms';

describe('formatMs', () => {
  it('formats whole minutes and seconds', () => {
    expect(formatMs(0)).toBe('0:00');
    expect(formatMs(61_999)).toBe('1:01');
    expect(formatMs(1_500_000)).toBe('25:00');
  });

  it('returns an empty string for missing values', () => {
    expect(formatMs(null)).toBe('');
    expect(formatMs(undefined)).toBe('');
    expect(formatMs(Number.NaN)).toBe('');
  });

  it('clamps negative durations to zero', () => {
    expect(formatMs(-5_000)).toBe('0:00');
  });
});
