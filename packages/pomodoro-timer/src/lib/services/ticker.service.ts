import { interval } from 'rxjs';
import type { Subscription } from 'rxjs';

/** Periodic driver; carries no timer state of its own. */
export class TickerService {
  private tickerSub: Subscription | null = null;
  private periodMs: number;

  constructor(periodMs: number, private readonly onTick: () => void) {
    this.periodMs = periodMs;
  }

  get running(): boolean {
    return this.tickerSub != null;
  }

  /** Starts ticking unless already running. */
  ensureStarted(): void {
    if (this.tickerSub || this.periodMs <= 0) {
      return;
    }
    this.tickerSub = interval(this.periodMs).subscribe(() => {
      this.onTick();
    });
  }

  stop(): void {
    this.tickerSub?.unsubscribe();
    this.tickerSub = null;
  }

  /** Changes the period, restarting a running ticker. */
  setPeriod(periodMs: number): void {
    if (periodMs === this.periodMs) {
      return;
    }
    this.periodMs = periodMs;
    if (this.tickerSub) {
      this.stop();
      this.ensureStarted();
    }
  }
}
