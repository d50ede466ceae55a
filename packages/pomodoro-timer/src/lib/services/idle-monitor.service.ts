import { Observable, Subject } from 'rxjs';

/** Reports user activity; only watched while the timer sits in `idle`. */
export interface IdleMonitor {
  watchUserActive(): Observable<void>;
}

/** Idle monitor fed by the host, e.g. from input events or an OS idle API. */
export class ManualIdleMonitor implements IdleMonitor {
  private readonly activeSubject = new Subject<void>();
  private watchers = 0;

  watchUserActive(): Observable<void> {
    return new Observable<void>(subscriber => {
      this.watchers += 1;
      const sub = this.activeSubject.subscribe(subscriber);
      return () => {
        this.watchers -= 1;
        sub.unsubscribe();
      };
    });
  }

  get watching(): boolean {
    return this.watchers > 0;
  }

  notifyActive(): void {
    this.activeSubject.next();
  }
}
