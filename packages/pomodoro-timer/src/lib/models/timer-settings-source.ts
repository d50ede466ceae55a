import type { Observable } from 'rxjs';

import type { TimerSettingChange } from './timer-config';

/** Feed of configuration changes keyed by option name. */
export interface TimerSettingsSource {
  readonly changes$: Observable<TimerSettingChange>;
}
