/** Raw fields as read back from the key/value store. */
export interface PersistedTimerState {
  session: string | null;
  state: string | null;
  stateChangedDate: string | null;
}
