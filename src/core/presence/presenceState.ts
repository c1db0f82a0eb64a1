/**
 * Live presence state machine.
 *
 * `init` exists so the first observation after a restart only records the state:
 * what the room was doing before the restart is unknown. `trap` is never entered by
 * a transition; it only comes from an invalid restored state.
 */

export type PresenceState = 'init' | 'on' | 'off' | 'trap';

export type PresenceNotification = 'went_live' | 'went_offline';

export interface PresenceTransition {
  next: PresenceState;
  notification: PresenceNotification | null;
}

const PRESENCE_STATES: readonly PresenceState[] = ['init', 'on', 'off', 'trap'];

/** Decode an externally supplied state; anything unrecognised becomes `trap`. */
export function decodePresenceState(value: unknown): PresenceState {
  return PRESENCE_STATES.find((s) => s === value) ?? 'trap';
}

export function nextPresence(state: PresenceState, isLive: boolean): PresenceTransition {
  switch (state) {
    case 'init':
      return { next: isLive ? 'on' : 'off', notification: null };
    case 'on':
      return isLive
        ? { next: 'on', notification: null }
        : { next: 'off', notification: 'went_offline' };
    case 'off':
      return isLive
        ? { next: 'on', notification: 'went_live' }
        : { next: 'off', notification: null };
    case 'trap':
      return { next: 'trap', notification: null };
  }
}
