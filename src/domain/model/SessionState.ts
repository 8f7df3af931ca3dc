/**
 * Finite state machine for a log session.
 *
 * Valid transitions:
 * - `UNOPENED` → `OPENING` | `CLOSED`
 * - `OPENING` → `READY` | `ERRORED` | `CLOSED`
 * - `READY` → `EXHAUSTED` | `ERRORED` | `CLOSED`
 * - `EXHAUSTED` → `CLOSED`
 * - `ERRORED` → `CLOSED`
 * - `CLOSED` → (terminal)
 *
 * `READY` covers both "no record yet" and "positioned on a record"; the session's
 * `current` property tells them apart.
 */
export const SessionState = {
  UNOPENED: 'UNOPENED',
  OPENING: 'OPENING',
  READY: 'READY',
  EXHAUSTED: 'EXHAUSTED',
  ERRORED: 'ERRORED',
  CLOSED: 'CLOSED',
} as const;

export type SessionState = (typeof SessionState)[keyof typeof SessionState];

const VALID_TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  [SessionState.UNOPENED]: [SessionState.OPENING, SessionState.CLOSED],
  [SessionState.OPENING]: [SessionState.READY, SessionState.ERRORED, SessionState.CLOSED],
  [SessionState.READY]: [SessionState.EXHAUSTED, SessionState.ERRORED, SessionState.CLOSED],
  [SessionState.EXHAUSTED]: [SessionState.CLOSED],
  [SessionState.ERRORED]: [SessionState.CLOSED],
  [SessionState.CLOSED]: [],
};

/** Check whether a state transition is valid according to the session FSM. */
export function canTransition(from: SessionState, to: SessionState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
