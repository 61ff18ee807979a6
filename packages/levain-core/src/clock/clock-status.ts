/**
 * Clock Status Transitions
 *
 * Lifecycle of a simulation clock:
 *
 *   idle ────► running ◄────► paused
 *     │           │              │
 *     └───────────┴──────────────┴────► stopped
 *
 * `stopped` is terminal: no ticks, no interventions, no restart.
 */

export type ClockStatus = 'idle' | 'running' | 'paused' | 'stopped';

type StatusTransitionMap = {
  [K in ClockStatus]: readonly ClockStatus[];
};

export const VALID_CLOCK_TRANSITIONS: StatusTransitionMap = {
  idle: ['running', 'stopped'],
  running: ['paused', 'stopped'],
  paused: ['running', 'stopped'],
  stopped: [],
};

export function isValidClockTransition(from: ClockStatus, to: ClockStatus): boolean {
  return VALID_CLOCK_TRANSITIONS[from].includes(to);
}

export function isTerminalClockStatus(status: ClockStatus): boolean {
  return VALID_CLOCK_TRANSITIONS[status].length === 0;
}

/**
 * Error thrown on an illegal lifecycle transition or an operation
 * the current status does not allow.
 */
export class ClockStateError extends Error {
  public readonly from: ClockStatus;
  public readonly attempted: string;

  constructor(from: ClockStatus, attempted: string) {
    const validStates = VALID_CLOCK_TRANSITIONS[from];
    const validStr = validStates.length > 0 ? validStates.join(', ') : 'none (terminal state)';
    super(
      `Cannot ${attempted} while clock is ${from}. ` +
        `Valid transitions from '${from}': ${validStr}`
    );
    this.name = 'ClockStateError';
    this.from = from;
    this.attempted = attempted;
  }
}
