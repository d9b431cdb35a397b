/**
 * DriverState - State machine for the protocol driver lifecycle
 */

/**
 * Driver lifecycle states
 */
export enum DriverState {
  UNINITIALIZED = 'UNINITIALIZED', // Process spawned, nothing sent yet
  HANDSHAKING = 'HANDSHAKING', // uci sent, waiting for uciok / readyok
  READY = 'READY', // Idle, accepts position / search / option commands
  SEARCHING = 'SEARCHING', // go sent, waiting for bestmove
  CLOSED = 'CLOSED' // quit sent or channel lost
}

/**
 * State transition events
 */
export type DriverTransitionEvent =
  | 'handshake_started'
  | 'handshake_completed'
  | 'handshake_failed'
  | 'search_started'
  | 'search_completed'
  | 'channel_closed'
  | 'close_requested'

/**
 * State transition definition
 */
export interface DriverTransition {
  from: DriverState | '*'
  to: DriverState
  on: DriverTransitionEvent
}

export const DRIVER_TRANSITIONS: DriverTransition[] = [
  { from: DriverState.UNINITIALIZED, to: DriverState.HANDSHAKING, on: 'handshake_started' },
  { from: DriverState.HANDSHAKING, to: DriverState.READY, on: 'handshake_completed' },
  { from: DriverState.HANDSHAKING, to: DriverState.CLOSED, on: 'handshake_failed' },
  { from: DriverState.READY, to: DriverState.SEARCHING, on: 'search_started' },
  { from: DriverState.SEARCHING, to: DriverState.READY, on: 'search_completed' },
  { from: '*', to: DriverState.CLOSED, on: 'channel_closed' },
  { from: '*', to: DriverState.CLOSED, on: 'close_requested' }
]

/**
 * State machine for the driver lifecycle
 */
export class DriverStateMachine {
  private currentState: DriverState

  constructor(initialState: DriverState = DriverState.UNINITIALIZED) {
    this.currentState = initialState
  }

  getState(): DriverState {
    return this.currentState
  }

  /**
   * Attempt state transition
   * @returns true if transition was valid, false otherwise
   */
  transition(event: DriverTransitionEvent): boolean {
    const validTransition = this.find(event)
    if (!validTransition) {
      return false
    }

    this.currentState = validTransition.to
    return true
  }

  /**
   * Check if a transition is valid
   */
  canTransition(event: DriverTransitionEvent): boolean {
    return this.find(event) !== undefined
  }

  private find(event: DriverTransitionEvent): DriverTransition | undefined {
    // CLOSED is terminal
    if (this.currentState === DriverState.CLOSED) {
      return undefined
    }
    return DRIVER_TRANSITIONS.find((t) => {
      return (t.from === '*' || t.from === this.currentState) && t.on === event
    })
  }
}
