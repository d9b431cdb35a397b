/**
 * UCI Engine Session API
 *
 * Drives a UCI chess engine process and keeps a two-player game clock.
 *
 * Quick Start:
 * ```typescript
 * import { createSession } from 'uci-session'
 *
 * const session = await createSession('stockfish', {
 *   onSearchInfo: (info) => console.log(info.depth, info.pv.join(' '))
 * })
 *
 * session.setPosition(['e2e4', 'e7e5'])
 * console.log(await session.bestMove(12))
 * await session.close()
 * ```
 */

// ============================================================================
// High-Level Session API (Recommended for all users)
// ============================================================================

export { EngineSession, createSession, DEFAULT_ENGINE_PATH } from './EngineSession'
export type { SessionConfig } from './EngineSession'
export type { EventCallbacks, SessionError } from './EventCoordinator'

// Errors
export {
  EngineError,
  ProcessSpawnError,
  ChannelClosedError,
  HandshakeError,
  SessionBusyError,
  SearchTimeoutError,
  EngineStateError
} from './errors'

// ============================================================================
// Domain and Protocol Types
// ============================================================================

export type {
  Position,
  SearchRequest,
  SearchResult,
  SearchInfo,
  Score,
  ScoreKind,
  BestMoveLine,
  EngineIdentity,
  EngineOption,
  LineType,
  Side,
  ClockTimes,
  ClockSnapshot,
  TimeExpired
} from './types'

// ============================================================================
// Low-Level Components (Advanced)
// ============================================================================

export { ProcessChannel } from './ProcessChannel'
export type { LineChannel, ChannelConfig, ProcessChannelEvents } from './ProcessChannel'

export { ProtocolDriver } from './ProtocolDriver'
export type { DriverConfig, ProtocolDriverEvents } from './ProtocolDriver'

export { DriverState, DriverStateMachine, DRIVER_TRANSITIONS } from './DriverState'
export type { DriverTransition, DriverTransitionEvent } from './DriverState'

export { ChessClock, opponent } from './ChessClock'
export type { ClockConfig, ChessClockEvents } from './ChessClock'

export { LineDiscriminator } from './LineDiscriminator'
export { CommandBuilder, createPosition, DEFAULT_SEARCH_DEPTH } from './CommandBuilder'

export { SearchTracker } from './SearchTracker'
export type { SearchState } from './SearchTracker'

export { Transcript } from './Transcript'
export type { TranscriptEntry, TranscriptSummary } from './Transcript'

export { EventCoordinator } from './EventCoordinator'

// Terminal front end helpers
export { parseCommand, formatClock, HELP_TEXT } from './Commands'
export type { Command } from './Commands'
