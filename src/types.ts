/**
 * Protocol and domain types for UCI engine sessions
 */

// ============================================================================
// Engine → driver lines
// ============================================================================

export type LineType =
  | 'id'
  | 'option'
  | 'uciok'
  | 'readyok'
  | 'info'
  | 'bestmove'
  | 'unknown'

export type ScoreKind = 'cp' | 'mate'

export interface Score {
  kind: ScoreKind
  value: number
}

/** One parsed progress ("info ... pv ...") line */
export interface SearchInfo {
  depth: number
  score: Score
  pv: string[]
  seldepth?: number
  multipv?: number
  nodes?: number
  nps?: number
  timeMs?: number
}

/** Parsed terminal "bestmove" line; bestMove is null when the engine has no legal move */
export interface BestMoveLine {
  bestMove: string | null
  ponder?: string
}

export interface EngineOption {
  name: string
  type?: string
  default?: string
}

/** Collected from id / option lines during the handshake */
export interface EngineIdentity {
  name?: string
  author?: string
  options: EngineOption[]
}

// ============================================================================
// Driver → engine values
// ============================================================================

/** Start position (no fen) or an explicit FEN, plus moves applied on top */
export interface Position {
  readonly fen?: string
  readonly moves: readonly string[]
}

export interface SearchRequest {
  /** Positive integer ply bound */
  depth?: number
  /** Engine-side time bound in milliseconds; advisory, not a local deadline */
  movetimeMs?: number
}

export interface SearchResult {
  searchNumber: number
  bestMove: string | null
  ponder?: string
  infos: SearchInfo[]
  durationMs: number
}

// ============================================================================
// Clock
// ============================================================================

export type Side = 'white' | 'black'

export interface ClockTimes {
  white: number
  black: number
}

export interface ClockSnapshot extends ClockTimes {
  active: Side
  running: boolean
  incrementSeconds: number
}

export interface TimeExpired {
  side: Side
  winner: Side
}
