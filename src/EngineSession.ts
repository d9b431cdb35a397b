/**
 * High-Level Session API for UCI chess engines
 *
 * Owns one engine channel, one protocol driver and one game clock.
 * Searches are single-flight; the clock runs independently of them and
 * the caller decides when to switch sides.
 *
 * Usage:
 * ```typescript
 * const session = await createSession('/usr/local/bin/stockfish', {
 *   minutesPerSide: 5,
 *   incrementSeconds: 2,
 *   onSearchInfo: (info) => console.log(info.depth, info.score, info.pv.join(' ')),
 *   onTimeExpired: ({ side }) => console.log(`${side} flagged`)
 * })
 *
 * session.setPosition(['e2e4', 'e7e5'])
 * session.startClock()
 * const move = await session.bestMove(12)
 * session.switchSide()
 * await session.close()
 * ```
 */

import { ChessClock } from './ChessClock'
import { createPosition } from './CommandBuilder'
import type { DriverState } from './DriverState'
import { EventCoordinator } from './EventCoordinator'
import type { EventCallbacks } from './EventCoordinator'
import { ProcessChannel } from './ProcessChannel'
import type { ChannelConfig, LineChannel } from './ProcessChannel'
import { ProtocolDriver } from './ProtocolDriver'
import type { Transcript } from './Transcript'
import { SessionBusyError } from './errors'
import type {
  ClockSnapshot,
  EngineIdentity,
  Position,
  SearchRequest,
  SearchResult,
  Side
} from './types'

// ============================================================================
// Public API Types
// ============================================================================

export interface SessionConfig extends EventCallbacks {
  /** Engine executable (defaults to 'stockfish' on PATH) */
  enginePath?: string

  /** Extra command-line arguments for the engine */
  args?: string[]

  /** Working directory for the engine process (defaults to process.cwd()) */
  cwd?: string

  /**
   * Bound on the uci/isready handshake.
   * Unset waits as long as the engine takes to start.
   */
  handshakeTimeoutMs?: number

  /**
   * Local watchdog per search. Unset means no local deadline; movetime
   * is only ever a hint to the engine.
   */
  searchTimeoutMs?: number

  /** Bound on readiness probes during timeout recovery and newGame() */
  syncTimeoutMs?: number

  /** Delay between shutdown escalation steps (stdin close → SIGTERM → SIGKILL) */
  shutdownGraceMs?: number

  // Clock
  minutesPerSide?: number
  incrementSeconds?: number
  tickIntervalMs?: number

  /** Lines of engine conversation kept for getTranscript() */
  transcriptSize?: number

  /** Echo engine stderr to the console */
  verbose?: boolean

  /**
   * Opens the engine channel. Defaults to spawning a real process;
   * tests pass an in-process fake.
   */
  channelFactory?: (enginePath: string, config: ChannelConfig) => Promise<LineChannel>
}

export const DEFAULT_ENGINE_PATH = 'stockfish'

// ============================================================================
// EngineSession - Main API
// ============================================================================

export class EngineSession {
  private readonly driver: ProtocolDriver
  private readonly clock: ChessClock
  private readonly coordinator: EventCoordinator
  private busy = false
  private isStopping = false

  private constructor(
    private readonly config: SessionConfig,
    private readonly channel: LineChannel
  ) {
    this.driver = new ProtocolDriver(channel, {
      handshakeTimeoutMs: config.handshakeTimeoutMs,
      searchTimeoutMs: config.searchTimeoutMs,
      syncTimeoutMs: config.syncTimeoutMs,
      transcriptSize: config.transcriptSize
    })
    this.clock = new ChessClock({
      minutesPerSide: config.minutesPerSide,
      incrementSeconds: config.incrementSeconds,
      tickIntervalMs: config.tickIntervalMs
    })
    this.coordinator = new EventCoordinator(this.driver, this.clock, config, {
      verbose: config.verbose,
      isStopping: () => this.isStopping
    })
    this.coordinator.attachChannel(channel)
  }

  /**
   * Start the engine and complete the handshake.
   * Rejects with ProcessSpawnError or HandshakeError; nothing is left running on failure.
   */
  static async create(config: SessionConfig = {}): Promise<EngineSession> {
    const enginePath = config.enginePath || DEFAULT_ENGINE_PATH
    const openChannel =
      config.channelFactory ?? ((path: string, channelConfig: ChannelConfig) => ProcessChannel.start(path, channelConfig))

    const channel = await openChannel(enginePath, {
      args: config.args,
      cwd: config.cwd,
      graceMs: config.shutdownGraceMs
    })

    const session = new EngineSession({ ...config, enginePath }, channel)
    try {
      await session.driver.initialize()
    } catch (error) {
      await session.close()
      throw error
    }
    return session
  }

  // ============================================================================
  // Engine
  // ============================================================================

  /**
   * Replace the position: start position (or `fen`) plus `moves`
   */
  setPosition(moves?: readonly string[], fen?: string): Position {
    const position = createPosition(moves, fen)
    this.driver.setPosition(position)
    return position
  }

  /**
   * Best move for the current position, or null when the engine has none
   */
  async bestMove(depth?: number, movetimeMs?: number): Promise<string | null> {
    const result = await this.search({
      ...(depth !== undefined ? { depth } : {}),
      ...(movetimeMs !== undefined ? { movetimeMs } : {})
    })
    return result.bestMove
  }

  /**
   * Full search result including every parsed progress line.
   * Rejects with SessionBusyError while another search is outstanding.
   */
  async search(request: SearchRequest = {}): Promise<SearchResult> {
    return this.exclusive('bestMove', () => this.driver.search(request))
  }

  setOption(name: string, value?: string | number | boolean): void {
    this.driver.setOption(name, value)
  }

  async newGame(): Promise<void> {
    return this.exclusive('newGame', () => this.driver.newGame())
  }

  // ============================================================================
  // Clock
  // ============================================================================

  startClock(): void {
    this.clock.start()
  }

  stopClock(): void {
    this.clock.stop()
  }

  switchSide(): void {
    this.clock.switchSide()
  }

  setTimeControl(minutesPerSide: number, incrementSeconds = 0): void {
    this.clock.configure(minutesPerSide, incrementSeconds)
  }

  setSideToMove(side: Side): void {
    this.clock.setActiveSide(side)
  }

  times(): ClockSnapshot {
    return this.clock.times()
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Stop the clock, send quit and terminate the engine.
   * Safe while a search is outstanding: that search rejects with ChannelClosedError.
   */
  async close(): Promise<void> {
    this.isStopping = true
    this.clock.stop()
    await this.driver.close()
  }

  shutdown(): Promise<void> {
    return this.close()
  }

  // ============================================================================
  // Accessors
  // ============================================================================

  getState(): DriverState {
    return this.driver.getState()
  }

  getEngineIdentity(): EngineIdentity {
    return this.driver.getIdentity()
  }

  getEnginePath(): string {
    return this.config.enginePath || DEFAULT_ENGINE_PATH
  }

  getPosition(): Position {
    return this.driver.getPosition()
  }

  getTranscript(): Transcript {
    return this.driver.getTranscript()
  }

  getSearchHistory(): ReadonlyArray<SearchResult> {
    return this.driver.getSearchHistory()
  }

  isBusy(): boolean {
    return this.busy
  }

  isOpen(): boolean {
    return this.channel.isOpen()
  }

  /**
   * Update callbacks (for dynamic callback changes)
   */
  updateCallbacks(callbacks: EventCallbacks): void {
    this.coordinator.updateCallbacks(callbacks)
  }

  // ============================================================================
  // Private
  // ============================================================================

  private async exclusive<T>(operation: string, run: () => Promise<T>): Promise<T> {
    if (this.busy) {
      throw new SessionBusyError(operation)
    }

    this.busy = true
    try {
      return await run()
    } finally {
      this.busy = false
    }
  }
}

/**
 * Start a session on the engine at `enginePath`
 */
export function createSession(enginePath: string, config: Omit<SessionConfig, 'enginePath'> = {}): Promise<EngineSession> {
  return EngineSession.create({ ...config, enginePath })
}
