/**
 * ProtocolDriver - Speaks UCI with one engine over a LineChannel
 *
 * Responsibilities:
 * - Handshake: uci → uciok, isready → readyok
 * - Send position / option / new-game commands
 * - Run one search at a time: re-sync, go, collect info lines until bestmove
 * - Optional local watchdog with stop + re-sync recovery
 * - Close: quit, then terminate the channel
 */

import { EventEmitter } from 'events'
import type { LineChannel } from './ProcessChannel'
import { CommandBuilder, UCI, createPosition } from './CommandBuilder'
import { DriverState, DriverStateMachine } from './DriverState'
import type { DriverTransitionEvent } from './DriverState'
import { LineDiscriminator } from './LineDiscriminator'
import { SearchTracker } from './SearchTracker'
import { Transcript, DEFAULT_TRANSCRIPT_SIZE } from './Transcript'
import {
  ChannelClosedError,
  EngineError,
  EngineStateError,
  HandshakeError,
  SearchTimeoutError,
  SessionBusyError
} from './errors'
import type {
  EngineIdentity,
  LineType,
  Position,
  SearchInfo,
  SearchRequest,
  SearchResult
} from './types'

export interface DriverConfig {
  /** Bound on the whole handshake; undefined waits indefinitely */
  handshakeTimeoutMs?: number

  /** Local search watchdog; undefined leaves the search unbounded */
  searchTimeoutMs?: number

  /** Bound on readiness probes during watchdog recovery and new-game sync */
  syncTimeoutMs?: number

  /** Number of transcript lines kept in memory */
  transcriptSize?: number
}

export interface ProtocolDriverEvents {
  info: (info: SearchInfo, searchNumber: number) => void
  state: (state: DriverState) => void
}

const DEFAULT_SYNC_TIMEOUT_MS = 5000

export class ProtocolDriver extends EventEmitter {
  private readonly stateMachine = new DriverStateMachine()
  private readonly tracker = new SearchTracker()
  private readonly transcript: Transcript
  private identity: EngineIdentity = { options: [] }
  private position: Position = createPosition()
  private inFlight?: string
  private closing?: Promise<void>

  constructor(
    private readonly channel: LineChannel,
    private readonly config: DriverConfig = {}
  ) {
    super()
    this.transcript = new Transcript(config.transcriptSize ?? DEFAULT_TRANSCRIPT_SIZE)
  }

  // ============================================================================
  // Handshake
  // ============================================================================

  async initialize(): Promise<EngineIdentity> {
    this.requireState('initialize', DriverState.UNINITIALIZED)
    this.transition('handshake_started')

    const deadline = deadlineFrom(this.config.handshakeTimeoutMs)
    try {
      this.send(UCI.identify)
      const uciok = await this.readUntil('uciok', deadline, (line) => this.collectIdentity(line))
      if (uciok === undefined) {
        throw new HandshakeError(`no uciok within ${this.config.handshakeTimeoutMs}ms`)
      }

      this.send(UCI.isReady)
      const readyok = await this.readUntil('readyok', deadline)
      if (readyok === undefined) {
        throw new HandshakeError(`no readyok within ${this.config.handshakeTimeoutMs}ms`)
      }
    } catch (error) {
      this.transition('handshake_failed')
      if (error instanceof HandshakeError) throw error
      throw new HandshakeError(describeError(error), error)
    }

    this.transition('handshake_completed')
    return this.getIdentity()
  }

  // ============================================================================
  // Commands
  // ============================================================================

  /**
   * Replace the current position; the protocol defines no response
   */
  setPosition(position: Position): void {
    this.requireState('setPosition', DriverState.READY)
    this.send(CommandBuilder.position(position))
    this.position = position
  }

  setOption(name: string, value?: string | number | boolean): void {
    this.requireState('setOption', DriverState.READY)
    this.send(CommandBuilder.setOption(name, value))
  }

  /**
   * Tell the engine a new game starts, then wait until it is ready again
   */
  async newGame(): Promise<void> {
    this.requireState('newGame', DriverState.READY)
    this.inFlight = 'newGame'
    try {
      this.send(UCI.newGame)
      this.position = createPosition()
      const acknowledged = await this.sync(deadlineFrom(this.syncTimeoutMs()))
      if (!acknowledged) {
        throw new EngineError(`newGame: no readyok within ${this.syncTimeoutMs()}ms`, 'newGame')
      }
    } finally {
      this.inFlight = undefined
    }
  }

  // ============================================================================
  // Search
  // ============================================================================

  /**
   * Search the current position until the engine reports its best move.
   * A second call while one is outstanding rejects with SessionBusyError.
   */
  async search(request: SearchRequest = {}): Promise<SearchResult> {
    this.requireState('search', DriverState.READY)
    const normalized = CommandBuilder.normalizeSearch(request)

    this.inFlight = 'search'
    this.transition('search_started')
    this.tracker.startSearch(normalized)

    try {
      return await this.runSearch(normalized)
    } catch (error) {
      this.tracker.abandonSearch()
      if (error instanceof ChannelClosedError) {
        this.transition('channel_closed')
      } else if (this.getState() === DriverState.SEARCHING) {
        // Next search re-syncs with isready before sending go
        this.transition('search_completed')
      }
      throw error
    } finally {
      this.inFlight = undefined
    }
  }

  private async runSearch(request: SearchRequest): Promise<SearchResult> {
    const watchdogMs = this.config.searchTimeoutMs
    const deadline = deadlineFrom(watchdogMs)

    // Output from an earlier search must not leak into this one
    if (!(await this.sync(deadline))) {
      return this.recoverFromTimeout(watchdogMs, false)
    }

    this.send(CommandBuilder.go(request))

    for (;;) {
      const line = await this.nextLine(deadline)
      if (line === undefined) {
        return this.recoverFromTimeout(watchdogMs, true)
      }

      const type = LineDiscriminator.discriminate(line)
      if (type === 'info' && LineDiscriminator.isProgressLine(line)) {
        this.handleProgress(line)
      } else if (type === 'bestmove') {
        const result = this.tracker.completeSearch(LineDiscriminator.parseBestMove(line))
        this.transition('search_completed')
        return result
      }
    }
  }

  private handleProgress(line: string): void {
    const info = LineDiscriminator.parseInfo(line)
    // Garbled telemetry never aborts a search
    if (!info) return

    this.tracker.addInfo(info)
    this.emit('info', info, this.tracker.getCurrentSearchNumber())
  }

  /**
   * Watchdog fired: stop the engine, drain its bestmove, re-sync, then report the timeout
   */
  private async recoverFromTimeout(watchdogMs: number | undefined, goSent: boolean): Promise<never> {
    const timeoutMs = watchdogMs ?? 0
    const deadline = deadlineFrom(this.syncTimeoutMs())

    let recovered = true
    if (goSent) {
      this.send(UCI.stop)
      recovered = (await this.readUntil('bestmove', deadline)) !== undefined
    }
    if (recovered) {
      recovered = await this.sync(deadline)
    }

    if (!recovered) {
      await this.close()
      throw new SearchTimeoutError(timeoutMs)
    }

    this.transition('search_completed')
    throw new SearchTimeoutError(timeoutMs)
  }

  // ============================================================================
  // Shutdown
  // ============================================================================

  /**
   * Send quit and terminate the channel. Safe while a search is outstanding.
   */
  close(): Promise<void> {
    if (this.closing) {
      return this.closing
    }

    if (this.channel.isOpen()) {
      try {
        this.channel.writeLine(UCI.quit)
        this.transcript.recordSent(UCI.quit)
      } catch (error) {
        if (!(error instanceof ChannelClosedError)) throw error
      }
    }
    this.transition('close_requested')

    this.closing = this.channel.terminate()
    return this.closing
  }

  // ============================================================================
  // Accessors
  // ============================================================================

  getState(): DriverState {
    return this.stateMachine.getState()
  }

  getIdentity(): EngineIdentity {
    return { ...this.identity, options: [...this.identity.options] }
  }

  getPosition(): Position {
    return this.position
  }

  getTranscript(): Transcript {
    return this.transcript
  }

  /**
   * Number of searches started so far (completed or not)
   */
  getSearchCount(): number {
    return this.tracker.getCurrentSearchNumber()
  }

  getSearchHistory(): ReadonlyArray<SearchResult> {
    return this.tracker.getResults()
  }

  // ============================================================================
  // Private: line I/O
  // ============================================================================

  private send(line: string): void {
    try {
      this.channel.writeLine(line)
    } catch (error) {
      if (error instanceof ChannelClosedError) {
        this.transition('channel_closed')
      }
      throw error
    }
    this.transcript.recordSent(line, this.currentSearchNumber())
  }

  /**
   * Next line, or undefined once the deadline has passed
   */
  private async nextLine(deadline: number | undefined): Promise<string | undefined> {
    let timeoutMs: number | undefined
    if (deadline !== undefined) {
      timeoutMs = deadline - Date.now()
      if (timeoutMs <= 0) return undefined
    }

    const line = await this.channel.readLine(timeoutMs)
    if (line !== undefined) {
      this.transcript.recordReceived(line, this.currentSearchNumber())
    }
    return line
  }

  private async readUntil(
    type: LineType,
    deadline: number | undefined,
    onLine?: (line: string) => void
  ): Promise<string | undefined> {
    for (;;) {
      const line = await this.nextLine(deadline)
      if (line === undefined) return undefined
      if (LineDiscriminator.discriminate(line) === type) return line
      onLine?.(line)
    }
  }

  /**
   * isready → readyok; false when the deadline passes first
   */
  private async sync(deadline: number | undefined): Promise<boolean> {
    this.send(UCI.isReady)
    return (await this.readUntil('readyok', deadline)) !== undefined
  }

  private collectIdentity(line: string): void {
    const type = LineDiscriminator.discriminate(line)
    if (type === 'id') {
      const id = LineDiscriminator.parseId(line)
      if (id) this.identity[id.field] = id.value
    } else if (type === 'option') {
      const option = LineDiscriminator.parseOption(line)
      if (option) this.identity.options.push(option)
    }
  }

  // ============================================================================
  // Private: state
  // ============================================================================

  private transition(event: DriverTransitionEvent): void {
    if (this.stateMachine.transition(event)) {
      this.emit('state', this.stateMachine.getState())
    }
  }

  private requireState(operation: string, expected: DriverState): void {
    const state = this.getState()
    if (state === DriverState.CLOSED) {
      throw new ChannelClosedError(operation)
    }
    if (expected === DriverState.READY && (this.inFlight || state === DriverState.SEARCHING)) {
      throw new SessionBusyError(operation)
    }
    if (state !== expected) {
      throw new EngineStateError(operation, state)
    }
  }

  private currentSearchNumber(): number | undefined {
    return this.tracker.getCurrentSearch()?.searchNumber
  }

  private syncTimeoutMs(): number {
    return this.config.syncTimeoutMs ?? DEFAULT_SYNC_TIMEOUT_MS
  }
}

function deadlineFrom(timeoutMs: number | undefined): number | undefined {
  return timeoutMs === undefined ? undefined : Date.now() + timeoutMs
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
