/**
 * EventCoordinator - Routes component events to session callbacks
 *
 * Responsibilities:
 * - Driver progress lines → onSearchInfo
 * - Clock expiry → onTimeExpired
 * - Engine stderr / exit / pipe failures → onEngineStderr, onEngineExit, onError
 * - Fallback error reporting when no onError is configured
 */

import { EventEmitter } from 'events'
import type { ChessClock } from './ChessClock'
import type { LineChannel } from './ProcessChannel'
import type { ProtocolDriver } from './ProtocolDriver'
import type { SearchInfo, TimeExpired } from './types'

/** Error reported asynchronously, outside any call */
export interface SessionError {
  searchNumber?: number
  error: Error
  context: string
}

export interface EventCallbacks {
  onSearchInfo?: (info: SearchInfo, searchNumber: number) => void
  onTimeExpired?: (event: TimeExpired) => void
  onEngineExit?: (code: number | null) => void
  onEngineStderr?: (text: string) => void
  onError?: (error: SessionError) => void
}

export interface CoordinatorOptions {
  /** Echo engine stderr to the console when no onEngineStderr is set */
  verbose?: boolean
  /** True once the session is shutting down; exits are then expected */
  isStopping: () => boolean
}

export class EventCoordinator {
  constructor(
    private driver: ProtocolDriver,
    private clock: ChessClock,
    private callbacks: EventCallbacks,
    private options: CoordinatorOptions
  ) {
    this.setupDriverEvents()
    this.setupClockEvents()
  }

  /**
   * Subscribe to a channel's process events, when it has any
   */
  attachChannel(channel: LineChannel): void {
    if (!(channel instanceof EventEmitter)) return

    channel.on('stderr', (text: string) => {
      if (this.callbacks.onEngineStderr) {
        this.callbacks.onEngineStderr(text)
      } else if (this.options.verbose) {
        console.error('Engine stderr:', text.trimEnd())
      }
    })

    channel.on('failure', (error: Error) => {
      this.emitError(error, 'engine_pipe')
    })

    channel.on('exit', (code: number | null) => {
      // Stop the clock too: the game cannot continue without the engine
      this.clock.stop()
      this.callbacks.onEngineExit?.(code)

      if (!this.options.isStopping() && code !== 0) {
        this.emitError(new Error(`Engine exited unexpectedly with code ${code}`), 'process_exit')
      }
    })
  }

  emitError(error: Error, context: string): void {
    const searchNumber = this.driver.getSearchCount()
    const sessionError: SessionError = {
      ...(searchNumber > 0 ? { searchNumber } : {}),
      error,
      context
    }

    if (this.callbacks.onError) {
      this.callbacks.onError(sessionError)
    } else {
      console.error('[EngineSession Error]', context, ':', error)
    }
  }

  /**
   * Update callbacks (for dynamic callback changes)
   */
  updateCallbacks(callbacks: EventCallbacks): void {
    this.callbacks = { ...this.callbacks, ...callbacks }
  }

  private setupDriverEvents(): void {
    this.driver.on('info', (info: SearchInfo, searchNumber: number) => {
      this.callbacks.onSearchInfo?.(info, searchNumber)
    })
  }

  private setupClockEvents(): void {
    this.clock.on('expired', (event: TimeExpired) => {
      this.callbacks.onTimeExpired?.(event)
    })
  }
}
