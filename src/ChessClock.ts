/**
 * ChessClock - Two-sided countdown with increment and expiry
 *
 * Only the active side's budget runs. Each tick is a single synchronous
 * read-modify-write on the event loop, so snapshots never see a partial
 * update. Budgets are kept in milliseconds and reported in seconds.
 */

import { EventEmitter } from 'events'
import type { ClockSnapshot, ClockTimes, Side, TimeExpired } from './types'

export interface ClockConfig {
  minutesPerSide?: number
  incrementSeconds?: number
  /** Tick period while running */
  tickIntervalMs?: number
  /** Time source in milliseconds */
  now?: () => number
}

export interface ChessClockEvents {
  expired: (event: TimeExpired) => void
}

export const DEFAULT_MINUTES_PER_SIDE = 10
export const DEFAULT_TICK_INTERVAL_MS = 100

export class ChessClock extends EventEmitter {
  private remainingMs: Record<Side, number> = { white: 0, black: 0 }
  private incrementMs = 0
  private active: Side = 'white'
  private timer?: NodeJS.Timeout
  private lastTick = 0
  private readonly tickIntervalMs: number
  private readonly now: () => number

  constructor(config: ClockConfig = {}) {
    super()
    this.tickIntervalMs = config.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS
    this.now = config.now ?? (() => Date.now())
    this.configure(config.minutesPerSide ?? DEFAULT_MINUTES_PER_SIDE, config.incrementSeconds ?? 0)
  }

  /**
   * Reset both budgets and set the increment. Leaves the running flag alone.
   */
  configure(minutesPerSide: number, incrementSeconds = 0): void {
    if (!Number.isFinite(minutesPerSide) || minutesPerSide < 0) {
      throw new RangeError(`Minutes per side must be a non-negative number, got ${minutesPerSide}`)
    }
    if (!Number.isFinite(incrementSeconds) || incrementSeconds < 0) {
      throw new RangeError(`Increment must be a non-negative number of seconds, got ${incrementSeconds}`)
    }

    const budget = minutesPerSide * 60_000
    this.remainingMs = { white: budget, black: budget }
    this.incrementMs = incrementSeconds * 1000
    this.lastTick = this.now()
  }

  /**
   * Begin counting down the active side. No-op when running or when the
   * active side has no time left.
   */
  start(): void {
    if (this.timer || this.remainingMs[this.active] <= 0) {
      return
    }

    this.lastTick = this.now()
    this.timer = setInterval(() => this.tick(), this.tickIntervalMs)
    this.timer.unref()
  }

  /**
   * Apply the time elapsed since the last tick, then halt
   */
  stop(): void {
    if (!this.timer) {
      return
    }
    this.tick()
    this.halt()
  }

  /**
   * Credit the increment to the side that just moved and hand the move over
   */
  switchSide(): void {
    if (this.timer) {
      this.tick()
    }
    // A side that has run out of time keeps the move; no increment is due
    if (this.remainingMs[this.active] <= 0) {
      return
    }

    this.remainingMs[this.active] += this.incrementMs
    this.active = opponent(this.active)
  }

  /**
   * Choose which side is to move without touching either budget
   */
  setActiveSide(side: Side): void {
    if (this.timer) {
      this.tick()
    }
    this.active = side
  }

  times(): ClockSnapshot {
    return {
      white: this.remainingMs.white / 1000,
      black: this.remainingMs.black / 1000,
      active: this.active,
      running: this.isRunning(),
      incrementSeconds: this.incrementMs / 1000
    }
  }

  /**
   * Whole seconds per side, as shown on a display
   */
  displayTimes(): ClockTimes {
    return {
      white: Math.floor(this.remainingMs.white / 1000),
      black: Math.floor(this.remainingMs.black / 1000)
    }
  }

  isRunning(): boolean {
    return this.timer !== undefined
  }

  getActiveSide(): Side {
    return this.active
  }

  private tick(): void {
    if (!this.timer) return

    const now = this.now()
    const elapsed = Math.max(0, now - this.lastTick)
    this.lastTick = now

    const side = this.active
    const remaining = this.remainingMs[side] - elapsed
    if (remaining > 0) {
      this.remainingMs[side] = remaining
      return
    }

    this.remainingMs[side] = 0
    this.halt()
    this.emit('expired', { side, winner: opponent(side) } satisfies TimeExpired)
  }

  private halt(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = undefined
    }
  }
}

export function opponent(side: Side): Side {
  return side === 'white' ? 'black' : 'white'
}
