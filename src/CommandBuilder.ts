/**
 * CommandBuilder - Builds driver→engine command lines
 */

import type { Position, SearchRequest } from './types'

export const DEFAULT_SEARCH_DEPTH = 15

export const UCI = {
  identify: 'uci',
  isReady: 'isready',
  newGame: 'ucinewgame',
  stop: 'stop',
  quit: 'quit'
} as const

/**
 * Build an immutable position. No fen means the standard start position.
 */
export function createPosition(moves: readonly string[] = [], fen?: string): Position {
  const trimmed = fen?.trim()
  return Object.freeze({
    ...(trimmed ? { fen: trimmed } : {}),
    moves: Object.freeze(moves.filter((move) => move.length > 0))
  })
}

export class CommandBuilder {
  /**
   * position startpos|fen <fen> [moves m1 m2 ...]
   */
  static position(position: Position): string {
    let command = position.fen ? `position fen ${position.fen}` : 'position startpos'
    if (position.moves.length > 0) {
      command += ` moves ${position.moves.join(' ')}`
    }
    return command
  }

  /**
   * go [depth n] [movetime ms]
   */
  static go(request: SearchRequest): string {
    const { depth, movetimeMs } = CommandBuilder.normalizeSearch(request)
    let command = 'go'
    if (depth !== undefined) {
      command += ` depth ${depth}`
    }
    if (movetimeMs !== undefined) {
      command += ` movetime ${movetimeMs}`
    }
    return command
  }

  /**
   * setoption name <name> [value <value>]
   */
  static setOption(name: string, value?: string | number | boolean): string {
    const command = `setoption name ${name.trim()}`
    return value === undefined ? command : `${command} value ${String(value)}`
  }

  /**
   * Validate bounds; depth defaults to 15 with or without a movetime
   */
  static normalizeSearch(request: SearchRequest): SearchRequest {
    const { depth, movetimeMs } = request
    if (depth !== undefined && !isPositiveInteger(depth)) {
      throw new RangeError(`Search depth must be a positive integer, got ${depth}`)
    }
    if (movetimeMs !== undefined && !isPositiveInteger(movetimeMs)) {
      throw new RangeError(`Search movetime must be a positive integer of milliseconds, got ${movetimeMs}`)
    }

    return {
      depth: depth ?? DEFAULT_SEARCH_DEPTH,
      ...(movetimeMs !== undefined ? { movetimeMs } : {})
    }
  }
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0
}
