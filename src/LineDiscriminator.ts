/**
 * LineDiscriminator - Classifies and parses UCI engine output lines
 * The first whitespace-delimited token decides the line type
 */

import type { BestMoveLine, EngineOption, LineType, ScoreKind, SearchInfo } from './types'

const NO_MOVE_TOKENS = new Set(['(none)', '0000'])

export class LineDiscriminator {
  /**
   * Discriminate line type based on its leading token
   */
  static discriminate(line: string): LineType {
    const head = tokenize(line)[0]

    switch (head) {
      case 'id':
        return 'id'

      case 'option':
        return 'option'

      case 'uciok':
        return 'uciok'

      case 'readyok':
        return 'readyok'

      case 'info':
        return 'info'

      case 'bestmove':
        return 'bestmove'

      default:
        return 'unknown'
    }
  }

  /**
   * True for info lines that carry a principal variation
   */
  static isProgressLine(line: string): boolean {
    return this.discriminate(line) === 'info' && line.includes('pv')
  }

  /**
   * Parse an "info ... depth n ... score kind v ... pv m1 m2" line.
   * Returns null when depth, score or pv is missing or malformed.
   */
  static parseInfo(line: string): SearchInfo | null {
    const parts = tokenize(line)
    if (parts[0] !== 'info') return null

    const depth = integerAfter(parts, 'depth')
    const scoreIndex = parts.indexOf('score')
    const pvIndex = parts.indexOf('pv')
    if (depth === undefined || scoreIndex < 0 || pvIndex < 0) return null

    const kind = toScoreKind(parts[scoreIndex + 1])
    const value = toInteger(parts[scoreIndex + 2])
    if (kind === undefined || value === undefined) return null

    const pv = parts.slice(pvIndex + 1)
    if (pv.length === 0) return null

    const info: SearchInfo = {
      depth,
      score: { kind, value },
      pv
    }

    const seldepth = integerAfter(parts, 'seldepth')
    if (seldepth !== undefined) info.seldepth = seldepth
    const multipv = integerAfter(parts, 'multipv')
    if (multipv !== undefined) info.multipv = multipv
    const nodes = integerAfter(parts, 'nodes')
    if (nodes !== undefined) info.nodes = nodes
    const nps = integerAfter(parts, 'nps')
    if (nps !== undefined) info.nps = nps
    const timeMs = integerAfter(parts, 'time')
    if (timeMs !== undefined) info.timeMs = timeMs

    return info
  }

  /**
   * Parse "bestmove <move|(none)> [ponder <move>]"
   */
  static parseBestMove(line: string): BestMoveLine {
    const parts = tokenize(line)
    const token = parts[1]
    const bestMove = token === undefined || NO_MOVE_TOKENS.has(token) ? null : token

    const result: BestMoveLine = { bestMove }
    if (parts[2] === 'ponder' && parts[3] !== undefined && !NO_MOVE_TOKENS.has(parts[3])) {
      result.ponder = parts[3]
    }
    return result
  }

  /**
   * Parse "id name <text>" / "id author <text>"
   */
  static parseId(line: string): { field: 'name' | 'author'; value: string } | null {
    const match = /^id\s+(name|author)\s+(.+)$/.exec(line.trim())
    if (!match) return null
    return { field: match[1] === 'name' ? 'name' : 'author', value: match[2] }
  }

  /**
   * Parse "option name <words...> type <t> [default <v>] ..."
   * Option names may contain spaces, so the name runs up to the "type" keyword.
   */
  static parseOption(line: string): EngineOption | null {
    const parts = tokenize(line)
    if (parts[0] !== 'option' || parts[1] !== 'name') return null

    const typeIndex = parts.indexOf('type', 2)
    const nameEnd = typeIndex < 0 ? parts.length : typeIndex
    const name = parts.slice(2, nameEnd).join(' ')
    if (!name) return null

    const option: EngineOption = { name }
    if (typeIndex >= 0 && parts[typeIndex + 1] !== undefined) {
      option.type = parts[typeIndex + 1]
    }
    const defaultIndex = parts.indexOf('default', nameEnd)
    if (defaultIndex >= 0) {
      const rest: string[] = []
      for (const token of parts.slice(defaultIndex + 1)) {
        if (token === 'min' || token === 'max' || token === 'var') break
        rest.push(token)
      }
      option.default = rest.join(' ')
    }
    return option
  }
}

function tokenize(line: string): string[] {
  return line.trim().split(/\s+/).filter(Boolean)
}

function toInteger(token: string | undefined): number | undefined {
  if (token === undefined || !/^-?\d+$/.test(token)) return undefined
  return Number(token)
}

function toScoreKind(token: string | undefined): ScoreKind | undefined {
  switch (token) {
    case 'cp':
      return 'cp'
    case 'mate':
      return 'mate'
    default:
      return undefined
  }
}

function integerAfter(parts: string[], key: string): number | undefined {
  const index = parts.indexOf(key)
  return index < 0 ? undefined : toInteger(parts[index + 1])
}
