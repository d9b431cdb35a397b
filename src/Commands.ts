/**
 * Commands - Parses terminal input into session commands
 */

import { DEFAULT_SEARCH_DEPTH } from './CommandBuilder'

export type Command =
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'setPosition'; moves: string[] }
  | { kind: 'setFen'; fen: string }
  | { kind: 'setTime'; minutes: number; increment: number }
  | { kind: 'best'; depth: number }
  | { kind: 'go'; movetimeMs?: number }
  | { kind: 'newGame' }
  | { kind: 'start' }
  | { kind: 'stop' }
  | { kind: 'switch' }
  | { kind: 'times' }
  | { kind: 'empty' }
  | { kind: 'error'; message: string }

export const HELP_TEXT = [
  'Available commands:',
  '-'.repeat(50),
  'help                           - Show this help message',
  "set position [moves]           - Set position with optional moves (e.g. 'set position e2e4 e7e5')",
  'set fen <fen>                  - Set position from FEN',
  "set time <minutes> [increment] - Set time control (e.g. 'set time 5 2' for 5 min + 2 sec)",
  `best [depth]                   - Best move searched to depth (default: ${DEFAULT_SEARCH_DEPTH})`,
  'go [movetime_ms]               - Best move with an optional time limit in milliseconds',
  'new                            - Start a new game on the engine',
  'start                          - Start the chess clock',
  'stop                           - Stop the chess clock',
  'switch                         - Switch the active side and apply the increment',
  'times                          - Display current times',
  'quit                           - Exit',
  '-'.repeat(50)
].join('\n')

export function parseCommand(input: string): Command {
  const parts = input.trim().split(/\s+/).filter(Boolean)
  if (parts.length === 0) {
    return { kind: 'empty' }
  }

  const command = parts[0].toLowerCase()
  switch (command) {
    case 'quit':
    case 'exit':
      return { kind: 'quit' }

    case 'help':
      return { kind: 'help' }

    case 'set':
      return parseSet(parts.slice(1))

    case 'best': {
      if (parts.length < 2) return { kind: 'best', depth: DEFAULT_SEARCH_DEPTH }
      const depth = parsePositiveInteger(parts[1])
      return depth === undefined
        ? { kind: 'error', message: `Invalid depth '${parts[1]}'.` }
        : { kind: 'best', depth }
    }

    case 'go': {
      if (parts.length < 2) return { kind: 'go' }
      const movetimeMs = parsePositiveInteger(parts[1])
      return movetimeMs === undefined
        ? { kind: 'error', message: `Invalid movetime '${parts[1]}'.` }
        : { kind: 'go', movetimeMs }
    }

    case 'new':
      return { kind: 'newGame' }

    case 'start':
      return { kind: 'start' }

    case 'stop':
      return { kind: 'stop' }

    case 'switch':
      return { kind: 'switch' }

    case 'times':
      return { kind: 'times' }

    default:
      return { kind: 'error', message: `Unknown command: '${command}'. Type 'help' for available commands.` }
  }
}

function parseSet(args: string[]): Command {
  if (args.length === 0) {
    return { kind: 'error', message: "Invalid set command. Try 'set position', 'set fen', or 'set time'." }
  }

  const sub = args[0].toLowerCase()
  switch (sub) {
    case 'position':
      return { kind: 'setPosition', moves: args.slice(1) }

    case 'fen':
      if (args.length < 2) return { kind: 'error', message: 'FEN string required.' }
      return { kind: 'setFen', fen: args.slice(1).join(' ') }

    case 'time': {
      if (args.length < 2) return { kind: 'error', message: 'Time in minutes required.' }
      const minutes = parseNonNegativeInteger(args[1])
      const increment = args.length > 2 ? parseNonNegativeInteger(args[2]) : 0
      if (minutes === undefined || increment === undefined) {
        return { kind: 'error', message: 'Invalid time values.' }
      }
      return { kind: 'setTime', minutes, increment }
    }

    default:
      return { kind: 'error', message: `Unknown set command '${sub}'.` }
  }
}

/**
 * MM:SS, seconds truncated
 */
export function formatClock(seconds: number): string {
  const whole = Math.max(0, Math.floor(seconds))
  const minutes = Math.floor(whole / 60)
  const secs = whole % 60
  return `${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`
}

function parseNonNegativeInteger(token: string): number | undefined {
  return /^\d+$/.test(token) ? Number(token) : undefined
}

function parsePositiveInteger(token: string): number | undefined {
  const value = parseNonNegativeInteger(token)
  return value !== undefined && value > 0 ? value : undefined
}
