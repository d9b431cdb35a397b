#!/usr/bin/env node
/**
 * Terminal front end: one engine session driven by typed commands
 *
 * Usage: uci-session [engine-path]
 * The engine path falls back to $UCI_ENGINE_PATH, then 'stockfish'.
 */

import { createInterface } from 'readline'
import { formatClock, HELP_TEXT, parseCommand } from './Commands'
import type { Command } from './Commands'
import { createSession, DEFAULT_ENGINE_PATH } from './EngineSession'
import type { EngineSession } from './EngineSession'
import type { ClockSnapshot, SearchInfo } from './types'

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1)
}

function formatTimes(times: ClockSnapshot): string {
  return `White: ${formatClock(times.white)} | Black: ${formatClock(times.black)}`
}

function formatInfo(info: SearchInfo): string {
  return `Depth ${info.depth} | Score ${info.score.kind} ${info.score.value} | Line: ${info.pv.join(' ')}`
}

/**
 * Run one command; returns false when the loop should end
 */
async function execute(session: EngineSession, command: Command): Promise<boolean> {
  switch (command.kind) {
    case 'empty':
      return true

    case 'quit':
      return false

    case 'help':
      console.log(HELP_TEXT)
      return true

    case 'error':
      console.log(`Error: ${command.message}`)
      return true

    case 'setPosition': {
      session.setPosition(command.moves)
      console.log(`Position set: ${session.getTranscript().lastSent('position')}`)
      return true
    }

    case 'setFen':
      session.setPosition([], command.fen)
      console.log(`Position set: ${session.getTranscript().lastSent('position')}`)
      return true

    case 'setTime':
      session.setTimeControl(command.minutes, command.increment)
      console.log(`Time control set to ${command.minutes} minutes with ${command.increment} second increment.`)
      console.log(formatTimes(session.times()))
      return true

    case 'best': {
      const move = await session.bestMove(command.depth)
      console.log(`Best move: ${move ?? 'none'}`)
      return true
    }

    case 'go': {
      const move = await session.bestMove(undefined, command.movetimeMs)
      console.log(`Best move: ${move ?? 'none'}`)
      return true
    }

    case 'newGame':
      await session.newGame()
      console.log('New game started.')
      return true

    case 'start':
      session.startClock()
      console.log(`Timer started. ${capitalize(session.times().active)}'s move.`)
      return true

    case 'stop':
      session.stopClock()
      console.log('Timer stopped.')
      return true

    case 'switch':
      session.switchSide()
      console.log(`Now ${capitalize(session.times().active)}'s turn.`)
      console.log(formatTimes(session.times()))
      return true

    case 'times':
      console.log(formatTimes(session.times()))
      return true
  }
}

async function main(): Promise<void> {
  const enginePath = process.argv[2] || process.env.UCI_ENGINE_PATH || DEFAULT_ENGINE_PATH

  const session = await createSession(enginePath, {
    verbose: process.env.UCI_VERBOSE === '1',
    onSearchInfo: (info) => console.log(formatInfo(info)),
    onTimeExpired: ({ side, winner }) => {
      console.log(`\n${capitalize(side)}'s time has expired! ${capitalize(winner)} wins on time.`)
    },
    onEngineExit: (code) => {
      console.log(`Engine exited (code ${code}).`)
    }
  })

  const identity = session.getEngineIdentity()
  console.log(`${identity.name ?? enginePath} initialized successfully.`)
  console.log("Type 'help' for available commands")

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' })
  rl.prompt()

  try {
    for await (const line of rl) {
      try {
        if (!(await execute(session, parseCommand(line)))) break
      } catch (error) {
        console.log(`Error: ${error instanceof Error ? error.message : String(error)}`)
      }
      if (!session.isOpen()) {
        console.log('Engine is no longer running.')
        break
      }
      rl.prompt()
    }
  } finally {
    rl.close()
    await session.close()
    console.log('Goodbye!')
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error)
  process.exit(1)
})
