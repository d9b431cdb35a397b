/**
 * Unit tests for EngineSession with an in-process engine
 */

import { describe, it, expect, afterEach, vi } from 'vitest'
import { EngineSession, createSession } from '../EngineSession'
import type { SessionConfig } from '../EngineSession'
import { DriverState } from '../DriverState'
import { ChannelClosedError, HandshakeError, ProcessSpawnError, SessionBusyError } from '../errors'
import { FakeEngineChannel } from './fakes/FakeEngineChannel'
import type { FakeEngineOptions } from './fakes/FakeEngineChannel'

const sessions: EngineSession[] = []

async function openSession(options: FakeEngineOptions = {}, config: Omit<SessionConfig, 'channelFactory'> = {}) {
  const channel = new FakeEngineChannel(options)
  const session = await EngineSession.create({ ...config, channelFactory: async () => channel })
  sessions.push(session)
  return { channel, session }
}

describe('EngineSession', () => {
  afterEach(async () => {
    await Promise.all(sessions.map((s) => s.close()))
    sessions.length = 0
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  describe('create', () => {
    it('should complete the handshake and expose the engine identity', async () => {
      const { session } = await openSession()

      expect(session.getState()).toBe(DriverState.READY)
      expect(session.getEngineIdentity().name).toBe('FakeFish 1.0')
      expect(session.getEnginePath()).toBe('stockfish')
      expect(session.isOpen()).toBe(true)
    })

    it('should pass the engine path and process settings to the channel factory', async () => {
      const channel = new FakeEngineChannel()
      const factory = vi.fn(async () => channel)

      const session = await createSession('/opt/engines/fake', {
        args: ['--uci'],
        shutdownGraceMs: 50,
        channelFactory: factory
      })
      sessions.push(session)

      expect(factory).toHaveBeenCalledWith('/opt/engines/fake', { args: ['--uci'], cwd: undefined, graceMs: 50 })
      expect(session.getEnginePath()).toBe('/opt/engines/fake')
    })

    it('should propagate spawn failures', async () => {
      const failure = new ProcessSpawnError('/missing/engine', new Error('ENOENT'))

      await expect(
        EngineSession.create({ channelFactory: () => Promise.reject(failure) })
      ).rejects.toBe(failure)
    })

    it('should shut the engine down when the handshake fails', async () => {
      const channel = new FakeEngineChannel({ answerUci: false })

      await expect(
        EngineSession.create({ handshakeTimeoutMs: 20, channelFactory: async () => channel })
      ).rejects.toBeInstanceOf(HandshakeError)

      expect(channel.written).toEqual(['uci', 'quit'])
      expect(channel.terminated).toBe(true)
    })
  })

  describe('position and search', () => {
    it('should send the position it returns', async () => {
      const { session } = await openSession()

      const position = session.setPosition(['e2e4', 'e7e5'])

      expect(position).toEqual({ moves: ['e2e4', 'e7e5'] })
      expect(session.getPosition()).toBe(position)
      expect(session.getTranscript().lastSent('position')).toBe('position startpos moves e2e4 e7e5')
    })

    it('should return the best move', async () => {
      const { channel, session } = await openSession()

      await expect(session.bestMove(10)).resolves.toBe('e2e4')
      expect(channel.written).toContain('go depth 10')
    })

    it('should cap a movetime search at the default depth', async () => {
      const { channel, session } = await openSession()

      await session.bestMove(undefined, 1000)

      expect(channel.written.filter((l) => l.startsWith('go'))).toEqual(['go depth 15 movetime 1000'])
    })

    it('should send both bounds when given', async () => {
      const { channel, session } = await openSession()

      await session.bestMove(6, 500)

      expect(channel.lastWritten()).toBe('go depth 6 movetime 500')
    })

    it('should return null when the engine has no move', async () => {
      const { session } = await openSession({ searchOutput: ['bestmove (none)'] })

      await expect(session.bestMove()).resolves.toBeNull()
    })

    it('should stream progress to onSearchInfo', async () => {
      const seen: Array<[number, number]> = []
      const { session } = await openSession({}, { onSearchInfo: (info, n) => seen.push([info.depth, n]) })

      const result = await session.search({ depth: 2 })

      expect(seen).toEqual([[1, 1], [2, 1]])
      expect(result.infos).toHaveLength(2)
      expect(session.getSearchHistory()).toEqual([result])
    })

    it('should reject a second search while one is outstanding', async () => {
      const { channel, session } = await openSession({ holdSearch: true })

      const first = session.bestMove(5)
      expect(session.isBusy()).toBe(true)
      await expect(session.bestMove()).rejects.toBeInstanceOf(SessionBusyError)
      await expect(session.newGame()).rejects.toBeInstanceOf(SessionBusyError)

      await vi.waitFor(() => expect(channel.lastWritten()).toBe('go depth 5'))
      channel.releaseSearch()

      await expect(first).resolves.toBe('e2e4')
      expect(session.isBusy()).toBe(false)
      expect(channel.written.filter((l) => l.startsWith('go'))).toEqual(['go depth 5'])
    })

    it('should forward options and new games', async () => {
      const { channel, session } = await openSession()

      session.setOption('Threads', 2)
      await session.newGame()

      expect(channel.written.slice(-3)).toEqual(['setoption name Threads value 2', 'ucinewgame', 'isready'])
    })
  })

  describe('clock', () => {
    it('should apply a new time control to both sides', async () => {
      const { session } = await openSession()

      session.setTimeControl(5, 2)

      expect(session.times()).toEqual({ white: 300, black: 300, active: 'white', running: false, incrementSeconds: 2 })
    })

    it('should start from the configured time control', async () => {
      const { session } = await openSession({}, { minutesPerSide: 3, incrementSeconds: 1 })

      expect(session.times()).toMatchObject({ white: 180, black: 180, incrementSeconds: 1 })
    })

    it('should hand the move to the chosen side', async () => {
      const { session } = await openSession()

      session.setSideToMove('black')
      session.switchSide()

      expect(session.times().active).toBe('white')
    })

    it('should announce an expired side', async () => {
      vi.useFakeTimers()
      const onTimeExpired = vi.fn()
      const { session } = await openSession({}, { minutesPerSide: 1, onTimeExpired })

      session.startClock()
      vi.advanceTimersByTime(60_000)

      expect(onTimeExpired).toHaveBeenCalledWith({ side: 'white', winner: 'black' })
      expect(session.times()).toMatchObject({ white: 0, running: false })
    })

    it('should stop the clock on close', async () => {
      const { session } = await openSession()
      session.startClock()

      await session.close()

      expect(session.times().running).toBe(false)
    })
  })

  describe('engine events', () => {
    it('should report an unexpected engine exit', async () => {
      const onError = vi.fn()
      const onEngineExit = vi.fn()
      const { channel, session } = await openSession({}, { onError, onEngineExit })
      session.startClock()

      channel.crash(1)

      expect(onEngineExit).toHaveBeenCalledWith(1)
      expect(onError).toHaveBeenCalledWith({
        error: new Error('Engine exited unexpectedly with code 1'),
        context: 'process_exit'
      })
      expect(session.times().running).toBe(false)
      expect(session.isOpen()).toBe(false)
    })

    it('should tag errors with the latest search number', async () => {
      const onError = vi.fn()
      const { channel, session } = await openSession({}, { onError })
      await session.bestMove()

      channel.crash(2)

      expect(onError).toHaveBeenCalledWith(expect.objectContaining({ searchNumber: 1, context: 'process_exit' }))
    })

    it('should not report the exit caused by close', async () => {
      const onError = vi.fn()
      const onEngineExit = vi.fn()
      const { session } = await openSession({}, { onError, onEngineExit })

      await session.close()

      expect(onEngineExit).toHaveBeenCalledWith(0)
      expect(onError).not.toHaveBeenCalled()
    })

    it('should fall back to console.error without onError', async () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})
      const { channel } = await openSession()

      channel.crash(3)

      expect(consoleError).toHaveBeenCalledWith('[EngineSession Error]', 'process_exit', ':', expect.any(Error))
    })

    it('should route engine stderr', async () => {
      const onEngineStderr = vi.fn()
      const { channel } = await openSession({}, { onEngineStderr })

      channel.emit('stderr', 'info string low memory\n')

      expect(onEngineStderr).toHaveBeenCalledWith('info string low memory\n')
    })

    it('should echo stderr in verbose mode', async () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})
      const { channel } = await openSession({}, { verbose: true })

      channel.emit('stderr', 'warming up\n')

      expect(consoleError).toHaveBeenCalledWith('Engine stderr:', 'warming up')
    })

    it('should use callbacks swapped in later', async () => {
      const first = vi.fn()
      const second = vi.fn()
      const { channel, session } = await openSession({}, { onEngineExit: first })

      session.updateCallbacks({ onEngineExit: second })
      channel.crash(0)

      expect(first).not.toHaveBeenCalled()
      expect(second).toHaveBeenCalledWith(0)
    })
  })

  describe('close', () => {
    it('should end an outstanding search with ChannelClosedError', async () => {
      const { session } = await openSession({ holdSearch: true })

      const outcome = expect(session.bestMove()).rejects.toBeInstanceOf(ChannelClosedError)
      await session.close()

      await outcome
      expect(session.getState()).toBe(DriverState.CLOSED)
      expect(session.isBusy()).toBe(false)
    })

    it('should be idempotent', async () => {
      const { channel, session } = await openSession()

      await session.close()
      await session.shutdown()

      expect(channel.written.filter((l) => l === 'quit')).toEqual(['quit'])
      expect(session.isOpen()).toBe(false)
    })

    it('should refuse work after close', async () => {
      const { session } = await openSession()
      await session.close()

      expect(() => session.setPosition(['e2e4'])).toThrow(ChannelClosedError)
      await expect(session.bestMove()).rejects.toBeInstanceOf(ChannelClosedError)
    })
  })
})
