/**
 * Tests for ProcessChannel against small local node child processes
 */

import { describe, it, expect, afterEach } from 'vitest'
import { ProcessChannel } from '../ProcessChannel'
import { ChannelClosedError, ProcessSpawnError } from '../errors'

const ECHO_SCRIPT = `
const rl = require('readline').createInterface({ input: process.stdin })
rl.on('line', (line) => {
  if (line === 'quit') process.exit(0)
  console.log('echo ' + line)
})
`

const PRINT_AND_EXIT_SCRIPT = `
console.log('  readyok  ')
console.log('')
console.log('bestmove e2e4')
`

const STUBBORN_SCRIPT = `
process.on('SIGTERM', () => {})
setInterval(() => {}, 1000)
console.log('armed')
`

const channels: ProcessChannel[] = []

async function startNode(script: string, graceMs?: number): Promise<ProcessChannel> {
  const channel = await ProcessChannel.start(process.execPath, { args: ['-e', script], graceMs })
  channels.push(channel)
  return channel
}

describe('ProcessChannel', () => {
  afterEach(async () => {
    await Promise.all(channels.map((c) => c.terminate(50)))
    channels.length = 0
  })

  it('should write lines and read the replies', async () => {
    const channel = await startNode(ECHO_SCRIPT)

    channel.writeLine('uci')
    channel.writeLine('isready')

    expect(await channel.readLine(5000)).toBe('echo uci')
    expect(await channel.readLine(5000)).toBe('echo isready')
    expect(channel.isOpen()).toBe(true)
  })

  it('should trim lines, skip blank ones and then report the closed stream', async () => {
    const channel = await startNode(PRINT_AND_EXIT_SCRIPT)

    expect(await channel.readLine(5000)).toBe('readyok')
    expect(await channel.readLine(5000)).toBe('bestmove e2e4')
    await expect(channel.readLine(5000)).rejects.toBeInstanceOf(ChannelClosedError)
  })

  it('should resolve undefined when nothing arrives in time', async () => {
    const channel = await startNode(ECHO_SCRIPT)

    expect(await channel.readLine(50)).toBeUndefined()
  })

  it('should fail to start a missing executable', async () => {
    const error = await ProcessChannel.start('/nonexistent/uci-engine').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ProcessSpawnError)
    expect(error).toMatchObject({ executablePath: '/nonexistent/uci-engine', operation: 'start' })
  })

  it('should report stderr output and the exit code', async () => {
    const channel = await startNode("process.stderr.write('warn\\n'); process.exitCode = 3")
    const stderr = new Promise<string>((resolve) => channel.once('stderr', resolve))
    const exit = new Promise<number | null>((resolve) => channel.once('exit', resolve))

    expect(await stderr).toBe('warn\n')
    expect(await exit).toBe(3)
    expect(channel.isOpen()).toBe(false)
  })

  it('should let a well-behaved engine exit when stdin closes', async () => {
    const channel = await startNode(ECHO_SCRIPT)
    const signals: Array<NodeJS.Signals | null> = []
    channel.on('exit', (_code: number | null, signal: NodeJS.Signals | null) => signals.push(signal))

    await channel.terminate()

    expect(signals).toEqual([null])
  })

  it('should escalate to SIGKILL when the process ignores SIGTERM', async () => {
    const channel = await startNode(STUBBORN_SCRIPT)
    expect(await channel.readLine(5000)).toBe('armed')
    const signals: Array<NodeJS.Signals | null> = []
    channel.on('exit', (_code: number | null, signal: NodeJS.Signals | null) => signals.push(signal))

    await channel.terminate(50)

    expect(signals).toEqual(['SIGKILL'])
  })

  it('should return the same promise from repeated terminate calls', async () => {
    const channel = await startNode(ECHO_SCRIPT)

    const first = channel.terminate()
    expect(channel.terminate()).toBe(first)
    await first
  })

  it('should refuse I/O once terminating', async () => {
    const channel = await startNode(ECHO_SCRIPT)
    const done = channel.terminate()

    expect(() => channel.writeLine('uci')).toThrow(ChannelClosedError)
    await expect(channel.readLine()).rejects.toBeInstanceOf(ChannelClosedError)
    await done
  })
})
