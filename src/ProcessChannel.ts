/**
 * ProcessChannel - Owns the engine child process and its line streams
 *
 * Responsibilities:
 * - Spawn the engine with piped stdin/stdout/stderr
 * - Buffer stdout lines and hand them out through readLine()
 * - Write newline-terminated commands to stdin
 * - Shut the process down: stdin close → SIGTERM → SIGKILL
 */

import { spawn } from 'child_process'
import type { ChildProcessWithoutNullStreams } from 'child_process'
import { createInterface } from 'readline'
import type { Interface } from 'readline'
import { EventEmitter } from 'events'
import { ChannelClosedError, ProcessSpawnError } from './errors'

/**
 * Line-oriented duplex channel to an engine.
 * Implemented by ProcessChannel; tests substitute an in-process fake.
 */
export interface LineChannel {
  writeLine(text: string): void
  /** Resolves undefined on timeout, rejects with ChannelClosedError once the stream has closed */
  readLine(timeoutMs?: number): Promise<string | undefined>
  terminate(graceMs?: number): Promise<void>
  isOpen(): boolean
}

export interface ChannelConfig {
  args?: string[]
  cwd?: string
  /** Delay between each shutdown escalation step */
  graceMs?: number
}

export interface ProcessChannelEvents {
  stderr: (text: string) => void
  failure: (error: Error) => void
  exit: (code: number | null, signal: NodeJS.Signals | null) => void
}

interface PendingRead {
  resolve: (line: string | undefined) => void
  reject: (error: Error) => void
  timeout?: NodeJS.Timeout
}

const DEFAULT_GRACE_MS = 500

export class ProcessChannel extends EventEmitter implements LineChannel {
  private readline: Interface
  private lines: string[] = []
  private pending: PendingRead[] = []
  private readClosed = false
  private exited = false
  private stdinBroken = false
  private terminating?: Promise<void>
  private readonly exitPromise: Promise<void>

  private constructor(
    private readonly child: ChildProcessWithoutNullStreams,
    private readonly graceMs: number
  ) {
    super()

    this.readline = createInterface({
      input: child.stdout,
      crlfDelay: Infinity
    })
    this.readline.on('line', (line) => this.handleLine(line))
    this.readline.on('close', () => this.handleReadClose())

    child.stderr.on('data', (data: Buffer) => {
      this.emit('stderr', data.toString())
    })

    // EPIPE after the engine dies must not crash the host
    child.stdin.on('error', (error) => {
      this.stdinBroken = true
      this.emit('failure', error)
    })

    child.on('error', (error) => {
      this.emit('failure', error)
    })

    this.exitPromise = new Promise((resolve) => {
      child.once('exit', (code, signal) => {
        this.exited = true
        this.emit('exit', code, signal)
        resolve()
      })
    })
  }

  /**
   * Spawn the engine; resolves once the OS reports the process started
   */
  static start(executablePath: string, config: ChannelConfig = {}): Promise<ProcessChannel> {
    return new Promise((resolve, reject) => {
      let child: ChildProcessWithoutNullStreams
      try {
        child = spawn(executablePath, config.args ?? [], {
          cwd: config.cwd || process.cwd(),
          stdio: 'pipe'
        })
      } catch (error) {
        reject(new ProcessSpawnError(executablePath, error))
        return
      }

      const onError = (error: Error) => {
        child.removeListener('spawn', onSpawn)
        reject(new ProcessSpawnError(executablePath, error))
      }
      const onSpawn = () => {
        child.removeListener('error', onError)
        resolve(new ProcessChannel(child, config.graceMs ?? DEFAULT_GRACE_MS))
      }

      child.once('error', onError)
      child.once('spawn', onSpawn)
    })
  }

  writeLine(text: string): void {
    if (!this.isWritable()) {
      throw new ChannelClosedError('writeLine')
    }
    this.child.stdin.write(text + '\n')
  }

  readLine(timeoutMs?: number): Promise<string | undefined> {
    const line = this.lines.shift()
    if (line !== undefined) {
      return Promise.resolve(line)
    }
    if (this.readClosed) {
      return Promise.reject(new ChannelClosedError('readLine'))
    }

    return new Promise((resolve, reject) => {
      const entry: PendingRead = { resolve, reject }
      if (timeoutMs !== undefined) {
        entry.timeout = setTimeout(() => {
          this.pending = this.pending.filter((p) => p !== entry)
          resolve(undefined)
        }, timeoutMs)
      }
      this.pending.push(entry)
    })
  }

  isOpen(): boolean {
    return !this.readClosed && this.isWritable()
  }

  /**
   * Stop the process gracefully, escalating to signals if it lingers
   */
  terminate(graceMs = this.graceMs): Promise<void> {
    if (this.terminating) {
      return this.terminating
    }

    this.readline.close()
    this.handleReadClose()

    if (!this.exited) {
      this.child.stdin.end()
    }

    const sigtermTimeout = setTimeout(() => {
      if (this.exited) return
      this.child.kill('SIGTERM')

      const sigkillTimeout = setTimeout(() => {
        if (!this.exited) {
          this.child.kill('SIGKILL')
        }
      }, graceMs)

      this.child.once('exit', () => {
        clearTimeout(sigkillTimeout)
      })
    }, graceMs)

    this.terminating = this.exitPromise.then(() => {
      clearTimeout(sigtermTimeout)
    })
    return this.terminating
  }

  private isWritable(): boolean {
    return !this.exited && !this.stdinBroken && !this.terminating && this.child.stdin.writable
  }

  private handleLine(raw: string): void {
    const line = raw.trim()
    if (!line) return

    const waiter = this.pending.shift()
    if (waiter) {
      if (waiter.timeout) clearTimeout(waiter.timeout)
      waiter.resolve(line)
    } else {
      this.lines.push(line)
    }
  }

  private handleReadClose(): void {
    if (this.readClosed) return
    this.readClosed = true

    const waiters = this.pending
    this.pending = []
    for (const waiter of waiters) {
      if (waiter.timeout) clearTimeout(waiter.timeout)
      waiter.reject(new ChannelClosedError('readLine'))
    }
  }
}
