/**
 * Error taxonomy for engine sessions
 *
 * Every error carries the operation that failed and, where there is one,
 * the underlying cause.
 */

export class EngineError extends Error {
  constructor(
    message: string,
    readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Engine executable missing or not launchable */
export class ProcessSpawnError extends EngineError {
  constructor(readonly executablePath: string, cause?: unknown) {
    super(`Failed to start engine '${executablePath}': ${describe(cause)}`, 'start', { cause })
  }
}

/** Engine process exited, pipe broke, or the channel was terminated */
export class ChannelClosedError extends EngineError {
  constructor(operation: string, detail = 'engine channel is closed') {
    super(`${operation}: ${detail}`, operation)
  }
}

/** uciok / readyok never observed during initialization */
export class HandshakeError extends EngineError {
  constructor(detail: string, cause?: unknown) {
    super(`Handshake failed: ${detail}`, 'initialize', { cause })
  }
}

/** A search is already in flight */
export class SessionBusyError extends EngineError {
  constructor(operation = 'search') {
    super(`${operation}: a search is already in progress`, operation)
  }
}

/** Local search watchdog fired; the driver has re-synced before this is thrown */
export class SearchTimeoutError extends EngineError {
  constructor(readonly timeoutMs: number) {
    super(`search: no bestmove within ${timeoutMs}ms`, 'search')
  }
}

/** Operation not valid in the driver's current state */
export class EngineStateError extends EngineError {
  constructor(operation: string, readonly state: string) {
    super(`${operation}: not allowed in state ${state}`, operation)
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
