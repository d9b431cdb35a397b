/**
 * Transcript - Bounded in-memory record of the engine conversation
 *
 * Keeps the most recent lines sent to and received from the engine so
 * callers can inspect what was actually exchanged (e.g. the last
 * position command). Nothing is written to disk.
 */

// ============================================================================
// Types
// ============================================================================

export interface TranscriptEntry {
  /** Monotonic sequence number across both directions */
  seq: number

  timestamp: Date

  /** Direction: sent to the engine or received from it */
  direction: 'sent' | 'received'

  /** Search number this line belongs to, if it was exchanged during a search */
  searchNumber?: number

  line: string
}

export interface TranscriptSummary {
  sent: number
  received: number
  retained: number
}

// ============================================================================
// Transcript
// ============================================================================

export const DEFAULT_TRANSCRIPT_SIZE = 500

export class Transcript {
  private entries: TranscriptEntry[] = []
  private seq = 0
  private sentCount = 0
  private receivedCount = 0

  constructor(private readonly maxEntries = DEFAULT_TRANSCRIPT_SIZE) {}

  recordSent(line: string, searchNumber?: number): void {
    this.sentCount++
    this.push('sent', line, searchNumber)
  }

  recordReceived(line: string, searchNumber?: number): void {
    this.receivedCount++
    this.push('received', line, searchNumber)
  }

  getEntries(): ReadonlyArray<TranscriptEntry> {
    return this.entries
  }

  /**
   * Most recent line sent whose first token is `command` (e.g. 'position')
   */
  lastSent(command?: string): string | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i]
      if (entry.direction !== 'sent') continue
      if (command === undefined || entry.line === command || entry.line.startsWith(command + ' ')) {
        return entry.line
      }
    }
    return undefined
  }

  getSummary(): TranscriptSummary {
    return {
      sent: this.sentCount,
      received: this.receivedCount,
      retained: this.entries.length
    }
  }

  clear(): void {
    this.entries = []
  }

  private push(direction: TranscriptEntry['direction'], line: string, searchNumber?: number): void {
    if (this.maxEntries <= 0) return

    this.entries.push({
      seq: ++this.seq,
      timestamp: new Date(),
      direction,
      ...(searchNumber !== undefined ? { searchNumber } : {}),
      line
    })

    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries)
    }
  }
}
