/**
 * Unit tests for Transcript
 */

import { describe, it, expect } from 'vitest'
import { Transcript } from '../Transcript'

describe('Transcript', () => {
  it('should record both directions in order', () => {
    const transcript = new Transcript()

    transcript.recordSent('isready')
    transcript.recordReceived('readyok')
    transcript.recordSent('go depth 5', 1)

    expect(transcript.getEntries().map((e) => [e.seq, e.direction, e.line, e.searchNumber])).toEqual([
      [1, 'sent', 'isready', undefined],
      [2, 'received', 'readyok', undefined],
      [3, 'sent', 'go depth 5', 1]
    ])
  })

  it('should find the last sent line for a command', () => {
    const transcript = new Transcript()
    transcript.recordSent('position startpos')
    transcript.recordSent('position startpos moves e2e4')
    transcript.recordReceived('position echo')
    transcript.recordSent('go depth 3')

    expect(transcript.lastSent('position')).toBe('position startpos moves e2e4')
    expect(transcript.lastSent()).toBe('go depth 3')
    expect(transcript.lastSent('stop')).toBeUndefined()
  })

  it('should match whole command words only', () => {
    const transcript = new Transcript()
    transcript.recordSent('ucinewgame')

    expect(transcript.lastSent('uci')).toBeUndefined()
    expect(transcript.lastSent('ucinewgame')).toBe('ucinewgame')
  })

  it('should keep only the most recent entries', () => {
    const transcript = new Transcript(2)

    transcript.recordSent('a')
    transcript.recordSent('b')
    transcript.recordReceived('c')

    expect(transcript.getEntries().map((e) => e.line)).toEqual(['b', 'c'])
    expect(transcript.getSummary()).toEqual({ sent: 2, received: 1, retained: 2 })
  })

  it('should count but retain nothing with size zero', () => {
    const transcript = new Transcript(0)
    transcript.recordSent('uci')

    expect(transcript.getEntries()).toEqual([])
    expect(transcript.getSummary()).toEqual({ sent: 1, received: 0, retained: 0 })
  })

  it('should clear retained entries', () => {
    const transcript = new Transcript()
    transcript.recordSent('uci')
    transcript.clear()

    expect(transcript.getEntries()).toEqual([])
    expect(transcript.lastSent()).toBeUndefined()
  })
})
