/**
 * SearchTracker - Manages search lifecycle and accumulated progress
 *
 * Responsibilities:
 * - Number searches within a session
 * - Accumulate progress lines for the in-flight search
 * - Produce the SearchResult when the terminal line arrives
 * - Keep the results of completed searches
 */

import type { BestMoveLine, SearchInfo, SearchRequest, SearchResult } from './types'

export interface SearchState {
  searchNumber: number
  request: SearchRequest
  startTime: Date
  infos: SearchInfo[]
}

export class SearchTracker {
  private currentSearchNumber = 0
  private currentSearch?: SearchState
  private results: SearchResult[] = []

  /**
   * Start a new search
   */
  startSearch(request: SearchRequest): SearchState {
    this.currentSearchNumber++
    this.currentSearch = {
      searchNumber: this.currentSearchNumber,
      request,
      startTime: new Date(),
      infos: []
    }
    return this.currentSearch
  }

  /**
   * Get in-flight search state
   */
  getCurrentSearch(): SearchState | undefined {
    return this.currentSearch
  }

  getCurrentSearchNumber(): number {
    return this.currentSearchNumber
  }

  addInfo(info: SearchInfo): void {
    this.currentSearch?.infos.push(info)
  }

  /**
   * Complete the in-flight search with its terminal line
   */
  completeSearch(terminal: BestMoveLine): SearchResult {
    const search = this.currentSearch
    if (!search) {
      throw new Error('No search in progress')
    }

    const result: SearchResult = {
      searchNumber: search.searchNumber,
      bestMove: terminal.bestMove,
      ...(terminal.ponder !== undefined ? { ponder: terminal.ponder } : {}),
      infos: search.infos,
      durationMs: Date.now() - search.startTime.getTime()
    }

    this.results.push(result)
    this.currentSearch = undefined
    return result
  }

  /**
   * Drop the in-flight search without a result (timeout, channel loss)
   */
  abandonSearch(): void {
    this.currentSearch = undefined
  }

  getResults(): ReadonlyArray<SearchResult> {
    return this.results
  }

  getResult(searchNumber: number): SearchResult | undefined {
    return this.results.find((r) => r.searchNumber === searchNumber)
  }
}
