/**
 * Helpers for turning dashboard selections into API requests
 */

import type { ChartFigure, SelectionState } from '../types'

/**
 * Query parameters for `/dashboard/chart`. An inactive choice is left out.
 */
export const chartQueryParams = (state: SelectionState): Record<string, string> => {
  const params: Record<string, string> = {
    filter: state.filter,
    question: state.question,
    disaggregation: state.disaggregation
  }
  if (state.choice) {
    params.choice = state.choice
  }
  return params
}

/**
 * Stable identity of a selection, used as the figure cache key
 */
export const selectionKey = (state: SelectionState): string =>
  JSON.stringify([state.filter, state.question, state.choice, state.disaggregation])

/**
 * Small insertion-ordered cache for rendered figures. The aggregates never
 * change while the server runs, so entries only leave when the cache is full.
 */
export interface FigureCache {
  get: (state: SelectionState) => ChartFigure | undefined
  set: (state: SelectionState, figure: ChartFigure) => void
  size: () => number
}

export const createFigureCache = (maxEntries: number): FigureCache => {
  const entries = new Map<string, ChartFigure>()

  return {
    get: state => entries.get(selectionKey(state)),
    set: (state, figure) => {
      const key = selectionKey(state)
      entries.delete(key)
      entries.set(key, figure)
      while (entries.size > maxEntries) {
        const oldest = entries.keys().next()
        if (oldest.done) break
        entries.delete(oldest.value)
      }
    },
    size: () => entries.size
  }
}
