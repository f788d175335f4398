import express from 'express'
import type { DashboardContext } from '../services/dashboardContext.js'
import { renderChart } from '../services/chartRenderer.js'
import {
  initialSelection,
  isSelectionControl,
  resolveSelection,
  type SelectionChange,
  type SelectionState
} from '../services/selectionResolver.js'

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error))

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/**
 * Pick the string-valued selection fields out of untrusted input.
 * Returns null when a present field has the wrong type.
 */
export const parseSelectionState = (raw: unknown): Partial<SelectionState> | null => {
  if (raw === undefined || raw === null) return {}
  if (!isRecord(raw)) return null

  const state: Partial<SelectionState> = {}
  for (const control of ['filter', 'question', 'disaggregation'] as const) {
    const value = raw[control]
    if (value === undefined || value === '') continue
    if (typeof value !== 'string') return null
    state[control] = value
  }

  const choice = raw.choice
  if (choice === null || choice === '') {
    state.choice = null
  } else if (typeof choice === 'string') {
    state.choice = choice
  } else if (choice !== undefined) {
    return null
  }
  return state
}

export const parseSelectionChange = (raw: unknown): SelectionChange | undefined | null => {
  if (raw === undefined || raw === null) return undefined
  if (!isRecord(raw) || !isSelectionControl(raw.control)) return null

  const value = raw.value
  if (value !== null && typeof value !== 'string') return null
  return { control: raw.control, value }
}

const queryString = (value: unknown): string | undefined =>
  typeof value === 'string' && value !== '' ? value : undefined

export function createDashboardRouter(context: DashboardContext) {
  const router = express.Router()
  const { config } = context

  // Catalogs plus the default selection
  router.get('/config', (_req, res) => {
    try {
      return res.json({
        title: config.title,
        filterLabel: config.filterLabel,
        filters: config.filters,
        questions: config.questions.map(q => ({ label: q.label, value: q.id })),
        disaggregations: config.disaggregations.map(d => ({ label: d.label, value: d.id })),
        selection: initialSelection(context)
      })
    } catch (error) {
      console.error('Get dashboard config error:', error)
      return res.status(500).json({ error: 'Failed to load dashboard config', message: errorMessage(error) })
    }
  })

  // Apply one control change and return the dependent options
  router.post('/resolve', (req, res) => {
    const body: unknown = req.body
    const state = parseSelectionState(isRecord(body) ? body.state : undefined)
    const change = parseSelectionChange(isRecord(body) ? body.change : undefined)
    if (state === null || change === null) {
      return res.status(400).json({ error: 'Invalid selection payload' })
    }

    try {
      return res.json(resolveSelection(context, state, change))
    } catch (error) {
      console.error('Resolve selection error:', error)
      return res.status(500).json({ error: 'Failed to resolve selection', message: errorMessage(error) })
    }
  })

  // Figure for a selection; the selection is resolved first so only valid combinations are drawn
  router.get('/chart', (req, res) => {
    try {
      const choice = queryString(req.query.choice)
      const selection = resolveSelection(context, {
        filter: queryString(req.query.filter),
        question: queryString(req.query.question),
        choice: choice ?? null,
        disaggregation: queryString(req.query.disaggregation)
      })
      const figure = renderChart(context, selection.state)
      return res.json({ selection, figure })
    } catch (error) {
      console.error('Render chart error:', error)
      return res.status(500).json({ error: 'Failed to render chart', message: errorMessage(error) })
    }
  })

  return router
}
