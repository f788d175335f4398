import type { DashboardConfig, LabeledOption, QuestionDefinition } from '../config/dashboard.js'
import type { DashboardContext } from './dashboardContext.js'
import { choiceLabel, findField } from './fieldCatalog.js'

export interface SelectionState {
  filter: string
  question: string
  choice: string | null
  disaggregation: string
}

export type SelectionControl = keyof SelectionState

export interface SelectionChange {
  control: SelectionControl
  value: string | null
}

export interface ResolvedSelection {
  state: SelectionState
  questionOptions: LabeledOption[]
  choiceVisible: boolean
  choiceOptions: LabeledOption[]
}

export const SELECTION_CONTROLS: readonly SelectionControl[] = ['filter', 'question', 'choice', 'disaggregation']

/**
 * Questions visible for a filter value. A filter with exclusive questions sees
 * only those; every other filter sees the catalog minus all exclusive ones.
 * Declaration order is kept.
 */
export function questionCatalogFor(config: DashboardConfig, filter: string): QuestionDefinition[] {
  const exclusive = config.exclusiveQuestions[filter]
  if (exclusive) {
    return config.questions.filter(q => exclusive.includes(q.id))
  }

  const hidden = new Set(Object.values(config.exclusiveQuestions).flat())
  return config.questions.filter(q => !hidden.has(q.id))
}

const applyChange = (
  previous: Partial<SelectionState>,
  change?: SelectionChange
): Partial<SelectionState> => {
  const next: Partial<SelectionState> = { ...previous }
  if (!change) return next

  if (change.control === 'choice') {
    next.choice = change.value
  } else if (change.value !== null) {
    next[change.control] = change.value
  }
  return next
}

/**
 * Compute the next selection from the previous one and the control that
 * changed. Pure and deterministic: the same inputs give the same output, and
 * a resolved state is a fixed point.
 */
export function resolveSelection(
  context: DashboardContext,
  previous: Partial<SelectionState>,
  change?: SelectionChange
): ResolvedSelection {
  const { config, fields } = context
  const draft = applyChange(previous, change)

  const filter = config.filters.find(f => f.value === draft.filter)?.value ?? config.filters[0].value
  const disaggregation =
    config.disaggregations.find(d => d.id === draft.disaggregation)?.id ?? config.defaultDisaggregation

  const catalog = questionCatalogFor(config, filter)
  const questionOptions = catalog.map(q => ({ label: q.label, value: q.id }))
  const question = catalog.find(q => q.id === draft.question)?.id ?? catalog[0].id

  const field = findField(fields, question)
  if (field?.kind !== 'multi') {
    return {
      state: { filter, question, choice: null, disaggregation },
      questionOptions,
      choiceVisible: false,
      choiceOptions: []
    }
  }

  const choiceOptions = field.choices.map(choice => ({ label: choiceLabel(field.id, choice), value: choice }))
  const choice = field.choices.find(c => c === draft.choice) ?? field.choices[0] ?? null

  return {
    state: { filter, question, choice, disaggregation },
    questionOptions,
    choiceVisible: true,
    choiceOptions
  }
}

export const initialSelection = (context: DashboardContext): ResolvedSelection =>
  resolveSelection(context, {})

export const isSelectionControl = (value: unknown): value is SelectionControl =>
  typeof value === 'string' && SELECTION_CONTROLS.some(control => control === value)
