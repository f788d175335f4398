import type { DashboardConfig } from '../config/dashboard.js'
import { compareCodeUnits } from '../utils/aggregateKey.js'
import type { AggregateStore } from './aggregateStore.js'

export interface SingleSelectField {
  kind: 'single'
  id: string
  label: string
}

export interface MultiSelectField {
  kind: 'multi'
  id: string
  label: string
  /** Choice identifiers found in the store, sorted. */
  choices: readonly string[]
}

export type Field = SingleSelectField | MultiSelectField

export const isMultiSelectId = (id: string, delimiter: string): boolean => id.endsWith(delimiter)

/**
 * Choice identifiers of a multi-select question: every field segment in the
 * store that extends the question identifier.
 */
export function discoverChoices(store: AggregateStore, questionId: string): string[] {
  const choices = store
    .fieldIdentifiers()
    .filter(fieldId => fieldId.length > questionId.length && fieldId.startsWith(questionId))
  return choices.sort(compareCodeUnits)
}

/**
 * Resolve the question catalog against the store once, so multi-select
 * families are declared instead of rediscovered on every selection.
 */
export function buildFieldCatalog(config: DashboardConfig, store: AggregateStore): Field[] {
  const fields = config.questions.map((question): Field => {
    if (!isMultiSelectId(question.id, config.multiSelectDelimiter)) {
      return Object.freeze({ kind: 'single', id: question.id, label: question.label })
    }

    const choices = Object.freeze(discoverChoices(store, question.id))
    if (choices.length === 0) {
      console.warn(`No aggregates found for multi-select question ${question.id}`)
    }
    return Object.freeze({ kind: 'multi', id: question.id, label: question.label, choices })
  })
  return fields
}

export const findField = (fields: readonly Field[], id: string): Field | undefined =>
  fields.find(field => field.id === id)

export function subChoiceOptions(fields: readonly Field[], id: string): readonly string[] {
  const field = findField(fields, id)
  return field?.kind === 'multi' ? field.choices : []
}

/** Display label of a choice: its identifier without the question prefix. */
export const choiceLabel = (questionId: string, choiceId: string): string =>
  choiceId.startsWith(questionId) ? choiceId.slice(questionId.length) : choiceId
