import { describe, test, expect, beforeAll, afterAll, vi } from 'vitest'
import { surveyDashboardConfig } from '../../config/dashboard.js'
import type { DashboardContext } from '../dashboardContext.js'
import {
  initialSelection,
  questionCatalogFor,
  resolveSelection,
  type SelectionState
} from '../selectionResolver.js'
import { buildFixtureContext, NO, YES } from './fixtures.js'

describe('selection resolver', () => {
  let context: DashboardContext
  let consoleWarnSpy: ReturnType<typeof vi.spyOn>

  beforeAll(() => {
    consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
    context = buildFixtureContext()
  })

  afterAll(() => {
    consoleWarnSpy.mockRestore()
  })

  test('initial selection uses the first filter, first question and default disaggregation', () => {
    const resolved = initialSelection(context)

    expect(resolved.state).toEqual({
      filter: YES,
      question: '11_Response',
      choice: null,
      disaggregation: '7_Response_Bucket'
    })
    expect(resolved.questionOptions.map(o => o.value)).toEqual(['11_Response', '12_Response', '15_', '16_'])
    expect(resolved.choiceVisible).toBe(false)
    expect(resolved.choiceOptions).toEqual([])
  })

  test('a filter with exclusive questions restricts the catalog to them', () => {
    const resolved = resolveSelection(context, initialSelection(context).state, { control: 'filter', value: NO })

    expect(resolved.questionOptions).toEqual([{ label: 'Q25 – Reasons for non-adoption', value: '25_' }])
    expect(resolved.state).toEqual({
      filter: NO,
      question: '25_',
      choice: '25_Cost',
      disaggregation: '7_Response_Bucket'
    })
    expect(resolved.choiceVisible).toBe(true)
  })

  test('switching back resets a question that is no longer offered to the first entry', () => {
    const previous: SelectionState = { filter: NO, question: '25_', choice: '25_Cost', disaggregation: '3_Response' }

    const resolved = resolveSelection(context, previous, { control: 'filter', value: YES })

    expect(resolved.state).toEqual({
      filter: YES,
      question: '11_Response',
      choice: null,
      disaggregation: '3_Response'
    })
  })

  test('changing an unrelated control keeps the selected question', () => {
    const previous: SelectionState = { filter: YES, question: '12_Response', choice: null, disaggregation: '7_Response_Bucket' }

    const resolved = resolveSelection(context, previous, { control: 'disaggregation', value: '3_Response' })

    expect(resolved.state.question).toBe('12_Response')
    expect(resolved.state.disaggregation).toBe('3_Response')
  })

  test('selecting a multi-select question exposes its choices and defaults to the first', () => {
    const resolved = resolveSelection(context, initialSelection(context).state, { control: 'question', value: '15_' })

    expect(resolved.choiceVisible).toBe(true)
    expect(resolved.choiceOptions).toEqual([
      { label: 'Administrative staff', value: '15_Administrative staff' },
      { label: 'Managers', value: '15_Managers' }
    ])
    expect(resolved.state.choice).toBe('15_Administrative staff')
  })

  test('keeps a valid choice and replaces an invalid one', () => {
    const previous: SelectionState = { filter: YES, question: '15_', choice: '15_Managers', disaggregation: '7_Response_Bucket' }

    expect(resolveSelection(context, previous, { control: 'disaggregation', value: '3_Response' }).state.choice)
      .toBe('15_Managers')
    expect(resolveSelection(context, previous, { control: 'choice', value: '16_Lower costs' }).state.choice)
      .toBe('15_Administrative staff')
  })

  test('leaving a multi-select question hides and clears the choice', () => {
    const previous: SelectionState = { filter: YES, question: '15_', choice: '15_Managers', disaggregation: '7_Response_Bucket' }

    const resolved = resolveSelection(context, previous, { control: 'question', value: '12_Response' })

    expect(resolved.state.choice).toBeNull()
    expect(resolved.choiceVisible).toBe(false)
    expect(resolved.choiceOptions).toEqual([])
  })

  test('a multi-select question without aggregates shows an empty choice list', () => {
    const resolved = resolveSelection(context, {}, { control: 'question', value: '16_' })

    expect(resolved.state.question).toBe('16_')
    expect(resolved.state.choice).toBeNull()
    expect(resolved.choiceVisible).toBe(true)
    expect(resolved.choiceOptions).toEqual([])
  })

  test('unknown values fall back to defaults', () => {
    const resolved = resolveSelection(context, {
      filter: 'Maybe',
      question: '25_',
      choice: '25_Cost',
      disaggregation: 'region'
    })

    expect(resolved.state).toEqual({
      filter: YES,
      question: '11_Response',
      choice: null,
      disaggregation: '7_Response_Bucket'
    })
  })

  test('a null value for a required control leaves it unchanged', () => {
    const previous: SelectionState = { filter: YES, question: '12_Response', choice: null, disaggregation: '3_Response' }

    expect(resolveSelection(context, previous, { control: 'question', value: null }).state).toEqual(previous)
  })

  test('a resolved state is a fixed point', () => {
    const inputs: Partial<SelectionState>[] = [
      {},
      { filter: NO },
      { question: '15_', choice: '15_Managers' },
      { question: '16_' },
      { filter: YES, question: '25_', disaggregation: '3_Response' }
    ]

    for (const input of inputs) {
      const first = resolveSelection(context, input)
      const second = resolveSelection(context, first.state)
      expect(second).toEqual(first)
    }
  })

  test('identical inputs give identical output', () => {
    const previous: SelectionState = { filter: YES, question: '15_', choice: null, disaggregation: '3_Response' }

    const a = resolveSelection(context, previous, { control: 'filter', value: YES })
    const b = resolveSelection(context, previous, { control: 'filter', value: YES })

    expect(JSON.stringify(a)).toBe(JSON.stringify(b))
  })

  test('does not mutate the previous state', () => {
    const previous: SelectionState = { filter: YES, question: '12_Response', choice: null, disaggregation: '3_Response' }

    resolveSelection(context, previous, { control: 'filter', value: NO })

    expect(previous).toEqual({ filter: YES, question: '12_Response', choice: null, disaggregation: '3_Response' })
  })
})

describe('questionCatalogFor', () => {
  test('shows Q25 only to respondents who never adopted remote work', () => {
    const never = questionCatalogFor(surveyDashboardConfig, 'No, never')
    const adopted = questionCatalogFor(surveyDashboardConfig, 'Yes (currently or at some point in time)')

    expect(never.map(q => q.id)).toEqual(['25_'])
    expect(adopted).toHaveLength(25)
    expect(adopted.some(q => q.id === '25_')).toBe(false)
    expect(adopted[0].id).toBe('11_Response')
  })
})
