import { describe, test, expect } from 'vitest'
import { chartQueryParams, createFigureCache, selectionKey } from '../selectionHelpers'
import type { ChartFigure, SelectionState } from '../../types'

const single: SelectionState = {
  filter: 'No, never',
  question: '11_Response',
  choice: null,
  disaggregation: '7_Response_Bucket'
}

const multi: SelectionState = {
  filter: 'Yes (currently or at some point in time)',
  question: '15_',
  choice: '15_Managers',
  disaggregation: '3_Response'
}

const figure = (title: string): ChartFigure => ({
  data: [],
  layout: { title: { text: title } },
  placeholder: true
})

describe('selection helpers', () => {
  test('chartQueryParams omits an inactive choice', () => {
    expect(chartQueryParams(single)).toEqual({
      filter: 'No, never',
      question: '11_Response',
      disaggregation: '7_Response_Bucket'
    })
    expect(chartQueryParams(multi).choice).toBe('15_Managers')
  })

  test('selectionKey distinguishes every control', () => {
    expect(selectionKey(single)).not.toBe(selectionKey({ ...single, disaggregation: '3_Response' }))
    expect(selectionKey(multi)).toBe(selectionKey({ ...multi }))
  })

  test('figure cache drops the oldest entry when full', () => {
    const cache = createFigureCache(2)
    const third: SelectionState = { ...multi, choice: '15_Administrative staff' }

    cache.set(single, figure('single'))
    cache.set(multi, figure('multi'))
    cache.set(third, figure('third'))

    expect(cache.size()).toBe(2)
    expect(cache.get(single)).toBeUndefined()
    expect(cache.get(multi)?.layout.title).toEqual({ text: 'multi' })
    expect(cache.get(third)?.layout.title).toEqual({ text: 'third' })
  })
})
