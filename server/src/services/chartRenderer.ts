import type { DashboardConfig } from '../config/dashboard.js'
import { buildAggregateKey } from '../utils/aggregateKey.js'
import type { AggregateRecord } from './aggregateStore.js'
import type { DashboardContext } from './dashboardContext.js'
import { choiceLabel, findField } from './fieldCatalog.js'
import type { SelectionState } from './selectionResolver.js'

export const NO_DATA_TITLE = 'No data available for this selection.'
export const NO_DATA_TEXT = 'No data'
const BACKGROUND = '#f8f9fc'

// Plain Plotly figure JSON; the client hands it to react-plotly.js unchanged.
export interface BarTrace {
  type: 'bar'
  orientation: 'h'
  name?: string
  showlegend: boolean
  x: number[]
  y: string[]
  text: string[]
  customdata: number[]
  textposition: 'inside'
  insidetextanchor: 'middle'
  hovertemplate: string
}

export interface ChartAxis {
  title?: { text: string }
  range?: [number, number]
  categoryorder?: 'array'
  categoryarray?: string[]
  autorange?: 'reversed'
  visible?: boolean
}

export interface ChartAnnotation {
  text: string
  showarrow: false
  xref: 'paper'
  yref: 'paper'
  x: number
  y: number
  font: { size: number; color: string }
}

export interface ChartLayout {
  title: { text: string }
  barmode?: 'stack'
  xaxis: ChartAxis
  yaxis: ChartAxis
  legend?: {
    orientation: 'h'
    yanchor: 'bottom'
    y: number
    xanchor: 'left'
    x: number
    title: { text: string }
  }
  annotations?: ChartAnnotation[]
  margin: { t: number; b: number; l: number; r: number }
  autosize: boolean
  plot_bgcolor: string
  paper_bgcolor: string
}

export interface ChartFigure {
  data: BarTrace[]
  layout: ChartLayout
  /** True when the selection has no aggregate and the figure only says so. */
  placeholder: boolean
}

export function aggregateKeyFor(config: DashboardConfig, state: SelectionState): string {
  const multiSelect = state.question.endsWith(config.multiSelectDelimiter)
  const fieldId = multiSelect && state.choice ? state.choice : state.question
  return buildAggregateKey(
    { filterValue: state.filter, fieldId, disaggregationId: state.disaggregation },
    config.keySeparator
  )
}

export const formatSegmentLabel = (record: AggregateRecord, threshold: number = 0): string =>
  record.percent < threshold ? '' : `${record.percent.toFixed(1)}% (${record.count})`

/**
 * Stable sort by a fixed category order; categories outside it keep their
 * relative order after the known ones.
 */
export function orderByCategory(records: readonly AggregateRecord[], order: readonly string[]): AggregateRecord[] {
  const rank = (category: string) => {
    const index = order.indexOf(category)
    return index === -1 ? order.length : index
  }
  return records
    .map((record, position) => ({ record, position }))
    .sort((a, b) => rank(a.record.category) - rank(b.record.category) || a.position - b.position)
    .map(({ record }) => record)
}

const categoryAxisFor = (records: readonly AggregateRecord[], title: string, order?: readonly string[]): ChartAxis => {
  if (!order) return { title: { text: title } }

  const extras: string[] = []
  for (const record of records) {
    if (!order.includes(record.category) && !extras.includes(record.category)) {
      extras.push(record.category)
    }
  }
  return {
    title: { text: title },
    categoryorder: 'array',
    categoryarray: [...order, ...extras],
    autorange: 'reversed'
  }
}

const buildTrace = (records: readonly AggregateRecord[], threshold: number, name?: string): BarTrace => ({
  type: 'bar',
  orientation: 'h',
  ...(name !== undefined ? { name } : {}),
  showlegend: name !== undefined,
  x: records.map(r => r.percent),
  y: records.map(r => r.category),
  text: records.map(r => formatSegmentLabel(r, threshold)),
  customdata: records.map(r => r.count),
  textposition: 'inside',
  insidetextanchor: 'middle',
  hovertemplate: `%{y}${name !== undefined ? ' – %{fullData.name}' : ''}<br>%{x:.1f}% (%{customdata})<extra></extra>`
})

const groupByLevel = (records: readonly AggregateRecord[]): Map<string | undefined, AggregateRecord[]> => {
  const groups = new Map<string | undefined, AggregateRecord[]>()
  for (const record of records) {
    const group = groups.get(record.level)
    if (group) {
      group.push(record)
    } else {
      groups.set(record.level, [record])
    }
  }
  return groups
}

const baseLayout = (title: string): Pick<ChartLayout, 'title' | 'margin' | 'autosize' | 'plot_bgcolor' | 'paper_bgcolor'> => ({
  title: { text: title },
  margin: { t: 140, b: 40, l: 40, r: 40 },
  autosize: true,
  plot_bgcolor: BACKGROUND,
  paper_bgcolor: BACKGROUND
})

export function renderPlaceholder(): ChartFigure {
  return {
    data: [],
    layout: {
      ...baseLayout(NO_DATA_TITLE),
      xaxis: { visible: false },
      yaxis: { visible: false },
      annotations: [{
        text: NO_DATA_TEXT,
        showarrow: false,
        xref: 'paper',
        yref: 'paper',
        x: 0.5,
        y: 0.5,
        font: { size: 18, color: '#999' }
      }]
    },
    placeholder: true
  }
}

/**
 * Build the figure for a resolved selection. A selection without an
 * aggregate yields the placeholder figure.
 */
export function renderChart(context: DashboardContext, state: SelectionState): ChartFigure {
  const { config, store, fields } = context
  const records = store.get(aggregateKeyFor(config, state))
  if (!records) {
    return renderPlaceholder()
  }

  const field = findField(fields, state.question)
  const questionLabel = field?.label ?? state.question
  const disaggregationLabel =
    config.disaggregations.find(d => d.id === state.disaggregation)?.label ?? state.disaggregation
  const order = config.ordinalOrders[state.disaggregation]
  const ordered = order ? orderByCategory(records, order) : [...records]

  const legend: ChartLayout['legend'] = {
    orientation: 'h',
    yanchor: 'bottom',
    y: 1.02,
    xanchor: 'left',
    x: 0,
    title: { text: '' }
  }

  if (field?.kind === 'multi' && state.choice) {
    return {
      data: [buildTrace(ordered, config.labelThreshold)],
      layout: {
        ...baseLayout(`${choiceLabel(field.id, state.choice)} by ${disaggregationLabel}`),
        xaxis: { title: { text: 'Percentage of respondents' }, range: [0, 100] },
        yaxis: categoryAxisFor(ordered, disaggregationLabel, order),
        legend
      },
      placeholder: false
    }
  }

  const traces = [...groupByLevel(ordered)].map(([level, group]) =>
    buildTrace(group, config.labelThreshold, level)
  )

  return {
    data: traces,
    layout: {
      ...baseLayout(`${questionLabel} by ${disaggregationLabel} (${config.filterName}=${state.filter})`),
      barmode: 'stack',
      xaxis: { title: { text: 'Percentage of responses' } },
      yaxis: categoryAxisFor(ordered, disaggregationLabel, order),
      legend
    },
    placeholder: false
  }
}
