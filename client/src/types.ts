import type { Data, Layout } from 'plotly.js'

export interface Option {
  label: string
  value: string
}

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
  questionOptions: Option[]
  choiceVisible: boolean
  choiceOptions: Option[]
}

export interface DashboardConfigResponse {
  title: string
  filterLabel: string
  filters: Option[]
  questions: Option[]
  disaggregations: Option[]
  selection: ResolvedSelection
}

export interface ChartFigure {
  data: Data[]
  layout: Partial<Layout>
  placeholder: boolean
}

export interface ChartResponse {
  selection: ResolvedSelection
  figure: ChartFigure
}
