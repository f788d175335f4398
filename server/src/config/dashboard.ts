import { DEFAULT_KEY_SEPARATOR } from '../utils/aggregateKey.js'

export interface LabeledOption {
  label: string
  value: string
}

export interface QuestionDefinition {
  label: string
  id: string
}

export interface DisaggregationDefinition {
  label: string
  id: string
}

export interface DashboardConfig {
  readonly title: string
  readonly filterLabel: string
  /** Short name of the filter question, used in chart titles. */
  readonly filterName: string
  readonly filters: readonly LabeledOption[]
  readonly questions: readonly QuestionDefinition[]
  readonly disaggregations: readonly DisaggregationDefinition[]
  readonly defaultDisaggregation: string
  /** Filter value -> the only questions shown for it. Listed questions are hidden for other filters. */
  readonly exclusiveQuestions: Readonly<Record<string, readonly string[]>>
  /** Disaggregation id -> fixed display order of its categories. */
  readonly ordinalOrders: Readonly<Record<string, readonly string[]>>
  readonly multiSelectDelimiter: string
  readonly keySeparator: string
  /** Segments below this percent are drawn without a text label. */
  readonly labelThreshold: number
}

export type DashboardConfigInput = Omit<
  DashboardConfig,
  'defaultDisaggregation' | 'exclusiveQuestions' | 'ordinalOrders' | 'multiSelectDelimiter' | 'keySeparator' | 'labelThreshold' | 'title' | 'filterLabel' | 'filterName'
> & Partial<DashboardConfig>

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const nested of Object.values(value)) {
      deepFreeze(nested)
    }
  }
  return value
}

const assertUnique = (values: readonly string[], what: string) => {
  const seen = new Set<string>()
  for (const value of values) {
    if (seen.has(value)) {
      throw new Error(`Duplicate ${what} "${value}" in dashboard config`)
    }
    seen.add(value)
  }
}

/**
 * Build the immutable configuration handed to the resolver and the renderer.
 */
export function createDashboardConfig(input: DashboardConfigInput): DashboardConfig {
  if (input.filters.length === 0) throw new Error('Dashboard config needs at least one filter value')
  if (input.questions.length === 0) throw new Error('Dashboard config needs at least one question')
  if (input.disaggregations.length === 0) throw new Error('Dashboard config needs at least one disaggregation')

  assertUnique(input.filters.map(f => f.value), 'filter value')
  assertUnique(input.questions.map(q => q.id), 'question id')
  assertUnique(input.disaggregations.map(d => d.id), 'disaggregation id')

  const questionIds = new Set(input.questions.map(q => q.id))
  const exclusiveQuestions = input.exclusiveQuestions ?? {}
  for (const [filterValue, ids] of Object.entries(exclusiveQuestions)) {
    if (ids.length === 0) {
      throw new Error(`Exclusive question list for filter "${filterValue}" is empty`)
    }
    const unknown = ids.find(id => !questionIds.has(id))
    if (unknown !== undefined) {
      throw new Error(`Exclusive question "${unknown}" for filter "${filterValue}" is not in the catalog`)
    }
  }

  const exclusiveIds = new Set(Object.values(exclusiveQuestions).flat())
  if (input.questions.every(q => exclusiveIds.has(q.id))) {
    throw new Error('Every question is exclusive to a filter; the general catalog would be empty')
  }

  const defaultDisaggregation = input.defaultDisaggregation ?? input.disaggregations[0].id
  if (!input.disaggregations.some(d => d.id === defaultDisaggregation)) {
    throw new Error(`Default disaggregation "${defaultDisaggregation}" is not in the catalog`)
  }

  return deepFreeze({
    title: input.title ?? 'Survey Dashboard',
    filterLabel: input.filterLabel ?? 'Filter',
    filterName: input.filterName ?? 'Filter',
    filters: input.filters.map(f => ({ ...f })),
    questions: input.questions.map(q => ({ ...q })),
    disaggregations: input.disaggregations.map(d => ({ ...d })),
    defaultDisaggregation,
    exclusiveQuestions: Object.fromEntries(
      Object.entries(exclusiveQuestions).map(([filterValue, ids]) => [filterValue, [...ids]])
    ),
    ordinalOrders: Object.fromEntries(
      Object.entries(input.ordinalOrders ?? {}).map(([id, order]) => [id, [...order]])
    ),
    multiSelectDelimiter: input.multiSelectDelimiter ?? '_',
    keySeparator: input.keySeparator ?? DEFAULT_KEY_SEPARATOR,
    labelThreshold: input.labelThreshold ?? 0
  })
}

export const WORKFORCE_BUCKET_ORDER = [
  'Micro (1–9)',
  'Small (10–49)',
  'Medium (50–249)',
  'Large (250+)'
] as const

export const ADOPTED_FILTER = 'Yes (currently or at some point in time)'
export const NEVER_ADOPTED_FILTER = 'No, never'

/**
 * Catalog of the remote/hybrid work survey.
 */
export const surveyDashboardConfig = createDashboardConfig({
  title: 'Remote/Hybrid Work Survey Dashboard',
  filterLabel: 'Filter by Q8 Response:',
  filterName: 'Q8',
  filters: [
    { label: ADOPTED_FILTER, value: ADOPTED_FILTER },
    { label: NEVER_ADOPTED_FILTER, value: NEVER_ADOPTED_FILTER }
  ],
  questions: [
    { label: 'Q11 – Policy change since pandemic', id: '11_Response' },
    { label: 'Q12 – Likelihood of return-to-office', id: '12_Response' },
    { label: 'Q13 – Proportion working remotely', id: '13_Response' },
    { label: 'Q14 – Frequency of WFH', id: '14_Response' },
    { label: 'Q15 – Roles in organization - multi-select', id: '15_' },
    { label: 'Q16 – Benefits of WFH - multi-select', id: '16_' },
    { label: 'Q17 – Difficulties in Management - multi-select', id: '17_' },
    { label: 'Q18 – Impact: Productivity', id: '18_Productivity' },
    { label: 'Q18 – Impact: Innovation', id: '18_Innovation' },
    { label: 'Q18 – Impact: Staff recruitment and retention', id: '18_Staff recruitment and retention' },
    { label: 'Q18 – Impact: Staff wellbeing', id: '18_Staff wellbeing' },
    { label: 'Q18 – Impact: Training and career development', id: '18_Training and career development' },
    { label: 'Q18 – Impact: Team collaboration', id: '18_Team collaboration' },
    { label: 'Q18 – Impact: Overall business growth', id: '18_Overall business growth' },
    { label: 'Q19 – Idea development and collaboration', id: '19_Idea development and collaboration (e.g. brainstorming, informal knowledge sharing)' },
    { label: 'Q19 – Speed and implementation of innovation', id: '19_Speed and implementation of innovation (e.g. introduction of new products or services)' },
    { label: 'Q19 – Adoption of new technologies/tools', id: '19_Adoption of new technologies or tools' },
    { label: 'Q19 – Access to external collaborators', id: '19_Access to external collaborators (e.g. partners, clients)' },
    { label: 'Q19 – Access to new talent/skills', id: '19_Access to new talent or innovation-related skills' },
    { label: 'Q19 – Other (please select/specify)', id: '19_Other (please select and specify below)' },
    { label: 'Q19 – Other (please specify)', id: '19_Other (please specify)' },
    { label: 'Q20 – Barriers to scaling - multi-select', id: '20_' },
    { label: 'Q21 – Technologies of enablement - multi-select', id: '21_' },
    { label: 'Q23 – Barriers to scaling - multi-select', id: '23_' },
    { label: 'Q24 – Adoption of AI impact on remote work - multi-select', id: '24_' },
    { label: 'Q25 – Reasons for non-adoption - multi-select', id: '25_' }
  ],
  disaggregations: [
    { label: 'Years since business incorporated', id: '2_Response' },
    { label: 'Sector', id: '3_Response' },
    { label: 'Workforce size (Q7 buckets)', id: '7_Response_Bucket' }
  ],
  defaultDisaggregation: '7_Response_Bucket',
  exclusiveQuestions: {
    [NEVER_ADOPTED_FILTER]: ['25_']
  },
  ordinalOrders: {
    '7_Response_Bucket': WORKFORCE_BUCKET_ORDER
  }
})
