import { createDashboardConfig, WORKFORCE_BUCKET_ORDER, type DashboardConfigInput } from '../../config/dashboard.js'
import { AggregateStore } from '../aggregateStore.js'
import { createDashboardContext } from '../dashboardContext.js'

export const YES = 'Yes (currently or at some point in time)'
export const NO = 'No, never'

export const fixtureConfigInput: DashboardConfigInput = {
  title: 'Test Dashboard',
  filterLabel: 'Filter by Q8 Response:',
  filterName: 'Q8',
  filters: [
    { label: YES, value: YES },
    { label: NO, value: NO }
  ],
  questions: [
    { label: 'Q11 – Policy change', id: '11_Response' },
    { label: 'Q12 – Return to office', id: '12_Response' },
    { label: 'Q15 – Roles', id: '15_' },
    { label: 'Q16 – Benefits', id: '16_' },
    { label: 'Q25 – Reasons for non-adoption', id: '25_' }
  ],
  disaggregations: [
    { label: 'Sector', id: '3_Response' },
    { label: 'Workforce size', id: '7_Response_Bucket' }
  ],
  defaultDisaggregation: '7_Response_Bucket',
  exclusiveQuestions: { [NO]: ['25_'] },
  ordinalOrders: { '7_Response_Bucket': WORKFORCE_BUCKET_ORDER }
}

export const fixtureAggregates = {
  [`${YES}|11_Response|3_Response`]: [
    { category: 'Finance', count: 12, percent: 24.0 },
    { category: 'Retail', count: 8, percent: 16.0 }
  ],
  [`${YES}|11_Response|7_Response_Bucket`]: [
    { Count: 5, Percent: 50, '7_Response_Bucket': 'Large (250+)', '11_Response': 'More flexible' },
    { Count: 2, Percent: 20, '7_Response_Bucket': 'Micro (1–9)', '11_Response': 'More flexible' },
    { Count: 3, Percent: 30, '7_Response_Bucket': 'Small (10–49)', '11_Response': 'Less flexible' },
    { Count: 4, Percent: 40, '7_Response_Bucket': 'Medium (50–249)', '11_Response': 'More flexible' }
  ],
  [`${YES}|15_Managers|7_Response_Bucket`]: [
    { category: 'Small (10–49)', count: 6, percent: 60 },
    { category: 'Micro (1–9)', count: 1, percent: 12.5 }
  ],
  [`${YES}|15_Administrative staff|3_Response`]: [
    { category: 'Retail', count: 3, percent: 30 }
  ],
  [`${NO}|25_Cost|7_Response_Bucket`]: [
    { category: 'Micro (1–9)', count: 4, percent: 0.4 }
  ]
}

export const buildFixtureContext = (overrides: Partial<DashboardConfigInput> = {}) =>
  createDashboardContext(
    createDashboardConfig({ ...fixtureConfigInput, ...overrides }),
    AggregateStore.fromJSON(fixtureAggregates)
  )
