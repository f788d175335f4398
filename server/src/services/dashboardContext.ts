import type { DashboardConfig } from '../config/dashboard.js'
import type { AggregateStore } from './aggregateStore.js'
import { buildFieldCatalog, type Field } from './fieldCatalog.js'

/**
 * Everything the resolver and renderer read. Built once at startup and
 * shared by every request.
 */
export interface DashboardContext {
  readonly config: DashboardConfig
  readonly store: AggregateStore
  readonly fields: readonly Field[]
}

export function createDashboardContext(config: DashboardConfig, store: AggregateStore): DashboardContext {
  return Object.freeze({
    config,
    store,
    fields: Object.freeze(buildFieldCatalog(config, store))
  })
}
