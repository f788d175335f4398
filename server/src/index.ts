import { createApp } from './app.js'
import { surveyDashboardConfig } from './config/dashboard.js'
import { loadServerSettings } from './config/server.js'
import { DataLoadError, loadAggregateStore } from './services/aggregateStore.js'
import { createDashboardContext } from './services/dashboardContext.js'

const settings = loadServerSettings()

try {
  const store = loadAggregateStore(settings.aggregatesPath, surveyDashboardConfig.keySeparator)
  const context = createDashboardContext(surveyDashboardConfig, store)
  const app = createApp(context)

  app.listen(settings.port, () => {
    console.log(`Survey dashboard API listening on http://localhost:${settings.port}`)
  })
} catch (error) {
  if (error instanceof DataLoadError) {
    console.error('Failed to load survey aggregates:', error.message)
  } else {
    console.error('Failed to start server:', error)
  }
  process.exit(1)
}
