import React, { useState, useEffect, useRef } from 'react'
import axios from 'axios'
import SelectionControls from '../components/SelectionControls'
import SurveyChart from '../components/SurveyChart'
import api from '../services/api'
import type {
  ChartFigure,
  ChartResponse,
  DashboardConfigResponse,
  ResolvedSelection,
  SelectionChange,
  SelectionControl
} from '../types'
import { chartQueryParams, createFigureCache } from '../utils/selectionHelpers'

const FIGURE_CACHE_MAX_ENTRIES = 20

const headerStyle: React.CSSProperties = {
  color: '#1f2c56',
  textAlign: 'center',
  fontWeight: 700,
  marginBottom: '30px',
  fontFamily: 'Inter, Helvetica, Arial, sans-serif'
}

const bodyStyle: React.CSSProperties = {
  fontFamily: 'Inter, Helvetica, Arial, sans-serif',
  backgroundColor: '#f8f9fc',
  padding: '30px',
  textAlign: 'center',
  minHeight: '100vh',
  boxSizing: 'border-box'
}

const errorStyle: React.CSSProperties = {
  maxWidth: '650px',
  margin: '0 auto 20px',
  padding: '10px 12px',
  borderRadius: '8px',
  background: '#fdecea',
  color: '#b3261e',
  fontSize: '14px'
}

const describeError = (error: unknown): string => {
  if (axios.isAxiosError(error)) {
    const data: unknown = error.response?.data
    if (typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string') {
      return data.error
    }
  }
  return error instanceof Error ? error.message : 'Unexpected error'
}

export default function SurveyDashboard() {
  const [config, setConfig] = useState<DashboardConfigResponse | null>(null)
  const [selection, setSelection] = useState<ResolvedSelection | null>(null)
  const [figure, setFigure] = useState<ChartFigure | null>(null)
  const [loadingChart, setLoadingChart] = useState(false)
  const [resolving, setResolving] = useState(false)
  const [error, setError] = useState<string | null>(null)
  const figureCache = useRef(createFigureCache(FIGURE_CACHE_MAX_ENTRIES))

  // Load catalogs and the initial selection on mount
  useEffect(() => {
    let cancelled = false

    const loadConfig = async () => {
      try {
        const response = await api.get<DashboardConfigResponse>('/dashboard/config')
        if (cancelled) return
        setConfig(response.data)
        setSelection(response.data.selection)
      } catch (err) {
        console.error('Failed to load dashboard config:', err)
        if (!cancelled) setError(`Failed to load dashboard: ${describeError(err)}`)
      }
    }

    void loadConfig()
    return () => {
      cancelled = true
    }
  }, [])

  const state = selection?.state

  // Redraw whenever the resolved selection changes
  useEffect(() => {
    if (!state) return
    let cancelled = false

    const cached = figureCache.current.get(state)
    if (cached) {
      setFigure(cached)
      setLoadingChart(false)
      return
    }

    const loadChart = async () => {
      setLoadingChart(true)
      try {
        const response = await api.get<ChartResponse>('/dashboard/chart', { params: chartQueryParams(state) })
        if (cancelled) return
        figureCache.current.set(state, response.data.figure)
        setFigure(response.data.figure)
        setError(null)
      } catch (err) {
        console.error('Failed to load chart:', err)
        if (!cancelled) setError(`Failed to load chart: ${describeError(err)}`)
      } finally {
        if (!cancelled) setLoadingChart(false)
      }
    }

    void loadChart()
    return () => {
      cancelled = true
    }
  }, [state?.filter, state?.question, state?.choice, state?.disaggregation])

  const handleChange = async (control: SelectionControl, value: string) => {
    if (!selection) return
    const change: SelectionChange = { control, value }

    setResolving(true)
    try {
      const response = await api.post<ResolvedSelection>('/dashboard/resolve', {
        state: selection.state,
        change
      })
      setSelection(response.data)
    } catch (err) {
      console.error('Failed to update selection:', err)
      setError(`Failed to update selection: ${describeError(err)}`)
    } finally {
      setResolving(false)
    }
  }

  return (
    <div style={bodyStyle}>
      <h2 style={headerStyle}>{config?.title ?? 'Survey Dashboard'}</h2>

      {error && <div role="alert" style={errorStyle}>{error}</div>}

      {config && selection ? (
        <>
          <SelectionControls
            filterLabel={config.filterLabel}
            filters={config.filters}
            disaggregations={config.disaggregations}
            selection={selection}
            disabled={resolving}
            onChange={(control, value) => void handleChange(control, value)}
          />
          <SurveyChart figure={figure} loading={loadingChart} />
        </>
      ) : (
        !error && <div style={{ color: '#999' }}>Loading dashboard…</div>
      )}
    </div>
  )
}
