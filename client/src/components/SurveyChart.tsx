import React from 'react'
import Plot from 'react-plotly.js'
import type { ChartFigure } from '../types'

interface SurveyChartProps {
  figure: ChartFigure | null
  loading?: boolean
}

const containerStyle: React.CSSProperties = {
  marginTop: '30px',
  padding: '20px',
  borderRadius: '10px',
  backgroundColor: '#ffffff',
  boxShadow: '0 4px 12px rgba(0,0,0,0.05)',
  minHeight: '480px',
  position: 'relative'
}

const messageStyle: React.CSSProperties = {
  display: 'flex',
  alignItems: 'center',
  justifyContent: 'center',
  minHeight: '440px',
  color: '#999',
  fontSize: '1rem'
}

export default function SurveyChart({ figure, loading = false }: SurveyChartProps) {
  if (!figure) {
    return (
      <div style={containerStyle}>
        <div style={messageStyle}>{loading ? 'Loading chart…' : 'Select a question to see results'}</div>
      </div>
    )
  }

  // Placeholder figures are drawn by Plotly too; the server lays out the "No data" annotation
  return (
    <div
      style={{ ...containerStyle, opacity: loading ? 0.6 : 1 }}
      data-testid={figure.placeholder ? 'no-data' : undefined}
    >
      <Plot
        data={figure.data}
        layout={figure.layout}
        config={{
          displayModeBar: false,
          responsive: true
        }}
        useResizeHandler
        style={{ width: '100%', height: '480px' }}
      />
    </div>
  )
}
