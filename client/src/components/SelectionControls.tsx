import React from 'react'
import type { Option, ResolvedSelection, SelectionControl } from '../types'

interface SelectionControlsProps {
  filterLabel: string
  filters: Option[]
  disaggregations: Option[]
  selection: ResolvedSelection
  disabled?: boolean
  onChange: (control: SelectionControl, value: string) => void
}

const labelStyle: React.CSSProperties = {
  color: '#1f2c56',
  fontWeight: 600,
  fontSize: '15px',
  marginBottom: '6px',
  textAlign: 'center',
  display: 'block'
}

const selectStyle: React.CSSProperties = {
  width: '100%',
  maxWidth: '650px',
  margin: '5px auto',
  backgroundColor: '#ffffff',
  border: '1px solid #d1d3e0',
  borderRadius: '8px',
  padding: '10px 12px',
  fontSize: '14px',
  color: '#1f2c56',
  boxShadow: '0 2px 6px rgba(0,0,0,0.05)'
}

export default function SelectionControls({
  filterLabel,
  filters,
  disaggregations,
  selection,
  disabled = false,
  onChange
}: SelectionControlsProps) {
  const { state, questionOptions, choiceVisible, choiceOptions } = selection

  return (
    <div className="selection-controls">
      <fieldset style={{ border: 'none', marginBottom: '20px' }} disabled={disabled}>
        <legend style={labelStyle}>{filterLabel}</legend>
        <div style={{ display: 'flex', justifyContent: 'center', gap: '1rem' }}>
          {filters.map(option => (
            <label key={option.value} style={{ cursor: 'pointer' }}>
              <input
                type="radio"
                name="filter"
                value={option.value}
                checked={state.filter === option.value}
                onChange={() => onChange('filter', option.value)}
              />
              {' '}{option.label}
            </label>
          ))}
        </div>
      </fieldset>

      <div>
        <label htmlFor="question-select" style={labelStyle}>Select question to analyze:</label>
        <select
          id="question-select"
          style={selectStyle}
          value={state.question}
          disabled={disabled}
          onChange={e => onChange('question', e.target.value)}
        >
          {questionOptions.map(option => (
            <option key={option.value} value={option.value}>{option.label}</option>
          ))}
        </select>
      </div>

      {choiceVisible && (
        <div>
          <label htmlFor="choice-select" style={labelStyle}>Select option within multi-select question:</label>
          <select
            id="choice-select"
            style={selectStyle}
            value={state.choice ?? ''}
            disabled={disabled || choiceOptions.length === 0}
            onChange={e => onChange('choice', e.target.value)}
          >
            {choiceOptions.length === 0 && <option value="">No options available</option>}
            {choiceOptions.map(option => (
              <option key={option.value} value={option.value}>{option.label}</option>
            ))}
          </select>
        </div>
      )}

      <div style={{ marginBottom: '20px' }}>
        <label htmlFor="disaggregation-select" style={labelStyle}>Disaggregate by:</label>
        <select
          id="disaggregation-select"
          style={selectStyle}
          value={state.disaggregation}
          disabled={disabled}
          onChange={e => onChange('disaggregation', e.target.value)}
        >
          {disaggregations.map(option => (
            <option key={option.value} value={option.value}>{option.label}</option>
          ))}
        </select>
      </div>
    </div>
  )
}
