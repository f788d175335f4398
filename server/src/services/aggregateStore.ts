import { readFileSync } from 'fs'
import { compareCodeUnits, DEFAULT_KEY_SEPARATOR, parseAggregateKey } from '../utils/aggregateKey.js'

export interface AggregateRecord {
  category: string
  count: number
  percent: number
  level?: string
}

export class DataLoadError extends Error {
  constructor(message: string, readonly path?: string, options?: { cause?: unknown }) {
    super(path ? `${message} (${path})` : message, options)
    this.name = 'DataLoadError'
  }
}

type RawRecord = Record<string, unknown>

const isPlainObject = (value: unknown): value is RawRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const pickNumber = (row: RawRecord, ...names: string[]): number | undefined => {
  for (const name of names) {
    const value = row[name]
    if (typeof value === 'number' && Number.isFinite(value)) return value
  }
  return undefined
}

const pickLabel = (row: RawRecord, ...names: string[]): string | undefined => {
  for (const name of names) {
    const value = row[name]
    if (typeof value === 'string') return value
    if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  }
  return undefined
}

/**
 * Normalize one row. Accepts the canonical `{ category, count, percent, level }`
 * shape and the upstream export shape, where the category and level sit under
 * the disaggregation and field identifiers and the numbers under `Count`/`Percent`.
 */
export function normalizeRecord(
  row: unknown,
  fieldId: string,
  disaggregationId: string
): AggregateRecord | null {
  if (!isPlainObject(row)) return null

  const category = pickLabel(row, 'category', disaggregationId)
  const count = pickNumber(row, 'count', 'Count')
  const percent = pickNumber(row, 'percent', 'Percent')
  if (category === undefined || count === undefined || percent === undefined) return null
  if (count < 0 || !Number.isInteger(count)) return null
  if (percent < 0 || percent > 100) return null

  const level = pickLabel(row, 'level', fieldId)
  const record: AggregateRecord = { category, count, percent }
  if (level !== undefined) {
    record.level = level
  }
  return Object.freeze(record)
}

/**
 * Read-only view over the pre-aggregated survey tables.
 */
export class AggregateStore {
  private readonly entries: ReadonlyMap<string, readonly AggregateRecord[]>
  private readonly sortedKeys: readonly string[]
  private readonly fieldSegments: ReadonlyMap<string, string>

  constructor(
    entries: Map<string, readonly AggregateRecord[]>,
    readonly separator: string = DEFAULT_KEY_SEPARATOR
  ) {
    const fieldSegments = new Map<string, string>()
    for (const key of entries.keys()) {
      const parts = parseAggregateKey(key, separator)
      if (!parts) {
        throw new DataLoadError(`Malformed aggregate key "${key}"`)
      }
      fieldSegments.set(key, parts.fieldId)
    }

    this.entries = entries
    this.fieldSegments = fieldSegments
    this.sortedKeys = Object.freeze([...entries.keys()].sort(compareCodeUnits))
    Object.freeze(this)
  }

  get size(): number {
    return this.entries.size
  }

  get(key: string): readonly AggregateRecord[] | undefined {
    return this.entries.get(key)
  }

  has(key: string): boolean {
    return this.entries.has(key)
  }

  keys(): readonly string[] {
    return this.sortedKeys
  }

  /**
   * Keys whose field segment starts with `prefix`, in sorted order.
   */
  keysWithPrefix(prefix: string): string[] {
    return this.sortedKeys.filter(key => {
      const fieldId = this.fieldSegments.get(key)
      return fieldId !== undefined && fieldId.startsWith(prefix)
    })
  }

  fieldIdentifiers(): string[] {
    return [...new Set(this.fieldSegments.values())].sort(compareCodeUnits)
  }

  static fromJSON(raw: unknown, separator: string = DEFAULT_KEY_SEPARATOR, path?: string): AggregateStore {
    if (!isPlainObject(raw)) {
      throw new DataLoadError('Aggregate file must contain a JSON object', path)
    }

    const entries = new Map<string, readonly AggregateRecord[]>()
    for (const [key, rows] of Object.entries(raw)) {
      const parts = parseAggregateKey(key, separator)
      if (!parts) {
        throw new DataLoadError(`Malformed aggregate key "${key}"`, path)
      }
      if (!Array.isArray(rows)) {
        throw new DataLoadError(`Aggregate "${key}" must be a list of records`, path)
      }

      const records = rows.map((row, index) => {
        const record = normalizeRecord(row, parts.fieldId, parts.disaggregationId)
        if (!record) {
          throw new DataLoadError(`Invalid record ${index} in aggregate "${key}"`, path)
        }
        return record
      })
      entries.set(key, Object.freeze(records))
    }

    return new AggregateStore(entries, separator)
  }
}

/**
 * Load the aggregate file once. Any failure is a DataLoadError; the server
 * must not start without its data.
 */
export function loadAggregateStore(path: string, separator: string = DEFAULT_KEY_SEPARATOR): AggregateStore {
  let content: string
  try {
    content = readFileSync(path, 'utf-8')
  } catch (error) {
    throw new DataLoadError('Aggregate file could not be read', path, { cause: error })
  }

  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    throw new DataLoadError('Aggregate file is not valid JSON', path, { cause: error })
  }

  const store = AggregateStore.fromJSON(raw, separator, path)
  console.log(`Loaded ${store.size} aggregates from ${path}`)
  return store
}
