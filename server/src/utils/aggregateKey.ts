/**
 * Helpers for the composite aggregate key convention:
 * `filterValue|fieldIdentifier|disaggregationIdentifier`.
 */

export const DEFAULT_KEY_SEPARATOR = '|'

export interface AggregateKeyParts {
  filterValue: string
  fieldId: string
  disaggregationId: string
}

export function buildAggregateKey(
  parts: AggregateKeyParts,
  separator: string = DEFAULT_KEY_SEPARATOR
): string {
  return [parts.filterValue, parts.fieldId, parts.disaggregationId].join(separator)
}

/**
 * Split a key into its three segments.
 *
 * @returns null when the key does not have exactly three non-empty segments
 */
export function parseAggregateKey(
  key: string,
  separator: string = DEFAULT_KEY_SEPARATOR
): AggregateKeyParts | null {
  if (typeof key !== 'string') return null

  const segments = key.split(separator)
  if (segments.length !== 3) return null
  if (segments.some(segment => segment.length === 0)) return null

  const [filterValue, fieldId, disaggregationId] = segments
  return { filterValue, fieldId, disaggregationId }
}

/**
 * Code unit ordering, so sorted output does not depend on the runtime locale.
 */
export const compareCodeUnits = (a: string, b: string): number => {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
