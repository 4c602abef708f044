/**
 * A plain object parsed from YAML or JSON, as opposed to an array or scalar.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
