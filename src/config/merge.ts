function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced, not merged.
 * Undefined values in source are ignored.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target }

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue
    }

    const targetValue = target[key]
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue)
    } else {
      result[key] = sourceValue
    }
  }

  return result
}

/**
 * Set a value at a dot-separated path in an object.
 * Creates intermediate objects as needed.
 */
export function setPath(
  obj: Record<string, unknown>,
  path: string,
  value: unknown
): void {
  const parts = path.split('.')
  let current = obj

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]]
    if (isPlainObject(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[parts[i]] = created
      current = created
    }
  }

  current[parts[parts.length - 1]] = value
}
