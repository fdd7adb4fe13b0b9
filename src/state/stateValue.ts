export type DocumentValue = string | number | boolean | null

export type StateValue = DocumentValue | StateValue[] | StateMap

export type StateMap = { [key: string]: StateValue }

export function isStateMap(v: StateValue | undefined): v is StateMap {
  return Boolean(v && typeof v === 'object' && !Array.isArray(v))
}

export function asNumber(v: StateValue | undefined): number | undefined {
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined
}

export function asBoolean(v: StateValue | undefined): boolean | undefined {
  return typeof v === 'boolean' ? v : undefined
}

export function asString(v: StateValue | undefined): string | undefined {
  return typeof v === 'string' ? v : undefined
}

export function asArray(v: StateValue | undefined): StateValue[] | undefined {
  return Array.isArray(v) ? v : undefined
}

// Structural conversion from arbitrary JS data. Functions, symbols, bigints and
// non-finite numbers are not representable.
/** Writes an own data property, so keys such as `__proto__` stay ordinary keys. */
export function setOwn(map: StateMap, key: string, value: StateValue): void {
  Object.defineProperty(map, key, { value, writable: true, enumerable: true, configurable: true })
}

export function toStateValue(v: unknown): StateValue | undefined {
  if (v === null) return null
  if (typeof v === 'string' || typeof v === 'boolean') return v
  if (typeof v === 'number') return Number.isFinite(v) ? v : undefined
  if (Array.isArray(v)) {
    const out: StateValue[] = []
    for (const item of v) out.push(toStateValue(item) ?? null)
    return out
  }
  if (typeof v === 'object') {
    const out: StateMap = {}
    for (const [k, item] of Object.entries(v)) {
      const converted = toStateValue(item)
      if (converted !== undefined) setOwn(out, k, converted)
    }
    return out
  }
  return undefined
}

export function stateValuesEqual(a: StateValue | undefined, b: StateValue | undefined): boolean {
  if (a === b) return true
  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false
    return a.every((item, i) => stateValuesEqual(item, b[i]))
  }
  if (isStateMap(a)) {
    if (!isStateMap(b)) return false
    const keys = Object.keys(a)
    if (keys.length !== Object.keys(b).length) return false
    return keys.every((k) => k in b && stateValuesEqual(a[k], b[k]))
  }
  return false
}

/** Display form used by templates: null and undefined render as the empty string. */
export function stringifyValue(v: StateValue | undefined): string {
  if (v === undefined || v === null) return ''
  if (typeof v === 'string') return v
  if (typeof v === 'number' || typeof v === 'boolean') return String(v)
  return JSON.stringify(v)
}
