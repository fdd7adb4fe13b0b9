import { isStateMap, setOwn, type StateMap, type StateValue } from './stateValue'

export type KeypathComponent = { kind: 'key'; key: string } | { kind: 'index'; index: number }

const INDEX_RE = /^\d+$/

/**
 * Splits a keypath such as `user.tags[0].label` into key and index components.
 * `items.0` and `items[0]` parse the same way. Never fails: empty segments are
 * dropped, a non-numeric bracket body is skipped and an unclosed bracket ends parsing.
 */
export function parseKeypath(path: string): KeypathComponent[] {
  const out: KeypathComponent[] = []
  let i = 0
  while (i < path.length) {
    const ch = path[i]
    if (ch === '.') {
      i++
      continue
    }
    if (ch === '[') {
      const close = path.indexOf(']', i)
      if (close === -1) break
      const inner = path.slice(i + 1, close).trim()
      if (INDEX_RE.test(inner)) out.push({ kind: 'index', index: Number(inner) })
      i = close + 1
      continue
    }
    let end = i
    while (end < path.length && path[end] !== '.' && path[end] !== '[') end++
    const segment = path.slice(i, end)
    if (INDEX_RE.test(segment)) out.push({ kind: 'index', index: Number(segment) })
    else out.push({ kind: 'key', key: segment })
    i = end
  }
  return out
}

export function getAtPath(path: string, container: StateMap): StateValue | undefined {
  const components = parseKeypath(path)
  if (components.length === 0) return undefined

  let cur: StateValue | undefined = container
  for (const c of components) {
    if (c.kind === 'key') {
      if (!isStateMap(cur) || !Object.hasOwn(cur, c.key)) return undefined
      cur = cur[c.key]
    } else {
      if (!Array.isArray(cur) || c.index >= cur.length) return undefined
      cur = cur[c.index]
    }
  }
  return cur
}

/**
 * Returns a copy of `container` with `value` written at `path`; untouched branches
 * are shared. Missing or mismatched intermediates become fresh maps or arrays, and
 * arrays are padded with nulls up to the target index. `undefined` removes a map
 * key but leaves an explicit null in an array slot.
 */
export function setAtPath(path: string, value: StateValue | undefined, container: StateMap): StateMap {
  const components = parseKeypath(path)
  let start = 0
  while (components[start]?.kind === 'index') start++
  const first = components[start]
  if (!first || first.kind !== 'key') return container
  return setInMap(container, first.key, components, start, value)
}

function setInMap(
  map: StateMap,
  key: string,
  components: KeypathComponent[],
  i: number,
  value: StateValue | undefined,
): StateMap {
  const out: StateMap = { ...map }
  const next = components[i + 1]
  if (!next) {
    if (value === undefined) delete out[key]
    else setOwn(out, key, value)
    return out
  }
  setOwn(out, key, setChild(Object.hasOwn(map, key) ? map[key] : undefined, next, components, i + 1, value))
  return out
}

function setChild(
  existing: StateValue | undefined,
  component: KeypathComponent,
  components: KeypathComponent[],
  i: number,
  value: StateValue | undefined,
): StateValue {
  if (component.kind === 'key') {
    return setInMap(isStateMap(existing) ? existing : {}, component.key, components, i, value)
  }

  const out: StateValue[] = Array.isArray(existing) ? existing.slice() : []
  while (out.length <= component.index) out.push(null)
  const next = components[i + 1]
  if (!next) {
    out[component.index] = value ?? null
    return out
  }
  out[component.index] = setChild(out[component.index], next, components, i + 1, value)
  return out
}

/**
 * Strict ancestors, outermost first, cut at every `.` and `[` of the path as
 * written: `a.b.c` gives `['a', 'a.b']` and `tags[0].name` gives `['tags', 'tags[0]']`.
 */
export function parentPaths(path: string): string[] {
  const out: string[] = []
  for (let i = 1; i < path.length; i++) {
    const ch = path[i]
    if (ch !== '.' && ch !== '[') continue
    const prefix = path.slice(0, i)
    if (prefix && !prefix.endsWith('.') && out[out.length - 1] !== prefix) out.push(prefix)
  }
  return out
}

/** Dotted form of a keypath, so `items[0].name` and `items.0.name` compare equal. */
export function canonicalKeypath(path: string): string {
  return parseKeypath(path)
    .map((c) => (c.kind === 'key' ? c.key : String(c.index)))
    .join('.')
}

export function rootKey(path: string): string | undefined {
  const first = parseKeypath(path)[0]
  return first?.kind === 'key' ? first.key : undefined
}
