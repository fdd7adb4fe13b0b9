import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand'
import type { z } from 'zod'
import { evaluate, interpolate, type StateReader } from '../bindings/evalExpr'
import { silentLogSink, tagged, type LogSink } from '../logging/log'
import { getAtPath, parentPaths, setAtPath } from './keypath'
import { stateValuesEqual, toStateValue, type StateMap, type StateValue } from './stateValue'

export type StateChangeCallback = (
  path: string,
  oldValue: StateValue | undefined,
  newValue: StateValue | undefined,
) => void

export type StateStoreState = {
  values: StateMap
}

export type StateStoreOptions = {
  initial?: StateMap
  log?: LogSink
}

/**
 * Keypath-addressed session state. Writes go through `set`, which records the
 * written path and its ancestors as dirty and then notifies every change callback.
 */
export class StateStore implements StateReader {
  private readonly store: StoreApi<StateStoreState>
  private readonly dirty = new Set<string>()
  private readonly callbacks = new Map<number, StateChangeCallback>()
  private nextCallbackId = 1
  private readonly log: (msg: string) => void

  constructor(options: StateStoreOptions = {}) {
    this.store = createStore<StateStoreState>()(() => ({ values: options.initial ?? {} }))
    this.log = tagged(options.log ?? silentLogSink, 'state')
  }

  /** Replaces all values without marking anything dirty. */
  initialize(values: StateMap): void {
    this.store.setState({ values }, true)
    this.dirty.clear()
  }

  get(path: string): StateValue | undefined {
    return getAtPath(path, this.store.getState().values)
  }

  getValue(path: string): StateValue | undefined {
    return this.get(path)
  }

  getArray(path: string): StateValue[] | undefined {
    const v = this.get(path)
    return Array.isArray(v) ? v : undefined
  }

  getArrayCount(path: string): number {
    return this.getArray(path)?.length ?? 0
  }

  arrayContains(path: string, value: StateValue): boolean {
    return this.getArray(path)?.some((item) => stateValuesEqual(item, value)) ?? false
  }

  set(path: string, value: StateValue | undefined): void {
    const oldValue = this.get(path)
    this.store.setState((s) => ({ values: setAtPath(path, value, s.values) }))

    this.dirty.add(path)
    for (const parent of parentPaths(path)) this.dirty.add(parent)

    for (const cb of Array.from(this.callbacks.values())) cb(path, oldValue, value)
  }

  appendToArray(path: string, value: StateValue): void {
    this.set(path, [...(this.getArray(path) ?? []), value])
  }

  removeFromArray(path: string, value: StateValue): void {
    const items = this.getArray(path)
    if (!items) return
    this.set(
      path,
      items.filter((item) => !stateValuesEqual(item, value)),
    )
  }

  removeFromArrayAt(path: string, index: number): void {
    const items = this.getArray(path)
    if (!items || index < 0 || index >= items.length) return
    this.set(
      path,
      items.filter((_, i) => i !== index),
    )
  }

  toggleInArray(path: string, value: StateValue): void {
    if (this.arrayContains(path, value)) this.removeFromArray(path, value)
    else this.appendToArray(path, value)
  }

  // --- dirty paths ---

  hasDirtyPaths(): boolean {
    return this.dirty.size > 0
  }

  consumeDirtyPaths(): Set<string> {
    const out = new Set(this.dirty)
    this.dirty.clear()
    return out
  }

  clearDirtyPaths(): void {
    this.dirty.clear()
  }

  isDirty(path: string): boolean {
    if (this.dirty.has(path)) return true
    for (const d of this.dirty) {
      if (d.startsWith(`${path}.`) || d.startsWith(`${path}[`)) return true
    }
    return false
  }

  // --- callbacks ---

  /**
   * Registers a callback invoked synchronously on every `set`, including writes of an
   * unchanged value. A callback that calls `set` itself is re-entered before the
   * outer notification loop continues.
   */
  onStateChange(cb: StateChangeCallback): number {
    const id = this.nextCallbackId++
    this.callbacks.set(id, cb)
    return id
  }

  removeStateChangeCallback(id: number): void {
    this.callbacks.delete(id)
  }

  removeAllCallbacks(): void {
    this.callbacks.clear()
  }

  /** Whole-map replacements, for observers that do not need per-path detail. */
  subscribe(listener: (values: StateMap, previous: StateMap) => void): () => void {
    return this.store.subscribe((s, prev) => listener(s.values, prev.values))
  }

  // --- snapshot ---

  snapshot(): StateMap {
    return this.store.getState().values
  }

  restore(snapshot: StateMap): void {
    this.store.setState({ values: snapshot }, true)
    for (const key of Object.keys(snapshot)) this.dirty.add(key)
  }

  // --- expressions ---

  evaluate(expression: string): StateValue | undefined {
    return evaluate(expression, this)
  }

  interpolate(template: string): string {
    return interpolate(template, this)
  }

  // --- typed bridging ---

  getTyped<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
    return this.getTypedAt(key, schema)
  }

  setTyped(key: string, value: unknown): void {
    this.setTypedAt(key, value)
  }

  getTypedAt<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
    const raw = this.get(path)
    if (raw === undefined) return undefined
    const parsed = schema.safeParse(raw)
    return parsed.success ? parsed.data : undefined
  }

  setTypedAt(path: string, value: unknown): void {
    let encoded: StateValue | undefined
    try {
      const json: unknown = JSON.parse(JSON.stringify(value) ?? 'null')
      encoded = toStateValue(json)
    } catch (e) {
      this.log(`typed write to ${path} skipped: ${e instanceof Error ? e.message : String(e)}`)
      return
    }
    if (encoded === undefined) return
    this.set(path, encoded)
  }
}
