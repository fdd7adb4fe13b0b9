import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { createLogBuffer } from '../../logging/log'
import { StateStore } from '../stateStore'

describe('StateStore', () => {
  it('reads and writes by keypath', () => {
    const store = new StateStore({ initial: { user: { name: 'Ada' } } })
    store.set('user.email', 'ada@example.com')
    expect(store.get('user')).toEqual({ name: 'Ada', email: 'ada@example.com' })
    expect(store.getValue('user.name')).toBe('Ada')
  })

  it('marks the written path and its ancestors dirty', () => {
    const store = new StateStore()
    store.set('form.address.city', 'Oslo')
    expect(store.hasDirtyPaths()).toBe(true)
    expect(store.consumeDirtyPaths()).toEqual(new Set(['form.address.city', 'form', 'form.address']))
    expect(store.hasDirtyPaths()).toBe(false)
  })

  it('treats a path as dirty when a descendant changed', () => {
    const store = new StateStore()
    store.set('items[0]', 'a')
    expect(store.isDirty('items')).toBe(true)
    expect(store.isDirty('items[0]')).toBe(true)
    expect(store.isDirty('item')).toBe(false)
  })

  it('dirties bracketed ancestors of an element write', () => {
    const store = new StateStore({ initial: { items: [{ name: 'a' }] } })
    store.set('items[0].name', 'b')
    expect(store.consumeDirtyPaths()).toEqual(new Set(['items[0].name', 'items', 'items[0]']))
  })

  it('initialize replaces values without dirtying them', () => {
    const store = new StateStore()
    store.set('a', 1)
    store.initialize({ b: 2 })
    expect(store.get('a')).toBeUndefined()
    expect(store.get('b')).toBe(2)
    expect(store.hasDirtyPaths()).toBe(false)
  })

  it('notifies callbacks with old and new values, even for unchanged writes', () => {
    const store = new StateStore({ initial: { count: 1 } })
    const seen: [string, unknown, unknown][] = []
    const id = store.onStateChange((path, oldValue, newValue) => seen.push([path, oldValue, newValue]))
    expect(id).toBe(1)

    store.set('count', 2)
    store.set('count', 2)
    store.removeStateChangeCallback(id)
    store.set('count', 3)

    expect(seen).toEqual([
      ['count', 1, 2],
      ['count', 2, 2],
    ])
  })

  it('re-enters callbacks for writes made inside a callback', () => {
    const store = new StateStore()
    const order: string[] = []
    store.onStateChange((path) => {
      order.push(`a:${path}`)
      if (path === 'x') store.set('y', 1)
    })
    store.onStateChange((path) => order.push(`b:${path}`))

    store.set('x', 1)
    expect(order).toEqual(['a:x', 'a:y', 'b:y', 'b:x'])
  })

  it('removeAllCallbacks silences every callback', () => {
    const store = new StateStore()
    let calls = 0
    store.onStateChange(() => calls++)
    store.onStateChange(() => calls++)
    store.removeAllCallbacks()
    store.set('a', 1)
    expect(calls).toBe(0)
  })

  it('edits arrays', () => {
    const store = new StateStore({ initial: { tags: ['a', 'b', 'a'] } })
    expect(store.arrayContains('tags', 'b')).toBe(true)
    expect(store.getArrayCount('tags')).toBe(3)
    expect(store.getArrayCount('missing')).toBe(0)

    store.removeFromArray('tags', 'a')
    expect(store.get('tags')).toEqual(['b'])

    store.appendToArray('tags', 'c')
    store.toggleInArray('tags', 'b')
    store.toggleInArray('tags', 'd')
    expect(store.get('tags')).toEqual(['c', 'd'])

    store.removeFromArrayAt('tags', 0)
    store.removeFromArrayAt('tags', 9)
    expect(store.get('tags')).toEqual(['d'])
  })

  it('compares array members structurally', () => {
    const store = new StateStore({ initial: { picks: [{ id: 1 }] } })
    expect(store.arrayContains('picks', { id: 1 })).toBe(true)
    store.toggleInArray('picks', { id: 1 })
    expect(store.get('picks')).toEqual([])
  })

  it('snapshots and restores', () => {
    const store = new StateStore({ initial: { a: 1 } })
    const snap = store.snapshot()
    store.set('a', 2)
    store.clearDirtyPaths()

    let calls = 0
    store.onStateChange(() => calls++)
    store.restore(snap)
    expect(store.get('a')).toBe(1)
    expect(store.consumeDirtyPaths()).toEqual(new Set(['a']))
    expect(calls).toBe(0)
  })

  it('notifies whole-map subscribers', () => {
    const store = new StateStore()
    const seen: unknown[] = []
    const unsubscribe = store.subscribe((values) => seen.push(values))
    store.set('a', 1)
    unsubscribe()
    store.set('a', 2)
    expect(seen).toEqual([{ a: 1 }])
  })

  it('evaluates and interpolates against its values', () => {
    const store = new StateStore({ initial: { count: 4, name: 'Ada' } })
    expect(store.evaluate('count')).toBe(4)
    expect(store.interpolate('Hi ${name}, ${count} left')).toBe('Hi Ada, 4 left')
  })

  describe('typed bridging', () => {
    const Settings = z.object({ theme: z.string(), fontSize: z.number() })

    it('round-trips plain objects', () => {
      const store = new StateStore()
      store.setTyped('settings', { theme: 'dark', fontSize: 14 })
      expect(store.get('settings.theme')).toBe('dark')
      expect(store.getTyped('settings', Settings)).toEqual({ theme: 'dark', fontSize: 14 })
    })

    it('returns undefined when the stored shape does not match', () => {
      const store = new StateStore({ initial: { settings: { theme: 'dark' } } })
      expect(store.getTyped('settings', Settings)).toBeUndefined()
      expect(store.getTypedAt('nothing', Settings)).toBeUndefined()
    })

    it('writes at nested paths and encodes dates as strings', () => {
      const store = new StateStore()
      store.setTypedAt('meta.created', new Date(Date.UTC(2024, 0, 2)))
      expect(store.get('meta.created')).toBe('2024-01-02T00:00:00.000Z')
    })

    it('logs and skips values that cannot be encoded', () => {
      const buffer = createLogBuffer()
      const store = new StateStore({ log: buffer.sink })
      store.setTyped('big', 10n)
      expect(store.get('big')).toBeUndefined()
      expect(store.hasDirtyPaths()).toBe(false)
      expect(buffer.lines()).toHaveLength(1)
      expect(buffer.lines()[0]).toMatch(/^\[state\] typed write to big skipped: /)
    })
  })
})
