import { describe, expect, it } from 'vitest'
import { Registry } from '../registry'

describe('Registry', () => {
  it('registers handlers by kind, last write wins', () => {
    const registry = new Registry<() => string>().register('a', () => 'first').register('a', () => 'second')
    expect(registry.get('a')?.()).toBe('second')
    expect(registry.has('b')).toBe(false)
    expect(registry.get('b')).toBeUndefined()
  })

  it('lists and removes kinds', () => {
    const registry = new Registry<number>([
      ['b', 2],
      ['a', 1],
    ])
    expect(registry.kinds()).toEqual(['a', 'b'])
    registry.unregister('a')
    expect(registry.kinds()).toEqual(['b'])
  })

  it('layers another registry on top of a copy', () => {
    const base = new Registry<number>([
      ['a', 1],
      ['b', 2],
    ])
    const merged = base.merging(new Registry<number>([['b', 20]]))
    expect(merged.get('b')).toBe(20)
    expect(merged.get('a')).toBe(1)
    expect(base.get('b')).toBe(2)
  })
})
