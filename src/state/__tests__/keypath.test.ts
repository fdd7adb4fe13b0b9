import { describe, expect, it } from 'vitest'
import { canonicalKeypath, getAtPath, parentPaths, parseKeypath, rootKey, setAtPath } from '../keypath'
import { stateValuesEqual, stringifyValue, toStateValue, type StateValue } from '../stateValue'

describe('parseKeypath', () => {
  it('splits keys and indices', () => {
    expect(parseKeypath('user.tags[0].label')).toEqual([
      { kind: 'key', key: 'user' },
      { kind: 'key', key: 'tags' },
      { kind: 'index', index: 0 },
      { kind: 'key', key: 'label' },
    ])
  })

  it('treats numeric dotted segments as indices', () => {
    expect(parseKeypath('items.2')).toEqual(parseKeypath('items[2]'))
  })

  it('skips empty segments, non-numeric brackets and stops at an unclosed bracket', () => {
    expect(parseKeypath('a..b')).toEqual([
      { kind: 'key', key: 'a' },
      { kind: 'key', key: 'b' },
    ])
    expect(parseKeypath('a[x].b')).toEqual([
      { kind: 'key', key: 'a' },
      { kind: 'key', key: 'b' },
    ])
    expect(parseKeypath('a[1')).toEqual([{ kind: 'key', key: 'a' }])
    expect(parseKeypath('')).toEqual([])
  })
})

describe('getAtPath', () => {
  const state = { user: { name: 'Ada', tags: ['x', 'y'] }, count: 0 }

  it('reads nested values', () => {
    expect(getAtPath('user.name', state)).toBe('Ada')
    expect(getAtPath('user.tags[1]', state)).toBe('y')
    expect(getAtPath('user.tags.0', state)).toBe('x')
    expect(getAtPath('count', state)).toBe(0)
  })

  it('returns undefined for missing or mismatched paths', () => {
    expect(getAtPath('user.age', state)).toBeUndefined()
    expect(getAtPath('user.tags[5]', state)).toBeUndefined()
    expect(getAtPath('count.value', state)).toBeUndefined()
    expect(getAtPath('', state)).toBeUndefined()
    expect(getAtPath('toString', state)).toBeUndefined()
  })
})

describe('setAtPath', () => {
  it('writes without touching the input and shares untouched branches', () => {
    const other = { keep: true }
    const before = { user: { name: 'Ada' }, other }
    const after = setAtPath('user.name', 'Grace', before)
    expect(after).toEqual({ user: { name: 'Grace' }, other: { keep: true } })
    expect(before.user.name).toBe('Ada')
    expect(after.other).toBe(other)
  })

  it('creates intermediates and pads arrays with null', () => {
    expect(setAtPath('list[2].name', 'c', {})).toEqual({ list: [null, null, { name: 'c' }] })
    expect(setAtPath('a.b.c', 1, { a: 5 })).toEqual({ a: { b: { c: 1 } } })
  })

  it('removes a map key on undefined but keeps null in array slots', () => {
    expect(setAtPath('a.b', undefined, { a: { b: 1, c: 2 } })).toEqual({ a: { c: 2 } })
    expect(setAtPath('xs[0]', undefined, { xs: [1, 2] })).toEqual({ xs: [null, 2] })
  })

  it('ignores paths without a key', () => {
    const state = { a: 1 }
    expect(setAtPath('', 2, state)).toBe(state)
    expect(setAtPath('[0]', 2, state)).toBe(state)
  })
})

describe('get after set', () => {
  const values: [string, StateValue][] = [
    ['int', 42],
    ['double', 2.5],
    ['string', 'hello'],
    ['bool', false],
    ['null', null],
    ['array', [1, 'two', [3]]],
    ['map', { a: 1, nested: { b: [true] } }],
  ]
  const paths = ['a.b.c', 'list[2].value', 'grid[1][0]', 'rows.1.cell']

  for (const path of paths) {
    it.each(values)(`reads back a %s written at ${path}`, (_kind, value) => {
      expect(getAtPath(path, setAtPath(path, value, {}))).toEqual(value)
      expect(getAtPath(path, setAtPath(path, value, { a: 'x', list: [0], grid: [[9]] }))).toEqual(value)
    })
  }

  it('keeps __proto__ as an ordinary key', () => {
    const state = setAtPath('__proto__', 'x', {})
    expect(getAtPath('__proto__', state)).toBe('x')
    expect(Object.getPrototypeOf(state)).toBe(Object.prototype)
    expect(getAtPath('meta.__proto__.flag', setAtPath('meta.__proto__.flag', true, {}))).toBe(true)
  })
})

describe('path helpers', () => {
  it('lists dotted ancestors and the root key', () => {
    expect(parentPaths('a.b.c')).toEqual(['a', 'a.b'])
    expect(parentPaths('a')).toEqual([])
    expect(parentPaths('tags[0].name')).toEqual(['tags', 'tags[0]'])
    expect(canonicalKeypath('tags[0].name')).toBe('tags.0.name')
    expect(rootKey('items[0].name')).toBe('items')
    expect(rootKey('[0]')).toBeUndefined()
  })
})

describe('state values', () => {
  it('converts plain data and drops what JSON cannot hold', () => {
    expect(toStateValue({ a: 1, f: () => 1, n: [1, Number.NaN, 'x'] })).toEqual({ a: 1, n: [1, null, 'x'] })
    expect(toStateValue(Number.POSITIVE_INFINITY)).toBeUndefined()
  })

  it('compares structurally', () => {
    expect(stateValuesEqual({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] })).toBe(true)
    expect(stateValuesEqual([1, 2], [2, 1])).toBe(false)
    expect(stateValuesEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false)
    expect(stateValuesEqual(null, undefined)).toBe(false)
  })

  it('stringifies for display', () => {
    expect(stringifyValue(undefined)).toBe('')
    expect(stringifyValue(null)).toBe('')
    expect(stringifyValue(3.5)).toBe('3.5')
    expect(stringifyValue(false)).toBe('false')
    expect(stringifyValue(['a', 1])).toBe('["a",1]')
  })
})
