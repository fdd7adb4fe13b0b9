import { describe, expect, it } from 'vitest'
import { createLogBuffer } from '../../logging/log'
import { mergeStyles, resolvePadding, StyleResolver } from '../styleResolver'

describe('StyleResolver', () => {
  it('merges a parent style under the child', () => {
    const resolver = new StyleResolver({
      A: { textColor: 'red' },
      B: { inherits: 'A', fontSize: 10 },
    })
    expect(resolver.resolve('B')).toEqual({ textColor: 'red', fontSize: 10 })
  })

  it('lets the child win and walks multiple levels', () => {
    const resolver = new StyleResolver({
      base: { textColor: 'black', fontSize: 12, fontWeight: 'regular' },
      title: { inherits: 'base', fontSize: 20, fontWeight: 'bold' },
      hero: { inherits: 'title', textColor: 'white' },
    })
    expect(resolver.resolve('hero')).toEqual({ textColor: 'white', fontSize: 20, fontWeight: 'bold' })
  })

  it('stops at a repeated style instead of recursing forever', () => {
    const buffer = createLogBuffer()
    const resolver = new StyleResolver(
      {
        A: { inherits: 'A', fontSize: 10 },
        B: { inherits: 'C', textColor: 'blue' },
        C: { inherits: 'B', fontSize: 8 },
      },
      { log: buffer.sink },
    )
    expect(resolver.resolve('A')).toEqual({ fontSize: 10 })
    expect(resolver.resolve('B')).toEqual({ textColor: 'blue', fontSize: 8 })
    expect(buffer.lines()).toEqual(['[styles] inheritance cycle at A', '[styles] inheritance cycle at B'])
  })

  it('returns an empty style for missing ids and warns only in strict mode', () => {
    const buffer = createLogBuffer()
    expect(new StyleResolver({}, { log: buffer.sink }).resolve('nope')).toEqual({})
    expect(buffer.lines()).toEqual([])

    new StyleResolver({}, { log: buffer.sink, strict: true }).resolve('nope')
    expect(buffer.lines()).toEqual(['[styles] warn: missing style nope'])
    expect(new StyleResolver().resolve(undefined)).toEqual({})
  })

  it('delegates prefixed ids to the design system without a local fallback', () => {
    const resolver = new StyleResolver(
      { primary: { textColor: 'local' }, card: { inherits: '@surface', cornerRadius: 8 } },
      { designSystem: { resolveStyle: (name) => (name === 'primary' ? { textColor: '#0050ff' } : name === 'surface' ? { backgroundColor: '#fff' } : undefined) } },
    )
    expect(resolver.resolve('@primary')).toEqual({ textColor: '#0050ff' })
    expect(resolver.resolve('@missing')).toEqual({})
    expect(resolver.resolve('card')).toEqual({ backgroundColor: '#fff', cornerRadius: 8 })
  })

  it('applies inline overrides last', () => {
    const resolver = new StyleResolver({ body: { textColor: 'gray', fontSize: 14 } })
    expect(resolver.resolveWith('body', { textColor: 'red' })).toEqual({ textColor: 'red', fontSize: 14 })
    expect(resolver.resolveWith(undefined, { inherits: 'body', fontSize: 18 })).toEqual({ textColor: 'gray', fontSize: 18 })
    expect(resolver.resolveWith('body')).toEqual({ textColor: 'gray', fontSize: 14 })
  })
})

describe('mergeStyles', () => {
  it('clears an inherited shadow with an empty one', () => {
    expect(mergeStyles({ shadow: { radius: 4 }, fontSize: 12 }, { shadow: {} })).toEqual({ fontSize: 12 })
  })
})

describe('resolvePadding', () => {
  it('falls back from sides to axes to zero', () => {
    expect(resolvePadding({ horizontal: 8, top: 2 })).toEqual({ top: 2, leading: 8, bottom: 0, trailing: 8 })
    expect(resolvePadding()).toEqual({ top: 0, leading: 0, bottom: 0, trailing: 0 })
  })
})
