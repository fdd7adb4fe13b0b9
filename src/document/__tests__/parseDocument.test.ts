import { describe, expect, it } from 'vitest'
import { isProbablyDocument } from '../documentTypes'
import { parseDocument } from '../parseDocument'

describe('parseDocument', () => {
  it('accepts a minimal document', () => {
    const result = parseDocument({ id: 'home', root: { children: [] } })
    expect(result.ok).toBe(true)
  })

  it('reports the path of each problem', () => {
    const result = parseDocument({ root: { children: [] } })
    expect(result).toMatchObject({ ok: false, error: 'id Required' })
  })

  it('rejects reserved layout types that do not parse as layouts', () => {
    const result = parseDocument({ id: 'home', root: { children: [{ type: 'vstack' }] } })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toMatch(/^root\.children\.0 /)
  })

  it('parses nested layouts, loops and components', () => {
    const result = parseDocument({
      id: 'list',
      state: { todos: [] },
      root: {
        children: [
          {
            type: 'vstack',
            spacing: 4,
            children: [
              { type: 'text', text: 'Todos' },
              { type: 'forEach', items: 'todos', template: { type: 'text', text: '${item}' } },
              { type: 'spacer', minLength: 8 },
            ],
          },
        ],
      },
    })
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.root.children[0]).toMatchObject({ type: 'vstack', spacing: 4 })
  })

  it('turns unknown action types into custom actions', () => {
    const result = parseDocument({
      id: 'a',
      actions: {
        save: { type: 'setState', path: 'saved', value: true },
        bump: { type: 'setState', path: 'n', value: { $expr: 'n + 1' } },
        track: { type: 'analytics', event: 'tap' },
      },
      root: { children: [] },
    })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.actions).toEqual({
      save: { type: 'setState', path: 'saved', value: true },
      bump: { type: 'setState', path: 'n', value: { $expr: 'n + 1' } },
      track: { type: 'custom', actionType: 'analytics', parameters: { event: 'tap' } },
    })
  })

  it('rejects malformed built-in actions', () => {
    const result = parseDocument({ id: 'a', actions: { bad: { type: 'setState' } }, root: { children: [] } })
    expect(result.ok).toBe(false)
  })
})

describe('isProbablyDocument', () => {
  it('checks for an id and a root object', () => {
    expect(isProbablyDocument({ id: 'x', root: {} })).toBe(true)
    expect(isProbablyDocument({ id: 'x' })).toBe(false)
    expect(isProbablyDocument([])).toBe(false)
    expect(isProbablyDocument(null)).toBe(false)
  })
})
