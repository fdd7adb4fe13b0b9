import { describe, expect, it } from 'vitest'
import { Resolver } from '../../resolver/resolver'
import { counterDocument, flags } from '../../resolver/__tests__/testDocuments'
import { StateStore } from '../../state/stateStore'
import { resolvePadding } from '../../styles/styleResolver'
import { renderTreeToJson, validateRenderTree } from '../renderTreeValidator'
import type { RenderTree } from '../irTypes'

describe('validateRenderTree', () => {
  it('accepts resolved trees', () => {
    const tree = new Resolver(counterDocument(), { config: flags }).resolve()
    const result = validateRenderTree(tree)
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.state).toEqual({ count: 0 })
  })

  it('reports schema violations by instance path', () => {
    const tree: RenderTree = {
      stateStore: new StateStore(),
      actions: {},
      root: {
        kind: 'root',
        colorScheme: 'system',
        edgeInsets: resolvePadding(),
        style: {},
        actions: {},
        children: [{ kind: 'text', id: 't', content: 'x', style: { fontSize: -1 }, padding: resolvePadding() }],
      },
    }
    const result = validateRenderTree(tree)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toContain('/root/children/0/style/fontSize must be >= 0')
  })
})

describe('renderTreeToJson', () => {
  it('replaces the live store with a snapshot', () => {
    const store = new StateStore({ initial: { a: 1 } })
    const tree = new Resolver(counterDocument(), { config: flags }).resolve(store, { initializeFromDocument: false })
    expect(renderTreeToJson(tree).state).toEqual({ a: 1 })
    expect(Object.keys(renderTreeToJson(tree)).sort()).toEqual(['actions', 'root', 'state'])
  })
})
