import { describe, expect, it } from 'vitest'
import { DependencyTracker, noopTracker } from '../dependencyTracker'
import { ViewTree } from '../viewTree'

function setup() {
  const tree = new ViewTree()
  const tracker = new DependencyTracker((slot) => tree.node(slot))
  return { tree, tracker }
}

describe('DependencyTracker', () => {
  it('credits reads to the innermost scope only', () => {
    const { tree, tracker } = setup()
    const outer = tree.create('vstack', 'outer', null)
    const inner = tree.create('text', 'inner', outer.slot)

    tracker.beginTracking(outer.slot)
    tracker.recordRead('title')
    tracker.beginTracking(inner.slot)
    tracker.recordRead('x')
    tracker.endTracking()
    tracker.endTracking()

    expect(Array.from(inner.reads)).toEqual(['x'])
    expect(Array.from(outer.reads)).toEqual(['title'])
  })

  it('counts a write as a read of the same path', () => {
    const { tree, tracker } = setup()
    const node = tree.create('button', 'b', null)
    tracker.track(node.slot, () => {
      tracker.recordWrite('count')
      tracker.recordLocalWrite('draft')
    })
    expect(Array.from(node.writes)).toEqual(['count'])
    expect(Array.from(node.reads)).toEqual(['count'])
    expect(Array.from(node.localWrites)).toEqual(['draft'])
    expect(Array.from(node.localReads)).toEqual(['draft'])
  })

  it('ignores records made outside any scope', () => {
    const { tree, tracker } = setup()
    const node = tree.create('text', 't', null)
    tracker.recordRead('stray')
    expect(node.reads.size).toBe(0)
    expect(tracker.currentSlot).toBeUndefined()
  })

  it('closes the scope when the tracked function throws', () => {
    const { tree, tracker } = setup()
    const node = tree.create('text', 't', null)
    expect(() =>
      tracker.track(node.slot, () => {
        throw new Error('boom')
      }),
    ).toThrow('boom')
    expect(tracker.scopeDepth).toBe(0)
  })

  it('rejects unknown nodes and unbalanced ends', () => {
    const { tracker } = setup()
    expect(() => tracker.beginTracking(3)).toThrow('tracking_unknown_node:3')
    expect(() => tracker.endTracking()).toThrow('tracking_unbalanced_end')
  })

  it('has a no-op counterpart that still runs tracked work', () => {
    expect(noopTracker.active).toBe(false)
    expect(noopTracker.track(0, () => 42)).toBe(42)
    noopTracker.recordRead('x')
    noopTracker.endTracking()
  })
})
