import { canonicalKeypath, getAtPath, setAtPath } from '../state/keypath'
import type { StateStore } from '../state/stateStore'
import type { StateMap, StateValue } from '../state/stateValue'
import { emptyDependencySets, type DependencySets, type DependencyTracking } from './dependencyTracker'

export type ViewNode = DependencySets & {
  id: string
  slot: number
  kind: string
  // Lookup only; the arena owns every node.
  parent: number | null
  children: number[]
  localState: StateMap
}

/** Arena of view nodes built alongside the IR when tracking is on. */
export class ViewTree {
  private readonly nodes: ViewNode[] = []

  get size(): number {
    return this.nodes.length
  }

  create(kind: string, id: string, parent: number | null, localState: StateMap = {}): ViewNode {
    const node: ViewNode = {
      id,
      slot: this.nodes.length,
      kind,
      parent,
      children: [],
      localState,
      ...emptyDependencySets(),
    }
    this.nodes.push(node)
    if (parent !== null) this.nodes[parent]?.children.push(node.slot)
    return node
  }

  node(slot: number): ViewNode | undefined {
    return this.nodes[slot]
  }

  all(): readonly ViewNode[] {
    return this.nodes
  }

  roots(): ViewNode[] {
    return this.nodes.filter((n) => n.parent === null)
  }

  parentOf(slot: number): ViewNode | undefined {
    const parent = this.nodes[slot]?.parent
    return parent === null || parent === undefined ? undefined : this.nodes[parent]
  }

  findById(id: string): ViewNode | undefined {
    return this.nodes.find((n) => n.id === id)
  }

  /** Slots from the root down to `slot`, inclusive. */
  pathFromRoot(slot: number): number[] {
    const out: number[] = []
    let cur = this.nodes[slot]
    while (cur) {
      out.unshift(cur.slot)
      cur = cur.parent === null ? undefined : this.nodes[cur.parent]
    }
    return out
  }

  getLocal(slot: number, path: string, tracker?: DependencyTracking): StateValue | undefined {
    const node = this.nodes[slot]
    if (!node) return undefined
    tracker?.recordLocalRead(path)
    return getAtPath(path, node.localState)
  }

  setLocal(slot: number, path: string, value: StateValue | undefined, tracker?: DependencyTracking): void {
    const node = this.nodes[slot]
    if (!node) return
    node.localState = setAtPath(path, value, node.localState)
    tracker?.recordLocalWrite(path)
  }
}

/** Reverse index from state path to the view nodes that read or write it. */
export class DependencyIndex {
  private readonly readers = new Map<string, Set<number>>()
  private readonly writers = new Map<string, Set<number>>()
  private readonly registered = new Map<number, ViewNode>()

  static fromViewTree(tree: ViewTree): DependencyIndex {
    const index = new DependencyIndex()
    index.rebuild(tree)
    return index
  }

  register(node: ViewNode): void {
    this.unregister(node.slot)
    this.registered.set(node.slot, node)
    for (const path of node.reads) addTo(this.readers, path, node.slot)
    for (const path of node.writes) addTo(this.writers, path, node.slot)
  }

  unregister(slot: number): void {
    if (!this.registered.delete(slot)) return
    for (const table of [this.readers, this.writers]) {
      for (const [path, slots] of table) {
        slots.delete(slot)
        if (slots.size === 0) table.delete(path)
      }
    }
  }

  rebuild(tree: ViewTree): void {
    this.readers.clear()
    this.writers.clear()
    this.registered.clear()
    for (const node of tree.all()) this.register(node)
  }

  nodesReading(path: string): Set<number> {
    return new Set(this.readers.get(path))
  }

  nodesWriting(path: string): Set<number> {
    return new Set(this.writers.get(path))
  }

  /**
   * Nodes that read a changed path, one of its ancestors (`user` for `user.name`,
   * `tags` for `tags[0]`) or one of its descendants (`user.name` for `user`).
   * Bracket and dotted indices are treated alike.
   */
  nodesAffectedBy(paths: Iterable<string>): Set<number> {
    const affected = new Set<number>()
    for (const path of paths) {
      const changed = canonicalKeypath(path)
      if (!changed) continue
      for (const [registeredPath, slots] of this.readers) {
        const read = canonicalKeypath(registeredPath)
        if (read === changed || changed.startsWith(`${read}.`) || read.startsWith(`${changed}.`)) {
          slots.forEach((s) => affected.add(s))
        }
      }
    }
    return affected
  }

  describe(): string {
    const lines = ['DependencyIndex:']
    for (const path of Array.from(this.readers.keys()).sort()) {
      const ids = Array.from(this.readers.get(path) ?? [])
        .sort((a, b) => a - b)
        .map((slot) => this.registered.get(slot)?.id ?? `#${slot}`)
      lines.push(`  ${path} <- ${ids.join(', ')}`)
    }
    return lines.join('\n')
  }
}

function addTo(table: Map<string, Set<number>>, path: string, slot: number) {
  const slots = table.get(path)
  if (slots) slots.add(slot)
  else table.set(path, new Set([slot]))
}

/** Turns dirty state paths into the set of view nodes that need re-resolving. */
export class ViewTreeUpdater {
  private readonly pending = new Set<number>()
  private store: StateStore | null = null
  private callbackId: number | null = null

  constructor(
    readonly viewTree: ViewTree,
    readonly index: DependencyIndex,
    private readonly onNodesNeedUpdate?: (slots: Set<number>) => void,
  ) {}

  /** Marks nodes as soon as each write happens, in addition to `processDirtyPaths`. */
  attach(store: StateStore): void {
    this.detach()
    this.store = store
    this.callbackId = store.onStateChange((path) => this.markAffected([path]))
  }

  detach(): void {
    if (this.store && this.callbackId !== null) this.store.removeStateChangeCallback(this.callbackId)
    this.store = null
    this.callbackId = null
  }

  processDirtyPaths(store: StateStore | null = this.store): void {
    if (!store) return
    const dirty = store.consumeDirtyPaths()
    if (dirty.size > 0) this.markAffected(dirty)
  }

  pendingSlots(): Set<number> {
    return new Set(this.pending)
  }

  get hasUpdates(): boolean {
    return this.pending.size > 0
  }

  markNodeUpdated(slot: number): void {
    this.pending.delete(slot)
  }

  clearPendingUpdates(): void {
    this.pending.clear()
  }

  /** Pending nodes that have no pending ancestor. */
  minimalUpdateSet(): Set<number> {
    const out = new Set<number>()
    for (const slot of this.pending) {
      const ancestors = this.viewTree.pathFromRoot(slot).slice(0, -1)
      if (!ancestors.some((a) => this.pending.has(a))) out.add(slot)
    }
    return out
  }

  updatesByDepth(): number[][] {
    const byDepth = new Map<number, number[]>()
    for (const slot of this.pending) {
      const depth = this.viewTree.pathFromRoot(slot).length - 1
      const bucket = byDepth.get(depth) ?? []
      bucket.push(slot)
      byDepth.set(depth, bucket)
    }
    return Array.from(byDepth.keys())
      .sort((a, b) => a - b)
      .map((depth) => (byDepth.get(depth) ?? []).sort((a, b) => a - b))
  }

  private markAffected(paths: Iterable<string>) {
    const affected = this.index.nodesAffectedBy(paths)
    if (affected.size === 0) return
    for (const slot of affected) this.pending.add(slot)
    this.onNodesNeedUpdate?.(affected)
  }
}
