/** Records which state paths a view node reads and writes while it resolves. */
export type DependencyTracking = {
  readonly active: boolean
  beginTracking: (nodeSlot: number) => void
  endTracking: () => void
  recordRead: (path: string) => void
  recordWrite: (path: string) => void
  recordLocalRead: (path: string) => void
  recordLocalWrite: (path: string) => void
  track: <T>(nodeSlot: number, fn: () => T) => T
}

export type DependencySets = {
  reads: Set<string>
  writes: Set<string>
  localReads: Set<string>
  localWrites: Set<string>
}

export function emptyDependencySets(): DependencySets {
  return { reads: new Set(), writes: new Set(), localReads: new Set(), localWrites: new Set() }
}

type Scope = {
  slot: number
  sets: DependencySets
}

/**
 * Scope-stack tracker. Records go to the innermost open scope only; a read made
 * while a child resolves is never credited to its ancestors.
 */
export class DependencyTracker implements DependencyTracking {
  readonly active = true
  private readonly stack: Scope[] = []

  constructor(private readonly setsFor: (slot: number) => DependencySets | undefined) {}

  get scopeDepth(): number {
    return this.stack.length
  }

  get currentSlot(): number | undefined {
    return this.stack[this.stack.length - 1]?.slot
  }

  beginTracking(nodeSlot: number): void {
    const sets = this.setsFor(nodeSlot)
    if (!sets) throw new Error(`tracking_unknown_node:${nodeSlot}`)
    this.stack.push({ slot: nodeSlot, sets })
  }

  endTracking(): void {
    if (!this.stack.pop()) throw new Error('tracking_unbalanced_end')
  }

  recordRead(path: string): void {
    this.top()?.reads.add(path)
  }

  // A node that writes a path also depends on it.
  recordWrite(path: string): void {
    const sets = this.top()
    if (!sets) return
    sets.writes.add(path)
    sets.reads.add(path)
  }

  recordLocalRead(path: string): void {
    this.top()?.localReads.add(path)
  }

  recordLocalWrite(path: string): void {
    const sets = this.top()
    if (!sets) return
    sets.localWrites.add(path)
    sets.localReads.add(path)
  }

  track<T>(nodeSlot: number, fn: () => T): T {
    this.beginTracking(nodeSlot)
    try {
      return fn()
    } finally {
      this.endTracking()
    }
  }

  private top(): DependencySets | undefined {
    return this.stack[this.stack.length - 1]?.sets
  }
}

export const noopTracker: DependencyTracking = {
  active: false,
  beginTracking: () => {},
  endTracking: () => {},
  recordRead: () => {},
  recordWrite: () => {},
  recordLocalRead: () => {},
  recordLocalWrite: () => {},
  track: (_nodeSlot, fn) => fn(),
}
