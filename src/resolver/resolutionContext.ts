import { evaluate, interpolate, type StateReader } from '../bindings/evalExpr'
import type { Component, Document, SectionLayoutConfig } from '../document/documentTypes'
import type { RenderNode, SectionConfig, SectionType } from '../ir/irTypes'
import type { Registry } from '../registry/registry'
import { getAtPath, rootKey } from '../state/keypath'
import type { StateStore } from '../state/stateStore'
import { stateValuesEqual, type StateMap, type StateValue } from '../state/stateValue'
import type { StyleResolver } from '../styles/styleResolver'
import { noopTracker, type DependencyTracking } from '../tracking/dependencyTracker'
import type { ViewTree } from '../tracking/viewTree'

export type ComponentResolver = (args: { component: Component; context: ResolutionContext }) => RenderNode

/** Optional override for how a section layout type is configured. */
export type SectionLayoutConfigResolver = (args: {
  config: SectionLayoutConfig
  context: ResolutionContext
}) => { sectionType: SectionType; config: SectionConfig }

// Shared by every context derived within one resolution pass.
type PassState = {
  document: Document
  styleResolver: StyleResolver
  stateStore: StateStore
  componentRegistry: Registry<ComponentResolver>
  sectionConfigRegistry?: Registry<SectionLayoutConfigResolver>
  tracker: DependencyTracking
  viewTree: ViewTree | null
  log: (msg: string) => void
  idCounts: Map<string, number>
}

export type ResolutionContextInit = Omit<PassState, 'tracker' | 'viewTree' | 'idCounts'> & {
  tracking?: { tracker: DependencyTracking; viewTree: ViewTree }
}

/**
 * Per-level view of a resolution pass. Never mutated: descending into children
 * or a loop body derives a new context. Reads through it check loop variables
 * first, then global state (recorded with the active tracker).
 */
export class ResolutionContext implements StateReader {
  private constructor(
    private readonly pass: PassState,
    readonly parentViewNode: number | null,
    readonly iterationVariables: Readonly<Record<string, StateValue>>,
  ) {}

  static create(init: ResolutionContextInit): ResolutionContext {
    const { tracking, ...rest } = init
    return new ResolutionContext(
      {
        ...rest,
        tracker: tracking?.tracker ?? noopTracker,
        viewTree: tracking?.viewTree ?? null,
        idCounts: new Map(),
      },
      null,
      {},
    )
  }

  get document(): Document {
    return this.pass.document
  }

  get styleResolver(): StyleResolver {
    return this.pass.styleResolver
  }

  get stateStore(): StateStore {
    return this.pass.stateStore
  }

  get componentRegistry(): Registry<ComponentResolver> {
    return this.pass.componentRegistry
  }

  get sectionConfigRegistry(): Registry<SectionLayoutConfigResolver> | undefined {
    return this.pass.sectionConfigRegistry
  }

  get tracker(): DependencyTracking {
    return this.pass.tracker
  }

  get viewTree(): ViewTree | null {
    return this.pass.viewTree
  }

  get isTracking(): boolean {
    return this.pass.tracker.active
  }

  get log(): (msg: string) => void {
    return this.pass.log
  }

  withParent(slot: number | null): ResolutionContext {
    if (slot === null || slot === this.parentViewNode) return this
    return new ResolutionContext(this.pass, slot, this.iterationVariables)
  }

  withIterationVariables(vars: Record<string, StateValue>): ResolutionContext {
    return new ResolutionContext(this.pass, this.parentViewNode, { ...this.iterationVariables, ...vars })
  }

  /** Copy of the loop variables in scope; `undefined` outside any loop. */
  bindingScope(): StateMap | undefined {
    return Object.keys(this.iterationVariables).length > 0 ? { ...this.iterationVariables } : undefined
  }

  // --- state reading ---

  getValue(path: string): StateValue | undefined {
    const root = rootKey(path)
    if (root !== undefined && Object.hasOwn(this.iterationVariables, root)) {
      const value = this.iterationVariables[root]
      return value === undefined ? undefined : getAtPath(path, { [root]: value })
    }
    this.pass.tracker.recordRead(path)
    return this.pass.stateStore.get(path)
  }

  getArray(path: string): StateValue[] | undefined {
    const v = this.getValue(path)
    return Array.isArray(v) ? v : undefined
  }

  arrayContains(path: string, value: StateValue): boolean {
    return this.getArray(path)?.some((item) => stateValuesEqual(item, value)) ?? false
  }

  getArrayCount(path: string): number {
    return this.getArray(path)?.length ?? 0
  }

  interpolate(template: string): string {
    return interpolate(template, this)
  }

  evaluate(expression: string): StateValue | undefined {
    return evaluate(expression, this)
  }

  // --- view nodes ---

  /** Opens a view node under the current parent; `null` when tracking is off. */
  beginViewNode(kind: string, id: string, localState?: StateMap): number | null {
    const tree = this.pass.viewTree
    if (!tree) return null
    return tree.create(kind, id, this.parentViewNode, localState ?? {}).slot
  }

  /** Runs content resolution inside the node's tracking scope. */
  trackContent<T>(slot: number | null, fn: () => T): T {
    return slot === null ? fn() : this.pass.tracker.track(slot, fn)
  }

  getLocal(slot: number | null, path: string): StateValue | undefined {
    if (slot === null) return undefined
    return this.pass.viewTree?.getLocal(slot, path, this.pass.tracker)
  }

  nextId(kind: string): string {
    const n = (this.pass.idCounts.get(kind) ?? 0) + 1
    this.pass.idCounts.set(kind, n)
    return `${kind}_${n}`
  }
}
