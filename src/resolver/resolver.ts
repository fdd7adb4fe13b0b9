import { getEngineConfig, type EngineFeatureFlags } from '../config/featureFlags'
import type { Document } from '../document/documentTypes'
import type { RenderNode, RenderTree, RootNode } from '../ir/irTypes'
import { consoleLogSink, silentLogSink, tagged, type LogSink } from '../logging/log'
import type { Registry } from '../registry/registry'
import { StateStore } from '../state/stateStore'
import { resolvePadding, StyleResolver, type DesignSystemProvider } from '../styles/styleResolver'
import { DependencyTracker } from '../tracking/dependencyTracker'
import { DependencyIndex, ViewTree, ViewTreeUpdater } from '../tracking/viewTree'
import { resolveActions } from './actionResolver'
import { createDefaultComponentRegistry } from './componentResolvers'
import { resolveRoot } from './layoutResolver'
import { ResolutionContext, type ComponentResolver, type SectionLayoutConfigResolver } from './resolutionContext'
import { ResolutionError } from './resolutionError'

export type ResolverOptions = {
  componentRegistry?: Registry<ComponentResolver>
  sectionConfigRegistry?: Registry<SectionLayoutConfigResolver>
  designSystem?: DesignSystemProvider
  log?: LogSink
  config?: EngineFeatureFlags
}

export type ResolveOptions = {
  initializeFromDocument?: boolean
}

export type TrackedResolution = {
  renderTree: RenderTree
  viewTree: ViewTree
  dependencyIndex: DependencyIndex
  updater: ViewTreeUpdater
}

// The updater of the latest tracking pass on each store; earlier ones are detached.
const attachedUpdaters = new WeakMap<StateStore, ViewTreeUpdater>()

/** Walks a document once per pass and produces its render tree. */
export class Resolver {
  private readonly config: EngineFeatureFlags
  private readonly sink: LogSink
  private readonly log: (msg: string) => void
  private readonly componentRegistry: Registry<ComponentResolver>

  constructor(
    readonly document: Document,
    private readonly options: ResolverOptions = {},
  ) {
    this.config = options.config ?? getEngineConfig()
    this.sink = options.log ?? (this.config.debug ? consoleLogSink : silentLogSink)
    this.log = tagged(this.sink, 'resolver')
    this.componentRegistry = options.componentRegistry ?? createDefaultComponentRegistry()
  }

  get logSink(): LogSink {
    return this.sink
  }

  get trackingByDefault(): boolean {
    return this.config.tracking
  }

  resolve(store?: StateStore, options: ResolveOptions = {}): RenderTree {
    return this.run(this.prepareStore(store, options), undefined)
  }

  /**
   * Resolves while building the view-node tree and its dependency index. The
   * returned updater listens to the store until another tracking pass on the
   * same store supersedes it.
   */
  resolveWithTracking(store?: StateStore, options: ResolveOptions = {}): TrackedResolution {
    const viewTree = new ViewTree()
    const tracker = new DependencyTracker((slot) => viewTree.node(slot))
    const renderTree = this.run(this.prepareStore(store, options), { tracker, viewTree })
    const dependencyIndex = DependencyIndex.fromViewTree(viewTree)
    const updater = new ViewTreeUpdater(viewTree, dependencyIndex)
    attachedUpdaters.get(renderTree.stateStore)?.detach()
    updater.attach(renderTree.stateStore)
    attachedUpdaters.set(renderTree.stateStore, updater)
    return { renderTree, viewTree, dependencyIndex, updater }
  }

  /** Store passed in, or a new one; loaded with the document's initial state. */
  prepareStore(store: StateStore | undefined, options: ResolveOptions = {}): StateStore {
    const target = store ?? new StateStore({ log: this.sink })
    if (!store || (options.initializeFromDocument ?? true)) {
      if (this.document.state) target.initialize(this.document.state)
    }
    return target
  }

  private run(stateStore: StateStore, tracking: { tracker: DependencyTracker; viewTree: ViewTree } | undefined): RenderTree {
    const styleResolver = new StyleResolver(this.document.styles ?? {}, {
      designSystem: this.options.designSystem,
      log: this.sink,
      strict: this.config.strictStyles,
    })
    const context = ResolutionContext.create({
      document: this.document,
      styleResolver,
      stateStore,
      componentRegistry: this.componentRegistry,
      sectionConfigRegistry: this.options.sectionConfigRegistry,
      tracking,
      log: this.log,
    })

    const root = resolveRoot(context)
    const actions = resolveActions(this.document.actions)
    this.log(
      `resolved ${this.document.id}: ${countNodes(root.children)} nodes, ${Object.keys(actions).length} actions` +
        (tracking ? `, ${tracking.viewTree.size} view nodes` : ''),
    )
    return { root, stateStore, actions }
  }
}

export type ResolutionOutcome = {
  renderTree: RenderTree
  tracked: TrackedResolution | null
  error?: ResolutionError
}

/**
 * Resolves a document, substituting an empty tree when the pass fails
 * structurally. The fallback still carries the session's live store.
 */
export function resolveOrFallback(
  document: Document,
  options: ResolverOptions & { store?: StateStore; tracking?: boolean } = {},
): ResolutionOutcome {
  const resolver = new Resolver(document, options)
  const store = resolver.prepareStore(options.store)
  try {
    if (options.tracking ?? resolver.trackingByDefault) {
      const tracked = resolver.resolveWithTracking(store, { initializeFromDocument: false })
      return { renderTree: tracked.renderTree, tracked }
    }
    return { renderTree: resolver.resolve(store, { initializeFromDocument: false }), tracked: null }
  } catch (e) {
    if (!(e instanceof ResolutionError)) throw e
    tagged(resolver.logSink, 'resolver')(`warn: ${e.message}; using empty tree`)
    return { renderTree: emptyRenderTree(store), tracked: null, error: e }
  }
}

export function emptyRenderTree(stateStore: StateStore): RenderTree {
  const root: RootNode = {
    kind: 'root',
    colorScheme: 'system',
    edgeInsets: resolvePadding(),
    style: {},
    actions: {},
    children: [],
  }
  return { root, stateStore, actions: {} }
}

export function countNodes(nodes: RenderNode[]): number {
  let n = 0
  for (const node of nodes) {
    n++
    if (node.kind === 'container' || node.kind === 'custom') n += countNodes(node.children)
    else if (node.kind === 'sectionLayout') {
      for (const section of node.sections) {
        n += countNodes(section.children)
        if (section.header) n += countNodes([section.header])
        if (section.footer) n += countNodes([section.footer])
      }
    }
  }
  return n
}
