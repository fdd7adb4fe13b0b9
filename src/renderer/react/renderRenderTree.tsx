import * as React from 'react'
import type { ReactElement, ReactNode } from 'react'
import { interpolate, type StateReader } from '../../bindings/evalExpr'
import type { RenderNode, RenderTree } from '../../ir/irTypes'
import { silentLogSink, tagged, type LogSink } from '../../logging/log'
import type { Registry } from '../../registry/registry'
import { getAtPath, rootKey } from '../../state/keypath'
import type { StateStore } from '../../state/stateStore'
import { stateValuesEqual, type StateMap } from '../../state/stateValue'
import { ActionExecutor, type ActionHost } from '../../runtime/actionRuntime'
import type { Renderer } from '../types'
import { createDefaultNodeRenderers, unknownNodeRenderer, type NodeRenderer, type ReactRenderContext } from './nodeRenderers'
import { styleToCss } from './styleToCss'

export type ReactRendererOptions = {
  registry?: Registry<NodeRenderer>
  host?: ActionHost
  log?: LogSink
}

/** Store reads with the loop variables a node was resolved under layered on top. */
function scopedReader(store: StateStore, scope: StateMap | undefined): StateReader {
  if (!scope) return store
  const getValue = (path: string) => {
    const root = rootKey(path)
    return root !== undefined && Object.hasOwn(scope, root) ? getAtPath(path, scope) : store.get(path)
  }
  const getArray = (path: string) => {
    const v = getValue(path)
    return Array.isArray(v) ? v : undefined
  }
  return {
    getValue,
    getArray,
    arrayContains: (path, value) => getArray(path)?.some((item) => stateValuesEqual(item, value)) ?? false,
    getArrayCount: (path) => getArray(path)?.length ?? 0,
  }
}

function renderNode(node: RenderNode, ctx: ReactRenderContext, registry: Registry<NodeRenderer>): ReactNode {
  const nested = node.kind === 'container' || node.kind === 'custom' ? node.children : []
  const children = nested.map((c, idx) => <React.Fragment key={idx}>{renderNode(c, ctx, registry)}</React.Fragment>)

  // Custom nodes are looked up by their own kind first.
  const factory = (node.kind === 'custom' ? registry.get(node.customKind) : undefined) ?? registry.get(node.kind)
  return (factory ?? unknownNodeRenderer)({ node, ctx, children })
}

export function renderRenderTree(tree: RenderTree, options: ReactRendererOptions = {}): ReactElement {
  const registry = options.registry ?? createDefaultNodeRenderers()
  const log = tagged(options.log ?? silentLogSink, 'render')
  const executor = new ActionExecutor(tree, { host: options.host, log: options.log })
  const store = tree.stateStore

  const ctx: ReactRenderContext = {
    tree,
    renderNode: (node) => renderNode(node, ctx, registry),
    dispatch: (ref) => {
      executor.executeBinding(ref).catch((e: unknown) => log(`warn: action failed: ${e instanceof Error ? e.message : String(e)}`))
    },
    read: (path, scope) => scopedReader(store, scope).getValue(path),
    interpolate: (template, scope) => interpolate(template, scopedReader(store, scope)),
    write: (path, value) => store.set(path, value),
  }

  const root = tree.root
  return (
    <div
      data-kind="root"
      data-color-scheme={root.colorScheme}
      style={{ ...styleToCss(root.style, root.edgeInsets), backgroundColor: root.backgroundColor }}
    >
      {root.children.map((c, idx) => (
        <React.Fragment key={idx}>{renderNode(c, ctx, registry)}</React.Fragment>
      ))}
    </div>
  )
}

export class ReactRenderer implements Renderer<ReactElement> {
  constructor(private readonly options: ReactRendererOptions = {}) {}

  render(tree: RenderTree): ReactElement {
    return renderRenderTree(tree, this.options)
  }
}

/**
 * Renders a tree and re-renders when its store changes. Structural changes
 * still need a new resolution pass; this only refreshes bound values.
 */
export function RenderTreeView(props: { tree: RenderTree } & ReactRendererOptions): ReactElement {
  const { tree, ...options } = props
  const store = tree.stateStore
  React.useSyncExternalStore(
    (onChange) => store.subscribe(onChange),
    () => store.snapshot(),
    () => store.snapshot(),
  )
  return renderRenderTree(tree, options)
}
