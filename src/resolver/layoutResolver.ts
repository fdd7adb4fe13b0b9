import {
  isForEach,
  isLayout,
  isSectionLayout,
  isSpacer,
  type Component,
  type ForEach,
  type Layout,
  type LayoutNode,
} from '../document/documentTypes'
import type { ContainerNode, RenderNode, RootNode } from '../ir/irTypes'
import { resolvePadding } from '../styles/styleResolver'
import { resolveActionBinding } from './actionResolver'
import type { ResolutionContext } from './resolutionContext'
import { ResolutionError } from './resolutionError'
import { resolveSectionLayout } from './sectionLayoutResolver'

export function resolveRoot(context: ResolutionContext): RootNode {
  const root = context.document.root
  const style = context.styleResolver.resolve(root.styleId)
  const slot = context.beginViewNode('root', 'root')
  const inner = context.withParent(slot)
  return {
    kind: 'root',
    backgroundColor: root.backgroundColor ?? style.backgroundColor,
    colorScheme: root.colorScheme ?? 'system',
    edgeInsets: resolvePadding(root.edgeInsets),
    style,
    actions: {
      onAppear: resolveActionBinding(root.actions?.onAppear),
      onDisappear: resolveActionBinding(root.actions?.onDisappear),
    },
    children: root.children.map((child) => resolveNode(child, inner)),
  }
}

export function resolveNode(node: LayoutNode, context: ResolutionContext): RenderNode {
  if (isLayout(node)) return resolveContainer(node, context)
  if (isForEach(node)) return resolveForEach(node, context)
  if (isSpacer(node)) return { kind: 'spacer', minLength: node.minLength }
  if (isSectionLayout(node)) return resolveSectionLayout(node, context, resolveNode)
  return resolveComponent(node, context)
}

export function resolveComponent(component: Component, context: ResolutionContext): RenderNode {
  const resolver = context.componentRegistry.get(component.type)
  if (!resolver) throw new ResolutionError('unknown_component_kind', component.type)
  return resolver({ component, context })
}

function resolveContainer(layout: Layout, context: ResolutionContext): ContainerNode {
  const style = context.styleResolver.resolve(layout.styleId)
  const slot = context.beginViewNode(layout.type, layout.id ?? context.nextId(layout.type), layout.state)
  const inner = context.withParent(slot)
  return {
    kind: 'container',
    id: layout.id,
    layoutType: layout.type,
    alignment: layout.alignment ?? 'center',
    spacing: layout.spacing ?? 0,
    padding: resolvePadding(layout.padding ?? style.padding),
    style,
    children: layout.children.map((child) => resolveNode(child, inner)),
  }
}

function resolveForEach(forEach: ForEach, context: ResolutionContext): RenderNode {
  const id = forEach.id ?? `forEach_${forEach.items}`
  const slot = context.beginViewNode('forEach', id)
  const inner = context.withParent(slot)
  const items = context.trackContent(slot, () => context.getArray(forEach.items)) ?? []

  const container = (containerId: string, children: RenderNode[]): ContainerNode => ({
    kind: 'container',
    id: containerId,
    layoutType: forEach.layout ?? 'vstack',
    alignment: forEach.alignment ?? 'center',
    spacing: forEach.spacing ?? 0,
    padding: resolvePadding(forEach.padding),
    style: {},
    children,
  })

  if (items.length === 0) {
    if (forEach.emptyView) return resolveNode(forEach.emptyView, inner)
    return container(`forEach_${forEach.items}_empty`, [])
  }

  const itemVariable = forEach.itemVariable ?? 'item'
  const indexVariable = forEach.indexVariable ?? 'index'
  return container(
    id,
    items.map((item, index) =>
      resolveNode(forEach.template, inner.withIterationVariables({ [itemVariable]: item, [indexVariable]: index })),
    ),
  )
}
