import type { LayoutNode, Section, SectionLayout, SectionLayoutConfig } from '../document/documentTypes'
import type { RenderNode, SectionConfig, SectionLayoutNode, SectionNode, SectionType } from '../ir/irTypes'
import { resolvePadding } from '../styles/styleResolver'
import type { ResolutionContext } from './resolutionContext'
import { ResolutionError } from './resolutionError'

type NodeResolver = (node: LayoutNode, context: ResolutionContext) => RenderNode

export const DEFAULT_SECTION_CONFIG: SectionConfig = {
  itemSpacing: 8,
  lineSpacing: 8,
  contentInsets: resolvePadding(),
  showsIndicators: false,
  isPagingEnabled: false,
  snapBehavior: 'none',
  showsDividers: true,
  alignment: 'leading',
}

const DEFAULT_GRID_COLUMNS = 2

export function resolveSectionLayout(
  layout: SectionLayout,
  context: ResolutionContext,
  resolveNode: NodeResolver,
): SectionLayoutNode {
  const slot = context.beginViewNode('sectionLayout', layout.id ?? context.nextId('sectionLayout'))
  const inner = context.withParent(slot)
  return {
    kind: 'sectionLayout',
    id: layout.id,
    sectionSpacing: layout.sectionSpacing ?? 0,
    sections: layout.sections.map((section) => resolveSection(section, inner, resolveNode)),
  }
}

function resolveSection(section: Section, context: ResolutionContext, resolveNode: NodeResolver): SectionNode {
  const { sectionType, config } = resolveSectionConfig(section.layout, context)
  const slot = context.beginViewNode('section', section.id ?? context.nextId('section'))
  const inner = context.withParent(slot)

  let children: RenderNode[]
  if (section.dataSource !== undefined) {
    const dataSource = section.dataSource
    const template = section.itemTemplate
    if (!template) throw new ResolutionError('invalid_content', section.id ?? dataSource, 'dataSource needs an itemTemplate')
    const items = context.trackContent(slot, () => inner.getArray(dataSource)) ?? []
    const itemVariable = section.itemVariable ?? 'item'
    children = items.map((item, index) =>
      resolveNode(template, inner.withIterationVariables({ [itemVariable]: item, index })),
    )
  } else {
    children = (section.children ?? []).map((child) => resolveNode(child, inner))
  }

  return {
    id: section.id,
    sectionType,
    config,
    header: section.header ? resolveNode(section.header, inner) : undefined,
    footer: section.footer ? resolveNode(section.footer, inner) : undefined,
    stickyHeader: section.stickyHeader ?? false,
    children,
  }
}

/** Registered config resolvers win; otherwise the built-in section types apply. */
export function resolveSectionConfig(
  config: SectionLayoutConfig,
  context: ResolutionContext,
): { sectionType: SectionType; config: SectionConfig } {
  const override = context.sectionConfigRegistry?.get(config.type)
  if (override) return override({ config, context })
  return { sectionType: builtinSectionType(config), config: builtinSectionConfig(config) }
}

function builtinSectionType(config: SectionLayoutConfig): SectionType {
  switch (config.type) {
    case 'horizontal':
      return { kind: 'horizontal' }
    case 'list':
      return { kind: 'list' }
    case 'flow':
      return { kind: 'flow' }
    case 'grid': {
      const columns = config.columns
      if (typeof columns === 'number') return { kind: 'grid', columns: { kind: 'fixed', count: columns } }
      if (columns) return { kind: 'grid', columns: { kind: 'adaptive', minWidth: columns.adaptive.minWidth } }
      return { kind: 'grid', columns: { kind: 'fixed', count: DEFAULT_GRID_COLUMNS } }
    }
    default:
      throw new ResolutionError('unknown_section_kind', config.type)
  }
}

export function builtinSectionConfig(config: SectionLayoutConfig): SectionConfig {
  const d = DEFAULT_SECTION_CONFIG
  return {
    itemSpacing: config.itemSpacing ?? d.itemSpacing,
    lineSpacing: config.lineSpacing ?? d.lineSpacing,
    contentInsets: config.contentInsets ? resolvePadding(config.contentInsets) : d.contentInsets,
    showsIndicators: config.showsIndicators ?? d.showsIndicators,
    isPagingEnabled: config.isPagingEnabled ?? d.isPagingEnabled,
    snapBehavior: config.snapBehavior ?? d.snapBehavior,
    showsDividers: config.showsDividers ?? d.showsDividers,
    alignment: config.alignment ?? d.alignment,
  }
}
