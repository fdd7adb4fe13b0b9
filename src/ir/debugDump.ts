import type { ActionDefinition, ActionRef, RenderNode, RenderTree, SectionNode, SectionType } from './irTypes'

const RULE = '━'.repeat(60)

function indent(depth: number): string {
  return '  '.repeat(depth)
}

function quote(s: string): string {
  return JSON.stringify(s)
}

/** Indented text view of a render tree, for diagnostics only. */
export function debugDump(tree: RenderTree): string {
  const lines: string[] = [RULE, 'RenderTree', RULE, 'Root:']
  const root = tree.root
  lines.push(`${indent(1)}root (bg: ${root.backgroundColor ?? 'default'}, scheme: ${root.colorScheme})`)
  for (const child of root.children) dumpNode(child, 2, lines)

  const ids = Object.keys(tree.actions).sort()
  if (ids.length > 0) {
    lines.push('', 'Actions:')
    for (const id of ids) {
      const action = tree.actions[id]
      if (action) lines.push(`${indent(1)}${id}: ${describeAction(action)}`)
    }
  }
  return lines.join('\n')
}

export function dumpNode(node: RenderNode, depth: number, lines: string[]): void {
  lines.push(indent(depth) + describeNode(node))
  switch (node.kind) {
    case 'container':
    case 'custom':
      for (const child of node.children) dumpNode(child, depth + 1, lines)
      return
    case 'sectionLayout':
      for (const section of node.sections) dumpSection(section, depth + 1, lines)
      return
    default:
      return
  }
}

function dumpSection(section: SectionNode, depth: number, lines: string[]) {
  const parts = [
    section.id !== undefined ? `id: ${section.id}` : undefined,
    `layout: ${describeSectionType(section.sectionType)}`,
    `children: ${section.children.length}`,
    section.stickyHeader ? 'stickyHeader' : undefined,
  ]
  lines.push(`${indent(depth)}section (${join(parts)})`)
  if (section.header) {
    lines.push(`${indent(depth + 1)}header:`)
    dumpNode(section.header, depth + 2, lines)
  }
  for (const child of section.children) dumpNode(child, depth + 1, lines)
  if (section.footer) {
    lines.push(`${indent(depth + 1)}footer:`)
    dumpNode(section.footer, depth + 2, lines)
  }
}

function join(parts: (string | undefined)[]): string {
  return parts.filter((p): p is string => p !== undefined).join(', ')
}

export function describeNode(node: RenderNode): string {
  switch (node.kind) {
    case 'container':
      return `${node.layoutType} (${join([
        node.id !== undefined ? `id: ${node.id}` : undefined,
        node.spacing > 0 ? `spacing: ${node.spacing}` : undefined,
        `align: ${node.alignment}`,
      ])})`
    case 'text':
      return `text (${join([
        `id: ${node.id}`,
        `content: ${quote(node.content)}`,
        node.bindingPath !== undefined ? `binding: ${node.bindingPath}` : undefined,
        node.bindingTemplate !== undefined ? `template: ${quote(node.bindingTemplate)}` : undefined,
      ])})`
    case 'button':
      return `button (${join([
        `id: ${node.id}`,
        `label: ${quote(node.label)}`,
        node.fillWidth ? 'fillWidth' : undefined,
        node.onTap ? `onTap: ${describeActionRef(node.onTap)}` : undefined,
      ])})`
    case 'textField':
      return `textField (${join([
        `id: ${node.id}`,
        `placeholder: ${quote(node.placeholder)}`,
        node.bindingPath !== undefined ? `binding: ${node.bindingPath}` : undefined,
      ])})`
    case 'toggle':
      return `toggle (${join([`id: ${node.id}`, node.bindingPath !== undefined ? `binding: ${node.bindingPath}` : undefined])})`
    case 'slider':
      return `slider (${join([
        `id: ${node.id}`,
        node.bindingPath !== undefined ? `binding: ${node.bindingPath}` : undefined,
        `range: ${node.minValue}...${node.maxValue}`,
      ])})`
    case 'image': {
      const src = node.source
      const source = src.kind === 'url' ? `url:${src.url}` : `${src.kind}:${src.name}`
      return `image (id: ${node.id}, source: ${source})`
    }
    case 'gradient':
      return `gradient (id: ${node.id}, colors: ${node.colors.length})`
    case 'divider':
      return 'divider'
    case 'spacer':
      return node.minLength !== undefined ? `spacer (minLength: ${node.minLength})` : 'spacer'
    case 'sectionLayout':
      return `sectionLayout (sections: ${node.sections.length}, spacing: ${node.sectionSpacing})`
    case 'custom':
      return `custom (kind: ${node.customKind}, id: ${node.id})`
  }
}

function describeSectionType(t: SectionType): string {
  switch (t.kind) {
    case 'grid':
      return t.columns.kind === 'fixed' ? `grid(fixed: ${t.columns.count})` : `grid(adaptive: ${t.columns.minWidth})`
    case 'custom':
      return `custom(${t.name})`
    default:
      return t.kind
  }
}

export function describeActionRef(ref: ActionRef): string {
  return ref.kind === 'reference' ? ref.id : describeAction(ref.action)
}

export function describeAction(action: ActionDefinition): string {
  switch (action.type) {
    case 'dismiss':
      return 'dismiss'
    case 'setState':
      return action.value.kind === 'expression'
        ? `setState(${action.path}, expr(${action.value.expression}))`
        : `setState(${action.path}, ${JSON.stringify(action.value.value)})`
    case 'toggleState':
      return `toggleState(${action.path})`
    case 'showAlert':
      return `showAlert(${quote(action.title)})`
    case 'navigate':
      return `navigate(${action.destination}, ${action.presentation})`
    case 'sequence':
      return `sequence[${action.steps.length} steps]`
    case 'custom':
      return `custom(${action.actionType})`
  }
}
