import * as React from 'react'
import type { CSSProperties, ReactNode } from 'react'
import type { Alignment, ContainerType } from '../../document/documentTypes'
import type { ActionRef, ContentBinding, RenderNode, RenderNodeKind, RenderTree, SectionNode } from '../../ir/irTypes'
import { Registry } from '../../registry/registry'
import { asBoolean, asNumber, stringifyValue, type StateMap, type StateValue } from '../../state/stateValue'
import { edgeInsetsToCss, styleToCss } from './styleToCss'

export type ReactRenderContext = {
  tree: RenderTree
  renderNode: (node: RenderNode) => ReactNode
  dispatch: (ref: ActionRef | undefined) => void
  read: (path: string, scope?: StateMap) => StateValue | undefined
  interpolate: (template: string, scope?: StateMap) => string
  write: (path: string, value: StateValue) => void
}

export type NodeRenderer = (args: { node: RenderNode; ctx: ReactRenderContext; children: ReactNode[] }) => ReactNode

type NodeOfKind<K extends RenderNodeKind> = Extract<RenderNode, { kind: K }>

function isKind<K extends RenderNodeKind>(node: RenderNode, kind: K): node is NodeOfKind<K> {
  return node.kind === kind
}

/** Adapts a renderer written for one node kind to the registry signature. */
export function forKind<K extends RenderNodeKind>(
  kind: K,
  render: (args: { node: NodeOfKind<K>; ctx: ReactRenderContext; children: ReactNode[] }) => ReactNode,
): NodeRenderer {
  return ({ node, ctx, children }) => (isKind(node, kind) ? render({ node, ctx, children }) : null)
}

const CROSS_AXIS: Record<Alignment, CSSProperties['alignItems']> = {
  leading: 'flex-start',
  top: 'flex-start',
  center: 'center',
  trailing: 'flex-end',
  bottom: 'flex-end',
}

function containerCss(layoutType: ContainerType, alignment: Alignment, spacing: number): CSSProperties {
  if (layoutType === 'zstack') return { display: 'grid', placeItems: CROSS_AXIS[alignment] }
  return {
    display: 'flex',
    flexDirection: layoutType === 'hstack' ? 'row' : 'column',
    alignItems: CROSS_AXIS[alignment],
    gap: spacing || undefined,
  }
}

function sectionCss(section: SectionNode): CSSProperties {
  const { config, sectionType } = section
  const padding = edgeInsetsToCss(config.contentInsets)
  switch (sectionType.kind) {
    case 'horizontal':
      return { display: 'flex', flexDirection: 'row', overflowX: 'auto', gap: config.itemSpacing, padding }
    case 'grid': {
      const columns =
        sectionType.columns.kind === 'fixed'
          ? `repeat(${sectionType.columns.count}, minmax(0, 1fr))`
          : `repeat(auto-fill, minmax(${sectionType.columns.minWidth}px, 1fr))`
      return { display: 'grid', gridTemplateColumns: columns, columnGap: config.itemSpacing, rowGap: config.lineSpacing, padding }
    }
    case 'flow':
      return { display: 'flex', flexWrap: 'wrap', columnGap: config.itemSpacing, rowGap: config.lineSpacing, padding }
    default:
      return { display: 'flex', flexDirection: 'column', gap: config.lineSpacing, padding }
  }
}

/** Current text of a bound node; `resolved` when it has no binding. */
export function boundText(binding: ContentBinding, resolved: string, ctx: ReactRenderContext): string {
  if (binding.bindingPath !== undefined) return stringifyValue(ctx.read(binding.bindingPath, binding.bindingScope))
  if (binding.bindingTemplate !== undefined) return ctx.interpolate(binding.bindingTemplate, binding.bindingScope)
  return resolved
}

function keyed(nodes: ReactNode[]): ReactNode[] {
  return nodes.map((n, idx) => <React.Fragment key={idx}>{n}</React.Fragment>)
}

export function createDefaultNodeRenderers(): Registry<NodeRenderer> {
  return new Registry<NodeRenderer>()
    .register(
      'container',
      forKind('container', ({ node, children }) => (
        <div
          data-kind={node.layoutType}
          data-node-id={node.id}
          style={{
            ...containerCss(node.layoutType, node.alignment, node.spacing),
            ...styleToCss(node.style, node.padding),
          }}
        >
          {children}
        </div>
      )),
    )
    .register(
      'sectionLayout',
      forKind('sectionLayout', ({ node, ctx }) => (
        <div data-kind="sectionLayout" style={{ display: 'flex', flexDirection: 'column', gap: node.sectionSpacing || undefined }}>
          {node.sections.map((section, idx) => (
            <section key={section.id ?? idx} data-section-id={section.id}>
              {section.header ? <header>{ctx.renderNode(section.header)}</header> : null}
              <div style={sectionCss(section)}>{keyed(section.children.map(ctx.renderNode))}</div>
              {section.footer ? <footer>{ctx.renderNode(section.footer)}</footer> : null}
            </section>
          ))}
        </div>
      )),
    )
    .register(
      'text',
      forKind('text', ({ node, ctx }) => (
        <span data-node-id={node.id} style={styleToCss(node.style, node.padding)}>
          {boundText(node, node.content, ctx)}
        </span>
      )),
    )
    .register(
      'button',
      forKind('button', ({ node, ctx }) => {
        const selected = node.isSelectedBinding !== undefined && asBoolean(ctx.read(node.isSelectedBinding)) === true
        const style = selected && node.styles.selected ? node.styles.selected : node.styles.normal
        return (
          <button
            type="button"
            data-node-id={node.id}
            aria-pressed={node.isSelectedBinding !== undefined ? selected : undefined}
            style={{ ...styleToCss(style, node.padding), width: node.fillWidth ? '100%' : undefined }}
            onClick={() => ctx.dispatch(node.onTap)}
          >
            {boundText(node, node.label, ctx)}
          </button>
        )
      }),
    )
    .register(
      'textField',
      forKind('textField', ({ node, ctx }) => (
        <input
          type="text"
          data-node-id={node.id}
          placeholder={node.placeholder}
          style={styleToCss(node.style)}
          value={node.bindingPath !== undefined ? stringifyValue(ctx.read(node.bindingPath)) : undefined}
          onChange={(e) => {
            if (node.bindingPath !== undefined) ctx.write(node.bindingPath, e.target.value)
            ctx.dispatch(node.onValueChanged)
          }}
        />
      )),
    )
    .register(
      'toggle',
      forKind('toggle', ({ node, ctx }) => (
        <label data-node-id={node.id} style={styleToCss(node.style)}>
          <input
            type="checkbox"
            checked={node.bindingPath !== undefined ? asBoolean(ctx.read(node.bindingPath)) === true : undefined}
            onChange={(e) => {
              if (node.bindingPath !== undefined) ctx.write(node.bindingPath, e.target.checked)
              ctx.dispatch(node.onValueChanged)
            }}
          />
          {node.label}
        </label>
      )),
    )
    .register(
      'slider',
      forKind('slider', ({ node, ctx }) => (
        <input
          type="range"
          data-node-id={node.id}
          min={node.minValue}
          max={node.maxValue}
          step="any"
          style={styleToCss(node.style)}
          value={node.bindingPath !== undefined ? asNumber(ctx.read(node.bindingPath)) ?? node.minValue : undefined}
          onChange={(e) => {
            if (node.bindingPath !== undefined) ctx.write(node.bindingPath, Number(e.target.value))
            ctx.dispatch(node.onValueChanged)
          }}
        />
      )),
    )
    .register(
      'image',
      forKind('image', ({ node, ctx }) => {
        const src = node.source
        const onClick = node.onTap ? () => ctx.dispatch(node.onTap) : undefined
        if (src.kind === 'url') {
          return <img data-node-id={node.id} src={src.url} alt="" style={styleToCss(node.style)} onClick={onClick} />
        }
        return (
          <span data-node-id={node.id} data-image={`${src.kind}:${src.name}`} role="img" style={styleToCss(node.style)} onClick={onClick} />
        )
      }),
    )
    .register(
      'gradient',
      forKind('gradient', ({ node }) => {
        const stops = node.colors.map((c) => `${c.color} ${c.location * 100}%`).join(', ')
        return (
          <div
            data-node-id={node.id}
            style={{ ...styleToCss(node.style), backgroundImage: `linear-gradient(to ${node.end}, ${stops})` }}
          />
        )
      }),
    )
    .register(
      'divider',
      forKind('divider', ({ node }) => <hr data-node-id={node.id} style={styleToCss(node.style)} />),
    )
    .register(
      'spacer',
      forKind('spacer', ({ node }) => <div data-kind="spacer" style={{ flexGrow: 1, minWidth: node.minLength, minHeight: node.minLength }} />),
    )
}

/** Shown for nodes nothing is registered for. */
export const unknownNodeRenderer: NodeRenderer = ({ node }) => (
  <div data-kind="unknown" style={{ border: '1px dashed #b45309', padding: '4px 8px', fontSize: 11 }}>
    Unknown component: <code>{node.kind === 'custom' ? node.customKind : node.kind}</code>
  </div>
)
