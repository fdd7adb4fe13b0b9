import { describe, expect, it } from 'vitest'
import { renderToStaticMarkup } from 'react-dom/server'
import { debugDump } from '../../ir/debugDump'
import { createCustomComponentResolver, createDefaultComponentRegistry } from '../../resolver/componentResolvers'
import { Resolver } from '../../resolver/resolver'
import { counterDocument, documentFrom, flags } from '../../resolver/__tests__/testDocuments'
import { DebugRenderer } from '../debugRenderer'
import { createDefaultNodeRenderers } from '../react/nodeRenderers'
import { ReactRenderer, RenderTreeView } from '../react/renderRenderTree'
import { styleToCss } from '../react/styleToCss'

const COUNTER_MARKUP =
  '<div data-kind="root" data-color-scheme="system">' +
  '<div data-kind="vstack" data-node-id="main" style="display:flex;flex-direction:column;align-items:center;gap:8px">' +
  '<span data-node-id="label" style="font-size:20px">Count: 0</span>' +
  '<button type="button" data-node-id="inc">Add</button>' +
  '</div></div>'

describe('DebugRenderer', () => {
  it('renders the debug dump', () => {
    const tree = new Resolver(counterDocument(), { config: flags }).resolve()
    expect(new DebugRenderer().render(tree)).toBe(debugDump(tree))
  })
})

describe('ReactRenderer', () => {
  it('renders resolved nodes as elements', () => {
    const tree = new Resolver(counterDocument(), { config: flags }).resolve()
    expect(renderToStaticMarkup(new ReactRenderer().render(tree))).toBe(COUNTER_MARKUP)
  })

  it('renders the current store values in a view', () => {
    const tree = new Resolver(counterDocument(), { config: flags }).resolve()
    expect(renderToStaticMarkup(<RenderTreeView tree={tree} />)).toBe(COUNTER_MARKUP)
  })

  it('re-reads bound text from the store on render', () => {
    const tree = new Resolver(counterDocument(), { config: flags }).resolve()
    tree.stateStore.set('count', 5)
    expect(renderToStaticMarkup(<RenderTreeView tree={tree} />)).toBe(COUNTER_MARKUP.replace('Count: 0', 'Count: 5'))
  })

  it('keeps loop variables when re-reading bound text', () => {
    const doc = documentFrom({
      id: 'todos',
      state: { todos: [{ title: 'Milk' }], item: 'global' },
      root: {
        children: [
          {
            type: 'forEach',
            items: 'todos',
            itemVariable: 'todo',
            template: { type: 'text', text: '${index}. ${todo.title} (${item})' },
          },
        ],
      },
    })
    const tree = new Resolver(doc, { config: flags }).resolve()
    tree.stateStore.set('item', 'changed')
    expect(renderToStaticMarkup(new ReactRenderer().render(tree))).toContain(
      '<span data-node-id="text_1">0. Milk (changed)</span>',
    )
  })

  it('binds inputs to state', () => {
    const doc = documentFrom({
      id: 'form',
      state: { user: { name: 'Ada' }, on: true },
      root: {
        children: [
          { type: 'textfield', id: 'f', placeholder: 'Name', bind: 'user.name' },
          { type: 'toggle', id: 't', text: 'On', bind: 'on' },
        ],
      },
    })
    const markup = renderToStaticMarkup(new ReactRenderer().render(new Resolver(doc, { config: flags }).resolve()))
    expect(markup).toContain('<input type="text" data-node-id="f" placeholder="Name" value="Ada"/>')
    expect(markup).toContain('<label data-node-id="t"><input type="checkbox" checked=""/>On</label>')
  })

  it('marks kinds without a renderer and accepts host renderers', () => {
    const doc = documentFrom({
      id: 'custom',
      state: { count: 3 },
      root: { children: [{ type: 'badge', id: 'b', props: { label: '${count} new' } }] },
    })
    const componentRegistry = createDefaultComponentRegistry().register('badge', createCustomComponentResolver())
    const tree = new Resolver(doc, { config: flags, componentRegistry }).resolve()

    expect(renderToStaticMarkup(new ReactRenderer().render(tree))).toContain('Unknown component: <code>badge</code>')

    const registry = createDefaultNodeRenderers().register('badge', ({ node }) =>
      node.kind === 'custom' ? <em>{String(node.props.label)}</em> : null,
    )
    expect(renderToStaticMarkup(new ReactRenderer({ registry }).render(tree))).toBe(
      '<div data-kind="root" data-color-scheme="system"><em>3 new</em></div>',
    )
  })
})

describe('styleToCss', () => {
  it('maps style fields to CSS properties', () => {
    expect(
      styleToCss(
        { fontWeight: 'semibold', textAlignment: 'trailing', width: { fractional: 0.5 }, shadow: { radius: 4 } },
        { top: 1, leading: 2, bottom: 3, trailing: 4 },
      ),
    ).toMatchObject({ fontWeight: 600, textAlign: 'end', width: '50%', boxShadow: '0px 0px 4px rgba(0,0,0,0.33)', padding: '1px 4px 3px 2px' })
    expect(styleToCss({})).toBeUndefined()
  })
})
