import type { Component } from '../document/documentTypes'
import type { ContentBinding, ImageNodeSource } from '../ir/irTypes'
import { Registry } from '../registry/registry'
import type { StateMap, StateValue } from '../state/stateValue'
import { resolvePadding, type ResolvedStyle } from '../styles/styleResolver'
import { resolveActionBinding } from './actionResolver'
import { resolveContent, type ResolvedContent } from './contentResolver'
import type { ComponentResolver, ResolutionContext } from './resolutionContext'
import { ResolutionError } from './resolutionError'

type Prepared = {
  id: string
  slot: number | null
  style: ResolvedStyle
}

// Style first, then the view node whose scope wraps content resolution.
function prepare(component: Component, context: ResolutionContext, styleId = component.styleId): Prepared {
  const style = context.styleResolver.resolveWith(styleId, component.style)
  const id = component.id ?? context.nextId(component.type)
  const slot = context.beginViewNode(component.type, id, component.state)
  return { id, slot, style }
}

function readBinding(component: Component, context: ResolutionContext, slot: number | null) {
  if (component.bind) context.getValue(component.bind)
  if (component.localBind) context.getLocal(slot, component.localBind)
}

function contentBinding(content: ResolvedContent, context: ResolutionContext): ContentBinding {
  const { bindingPath, bindingTemplate } = content
  if (bindingPath === undefined && bindingTemplate === undefined) return {}
  return { bindingPath, bindingTemplate, bindingScope: context.bindingScope() }
}

export const resolveTextComponent: ComponentResolver = ({ component, context }) => {
  const { id, slot, style } = prepare(component, context)
  const content = context.trackContent(slot, () => resolveContent(component, context, slot))
  return {
    kind: 'text',
    id,
    content: content.text,
    style,
    padding: resolvePadding(component.padding ?? style.padding),
    ...contentBinding(content, context),
  }
}

export const resolveButtonComponent: ComponentResolver = ({ component, context }) => {
  const { id, slot, style } = prepare(component, context, component.styles?.normal ?? component.styleId)
  const content = context.trackContent(slot, () => {
    if (component.isSelectedBinding) context.getValue(component.isSelectedBinding)
    return resolveContent(component, context, slot)
  })
  const styles = component.styles
  return {
    kind: 'button',
    id,
    label: content.text,
    style,
    styles: {
      normal: style,
      selected: styles?.selected ? context.styleResolver.resolve(styles.selected) : undefined,
      disabled: styles?.disabled ? context.styleResolver.resolve(styles.disabled) : undefined,
    },
    padding: resolvePadding(component.padding ?? style.padding),
    isSelectedBinding: component.isSelectedBinding,
    fillWidth: component.fillWidth ?? false,
    onTap: resolveActionBinding(component.actions?.onTap),
    ...contentBinding(content, context),
  }
}

export const resolveTextFieldComponent: ComponentResolver = ({ component, context }) => {
  const { id, slot, style } = prepare(component, context)
  const placeholder = context.trackContent(slot, () => {
    readBinding(component, context, slot)
    return context.interpolate(component.placeholder ?? '')
  })
  return {
    kind: 'textField',
    id,
    placeholder,
    style,
    bindingPath: component.bind,
    localBindingPath: component.localBind,
    onValueChanged: resolveActionBinding(component.actions?.onValueChanged),
  }
}

export const resolveToggleComponent: ComponentResolver = ({ component, context }) => {
  const { id, slot, style } = prepare(component, context)
  const label = context.trackContent(slot, () => {
    readBinding(component, context, slot)
    return resolveContent(component, context, slot).text
  })
  return {
    kind: 'toggle',
    id,
    label,
    style,
    bindingPath: component.bind,
    localBindingPath: component.localBind,
    onValueChanged: resolveActionBinding(component.actions?.onValueChanged),
  }
}

export const resolveSliderComponent: ComponentResolver = ({ component, context }) => {
  const { id, slot, style } = prepare(component, context)
  context.trackContent(slot, () => readBinding(component, context, slot))
  return {
    kind: 'slider',
    id,
    style,
    minValue: component.minValue ?? 0,
    maxValue: component.maxValue ?? 1,
    bindingPath: component.bind,
    localBindingPath: component.localBind,
    onValueChanged: resolveActionBinding(component.actions?.onValueChanged),
  }
}

export const resolveImageComponent: ComponentResolver = ({ component, context }) => {
  const { id, slot, style } = prepare(component, context)
  const source = context.trackContent(slot, (): ImageNodeSource => {
    const image = component.image
    if (image?.system) return { kind: 'system', name: image.system }
    if (image?.url) return { kind: 'url', url: context.interpolate(image.url) }
    if (image?.asset) return { kind: 'asset', name: image.asset }
    throw new ResolutionError('invalid_content', id, 'image needs a system, url or asset source')
  })
  return { kind: 'image', id, source, style, onTap: resolveActionBinding(component.actions?.onTap) }
}

export const resolveGradientComponent: ComponentResolver = ({ component, context }) => {
  const { id, style } = prepare(component, context)
  return {
    kind: 'gradient',
    id,
    colors: component.gradientColors ?? [],
    start: component.gradientStart ?? 'top',
    end: component.gradientEnd ?? 'bottom',
    style,
  }
}

export const resolveDividerComponent: ComponentResolver = ({ component, context }) => {
  const { id, style } = prepare(component, context)
  return { kind: 'divider', id, style }
}

/**
 * Resolver for host-defined component kinds. String props are interpolated
 * inside the node's tracking scope; other props pass through.
 */
export function createCustomComponentResolver(customKind?: string): ComponentResolver {
  return ({ component, context }) => {
    const { id, slot, style } = prepare(component, context)
    const props = context.trackContent(slot, () => {
      const out: StateMap = {}
      for (const [key, value] of Object.entries(component.props ?? {})) out[key] = interpolateProp(value, context)
      return out
    })
    return { kind: 'custom', customKind: customKind ?? component.type, id, style, props, children: [] }
  }
}

function interpolateProp(value: StateValue, context: ResolutionContext): StateValue {
  return typeof value === 'string' ? context.interpolate(value) : value
}

export function createDefaultComponentRegistry(): Registry<ComponentResolver> {
  return new Registry<ComponentResolver>()
    .register('label', resolveTextComponent)
    .register('text', resolveTextComponent)
    .register('button', resolveButtonComponent)
    .register('textfield', resolveTextFieldComponent)
    .register('toggle', resolveToggleComponent)
    .register('slider', resolveSliderComponent)
    .register('image', resolveImageComponent)
    .register('gradient', resolveGradientComponent)
    .register('divider', resolveDividerComponent)
}
