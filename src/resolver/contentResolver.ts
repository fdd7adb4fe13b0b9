import { containsExpression } from '../bindings/evalExpr'
import type { Component } from '../document/documentTypes'
import { stringifyValue } from '../state/stateValue'
import type { ResolutionContext } from './resolutionContext'
import { ResolutionError } from './resolutionError'

export type ResolvedContent = {
  text: string
  bindingPath?: string
  bindingTemplate?: string
  localBindingPath?: string
}

/**
 * Text content of a component: a named data source, then `data.value`, then
 * `text`. Must run inside the component's tracking scope so state reads are
 * attributed to it.
 */
export function resolveContent(component: Component, context: ResolutionContext, viewNode: number | null): ResolvedContent {
  if (component.dataSourceId !== undefined) {
    const source = context.document.dataSources?.[component.dataSourceId]
    if (!source) throw new ResolutionError('unknown_data_source', component.dataSourceId)
    if (source.type === 'static') return { text: source.value ?? '' }
    return resolveBinding(source.path, source.template, context, component.dataSourceId)
  }

  const ref = component.data?.value
  if (ref) {
    switch (ref.type) {
      case 'static':
        return { text: ref.value ?? '' }
      case 'binding':
        return resolveBinding(ref.path, ref.template, context, component.id ?? component.type)
      case 'localBinding': {
        const path = ref.path ?? ''
        return { text: stringifyValue(context.getLocal(viewNode, path)), localBindingPath: path }
      }
    }
  }

  const text = component.text
  if (text === undefined) return { text: '' }
  if (containsExpression(text)) return { text: context.interpolate(text), bindingTemplate: text }
  return { text }
}

function resolveBinding(
  path: string | undefined,
  template: string | undefined,
  context: ResolutionContext,
  owner: string,
): ResolvedContent {
  if (path) return { text: stringifyValue(context.getValue(path)), bindingPath: path }
  if (template !== undefined) return { text: context.interpolate(template), bindingTemplate: template }
  throw new ResolutionError('invalid_content', owner, 'binding needs a path or a template')
}
