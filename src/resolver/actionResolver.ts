import type { ActionBinding, AlertMessage, DocumentAction, SetStateValue } from '../document/documentTypes'
import type { ActionDefinition, ActionRef, SetStateSource } from '../ir/irTypes'

export function resolveActions(actions: Record<string, DocumentAction> | undefined): Record<string, ActionDefinition> {
  const out: Record<string, ActionDefinition> = {}
  for (const [id, action] of Object.entries(actions ?? {})) out[id] = resolveAction(action)
  return out
}

export function resolveAction(action: DocumentAction): ActionDefinition {
  switch (action.type) {
    case 'dismiss':
      return { type: 'dismiss' }
    case 'setState':
      return { type: 'setState', path: action.path, value: resolveSetStateValue(action.value) }
    case 'toggleState':
      return { type: 'toggleState', path: action.path }
    case 'showAlert':
      return {
        type: 'showAlert',
        title: action.title,
        message: resolveAlertMessage(action.message),
        buttons: action.buttons?.length ? action.buttons : [{ label: 'OK', style: 'default' }],
      }
    case 'navigate':
      return { type: 'navigate', destination: action.destination, presentation: action.presentation ?? 'push' }
    case 'sequence':
      return { type: 'sequence', steps: action.steps.map(resolveAction) }
    case 'custom':
      return { type: 'custom', actionType: action.actionType, parameters: action.parameters }
  }
}

export function resolveActionBinding(binding: ActionBinding | undefined): ActionRef | undefined {
  if (binding === undefined) return undefined
  if (typeof binding === 'string') return { kind: 'reference', id: binding }
  return { kind: 'inline', action: resolveAction(binding) }
}

function isExpressionValue(v: SetStateValue): v is { $expr: string } {
  return typeof v === 'object' && v !== null && !Array.isArray(v) && '$expr' in v && typeof v.$expr === 'string'
}

function resolveSetStateValue(v: SetStateValue): SetStateSource {
  if (isExpressionValue(v)) return { kind: 'expression', expression: v.$expr }
  return { kind: 'literal', value: v }
}

function resolveAlertMessage(message: AlertMessage | undefined): { kind: 'static' | 'template'; value: string } | undefined {
  if (message === undefined) return undefined
  if (typeof message === 'string') return { kind: 'static', value: message }
  return { kind: message.type, value: message.value }
}
