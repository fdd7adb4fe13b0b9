import { DocumentActionSchema, type AlertButton, type Presentation } from '../document/documentTypes'
import type { ActionDefinition, ActionRef, RenderTree } from '../ir/irTypes'
import { silentLogSink, tagged, type LogSink } from '../logging/log'
import { Registry } from '../registry/registry'
import { resolveAction } from '../resolver/actionResolver'
import {
  asArray,
  asBoolean,
  asNumber,
  asString,
  type StateMap,
  type StateValue,
} from '../state/stateValue'

export type AlertPresentation = {
  title: string
  message?: string
  buttons: AlertButton[]
  onButtonTap: (actionId: string) => Promise<void>
}

/** Side effects that belong to the embedding application. */
export type ActionHost = {
  dismiss?: () => void
  showAlert?: (alert: AlertPresentation) => void
  navigate?: (destination: string, presentation: Presentation) => void
}

/** What action handlers may touch. State writes always go through the store's `set`. */
export type ActionContext = {
  get: (path: string) => StateValue | undefined
  set: (path: string, value: StateValue | undefined) => void
  appendToArray: (path: string, value: StateValue) => void
  removeFromArray: (path: string, value: StateValue) => void
  removeFromArrayAt: (path: string, index: number) => void
  toggleInArray: (path: string, value: StateValue) => void
  interpolate: (template: string) => string
  evaluate: (expression: string) => StateValue | undefined
  execute: (actionId: string) => Promise<void>
  executeDefinition: (action: ActionDefinition) => Promise<void>
  host: ActionHost
  log: (msg: string) => void
}

export type ActionHandler = (args: { parameters: StateMap; context: ActionContext }) => void | Promise<void>

export type ActionExecutorOptions = {
  registry?: Registry<ActionHandler>
  host?: ActionHost
  log?: LogSink
  onLastAction?: (info: { action: string }) => void
}

export class ActionExecutor implements ActionContext {
  readonly host: ActionHost
  readonly log: (msg: string) => void
  private readonly registry: Registry<ActionHandler>

  constructor(
    private readonly tree: RenderTree,
    private readonly options: ActionExecutorOptions = {},
  ) {
    this.host = options.host ?? {}
    this.log = tagged(options.log ?? silentLogSink, 'actions')
    this.registry = options.registry ?? createDefaultActionRegistry()
  }

  get(path: string): StateValue | undefined {
    return this.tree.stateStore.get(path)
  }

  set(path: string, value: StateValue | undefined): void {
    this.tree.stateStore.set(path, value)
  }

  appendToArray(path: string, value: StateValue): void {
    this.tree.stateStore.appendToArray(path, value)
  }

  removeFromArray(path: string, value: StateValue): void {
    this.tree.stateStore.removeFromArray(path, value)
  }

  removeFromArrayAt(path: string, index: number): void {
    this.tree.stateStore.removeFromArrayAt(path, index)
  }

  toggleInArray(path: string, value: StateValue): void {
    this.tree.stateStore.toggleInArray(path, value)
  }

  interpolate(template: string): string {
    return this.tree.stateStore.interpolate(template)
  }

  evaluate(expression: string): StateValue | undefined {
    return this.tree.stateStore.evaluate(expression)
  }

  async execute(actionId: string): Promise<void> {
    const id = actionId.trim()
    if (!id) return
    this.options.onLastAction?.({ action: id })

    const action = this.tree.actions[id]
    if (!action) {
      this.log(`warn: unknown action ${id}`)
      return
    }
    await this.executeDefinition(action)
  }

  async executeBinding(ref: ActionRef | undefined): Promise<void> {
    if (!ref) return
    if (ref.kind === 'reference') await this.execute(ref.id)
    else await this.executeDefinition(ref.action)
  }

  async executeDefinition(action: ActionDefinition): Promise<void> {
    switch (action.type) {
      case 'dismiss':
        this.callHost('dismiss', this.host.dismiss)
        return
      case 'setState': {
        const source = action.value
        const value = source.kind === 'literal' ? source.value : this.evaluate(source.expression)
        this.set(action.path, value)
        return
      }
      case 'toggleState':
        this.set(action.path, !(asBoolean(this.get(action.path)) ?? false))
        return
      case 'showAlert': {
        const message = action.message
        const showAlert = this.host.showAlert
        const alert: AlertPresentation = {
          title: action.title,
          message: message && (message.kind === 'template' ? this.interpolate(message.value) : message.value),
          buttons: action.buttons,
          onButtonTap: (actionId) => this.execute(actionId),
        }
        this.callHost('showAlert', showAlert && (() => showAlert(alert)))
        return
      }
      case 'navigate': {
        const navigate = this.host.navigate
        this.callHost('navigate', navigate && (() => navigate(action.destination, action.presentation)))
        return
      }
      case 'sequence':
        for (const step of action.steps) await this.executeDefinition(step)
        return
      case 'custom':
        await this.executeType(action.actionType, action.parameters)
        return
    }
  }

  /** Runs a registered handler by action type. */
  async executeType(actionType: string, parameters: StateMap): Promise<void> {
    const handler = this.registry.get(actionType)
    if (!handler) {
      this.log(`warn: no handler for action type ${actionType}`)
      return
    }
    await handler({ parameters, context: this })
  }

  private callHost(name: string, fn: (() => void) | undefined) {
    if (fn) fn()
    else this.log(`warn: host has no ${name} handler`)
  }
}

// --- built-in handlers, addressed by type from custom actions ---

function requirePath(parameters: StateMap, context: ActionContext, type: string): string | undefined {
  const path = asString(parameters.path)
  if (!path) context.log(`warn: ${type} needs a path`)
  return path
}

export const setStateHandler: ActionHandler = ({ parameters, context }) => {
  const path = requirePath(parameters, context, 'setState')
  if (!path) return
  const expr = asString(parameters.expr)
  context.set(path, expr !== undefined ? context.evaluate(expr) : parameters.value)
}

export const toggleStateHandler: ActionHandler = ({ parameters, context }) => {
  const path = requirePath(parameters, context, 'toggleState')
  if (!path) return
  context.set(path, !(asBoolean(context.get(path)) ?? false))
}

export const appendToArrayHandler: ActionHandler = ({ parameters, context }) => {
  const path = requirePath(parameters, context, 'appendToArray')
  if (!path || parameters.value === undefined) return
  context.appendToArray(path, parameters.value)
}

export const removeFromArrayHandler: ActionHandler = ({ parameters, context }) => {
  const path = requirePath(parameters, context, 'removeFromArray')
  if (!path) return
  const index = asNumber(parameters.index)
  if (index !== undefined) context.removeFromArrayAt(path, index)
  else if (parameters.value !== undefined) context.removeFromArray(path, parameters.value)
}

export const toggleInArrayHandler: ActionHandler = ({ parameters, context }) => {
  const path = requirePath(parameters, context, 'toggleInArray')
  if (!path || parameters.value === undefined) return
  context.toggleInArray(path, parameters.value)
}

export const sequenceHandler: ActionHandler = async ({ parameters, context }) => {
  for (const raw of asArray(parameters.steps) ?? []) {
    const parsed = DocumentActionSchema.safeParse(raw)
    if (!parsed.success) {
      context.log(`warn: skipped malformed sequence step`)
      continue
    }
    await context.executeDefinition(resolveAction(parsed.data))
  }
}

export const dismissHandler: ActionHandler = ({ context }) => context.executeDefinition({ type: 'dismiss' })

export const navigateHandler: ActionHandler = ({ parameters, context }) => {
  const destination = asString(parameters.destination)
  if (!destination) return
  const presentation = asString(parameters.presentation)
  return context.executeDefinition({
    type: 'navigate',
    destination,
    presentation: presentation === 'present' || presentation === 'fullScreen' ? presentation : 'push',
  })
}

export const showAlertHandler: ActionHandler = ({ parameters, context }) => {
  const title = asString(parameters.title) ?? ''
  const message = asString(parameters.message)
  return context.executeDefinition({
    type: 'showAlert',
    title: context.interpolate(title),
    message: message === undefined ? undefined : { kind: 'template', value: message },
    buttons: [{ label: 'OK', style: 'default' }],
  })
}

export function createDefaultActionRegistry(): Registry<ActionHandler> {
  return new Registry<ActionHandler>()
    .register('setState', setStateHandler)
    .register('toggleState', toggleStateHandler)
    .register('sequence', sequenceHandler)
    .register('appendToArray', appendToArrayHandler)
    .register('removeFromArray', removeFromArrayHandler)
    .register('toggleInArray', toggleInArrayHandler)
    .register('dismiss', dismissHandler)
    .register('navigate', navigateHandler)
    .register('showAlert', showAlertHandler)
}
