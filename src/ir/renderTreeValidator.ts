import Ajv2020 from 'ajv/dist/2020'
import addFormats from 'ajv-formats'
import type { ErrorObject, ValidateFunction } from 'ajv'
import type { ValidationResult } from '../document/parseDocument'
import type { StateMap } from '../state/stateValue'
import type { ActionDefinition, RenderTree, RootNode } from './irTypes'

import schema from './renderTree.schema.json'

/** Serializable form of a render tree: the live store is replaced by its snapshot. */
export type RenderTreeJson = {
  root: RootNode
  state: StateMap
  actions: Record<string, ActionDefinition>
}

export function renderTreeToJson(tree: RenderTree): RenderTreeJson {
  return { root: tree.root, state: tree.stateStore.snapshot(), actions: tree.actions }
}

let _validate: ValidateFunction | null = null
let _initError: string | null = null

function compiledValidator(): ValidateFunction | string {
  if (!_validate && !_initError) {
    try {
      const ajv = new Ajv2020({ allErrors: true, strict: false })
      addFormats(ajv)
      _validate = ajv.compile(schema)
    } catch (e) {
      _initError = e instanceof Error ? e.message : String(e)
    }
  }
  return _validate ?? `Validator init failed: ${_initError ?? 'unknown error'}`
}

export function validateRenderTree(tree: RenderTree): ValidationResult<RenderTreeJson> {
  const validate = compiledValidator()
  if (typeof validate === 'string') return { ok: false, error: validate }

  const json = renderTreeToJson(tree)
  if (validate(json)) return { ok: true, value: json }

  const errs: ErrorObject[] = validate.errors ?? []
  const brief = errs
    .slice(0, 6)
    .map((e) => `${e.instancePath || '(root)'} ${e.message || ''}`.trim())
    .join('\n')
  return { ok: false, error: brief || 'Schema validation failed', issues: errs }
}
