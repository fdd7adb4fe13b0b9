import { stringifyValue, type StateValue } from '../state/stateValue'

/** Read-only view of state that expressions are evaluated against. */
export type StateReader = {
  getValue: (path: string) => StateValue | undefined
  getArray: (path: string) => StateValue[] | undefined
  arrayContains: (path: string, value: StateValue) => boolean
  getArrayCount: (path: string) => number
}

type Match = { value: StateValue | undefined }

const PATH_RE = /^[A-Za-z_][\w]*(?:\.\w+|\[\d+\])*$/
const NUMBER_RE = /^-?\d+(?:\.\d+)?$/
const TEMPLATE_RE = /\$\{([^}]+)\}/g
const PURE_RE = /^\$\{([^}]+)\}$/
const CONTAINS_RE = /^([A-Za-z_][\w]*(?:\.\w+|\[\d+\])*)\.contains\(([\s\S]*)\)$/
const ARITHMETIC_OPS = new Set(['+', '-', '*', '/', '%'])

/**
 * Evaluates an expression string. Tried in order: ternary, dynamic index,
 * array accessors, arithmetic, a single `${...}` span, a bare state path.
 * Anything else is interpolated as a template, so plain text comes back unchanged.
 * Never throws.
 */
export function evaluate(expression: string, reader: StateReader): StateValue | undefined {
  const expr = expression.trim()
  if (!expr) return expr

  const ternary = evalTernary(expr, reader)
  if (ternary) return ternary.value

  const indexed = evalDynamicIndex(expr, reader)
  if (indexed) return indexed.value

  const array = evalArrayExpression(expr, reader)
  if (array) return array.value

  const arithmetic = evalArithmetic(expr, reader)
  if (arithmetic) return arithmetic.value

  const pure = expr.match(PURE_RE)
  if (pure?.[1]) return evaluate(pure[1], reader)

  if (PATH_RE.test(expr)) {
    const v = reader.getValue(expr)
    if (v !== undefined) return v
  }

  return interpolate(expr, reader)
}

/** Replaces every `${...}` span with the display form of its inner expression. */
export function interpolate(template: string, reader: StateReader): string {
  const spans = Array.from(template.matchAll(TEMPLATE_RE))
  let out = template
  for (let i = spans.length - 1; i >= 0; i--) {
    const span = spans[i]
    if (!span || span.index === undefined) continue
    const inner = (span[1] ?? '').trim()
    const replacement = stringifyValue(evalTemplateInner(inner, reader))
    out = out.slice(0, span.index) + replacement + out.slice(span.index + span[0].length)
  }
  return out
}

function evalTemplateInner(inner: string, reader: StateReader): StateValue | undefined {
  return (
    evalTernary(inner, reader) ??
    evalDynamicIndex(inner, reader) ??
    evalArrayExpression(inner, reader) ??
    evalArithmetic(inner, reader) ?? { value: reader.getValue(inner) }
  ).value
}

export function containsExpression(s: string): boolean {
  return /\$\{[^}]+\}/.test(s)
}

export function isPureExpression(s: string): boolean {
  return PURE_RE.test(s.trim())
}

export function unwrapExpression(s: string): string {
  const m = s.trim().match(PURE_RE)
  return m?.[1] ? m[1].trim() : s
}

/** State paths a template reads directly, in order of first appearance. */
export function extractTemplatePaths(template: string): string[] {
  const out: string[] = []
  for (const span of template.matchAll(TEMPLATE_RE)) {
    const inner = (span[1] ?? '').trim()
    const base = arrayBasePath(inner) ?? (PATH_RE.test(inner) ? inner : undefined)
    if (base && !out.includes(base)) out.push(base)
  }
  return out
}

function arrayBasePath(expr: string): string | undefined {
  const contains = expr.match(CONTAINS_RE)
  if (contains?.[1]) return contains[1]
  for (const suffix of ['.count', '.isEmpty', '.first', '.last']) {
    if (expr.endsWith(suffix)) {
      const base = expr.slice(0, -suffix.length)
      return PATH_RE.test(base) ? base : undefined
    }
  }
  return undefined
}

// --- ternary ---

function findTernary(expr: string): { question: number; colon: number } | null {
  let quote: string | null = null
  let question = -1
  for (let i = 0; i < expr.length; i++) {
    const ch = expr[i]
    if (quote) {
      if (ch === quote) quote = null
      continue
    }
    if (ch === '"' || ch === "'") {
      quote = ch
      continue
    }
    if (ch === '?' && question === -1) question = i
    else if (ch === ':' && question !== -1) return { question, colon: i }
  }
  return null
}

function hasUnquotedWhitespace(s: string): boolean {
  let quote: string | null = null
  for (const ch of s) {
    if (quote) {
      if (ch === quote) quote = null
    } else if (ch === '"' || ch === "'") {
      quote = ch
    } else if (/\s/.test(ch)) {
      return true
    }
  }
  return false
}

function stripQuotes(s: string): string {
  const t = s.trim()
  if (t.length >= 2 && (t[0] === '"' || t[0] === "'") && t[t.length - 1] === t[0]) return t.slice(1, -1)
  return t
}

function evalTernary(expr: string, reader: StateReader): Match | null {
  const split = findTernary(expr)
  if (!split) return null
  const condition = expr.slice(0, split.question).trim()
  // Prose such as "Are you ready? Go: now" is not a ternary; `! flag` still is.
  const subject = condition.replace(/^(!\s*)+/, '')
  if (!subject || hasUnquotedWhitespace(subject)) return null

  const whenTrue = stripQuotes(expr.slice(split.question + 1, split.colon))
  const whenFalse = stripQuotes(expr.slice(split.colon + 1))
  return { value: evalCondition(condition, reader) ? whenTrue : whenFalse }
}

function evalCondition(condition: string, reader: StateReader): boolean {
  const array = evalArrayExpression(condition, reader)
  if (array && typeof array.value === 'boolean') return array.value

  const v = reader.getValue(condition)
  if (typeof v === 'boolean') return v

  const lower = condition.toLowerCase()
  if (lower === 'true') return true
  if (lower === 'false') return false

  if (condition.startsWith('!')) return !evalCondition(condition.slice(1).trim(), reader)
  return false
}

// --- arrays ---

function evalDynamicIndex(expr: string, reader: StateReader): Match | null {
  if (!expr.endsWith(']')) return null
  let depth = 0
  let open = -1
  for (let i = expr.length - 1; i >= 0; i--) {
    const ch = expr[i]
    if (ch === ']') depth++
    else if (ch === '[') {
      depth--
      if (depth === 0) {
        open = i
        break
      }
    }
  }
  if (open <= 0) return null

  const path = expr.slice(0, open)
  if (/\s/.test(path) || !PATH_RE.test(path.replace(/\[[^\]]*\]/g, '[0]'))) return null

  const indexExpr = expr.slice(open + 1, -1).trim()
  const index = /^\d+$/.test(indexExpr) ? Number(indexExpr) : evaluate(indexExpr, reader)
  if (typeof index !== 'number' || !Number.isInteger(index) || index < 0) return { value: undefined }
  return { value: reader.getValue(`${path}[${index}]`) }
}

function evalArrayExpression(expr: string, reader: StateReader): Match | null {
  const contains = expr.match(CONTAINS_RE)
  if (contains?.[1] !== undefined && contains[2] !== undefined) {
    const path = contains[1]
    const arg = contains[2].trim()
    const quoted = arg.match(/^'([\s\S]*)'$/) ?? arg.match(/^"([\s\S]*)"$/)
    let needle: StateValue | undefined
    if (quoted) needle = quoted[1] ?? ''
    else needle = reader.getValue(arg)
    if (needle === undefined) return null
    return { value: reader.arrayContains(path, needle) }
  }

  for (const suffix of ['.count', '.isEmpty', '.first', '.last'] as const) {
    if (!expr.endsWith(suffix)) continue
    const path = expr.slice(0, -suffix.length)
    if (!PATH_RE.test(path)) return null

    const items = reader.getArray(path)
    if (!items) {
      // `user.count` may be an ordinary field rather than an accessor.
      if (reader.getValue(expr) !== undefined) return null
      if (suffix === '.count') return { value: 0 }
      if (suffix === '.isEmpty') return { value: true }
      return { value: undefined }
    }
    switch (suffix) {
      case '.count':
        return { value: items.length }
      case '.isEmpty':
        return { value: items.length === 0 }
      case '.first':
        return { value: items[0] }
      case '.last':
        return { value: items[items.length - 1] }
    }
  }
  return null
}

// --- arithmetic ---

function findTopLevelOperator(expr: string): number {
  let depth = 0
  let quote: string | null = null
  let found = -1
  for (let i = 0; i < expr.length; i++) {
    const ch = expr[i]
    if (quote) {
      if (ch === quote) quote = null
      continue
    }
    if (ch === '"' || ch === "'") quote = ch
    else if (ch === '(' || ch === '{') depth++
    else if (ch === ')' || ch === '}') depth--
    else if (depth === 0 && ch && ARITHMETIC_OPS.has(ch) && expr[i - 1] === ' ' && expr[i + 1] === ' ') found = i
  }
  return found
}

function wrapsWhole(s: string): boolean {
  if (!s.startsWith('(') || !s.endsWith(')')) return false
  let depth = 0
  for (let i = 0; i < s.length; i++) {
    if (s[i] === '(') depth++
    else if (s[i] === ')') {
      depth--
      if (depth === 0 && i < s.length - 1) return false
    }
  }
  return depth === 0
}

function evalArithmetic(expr: string, reader: StateReader): Match | null {
  const at = findTopLevelOperator(expr)
  if (at === -1) return null

  const op = expr[at]
  const left = resolveOperand(expr.slice(0, at).trim(), reader)
  const right = resolveOperand(expr.slice(at + 1).trim(), reader)
  if (left === undefined || right === undefined) return null

  const integral = Number.isInteger(left) && Number.isInteger(right)
  let result: number
  switch (op) {
    case '+':
      result = left + right
      break
    case '-':
      result = left - right
      break
    case '*':
      result = left * right
      break
    case '/':
      if (right === 0) return null
      result = integral ? Math.trunc(left / right) : left / right
      break
    case '%':
      if (right === 0) return null
      result = left % right
      break
    default:
      return null
  }
  return { value: result === 0 ? 0 : result }
}

function resolveOperand(s: string, reader: StateReader): number | undefined {
  if (!s) return undefined
  if (wrapsWhole(s)) return resolveOperand(s.slice(1, -1).trim(), reader)

  const pure = s.match(PURE_RE)
  if (pure?.[1]) return resolveOperand(pure[1].trim(), reader)

  const nested = evalArithmetic(s, reader)
  if (nested) return typeof nested.value === 'number' ? nested.value : undefined

  if (NUMBER_RE.test(s)) return Number(s)
  if (!PATH_RE.test(s)) return undefined

  const array = evalArrayExpression(s, reader)
  if (array && typeof array.value === 'number') return array.value

  const v = reader.getValue(s)
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined
}
