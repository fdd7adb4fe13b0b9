import type { z } from 'zod'
import { DocumentSchema, type Document } from './documentTypes'

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; issues?: unknown[] }

const MAX_BRIEF_ISSUES = 6

export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .slice(0, MAX_BRIEF_ISSUES)
    .map((i) => `${i.path.length ? i.path.join('.') : '(root)'} ${i.message}`.trim())
    .join('\n')
}

export function parseDocument(raw: unknown): ValidationResult<Document> {
  const parsed = DocumentSchema.safeParse(raw)
  if (parsed.success) return { ok: true, value: parsed.data }
  return {
    ok: false,
    error: formatIssues(parsed.error.issues) || 'Document validation failed',
    issues: parsed.error.issues,
  }
}
