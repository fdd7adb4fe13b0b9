export type ResolutionErrorCode =
  | 'unknown_component_kind'
  | 'unknown_section_kind'
  | 'unknown_data_source'
  | 'invalid_content'
  | 'invalid_document'

/** Structural failure of a resolution pass; the message reads `<code>:<kind>`. */
export class ResolutionError extends Error {
  constructor(
    readonly code: ResolutionErrorCode,
    readonly kind: string,
    readonly detail?: string,
  ) {
    super(detail ? `${code}:${kind} (${detail})` : `${code}:${kind}`)
    this.name = 'ResolutionError'
  }
}
