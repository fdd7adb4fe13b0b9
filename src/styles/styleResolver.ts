import { StyleSchema, type Padding, type Style } from '../document/documentTypes'
import { silentLogSink, tagged, type LogSink } from '../logging/log'

export type ResolvedStyle = Omit<Style, 'inherits'>

export type EdgeInsets = {
  top: number
  leading: number
  bottom: number
  trailing: number
}

/** External source of shared styles, addressed as `@name` from documents. */
export type DesignSystemProvider = {
  resolveStyle: (ref: string) => ResolvedStyle | undefined
}

export const DESIGN_SYSTEM_PREFIX = '@'

export type StyleResolverOptions = {
  designSystem?: DesignSystemProvider
  log?: LogSink
  strict?: boolean
}

type StyleKey = keyof ResolvedStyle

const STYLE_KEYS: StyleKey[] = StyleSchema.keyof().options.filter((k): k is StyleKey => k !== 'inherits')

export class StyleResolver {
  private readonly log: (msg: string) => void

  constructor(
    private readonly styles: Record<string, Style> = {},
    private readonly options: StyleResolverOptions = {},
  ) {
    this.log = tagged(options.log ?? silentLogSink, 'styles')
  }

  resolve(styleId?: string): ResolvedStyle {
    if (!styleId) return {}
    if (styleId.startsWith(DESIGN_SYSTEM_PREFIX)) return this.fromDesignSystem(styleId)

    const style = this.styles[styleId]
    if (!style) {
      if (this.options.strict) this.log(`warn: missing style ${styleId}`)
      return {}
    }
    return this.resolveChain(style, new Set([styleId]))
  }

  /** Named style with a per-usage override applied last. */
  resolveWith(styleId: string | undefined, inline?: Style): ResolvedStyle {
    const base = this.resolve(styleId)
    return inline ? mergeStyles(base, this.resolveInline(inline)) : base
  }

  resolveInline(style: Style): ResolvedStyle {
    return this.resolveChain(style, new Set())
  }

  private fromDesignSystem(ref: string): ResolvedStyle {
    const name = ref.slice(DESIGN_SYSTEM_PREFIX.length)
    const style = this.options.designSystem?.resolveStyle(name)
    if (!style && this.options.strict) this.log(`warn: design system has no style ${name}`)
    return style ?? {}
  }

  private resolveChain(style: Style, visited: Set<string>): ResolvedStyle {
    let base: ResolvedStyle = {}
    const parentId = style.inherits
    if (parentId) {
      if (parentId.startsWith(DESIGN_SYSTEM_PREFIX)) {
        base = this.fromDesignSystem(parentId)
      } else if (visited.has(parentId)) {
        this.log(`inheritance cycle at ${parentId}`)
      } else {
        const parent = this.styles[parentId]
        if (parent) {
          visited.add(parentId)
          base = this.resolveChain(parent, visited)
        } else if (this.options.strict) {
          this.log(`warn: missing parent style ${parentId}`)
        }
      }
    }
    return mergeStyles(base, style)
  }
}

/**
 * Fields defined on `over` replace those on `base`. A `shadow` or `padding`
 * object with no defined fields clears the inherited one.
 */
export function mergeStyles(base: ResolvedStyle, over: Style): ResolvedStyle {
  const out: ResolvedStyle = { ...base }
  for (const key of STYLE_KEYS) copyDefined(out, over, key)
  if (over.shadow && isBlank(over.shadow)) delete out.shadow
  if (over.padding && isBlank(over.padding)) delete out.padding
  return out
}

function copyDefined<K extends StyleKey>(out: ResolvedStyle, src: ResolvedStyle, key: K) {
  const v = src[key]
  if (v !== undefined) out[key] = v
}

function isBlank(v: object): boolean {
  return Object.values(v).every((field) => field === undefined)
}

export function resolvePadding(padding?: Padding): EdgeInsets {
  return {
    top: padding?.top ?? padding?.vertical ?? 0,
    leading: padding?.leading ?? padding?.horizontal ?? 0,
    bottom: padding?.bottom ?? padding?.vertical ?? 0,
    trailing: padding?.trailing ?? padding?.horizontal ?? 0,
  }
}
