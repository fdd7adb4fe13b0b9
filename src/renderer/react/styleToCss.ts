import type { CSSProperties } from 'react'
import type { DimensionValue, FontWeight, TextAlignment } from '../../document/documentTypes'
import type { EdgeInsets, ResolvedStyle } from '../../styles/styleResolver'

const FONT_WEIGHTS: Record<FontWeight, number> = {
  ultraLight: 100,
  thin: 200,
  light: 300,
  regular: 400,
  medium: 500,
  semibold: 600,
  bold: 700,
  heavy: 800,
  black: 900,
}

const TEXT_ALIGN: Record<TextAlignment, CSSProperties['textAlign']> = {
  leading: 'start',
  center: 'center',
  trailing: 'end',
}

function dimension(v: DimensionValue | undefined): number | string | undefined {
  if (v === undefined) return undefined
  if (typeof v === 'number') return v
  if ('absolute' in v) return v.absolute
  return `${v.fractional * 100}%`
}

export function edgeInsetsToCss(insets: EdgeInsets): string | undefined {
  const { top, trailing, bottom, leading } = insets
  if (top === 0 && trailing === 0 && bottom === 0 && leading === 0) return undefined
  return `${top}px ${trailing}px ${bottom}px ${leading}px`
}

/** Inline CSS for a resolved style; undefined when nothing is set. */
export function styleToCss(style: ResolvedStyle, padding?: EdgeInsets): CSSProperties | undefined {
  const css: CSSProperties = {
    fontFamily: style.fontFamily,
    fontSize: style.fontSize,
    fontWeight: style.fontWeight && FONT_WEIGHTS[style.fontWeight],
    color: style.textColor,
    textAlign: style.textAlignment && TEXT_ALIGN[style.textAlignment],
    backgroundColor: style.backgroundColor,
    borderRadius: style.cornerRadius,
    borderWidth: style.borderWidth,
    borderStyle: style.borderWidth !== undefined ? 'solid' : undefined,
    borderColor: style.borderColor,
    accentColor: style.tintColor,
    width: dimension(style.width),
    height: dimension(style.height),
    minWidth: dimension(style.minWidth),
    minHeight: dimension(style.minHeight),
    maxWidth: dimension(style.maxWidth),
    maxHeight: dimension(style.maxHeight),
    padding: padding && edgeInsetsToCss(padding),
  }
  if (style.shadow) {
    const { x = 0, y = 0, radius = 0, color = 'rgba(0,0,0,0.33)' } = style.shadow
    css.boxShadow = `${x}px ${y}px ${radius}px ${color}`
  }

  return Object.values(css).some((v) => v !== undefined) ? css : undefined
}
