/**
 * Цвета циферблата в формате ARGB (0xAARRGGBB) и их разбор из атрибутов.
 */

export const COLOR_TRANSPARENT = 0
export const COLOR_GRAY = 0xff888888
export const COLOR_BLACK = 0xff000000

export type ColorAttribute = number | string

export interface DialAttributes {
  lowColor?: ColorAttribute
  mediumColor?: ColorAttribute
  highColor?: ColorAttribute
}

export interface DialColors {
  low: number
  medium: number
  high: number
}

const HEX_COLOR = /^#([0-9a-f]{6}|[0-9a-f]{8})$/i

export function parseColor(value: ColorAttribute): number | null {
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < -0x80000000 || value > 0xffffffff) return null
    return value >>> 0
  }
  const match = HEX_COLOR.exec(value.trim())
  if (!match) return null
  const hex = match[1]
  const rgb = parseInt(hex, 16)
  // #RRGGBB — непрозрачный
  return hex.length === 6 ? 0xff000000 + rgb : rgb
}

export function toCssColor(argb: number): string {
  const a = (argb >>> 24) & 0xff
  const r = (argb >>> 16) & 0xff
  const g = (argb >>> 8) & 0xff
  const b = argb & 0xff
  if (a === 0xff) return `rgb(${r}, ${g}, ${b})`
  return `rgba(${r}, ${g}, ${b}, ${Math.round((a / 255) * 1000) / 1000})`
}

function readColor(name: keyof DialAttributes, value: ColorAttribute | undefined): number {
  if (value === undefined) return COLOR_TRANSPARENT
  const parsed = parseColor(value)
  if (parsed === null) {
    if (import.meta.env.DEV) {
      console.warn(`FanDial: unsupported ${name} "${String(value)}", using transparent`)
    }
    return COLOR_TRANSPARENT
  }
  return parsed
}

export function resolveDialColors(attrs: DialAttributes): Readonly<DialColors> {
  return Object.freeze({
    low: readColor('lowColor', attrs.lowColor),
    medium: readColor('mediumColor', attrs.mediumColor),
    high: readColor('highColor', attrs.highColor),
  })
}
