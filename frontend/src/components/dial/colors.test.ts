import { afterEach, describe, expect, it, vi } from 'vitest'
import { COLOR_GRAY, parseColor, resolveDialColors, toCssColor } from './colors'

describe('parseColor', () => {
  it('accepts unsigned ARGB integers as is', () => {
    expect(parseColor(0xff00ff00)).toBe(0xff00ff00)
    expect(parseColor(0)).toBe(0)
  })

  it('normalises signed 32-bit integers', () => {
    expect(parseColor(-16711936)).toBe(0xff00ff00)
  })

  it('reads #RRGGBB as opaque and #AARRGGBB verbatim', () => {
    expect(parseColor('#FFFF00')).toBe(0xffffff00)
    expect(parseColor('#80ff0000')).toBe(0x80ff0000)
    expect(parseColor(' #00d4aa ')).toBe(0xff00d4aa)
  })

  it('rejects anything else', () => {
    expect(parseColor('red')).toBeNull()
    expect(parseColor('#fff')).toBeNull()
    expect(parseColor(1.5)).toBeNull()
    expect(parseColor(0x100000000)).toBeNull()
  })
})

describe('toCssColor', () => {
  it('drops alpha for opaque colors', () => {
    expect(toCssColor(COLOR_GRAY)).toBe('rgb(136, 136, 136)')
    expect(toCssColor(0xff00ff00)).toBe('rgb(0, 255, 0)')
  })

  it('keeps alpha for translucent colors', () => {
    expect(toCssColor(0)).toBe('rgba(0, 0, 0, 0)')
    expect(toCssColor(0x80ff0000)).toBe('rgba(255, 0, 0, 0.502)')
  })
})

describe('resolveDialColors', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('reads all three attributes', () => {
    expect(
      resolveDialColors({ lowColor: 0xff00ff00, mediumColor: '#FFFF00', highColor: '#FFFF0000' })
    ).toEqual({ low: 0xff00ff00, medium: 0xffffff00, high: 0xffff0000 })
  })

  it('falls back to transparent for missing values', () => {
    expect(resolveDialColors({ mediumColor: 0xffffff00 })).toEqual({
      low: 0,
      medium: 0xffffff00,
      high: 0,
    })
  })

  it('falls back to transparent and warns for unparseable values', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    expect(resolveDialColors({ highColor: 'crimson' }).high).toBe(0)
    expect(warn).toHaveBeenCalledWith('FanDial: unsupported highColor "crimson", using transparent')
  })

  it('freezes the result', () => {
    expect(Object.isFrozen(resolveDialColors({}))).toBe(true)
  })
})
