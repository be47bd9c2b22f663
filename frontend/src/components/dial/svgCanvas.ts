/**
 * SvgDialCanvas — холст, который записывает команды рисования
 * как описания SVG-фигур для рендера в React.
 */
import { toCssColor } from './colors'
import type { DialCanvas, DialPaint } from './drawDial'

export interface CircleShape {
  kind: 'circle'
  cx: number
  cy: number
  r: number
  fill: string
  stroke: string
}

export interface TextShape {
  kind: 'text'
  x: number
  y: number
  text: string
  fill: string
  fontSize: number
  fontWeight: DialPaint['fontWeight']
  textAnchor: 'start' | 'middle' | 'end'
}

export type DialShape = CircleShape | TextShape

const TEXT_ANCHOR: Record<DialPaint['textAlign'], TextShape['textAnchor']> = {
  left: 'start',
  center: 'middle',
  right: 'end',
}

export class SvgDialCanvas implements DialCanvas {
  readonly shapes: DialShape[] = []

  drawCircle(cx: number, cy: number, radius: number, paint: Readonly<DialPaint>): void {
    const color = toCssColor(paint.color)
    this.shapes.push({
      kind: 'circle',
      cx,
      cy,
      r: radius,
      fill: paint.style === 'fill' ? color : 'none',
      stroke: paint.style === 'stroke' ? color : 'none',
    })
  }

  drawText(text: string, x: number, y: number, paint: Readonly<DialPaint>): void {
    this.shapes.push({
      kind: 'text',
      x,
      y,
      text,
      fill: toCssColor(paint.color),
      fontSize: paint.textSize,
      fontWeight: paint.fontWeight,
      textAnchor: TEXT_ANCHOR[paint.textAlign],
    })
  }
}
