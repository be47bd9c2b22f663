/**
 * drawDial — последовательность отрисовки циферблата:
 * диск, индикатор текущей ступени, подписи всех ступеней.
 */
import { COLOR_BLACK, COLOR_GRAY, type DialColors } from './colors'
import { FAN_SPEEDS, labelOf, type FanSpeed, type LabelId } from './fanSpeed'
import { positionFor, RADIUS_OFFSET_INDICATOR, RADIUS_OFFSET_LABEL } from './geometry'

export interface DialPaint {
  style: 'fill' | 'stroke'
  color: number
  textSize: number
  fontWeight: 'normal' | 'bold'
  textAlign: 'left' | 'center' | 'right'
}

export interface DialCanvas {
  drawCircle(cx: number, cy: number, radius: number, paint: Readonly<DialPaint>): void
  drawText(text: string, x: number, y: number, paint: Readonly<DialPaint>): void
}

export interface DialDrawState {
  speed: FanSpeed
  radius: number
  width: number
  height: number
  colors: Readonly<DialColors>
}

export type LabelResolver = (id: LabelId) => string

export function createDialPaint(): DialPaint {
  return {
    style: 'fill',
    color: COLOR_BLACK,
    textSize: 55,
    fontWeight: 'bold',
    textAlign: 'center',
  }
}

export function fillColorFor(speed: FanSpeed, colors: Readonly<DialColors>): number {
  switch (speed) {
    case 'OFF':
      return COLOR_GRAY
    case 'LOW':
      return colors.low
    case 'MEDIUM':
      return colors.medium
    case 'HIGH':
      return colors.high
  }
}

export function drawDial(
  canvas: DialCanvas,
  state: DialDrawState,
  resolveLabel: LabelResolver,
  paint: DialPaint = createDialPaint(),
): void {
  const { speed, radius, width, height, colors } = state

  paint.color = fillColorFor(speed, colors)
  canvas.drawCircle(width / 2, height / 2, radius, paint)

  const marker = positionFor(speed, radius + RADIUS_OFFSET_INDICATOR, width, height)
  paint.color = COLOR_BLACK
  canvas.drawCircle(marker.x, marker.y, radius / 12, paint)

  // Подписи рисуются той же краской, что и индикатор
  const labelRadius = radius + RADIUS_OFFSET_LABEL
  for (const s of FAN_SPEEDS) {
    const pos = positionFor(s, labelRadius, width, height)
    canvas.drawText(resolveLabel(labelOf(s)), pos.x, pos.y, paint)
  }
}
