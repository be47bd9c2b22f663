/**
 * Геометрия циферблата: угол и координаты для каждой ступени.
 * Индикатор сдвинут внутрь диска, подписи — наружу.
 */
import { ordinalOf, type FanSpeed } from './fanSpeed'

export const RADIUS_OFFSET_LABEL = 30
export const RADIUS_OFFSET_INDICATOR = -35

// OFF смотрит влево-вниз, каждая следующая ступень +45°
const START_ANGLE = Math.PI * (9 / 8)
const STEP_ANGLE = Math.PI / 4

export interface Point {
  x: number
  y: number
}

export function angleFor(speed: FanSpeed): number {
  return START_ANGLE + ordinalOf(speed) * STEP_ANGLE
}

export function positionFor(speed: FanSpeed, radius: number, width: number, height: number): Point {
  const angle = angleFor(speed)
  return {
    x: radius * Math.cos(angle) + width / 2,
    y: radius * Math.sin(angle) + height / 2,
  }
}

export function dialRadius(width: number, height: number): number {
  return (Math.min(width, height) / 2) * 0.8
}
