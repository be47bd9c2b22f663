/**
 * FanSpeed — четыре ступени скорости вентилятора и переход по кругу.
 */

export const FAN_SPEEDS = ['OFF', 'LOW', 'MEDIUM', 'HIGH'] as const

export type FanSpeed = (typeof FAN_SPEEDS)[number]

// Ключи строковых ресурсов, не сами строки
export type LabelId = 'fan_off' | 'fan_low' | 'fan_medium' | 'fan_high'

const LABELS: Record<FanSpeed, LabelId> = {
  OFF: 'fan_off',
  LOW: 'fan_low',
  MEDIUM: 'fan_medium',
  HIGH: 'fan_high',
}

export function nextSpeed(speed: FanSpeed): FanSpeed {
  switch (speed) {
    case 'OFF':
      return 'LOW'
    case 'LOW':
      return 'MEDIUM'
    case 'MEDIUM':
      return 'HIGH'
    case 'HIGH':
      return 'OFF'
  }
}

export function labelOf(speed: FanSpeed): LabelId {
  return LABELS[speed]
}

export function ordinalOf(speed: FanSpeed): number {
  return FAN_SPEEDS.indexOf(speed)
}
