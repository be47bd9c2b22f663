/**
 * Настройки демо-циферблата из переменных окружения Vite.
 */
import type { DialAttributes } from '@/components/dial/colors'
import { DEFAULT_LOCALE, isLocale, type Locale } from '@/resources/strings'

// Палитра совпадает с индикаторами риска: зелёный → оранжевый → красный
export const dialColors: DialAttributes = {
  lowColor: import.meta.env.VITE_DIAL_LOW_COLOR || '#00D4AA',
  mediumColor: import.meta.env.VITE_DIAL_MEDIUM_COLOR || '#FFA502',
  highColor: import.meta.env.VITE_DIAL_HIGH_COLOR || '#FF4757',
}

const envLocale = import.meta.env.VITE_DIAL_LOCALE ?? ''

export const dialLocale: Locale = isLocale(envLocale) ? envLocale : DEFAULT_LOCALE
