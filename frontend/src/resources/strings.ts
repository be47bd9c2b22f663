/**
 * Строковые ресурсы подписей циферблата.
 */
import type { LabelId } from '@/components/dial/fanSpeed'

export type Locale = 'ru' | 'en'

export const DEFAULT_LOCALE: Locale = 'ru'

const STRINGS: Record<Locale, Record<LabelId, string>> = {
  ru: {
    fan_off: 'выкл',
    fan_low: '1',
    fan_medium: '2',
    fan_high: '3',
  },
  en: {
    fan_off: 'off',
    fan_low: '1',
    fan_medium: '2',
    fan_high: '3',
  },
}

export function isLocale(value: string): value is Locale {
  return value === 'ru' || value === 'en'
}

export function getString(id: LabelId, locale: Locale = DEFAULT_LOCALE): string {
  return STRINGS[locale][id]
}

export function createLabelResolver(locale: Locale = DEFAULT_LOCALE): (id: LabelId) => string {
  return (id) => getString(id, locale)
}
