/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_DIAL_LOW_COLOR?: string
  readonly VITE_DIAL_MEDIUM_COLOR?: string
  readonly VITE_DIAL_HIGH_COLOR?: string
  readonly VITE_DIAL_LOCALE?: string
}

