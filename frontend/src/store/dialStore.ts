/**
 * Zustand store для одного циферблата.
 * Создаётся на каждый экземпляр FanDial, а не глобально.
 */
import { createStore } from 'zustand/vanilla'
import type { DialColors } from '@/components/dial/colors'
import type { LabelResolver } from '@/components/dial/drawDial'
import { labelOf, nextSpeed, type FanSpeed } from '@/components/dial/fanSpeed'
import { dialRadius } from '@/components/dial/geometry'

export interface ActivateResult {
  speed: FanSpeed
  contentDescription: string
  handled: true
}

export interface DialState {
  speed: FanSpeed
  width: number
  height: number
  radius: number
  colors: Readonly<DialColors>
  contentDescription: string | null
  revision: number
  resize: (width: number, height: number) => number
  activate: () => ActivateResult
}

export interface DialStoreOptions {
  colors: Readonly<DialColors>
  resolveLabel: LabelResolver
  width: number
  height: number
}

export function createDialStore({ colors, resolveLabel, width, height }: DialStoreOptions) {
  return createStore<DialState>()((set, get) => ({
    speed: 'OFF',
    width,
    height,
    radius: dialRadius(width, height),
    colors,
    contentDescription: null,
    revision: 0,

    resize: (newWidth, newHeight) => {
      const radius = dialRadius(newWidth, newHeight)
      set({ width: newWidth, height: newHeight, radius })
      return radius
    },

    activate: () => {
      const speed = nextSpeed(get().speed)
      const contentDescription = resolveLabel(labelOf(speed))
      set((state) => ({ speed, contentDescription, revision: state.revision + 1 }))
      return { speed, contentDescription, handled: true }
    },
  }))
}

export type DialStore = ReturnType<typeof createDialStore>
