/**
 * FanDial — круговой переключатель скорости вентилятора.
 * Каждое нажатие переводит на следующую ступень: выкл → 1 → 2 → 3 → выкл.
 * Цвета и локаль читаются один раз при создании виджета.
 */
import { motion } from 'framer-motion'
import { useEffect, useMemo, useState } from 'react'
import { useStore } from 'zustand'
import { resolveDialColors, type DialAttributes } from './colors'
import { createDialPaint, drawDial } from './drawDial'
import type { FanSpeed } from './fanSpeed'
import { SvgDialCanvas } from './svgCanvas'
import { createDialStore } from '@/store/dialStore'
import { createLabelResolver, DEFAULT_LOCALE, type Locale } from '@/resources/strings'

interface FanDialProps extends DialAttributes {
  width?: number
  height?: number
  locale?: Locale
  onSpeedChange?: (speed: FanSpeed) => void
  className?: string
}

export function FanDial({
  width = 200,
  height = 200,
  lowColor,
  mediumColor,
  highColor,
  locale = DEFAULT_LOCALE,
  onSpeedChange,
  className = '',
}: FanDialProps) {
  const [resolveLabel] = useState(() => createLabelResolver(locale))
  const [store] = useState(() =>
    createDialStore({
      colors: resolveDialColors({ lowColor, mediumColor, highColor }),
      resolveLabel,
      width,
      height,
    })
  )
  const [paint] = useState(createDialPaint)

  const speed = useStore(store, (s) => s.speed)
  const radius = useStore(store, (s) => s.radius)
  const dialWidth = useStore(store, (s) => s.width)
  const dialHeight = useStore(store, (s) => s.height)
  const colors = useStore(store, (s) => s.colors)
  const contentDescription = useStore(store, (s) => s.contentDescription)
  const revision = useStore(store, (s) => s.revision)

  useEffect(() => {
    store.getState().resize(width, height)
  }, [store, width, height])

  const shapes = useMemo(() => {
    const canvas = new SvgDialCanvas()
    drawDial(
      canvas,
      { speed, radius, width: dialWidth, height: dialHeight, colors },
      resolveLabel,
      paint
    )
    return canvas.shapes
  }, [speed, radius, dialWidth, dialHeight, colors, resolveLabel, paint, revision])

  const handleClick = () => {
    const result = store.getState().activate()
    onSpeedChange?.(result.speed)
  }

  return (
    <motion.button
      type="button"
      aria-label={contentDescription ?? undefined}
      onClick={handleClick}
      whileTap={{ scale: 0.96 }}
      transition={{ type: 'spring', stiffness: 400, damping: 30 }}
      className={`inline-flex select-none focus:outline-none focus-visible:ring-2 focus-visible:ring-brand-primary ${className}`}
      style={{ width: dialWidth, height: dialHeight }}
    >
      <svg
        width={dialWidth}
        height={dialHeight}
        viewBox={`0 0 ${dialWidth} ${dialHeight}`}
        overflow="visible"
        aria-hidden="true"
      >
        {shapes.map((shape, i) =>
          shape.kind === 'circle' ? (
            <circle key={i} cx={shape.cx} cy={shape.cy} r={shape.r} fill={shape.fill} stroke={shape.stroke} />
          ) : (
            <text
              key={i}
              x={shape.x}
              y={shape.y}
              fill={shape.fill}
              fontSize={shape.fontSize}
              fontWeight={shape.fontWeight}
              textAnchor={shape.textAnchor}
            >
              {shape.text}
            </text>
          )
        )}
      </svg>
    </motion.button>
  )
}
