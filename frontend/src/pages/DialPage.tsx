/**
 * DialPage — страница с переключателем скорости вентилятора.
 */
import { useState } from 'react'
import { motion } from 'framer-motion'
import { FanDial } from '@/components/dial/FanDial'
import { labelOf, type FanSpeed } from '@/components/dial/fanSpeed'
import { dialColors, dialLocale } from '@/config/dialConfig'
import { getString } from '@/resources/strings'

export function DialPage() {
  const [speed, setSpeed] = useState<FanSpeed>('OFF')

  return (
    <div className="flex flex-col items-center gap-8 px-4 pt-12 pb-8">
      <div className="text-center">
        <h1 className="text-xl font-bold text-white">Вентилятор</h1>
        <p className="text-text-secondary text-sm mt-1">Нажмите на диск, чтобы сменить скорость</p>
      </div>

      <div className="p-12">
        <FanDial width={240} height={240} {...dialColors} locale={dialLocale} onSpeedChange={setSpeed} />
      </div>

      {/* Current speed */}
      <motion.span
        key={speed}
        initial={{ opacity: 0.5, y: -4 }}
        animate={{ opacity: 1, y: 0 }}
        transition={{ duration: 0.2 }}
        className="num text-3xl font-semibold text-white"
        data-testid="speed-caption"
      >
        {getString(labelOf(speed), dialLocale)}
      </motion.span>
    </div>
  )
}
