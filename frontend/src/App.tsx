/**
 * App.tsx — корневой компонент демо-приложения.
 */
import { DialPage } from '@/pages/DialPage'

export default function App() {
  return (
    <div className="flex flex-col min-h-dvh bg-bg-primary">
      <DialPage />
    </div>
  )
}
