import type { Config } from 'tailwindcss'

export default {
  content: ['./index.html', './frontend/src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        'bg-primary': '#0A0A0F',
        'text-secondary': '#8A8A9A',
        'brand-primary': '#6C63FF',
      },
    },
  },
  plugins: [],
} satisfies Config
