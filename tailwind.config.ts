import type { Config } from 'tailwindcss'
import { resolve, dirname } from 'path'
import { fileURLToPath } from 'url'

// ESM에서 __dirname 대체 (Windows 호환)
const __dirname = dirname(fileURLToPath(import.meta.url))

export default {
  content: [resolve(__dirname, 'packages/react/src/**/*.{ts,tsx}')],
  darkMode: 'class',
  theme: {
    extend: {
      colors: {
        // 에디터 배경
        editor: {
          bg: '#101418',
          surface: '#1a1f26',
          panel: '#2a313c',
        },
        // 액센트
        accent: {
          primary: '#3a6ea5',
          danger: '#f08080',
        },
        // 어노테이션 도형
        shape: {
          region: '#4cc38a',
          line: '#f5a524',
          selected: '#4cf',
        },
        // 텍스트
        text: {
          primary: '#ffffff',
          secondary: '#aaaaaa',
          disabled: '#555555',
        },
        // 테두리
        border: {
          DEFAULT: 'rgba(255, 255, 255, 0.15)',
          active: '#5a8aba',
        },
      },
      fontSize: {
        'xs': ['11px', '15px'],
        'sm': ['12px', '16px'],
        'base': ['13px', '18px'],
        'lg': ['14px', '20px'],
      },
      borderRadius: {
        'sm': '2px',
        'DEFAULT': '3px',
        'md': '4px',
      },
      transitionDuration: {
        '150': '150ms',
      },
    },
  },
  plugins: [],
} satisfies Config
