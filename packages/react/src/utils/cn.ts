import { clsx, type ClassValue } from 'clsx'
import { extendTailwindMerge } from 'tailwind-merge'

/**
 * 커스텀 Tailwind 테마를 인식하는 twMerge 설정
 *
 * tailwind.config.ts의 커스텀 색상을 등록해
 * text-{색상}과 text-{크기}가 서로 지워지지 않게 함
 */
const customTwMerge = extendTailwindMerge({
  extend: {
    theme: {
      // editor, accent, shape, text, border 계열
      colors: [
        'editor-bg',
        'editor-surface',
        'editor-panel',
        'accent-primary',
        'accent-danger',
        'shape-region',
        'shape-line',
        'shape-selected',
        'text-primary',
        'text-secondary',
        'text-disabled',
        'border-active',
      ],
    },
  },
})

/**
 * cn() - 조건부 클래스 병합 유틸리티
 *
 * @example
 * ```tsx
 * cn('px-3 py-2', isActive && 'bg-accent-primary', className)
 * ```
 */
export function cn(...inputs: ClassValue[]): string {
  return customTwMerge(clsx(inputs))
}
