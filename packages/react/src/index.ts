/**
 * @roimark/react
 *
 * React bindings for the roimark annotation editor
 *
 * 구성:
 * - useAnnotationEditor: 렌더 상태 구독 + 로드 폴링 + 명령 콜백
 * - useEditorKeyboard: 전역 단축키 (Escape, Delete, Undo/Redo)
 * - AnnotationToolbar: 도구 선택 + 편집 명령 툴바
 */

export const VERSION = '0.1.0';

// Types
export type { ToolDefinition, ToolbarOrientation } from './types';

// Hooks
export {
  useAnnotationEditor,
  useEditorKeyboard,
  DEFAULT_POLL_INTERVAL_MS,
  type UseAnnotationEditorOptions,
  type UseAnnotationEditorReturn,
  type UseEditorKeyboardOptions,
} from './hooks';

// Components
export {
  AnnotationToolbar,
  DEFAULT_TOOLS,
  type AnnotationToolbarProps,
} from './components/AnnotationToolbar';

// Utils
export { cn, isTextInputFocused } from './utils';
