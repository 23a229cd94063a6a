/**
 * React Hooks for the annotation editor
 */

export { useAnnotationEditor, DEFAULT_POLL_INTERVAL_MS } from './useAnnotationEditor';
export type {
  UseAnnotationEditorOptions,
  UseAnnotationEditorReturn,
} from './useAnnotationEditor';

export { useEditorKeyboard } from './useEditorKeyboard';
export type { UseEditorKeyboardOptions } from './useEditorKeyboard';
