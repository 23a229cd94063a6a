/**
 * useEditorKeyboard - 전역 단축키 훅
 *
 * window keydown → resolveKeyCommand → 에디터 명령
 * 처리된 키는 preventDefault (브라우저 뒤로가기 등 방지)
 */

import { useEffect } from 'react';
import { resolveKeyCommand } from '@roimark/core';
import type { AnnotationEditor } from '@roimark/core';

/**
 * useEditorKeyboard 옵션
 */
export interface UseEditorKeyboardOptions {
  /** 활성화 여부 (기본 true) */
  enabled?: boolean;
}

export function useEditorKeyboard(
  editor: AnnotationEditor,
  { enabled = true }: UseEditorKeyboardOptions = {}
): void {
  useEffect(() => {
    if (!enabled) return;

    const handleKeyDown = (event: KeyboardEvent) => {
      const command = resolveKeyCommand(event.key, event);
      if (!command) return;

      // 텍스트 편집 중에는 Escape만 에디터로 전달
      if (command !== 'escape' && editor.isKeyboardSuppressed()) return;

      let handled = false;
      switch (command) {
        case 'escape':
          editor.escape();
          handled = true;
          break;
        case 'delete':
          handled = editor.deleteKey();
          break;
        case 'undo':
          handled = editor.undo();
          break;
        case 'redo':
          handled = editor.redo();
          break;
      }

      if (handled) {
        event.preventDefault();
      }
    };

    window.addEventListener('keydown', handleKeyDown);
    return () => window.removeEventListener('keydown', handleKeyDown);
  }, [editor, enabled]);
}
