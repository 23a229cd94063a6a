/**
 * useAnnotationEditor - 에디터 상태 구독 + 로드 폴링 훅
 *
 * - useSyncExternalStore로 렌더 상태 구독 (변경 시에만 리렌더)
 * - 로드 중에는 pollIntervalMs 간격으로 editor.poll() 호출
 * - 명령 콜백은 useCallback으로 참조 안정화
 */

import { useCallback, useEffect, useMemo, useSyncExternalStore } from 'react';
import type { AnnotationEditor, EditorRenderState, EditorTool, OperationResult } from '@roimark/core';

/**
 * useAnnotationEditor 옵션
 */
export interface UseAnnotationEditorOptions {
  /** 로드 중 폴링 간격 (ms, 기본 16) */
  pollIntervalMs?: number;
}

/**
 * useAnnotationEditor 반환 타입
 */
export interface UseAnnotationEditorReturn {
  /** 현재 렌더 상태 */
  state: EditorRenderState;
  setTool: (tool: EditorTool) => void;
  undo: () => boolean;
  redo: () => boolean;
  deleteSelected: () => boolean;
  finishAnnotation: () => boolean;
  cancelAnnotation: () => boolean;
  selectAnnotation: (index: number | null) => boolean;
  renameAnnotation: (index: number, name: string) => boolean;
  openImage: (path: string) => void;
  loadAnnotations: (path: string) => boolean;
  exportAnnotations: (path: string) => Promise<OperationResult>;
}

export const DEFAULT_POLL_INTERVAL_MS = 16;

/**
 * 에디터 바인딩 훅
 *
 * @example
 * ```tsx
 * const { state, setTool, undo } = useAnnotationEditor(editor);
 *
 * <AnnotationToolbar
 *   activeTool={state.tool}
 *   onToolChange={setTool}
 *   canUndo={state.canUndo}
 *   onUndo={undo}
 * />
 * ```
 */
export function useAnnotationEditor(
  editor: AnnotationEditor,
  { pollIntervalMs = DEFAULT_POLL_INTERVAL_MS }: UseAnnotationEditorOptions = {}
): UseAnnotationEditorReturn {
  const subscribe = useCallback((onStoreChange: () => void) => editor.subscribe(onStoreChange), [editor]);
  const getSnapshot = useCallback(() => editor.getRenderState(), [editor]);

  const state = useSyncExternalStore(subscribe, getSnapshot, getSnapshot);

  // 로드 중에만 폴링 (결과 수신 → isLoading false → 정리)
  useEffect(() => {
    if (!state.isLoading) return;

    const intervalId = setInterval(() => {
      if (editor.needsContinuousPolling()) {
        editor.poll();
      }
    }, pollIntervalMs);

    return () => clearInterval(intervalId);
  }, [editor, state.isLoading, pollIntervalMs]);

  const setTool = useCallback((tool: EditorTool) => editor.setTool(tool), [editor]);
  const undo = useCallback(() => editor.undo(), [editor]);
  const redo = useCallback(() => editor.redo(), [editor]);
  const deleteSelected = useCallback(() => editor.deleteSelected(), [editor]);
  const finishAnnotation = useCallback(() => editor.finishAnnotation(), [editor]);
  const cancelAnnotation = useCallback(() => editor.cancelAnnotation(), [editor]);
  const selectAnnotation = useCallback((index: number | null) => editor.selectAnnotation(index), [editor]);
  const renameAnnotation = useCallback(
    (index: number, name: string) => editor.renameAnnotation(index, name),
    [editor]
  );
  const openImage = useCallback((path: string) => editor.openImage(path), [editor]);
  const loadAnnotations = useCallback((path: string) => editor.loadAnnotations(path), [editor]);
  const exportAnnotations = useCallback((path: string) => editor.exportAnnotations(path), [editor]);

  return useMemo(
    () => ({
      state,
      setTool,
      undo,
      redo,
      deleteSelected,
      finishAnnotation,
      cancelAnnotation,
      selectAnnotation,
      renameAnnotation,
      openImage,
      loadAnnotations,
      exportAnnotations,
    }),
    [
      state,
      setTool,
      undo,
      redo,
      deleteSelected,
      finishAnnotation,
      cancelAnnotation,
      selectAnnotation,
      renameAnnotation,
      openImage,
      loadAnnotations,
      exportAnnotations,
    ]
  );
}
