/**
 * Annotation Editor Type Definitions
 */

import type { AnnotationKind, Point, VertexRef } from '../model/types';
import type { ImageLoader, ProjectStorage } from '../io/types';

// =============================================================================
// Tools
// =============================================================================

/**
 * 편집 도구
 *
 * - select: 선택, 꼭짓점 드래그/삭제
 * - polygon: 닫힌 다각형 그리기 (더블클릭으로 완료)
 * - line: 열린 꺾은선 그리기 (Escape로 완료)
 */
export type EditorTool = 'select' | 'polygon' | 'line';

/**
 * 그리기 도구 → 어노테이션 종류
 */
export function toolToKind(tool: EditorTool): AnnotationKind | null {
  switch (tool) {
    case 'polygon':
      return 'polygon';
    case 'line':
      return 'line';
    case 'select':
      return null;
  }
}

// =============================================================================
// Pointer Input
// =============================================================================

/**
 * 포인터 버튼
 *
 * - primary: 그리기/선택/드래그
 * - secondary: 선택된 어노테이션의 꼭짓점 삭제
 */
export type PointerButton = 'primary' | 'secondary';

/**
 * 포인터 누름 옵션
 */
export interface PointerDownOptions {
  /** 버튼 (기본: primary) */
  button?: PointerButton;
}

// =============================================================================
// Status Log
// =============================================================================

/**
 * 상태 메시지 레벨
 */
export type StatusLevel = 'info' | 'warning' | 'error';

/**
 * 사용자에게 보여줄 상태 메시지
 */
export interface StatusMessage {
  level: StatusLevel;
  text: string;
  /** 발생 시간 (timestamp) */
  timestamp: number;
}

// =============================================================================
// Render Snapshot
// =============================================================================

/**
 * 렌더링용 어노테이션 (읽기 전용)
 */
export interface RenderAnnotation {
  readonly name: string;
  readonly kind: AnnotationKind;
  readonly vertices: readonly Point[];
  /** 마지막 점 → 첫 점 연결 여부 */
  readonly closed: boolean;
}

/**
 * 렌더러에 매 프레임 제공되는 상태
 *
 * 렌더러는 이 상태를 수정하지 않음
 */
export interface EditorRenderState {
  readonly tool: EditorTool;
  readonly annotations: readonly RenderAnnotation[];
  readonly inProgress: RenderAnnotation | null;
  readonly selectedIndex: number | null;
  readonly dragTarget: Readonly<VertexRef> | null;
  readonly isLoading: boolean;
  readonly canUndo: boolean;
  readonly canRedo: boolean;
  readonly mediaFile: string | null;
  readonly frameSize: { readonly width: number; readonly height: number } | null;
  readonly hasImage: boolean;
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * AnnotationEditor 옵션
 */
export interface AnnotationEditorOptions {
  /** 이미지 로더 */
  imageLoader: ImageLoader;
  /** 어노테이션 파일 저장소 */
  storage: ProjectStorage;
  /** 히스토리 스택 최대 크기 (기본: 50) */
  maxHistorySize?: number;
  /** 꼭짓점/도형 선택 반경 (화면 픽셀, 기본: 8) */
  pickRadiusPx?: number;
  /** 보관할 상태 메시지 수 (기본: 100) */
  maxStatusMessages?: number;
  /** 상태 메시지 콘솔 출력 여부 (기본: true) */
  logToConsole?: boolean;
  /**
   * 다른 UI에서 텍스트 편집 중인지 조회
   *
   * true면 Delete/Backspace 키를 무시 (명시적 삭제 동작은 허용)
   */
  isTextInputActive?: () => boolean;
  /** 상태 메시지 콜백 */
  onStatus?: (message: StatusMessage) => void;
}

/**
 * 기본 설정
 */
export const DEFAULT_EDITOR_CONFIG = {
  maxHistorySize: 50,
  pickRadiusPx: 8,
  maxStatusMessages: 100,
  logToConsole: true,
} as const;
