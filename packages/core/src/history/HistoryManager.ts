/**
 * History Manager
 *
 * 스냅샷 기반 Undo/Redo 관리
 *
 * 책임:
 * - 변경 직전 상태(스냅샷) 기록
 * - Undo/Redo 시 현재 상태와 스냅샷 교환
 * - 히스토리 스택 크기 관리
 *
 * 스냅샷 규칙:
 * - 각 Undo 항목 = 그 항목을 push한 작업 "직전"의 전체 상태
 * - 호출자는 변경 전에 push, 변경은 그 다음 (순서 반대 금지)
 * - 드래그처럼 연속된 변경은 시작 시 한 번만 push
 */

// =============================================================================
// Types
// =============================================================================

/**
 * HistoryManager 옵션
 */
export interface HistoryManagerOptions<TState> {
  /** 최대 Undo 스택 크기 (기본: 50) */
  maxSize?: number;
  /**
   * 상태 복사 함수
   *
   * 스택에 들어가는 모든 상태에 적용 - 라이브 상태와 별칭이 생기지 않음
   * (기본: 그대로 저장)
   */
  clone?: (state: TState) => TState;
  /** 변경 콜백 */
  onChange?: (canUndo: boolean, canRedo: boolean) => void;
}

/**
 * 히스토리 상태 정보
 */
export interface HistoryState {
  undoCount: number;
  redoCount: number;
  canUndo: boolean;
  canRedo: boolean;
}

/**
 * 기본 최대 히스토리 크기
 */
export const DEFAULT_HISTORY_SIZE = 50;

// =============================================================================
// History Manager
// =============================================================================

/**
 * 히스토리 관리자
 *
 * 두 개의 스택 (Undo, Redo) - 크기 제한은 Undo 스택에만 적용
 */
export class HistoryManager<TState> {
  /** Undo 스택 (마지막 원소가 가장 최근) */
  private undoStack: TState[] = [];

  /** Redo 스택 (마지막 원소가 가장 최근) */
  private redoStack: TState[] = [];

  /** 최대 히스토리 크기 */
  private readonly maxSize: number;

  /** 상태 복사 함수 */
  private readonly clone: (state: TState) => TState;

  /** 변경 콜백 */
  private readonly onChange?: (canUndo: boolean, canRedo: boolean) => void;

  constructor(options: HistoryManagerOptions<TState> = {}) {
    this.maxSize = Math.max(1, options.maxSize ?? DEFAULT_HISTORY_SIZE);
    this.clone = options.clone ?? ((state) => state);
    this.onChange = options.onChange;
  }

  // ---------------------------------------------------------------------------
  // 기록
  // ---------------------------------------------------------------------------

  /**
   * 변경 직전 상태 기록
   *
   * 새 작업은 Redo 타임라인을 무효화
   */
  push(snapshot: TState): void {
    this.redoStack = [];
    this.undoStack.push(this.clone(snapshot));

    // 스택 크기 제한 (가장 오래된 항목부터 제거)
    this.trimStack();

    this.notifyChange();
  }

  // ---------------------------------------------------------------------------
  // Undo/Redo
  // ---------------------------------------------------------------------------

  canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  /**
   * Undo 실행
   *
   * @param current - 현재 라이브 상태 (Redo 스택으로 이동)
   * @returns 이전 상태 또는 null (스택 비어 있음 - 호출자는 아무것도 바꾸면 안 됨)
   */
  undo(current: TState): TState | null {
    const previous = this.undoStack.pop();
    if (previous === undefined) {
      return null;
    }

    this.redoStack.push(this.clone(current));
    this.notifyChange();

    return previous;
  }

  /**
   * Redo 실행
   *
   * @param current - 현재 라이브 상태 (Undo 스택으로 이동)
   * @returns 다음 상태 또는 null
   */
  redo(current: TState): TState | null {
    const next = this.redoStack.pop();
    if (next === undefined) {
      return null;
    }

    this.undoStack.push(this.clone(current));
    this.trimStack();
    this.notifyChange();

    return next;
  }

  // ---------------------------------------------------------------------------
  // 스택 관리
  // ---------------------------------------------------------------------------

  /**
   * 히스토리 초기화 (프로젝트 교체 시)
   */
  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
    this.notifyChange();
  }

  /**
   * 현재 상태 정보
   */
  getState(): HistoryState {
    return {
      undoCount: this.undoStack.length,
      redoCount: this.redoStack.length,
      canUndo: this.canUndo(),
      canRedo: this.canRedo(),
    };
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  /**
   * 스택 크기 제한 - 바닥(가장 오래된 항목)부터 제거
   */
  private trimStack(): void {
    while (this.undoStack.length > this.maxSize) {
      this.undoStack.shift();
    }
  }

  private notifyChange(): void {
    if (this.onChange) {
      this.onChange(this.canUndo(), this.canRedo());
    }
  }
}
