/**
 * Load Channel
 *
 * 백그라운드 로드 결과를 전달하는 단일 슬롯 채널
 *
 * 책임:
 * - 한 번에 하나의 로드만 대기 (새 로드가 이전 로드를 대체)
 * - 세대(generation) 태그로 대체된 로드의 늦은 결과 폐기
 * - 컨트롤러가 사이클마다 poll()로 결과 수신
 *
 * 진행 중인 작업을 중단시키는 신호는 없음 - 버려질 뿐
 */

import { AnnotationIoError } from '../errors';

// =============================================================================
// Types
// =============================================================================

/**
 * 로드 결과
 */
export type LoadOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: AnnotationIoError };

/**
 * LoadChannel 옵션
 */
export interface LoadChannelOptions {
  /** 대체된 로드의 결과가 도착했을 때 콜백 */
  onStale?: (generation: number) => void;
}

// =============================================================================
// Load Channel
// =============================================================================

export class LoadChannel<T> {
  /** 마지막으로 발급한 세대 번호 */
  private generation = 0;

  /** 대기 중인 세대 (없으면 null) */
  private pendingGeneration: number | null = null;

  /** 도착했지만 아직 poll 되지 않은 결과 */
  private slot: LoadOutcome<T> | null = null;

  private readonly onStale?: (generation: number) => void;

  constructor(options: LoadChannelOptions = {}) {
    this.onStale = options.onStale;
  }

  /**
   * 로드 작업 시작
   *
   * 이전에 대기 중이던 로드와 미수신 결과는 버림
   *
   * @returns 이 로드의 세대 번호
   */
  dispatch(job: () => Promise<T>): number {
    const generation = ++this.generation;
    this.pendingGeneration = generation;
    this.slot = null;

    // 동기 throw도 reject로 처리
    void Promise.resolve()
      .then(job)
      .then(
        (value) => this.complete(generation, { ok: true, value }),
        (error: unknown) => this.complete(generation, { ok: false, error: AnnotationIoError.from(error) })
      );

    return generation;
  }

  /**
   * 도착한 결과 수신
   *
   * @returns 결과 또는 null (아직 도착 전 / 대기 중 로드 없음)
   */
  poll(): LoadOutcome<T> | null {
    const outcome = this.slot;
    if (!outcome) {
      return null;
    }

    this.slot = null;
    this.pendingGeneration = null;
    return outcome;
  }

  /**
   * 대기 중인 로드 존재 여부 (도착했지만 poll 전인 경우 포함)
   */
  isPending(): boolean {
    return this.pendingGeneration !== null;
  }

  /**
   * 현재 대기 중인 세대 번호
   */
  getPendingGeneration(): number | null {
    return this.pendingGeneration;
  }

  /**
   * 대기 중인 로드 포기
   */
  reset(): void {
    this.pendingGeneration = null;
    this.slot = null;
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private complete(generation: number, outcome: LoadOutcome<T>): void {
    // 대체되었거나 포기된 로드의 결과
    if (generation !== this.pendingGeneration) {
      this.onStale?.(generation);
      return;
    }

    this.slot = outcome;
  }
}
