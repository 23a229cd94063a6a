/**
 * Annotation
 *
 * 이름과 종류를 가진 정규화 좌표 꼭짓점 시퀀스
 *
 * 책임:
 * - 꼭짓점 추가/수정/삭제 (호출당 최대 한 개)
 * - 범위 밖 인덱스는 false 반환 (throw 하지 않음)
 * - 깊은 복사 (히스토리 스냅샷용)
 */

import type { AnnotationKind, Point } from './types';
import { isFinitePoint } from './types';

export class Annotation {
  /** 표시 이름 (예: "region 1") */
  name: string;

  /** 종류 (생성 후 변경 불가) */
  readonly kind: AnnotationKind;

  /** 꼭짓점들 (삽입 순서 = 연결 순서) */
  private points: Point[] = [];

  constructor(name: string, kind: AnnotationKind, vertices: readonly Point[] = []) {
    this.name = name;
    this.kind = kind;
    for (const vertex of vertices) {
      this.addVertex(vertex);
    }
  }

  // ---------------------------------------------------------------------------
  // Read
  // ---------------------------------------------------------------------------

  /**
   * 꼭짓점 목록 (읽기 전용 뷰)
   */
  get vertices(): readonly Point[] {
    return this.points;
  }

  vertexCount(): number {
    return this.points.length;
  }

  /**
   * 닫힌 도형 여부 - 꼭짓점 수와 무관하게 종류로만 결정
   */
  isClosed(): boolean {
    return this.kind === 'polygon';
  }

  getVertex(index: number): Point | undefined {
    return this.hasIndex(index) ? this.points[index] : undefined;
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  /**
   * 꼭짓점 추가
   *
   * @returns 유한하지 않은 좌표면 false (추가하지 않음)
   */
  addVertex(point: Point): boolean {
    if (!isFinitePoint(point)) {
      return false;
    }
    this.points.push({ x: point.x, y: point.y });
    return true;
  }

  /**
   * 꼭짓점 위치 변경
   *
   * @returns 범위 밖 인덱스 또는 유한하지 않은 좌표면 false
   */
  updateVertex(index: number, point: Point): boolean {
    if (!this.hasIndex(index) || !isFinitePoint(point)) {
      return false;
    }
    this.points[index] = { x: point.x, y: point.y };
    return true;
  }

  /**
   * 꼭짓점 삭제
   *
   * @returns 범위 밖 인덱스면 false
   */
  removeVertex(index: number): boolean {
    if (!this.hasIndex(index)) {
      return false;
    }
    this.points.splice(index, 1);
    return true;
  }

  rename(name: string): void {
    this.name = name;
  }

  /**
   * 깊은 복사
   */
  clone(): Annotation {
    return new Annotation(this.name, this.kind, this.points);
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private hasIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.points.length;
  }
}
