/**
 * Annotation Model Type Definitions
 *
 * 좌표는 모두 이미지 크기 기준 정규화 좌표 (0.0 ~ 1.0)
 */

// =============================================================================
// Basic Types
// =============================================================================

/**
 * 2D 정규화 좌표점
 *
 * 불변 값 타입 - 수정 대신 새 점을 생성
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * 어노테이션 종류
 *
 * - polygon: 마지막 점과 첫 점이 암묵적으로 연결됨
 * - line: 열린 꺾은선
 */
export type AnnotationKind = 'polygon' | 'line';

/**
 * 어노테이션 종류 목록 (검증용)
 */
export const ANNOTATION_KINDS: readonly AnnotationKind[] = ['polygon', 'line'];

/**
 * 프로젝트에 커밋 가능한 최소 꼭짓점 수
 *
 * 한 번의 클릭만으로는 쓸 수 있는 polygon/line이 아님
 */
export const MIN_COMMITTED_VERTICES = 2;

/**
 * 꼭짓점 위치 참조 (어노테이션 인덱스 + 꼭짓점 인덱스)
 *
 * 참조 대신 인덱스를 사용 - 스냅샷 교체 후에도 유효성 재검증 가능
 */
export interface VertexRef {
  annotationIndex: number;
  vertexIndex: number;
}

// =============================================================================
// Point Helpers
// =============================================================================

/**
 * Point 생성
 *
 * @throws RangeError - 유한하지 않은 좌표
 */
export function createPoint(x: number, y: number): Point {
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    throw new RangeError(`Point coordinates must be finite (got ${x}, ${y})`);
  }
  return Object.freeze({ x, y });
}

/**
 * 두 좌표가 모두 유한한지 (NaN, Infinity 거부)
 */
export function isFinitePoint(point: Point): boolean {
  return Number.isFinite(point.x) && Number.isFinite(point.y);
}

/**
 * 두 점의 정확한 값 비교 (epsilon 없음)
 */
export function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * 어노테이션 종류 타입 가드
 */
export function isAnnotationKind(value: unknown): value is AnnotationKind {
  return value === 'polygon' || value === 'line';
}
