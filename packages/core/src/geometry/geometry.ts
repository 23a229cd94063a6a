/**
 * Geometry
 *
 * 정규화 좌표 기반 기하 계산
 *
 * 순서 비교만 필요한 곳은 제곱 거리를 사용 (sqrt 생략)
 */

import type { Point } from '../model/types';

// =============================================================================
// Distance
// =============================================================================

export function distanceSquared(a: Point, b: Point): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  return dx * dx + dy * dy;
}

export function distance(a: Point, b: Point): number {
  return Math.sqrt(distanceSquared(a, b));
}

/**
 * 점과 선분 사이 최단 거리의 제곱
 */
export function distanceToSegmentSquared(p: Point, a: Point, b: Point): number {
  const abx = b.x - a.x;
  const aby = b.y - a.y;
  const lengthSquared = abx * abx + aby * aby;

  // 길이 0 선분 = 점
  if (lengthSquared === 0) {
    return distanceSquared(p, a);
  }

  let t = ((p.x - a.x) * abx + (p.y - a.y) * aby) / lengthSquared;
  t = Math.max(0, Math.min(1, t));

  return distanceSquared(p, { x: a.x + t * abx, y: a.y + t * aby });
}

// =============================================================================
// Vertex Picking
// =============================================================================

/**
 * 가장 가까운 꼭짓점 인덱스
 *
 * 동률이면 먼저 나온 (낮은) 인덱스 - 엄격한 < 비교
 *
 * @returns 빈 시퀀스면 null
 */
export function nearestVertex(points: readonly Point[], query: Point): number | null {
  let bestIndex: number | null = null;
  let bestDistance = Infinity;

  for (let i = 0; i < points.length; i++) {
    const d = distanceSquared(points[i], query);
    if (d < bestDistance) {
      bestDistance = d;
      bestIndex = i;
    }
  }

  return bestIndex;
}

/**
 * 임계값 이내에서 가장 가까운 꼭짓점 인덱스
 *
 * @param threshold - 정규화 좌표 단위 (픽셀 아님)
 * @returns 조건을 만족하는 점이 없으면 null
 */
export function vertexWithinThreshold(
  points: readonly Point[],
  query: Point,
  threshold: number
): number | null {
  const limit = threshold * threshold;
  let bestIndex: number | null = null;
  let bestDistance = Infinity;

  for (let i = 0; i < points.length; i++) {
    const d = distanceSquared(points[i], query);
    if (d <= limit && d < bestDistance) {
      bestDistance = d;
      bestIndex = i;
    }
  }

  return bestIndex;
}

// =============================================================================
// Shape Hit Testing
// =============================================================================

/**
 * 점이 다각형 내부에 있는지 (even-odd 규칙)
 *
 * 꼭짓점 3개 미만은 면적이 없으므로 항상 false
 */
export function pointInPolygon(points: readonly Point[], p: Point): boolean {
  if (points.length < 3) {
    return false;
  }

  let inside = false;
  for (let i = 0, j = points.length - 1; i < points.length; j = i++) {
    const a = points[i];
    const b = points[j];
    const crosses = a.y > p.y !== b.y > p.y;
    if (crosses && p.x < ((b.x - a.x) * (p.y - a.y)) / (b.y - a.y) + a.x) {
      inside = !inside;
    }
  }

  return inside;
}

/**
 * 점과 꺾은선(또는 닫힌 다각형 외곽선) 사이 최단 거리의 제곱
 *
 * @returns 꼭짓점이 없으면 Infinity
 */
export function distanceToPathSquared(points: readonly Point[], p: Point, closed: boolean): number {
  if (points.length === 0) {
    return Infinity;
  }
  if (points.length === 1) {
    return distanceSquared(points[0], p);
  }

  let best = Infinity;
  for (let i = 0; i < points.length - 1; i++) {
    best = Math.min(best, distanceToSegmentSquared(p, points[i], points[i + 1]));
  }
  if (closed && points.length > 2) {
    best = Math.min(best, distanceToSegmentSquared(p, points[points.length - 1], points[0]));
  }

  return best;
}

// =============================================================================
// Coordinate Conversion
// =============================================================================

/**
 * 픽셀 좌표 → 정규화 좌표
 */
export function normalizePoint(pixelX: number, pixelY: number, width: number, height: number): Point {
  return {
    x: pixelX / width,
    y: pixelY / height,
  };
}

/**
 * 정규화 좌표 → 픽셀 좌표
 */
export function denormalizePoint(point: Point, width: number, height: number): Point {
  return {
    x: point.x * width,
    y: point.y * height,
  };
}

/**
 * 화면 픽셀 반경 → 정규화 좌표 허용 오차
 *
 * 긴 축으로 나눔 - 어느 축으로도 요청한 픽셀 반경을 넘지 않음
 *
 * @returns 표시 크기가 0 이하면 0
 */
export function pixelToleranceToNormalized(
  radiusPx: number,
  displayWidth: number,
  displayHeight: number
): number {
  const longest = Math.max(displayWidth, displayHeight);
  if (!(longest > 0)) {
    return 0;
  }
  return radiusPx / longest;
}
