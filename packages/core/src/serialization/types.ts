/**
 * Serialization Type Definitions
 *
 * 파일 포맷 스키마 (JSON/YAML 공통)
 * 필드 순서 = 선언 순서 = 출력 순서
 */

import type { AnnotationKind } from '../model/types';

// =============================================================================
// File Formats
// =============================================================================

/**
 * 지원 파일 포맷
 */
export type ProjectFormat = 'json' | 'yaml';

/**
 * 확장자 → 포맷 매핑 (소문자, 점 포함)
 */
export const FORMAT_EXTENSIONS: Readonly<Record<string, ProjectFormat>> = {
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
};

// =============================================================================
// Records
// =============================================================================

/**
 * JSON 꼭짓점 표현
 */
export interface VertexRecord {
  x: number;
  y: number;
}

/**
 * YAML 꼭짓점 표현 ([x, y] 쌍)
 */
export type VertexPair = [number, number];

/**
 * 직렬화된 어노테이션
 */
export interface AnnotationRecord<TVertex = VertexRecord> {
  name: string;
  type: AnnotationKind;
  vertices: TVertex[];
}

/**
 * 직렬화된 프로젝트 (파일 루트)
 */
export interface ProjectRecord<TVertex = VertexRecord> {
  media_file: string;
  frame_width: number;
  frame_height: number;
  annotations: AnnotationRecord<TVertex>[];
}

// =============================================================================
// Results
// =============================================================================

/**
 * 작업 결과 (내보내기/파일 작업 공통)
 */
export interface OperationResult {
  /** 성공 여부 */
  success: boolean;
  /** 에러 목록 */
  errors: string[];
  /** 경고 목록 */
  warnings: string[];
}
