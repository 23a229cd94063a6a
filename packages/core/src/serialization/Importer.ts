/**
 * Project Importer
 *
 * 프로젝트 데이터 가져오기
 *
 * 책임:
 * - JSON/YAML 파싱
 * - 구조 검증 (실패 시 부분 프로젝트를 만들지 않음)
 * - ProjectRecord → Project 변환
 * - 커밋 게이트 미달 어노테이션 스킵
 */

import { parse as parseYaml } from 'yaml';
import { Annotation } from '../model/Annotation';
import { Project } from '../model/Project';
import type { Point } from '../model/types';
import { ANNOTATION_KINDS, MIN_COMMITTED_VERTICES, isAnnotationKind } from '../model/types';
import type { ProjectFormat } from './types';

// =============================================================================
// Import Result
// =============================================================================

/**
 * 가져오기 결과
 */
export interface ImportResult {
  /** 성공 여부 */
  success: boolean;
  /** 가져온 프로젝트 (실패 시 null) */
  project: Project | null;
  /** 에러 목록 */
  errors: string[];
  /** 경고 목록 */
  warnings: string[];
  /** 스킵된 어노테이션 개수 */
  skippedCount: number;
}

// =============================================================================
// Importer Class
// =============================================================================

/**
 * 프로젝트 가져오기 클래스
 */
export class Importer {
  /**
   * JSON 문자열에서 가져오기
   */
  fromJSON(jsonString: string): ImportResult {
    let data: unknown;
    try {
      data = JSON.parse(jsonString);
    } catch (e) {
      return this.failure([`JSON parse error: ${errorMessage(e)}`]);
    }

    return this.import(data);
  }

  /**
   * YAML 문자열에서 가져오기
   *
   * 인라인 꼭짓점 리스트는 표준 YAML이므로 별도 처리 없음
   */
  fromYAML(yamlString: string): ImportResult {
    let data: unknown;
    try {
      data = parseYaml(yamlString);
    } catch (e) {
      return this.failure([`YAML parse error: ${errorMessage(e)}`]);
    }

    return this.import(data);
  }

  /**
   * 포맷별 디코딩
   */
  decode(text: string, format: ProjectFormat): ImportResult {
    switch (format) {
      case 'json':
        return this.fromJSON(text);
      case 'yaml':
        return this.fromYAML(text);
    }
  }

  /**
   * 파싱된 데이터에서 가져오기
   */
  import(data: unknown): ImportResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    // 1. 루트 구조 검증
    if (!isRecord(data)) {
      return this.failure(['Root must be a mapping']);
    }

    const mediaFile = data['media_file'];
    const frameWidth = data['frame_width'];
    const frameHeight = data['frame_height'];
    const rawAnnotations = data['annotations'];

    if (typeof mediaFile !== 'string') {
      errors.push('media_file must be a string');
    }
    if (!isDimension(frameWidth)) {
      errors.push('frame_width must be a non-negative integer');
    }
    if (!isDimension(frameHeight)) {
      errors.push('frame_height must be a non-negative integer');
    }
    if (!Array.isArray(rawAnnotations)) {
      errors.push('annotations must be a sequence');
    }

    if (
      errors.length > 0 ||
      typeof mediaFile !== 'string' ||
      !isDimension(frameWidth) ||
      !isDimension(frameHeight) ||
      !Array.isArray(rawAnnotations)
    ) {
      return this.failure(errors);
    }

    // 2. 어노테이션 변환 (구조 오류는 전체 실패)
    const annotations: Annotation[] = [];
    let skippedCount = 0;

    rawAnnotations.forEach((raw: unknown, index: number) => {
      const annotation = this.convertAnnotation(raw, index, errors);
      if (!annotation) {
        return;
      }

      if (annotation.vertexCount() < MIN_COMMITTED_VERTICES) {
        skippedCount++;
        warnings.push(
          `annotations[${index}] ("${annotation.name}") has ${annotation.vertexCount()} vertices, skipped`
        );
        return;
      }

      if (annotation.vertices.some((p) => !isNormalized(p))) {
        warnings.push(`annotations[${index}] ("${annotation.name}") has coordinates outside [0, 1]`);
      }

      annotations.push(annotation);
    });

    if (errors.length > 0) {
      return this.failure(errors);
    }

    return {
      success: true,
      project: new Project(mediaFile, frameWidth, frameHeight, annotations),
      errors,
      warnings,
      skippedCount,
    };
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  /**
   * 단일 어노테이션 변환
   *
   * @returns 구조 오류면 null (errors에 기록)
   */
  private convertAnnotation(raw: unknown, index: number, errors: string[]): Annotation | null {
    const prefix = `annotations[${index}]`;

    if (!isRecord(raw)) {
      errors.push(`${prefix} must be a mapping`);
      return null;
    }

    const name = raw['name'];
    const type = raw['type'];
    const rawVertices = raw['vertices'];
    let valid = true;

    if (typeof name !== 'string') {
      errors.push(`${prefix}.name must be a string`);
      valid = false;
    }
    if (!isAnnotationKind(type)) {
      errors.push(`${prefix}.type must be one of ${ANNOTATION_KINDS.join(', ')}`);
      valid = false;
    }
    if (!Array.isArray(rawVertices)) {
      errors.push(`${prefix}.vertices must be a sequence`);
      valid = false;
    }

    if (!valid || typeof name !== 'string' || !isAnnotationKind(type) || !Array.isArray(rawVertices)) {
      return null;
    }

    const annotation = new Annotation(name, type);
    for (let i = 0; i < rawVertices.length; i++) {
      const point = toPoint(rawVertices[i]);
      if (!point) {
        errors.push(`${prefix}.vertices[${i}] must be {x, y} or [x, y] with finite numbers`);
        return null;
      }
      annotation.addVertex(point);
    }

    return annotation;
  }

  /**
   * 실패 결과 생성
   */
  private failure(errors: string[]): ImportResult {
    return {
      success: false,
      project: null,
      errors,
      warnings: [],
      skippedCount: 0,
    };
  }
}

/**
 * 기본 가져오기 인스턴스
 */
export const importer = new Importer();

// =============================================================================
// Helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDimension(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isNormalized(p: Point): boolean {
  return p.x >= 0 && p.x <= 1 && p.y >= 0 && p.y <= 1;
}

/**
 * 꼭짓점 표현 정규화 ({x, y} 또는 [x, y])
 */
function toPoint(raw: unknown): Point | null {
  if (Array.isArray(raw)) {
    const [x, y] = raw;
    return raw.length === 2 && isFiniteNumber(x) && isFiniteNumber(y) ? { x, y } : null;
  }

  if (isRecord(raw)) {
    const x = raw['x'];
    const y = raw['y'];
    return isFiniteNumber(x) && isFiniteNumber(y) ? { x, y } : null;
  }

  return null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
