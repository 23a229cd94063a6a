/**
 * Project
 *
 * 원본 이미지 참조 + 어노테이션 컬렉션
 *
 * 책임:
 * - 어노테이션의 유일한 소유자 (다른 컴포넌트는 인덱스로만 참조)
 * - 커밋 게이트 (꼭짓점 2개 미만 거부)
 * - 스냅샷 생성/설치 (HistoryManager용)
 */

import { Annotation } from './Annotation';
import { MIN_COMMITTED_VERTICES } from './types';

export class Project {
  /** 원본 이미지 경로 */
  mediaFile: string;

  /** 원본 이미지 너비 (픽셀) */
  frameWidth: number;

  /** 원본 이미지 높이 (픽셀) */
  frameHeight: number;

  /** 커밋된 어노테이션들 (순서 유지) */
  annotations: Annotation[];

  constructor(mediaFile: string, frameWidth: number, frameHeight: number, annotations: Annotation[] = []) {
    this.mediaFile = mediaFile;
    this.frameWidth = frameWidth;
    this.frameHeight = frameHeight;
    this.annotations = annotations;
  }

  /**
   * 빈 프로젝트 생성 (이미지 로드 직후)
   */
  static create(mediaFile: string, frameWidth: number, frameHeight: number): Project {
    return new Project(mediaFile, frameWidth, frameHeight);
  }

  // ---------------------------------------------------------------------------
  // Read
  // ---------------------------------------------------------------------------

  annotationCount(): number {
    return this.annotations.length;
  }

  getAnnotation(index: number): Annotation | undefined {
    return this.hasIndex(index) ? this.annotations[index] : undefined;
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  /**
   * 어노테이션 커밋
   *
   * @returns 꼭짓점이 부족하면 false (추가하지 않음)
   */
  commitAnnotation(annotation: Annotation): boolean {
    if (annotation.vertexCount() < MIN_COMMITTED_VERTICES) {
      return false;
    }
    this.annotations.push(annotation);
    return true;
  }

  /**
   * 어노테이션 삭제
   *
   * @returns 삭제된 어노테이션 또는 null (범위 밖)
   */
  removeAnnotation(index: number): Annotation | null {
    if (!this.hasIndex(index)) {
      return null;
    }
    const [removed] = this.annotations.splice(index, 1);
    return removed;
  }

  // ---------------------------------------------------------------------------
  // Snapshots
  // ---------------------------------------------------------------------------

  /**
   * 어노테이션 컬렉션 깊은 복사
   */
  snapshotAnnotations(): Annotation[] {
    return cloneAnnotations(this.annotations);
  }

  /**
   * 컬렉션 통째로 교체 (undo/redo 결과 설치)
   *
   * 입력은 복사해서 보관 - 호출자가 가진 배열과 별칭이 생기지 않음
   */
  replaceAnnotations(annotations: readonly Annotation[]): void {
    this.annotations = cloneAnnotations(annotations);
  }

  clone(): Project {
    return new Project(this.mediaFile, this.frameWidth, this.frameHeight, this.snapshotAnnotations());
  }

  private hasIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.annotations.length;
  }
}

/**
 * 어노테이션 배열 깊은 복사
 */
export function cloneAnnotations(annotations: readonly Annotation[]): Annotation[] {
  return annotations.map((annotation) => annotation.clone());
}
