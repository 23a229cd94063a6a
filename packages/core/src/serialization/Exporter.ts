/**
 * Project Exporter
 *
 * 프로젝트 데이터 내보내기
 *
 * 책임:
 * - Project → ProjectRecord 변환 (필드 순서 고정)
 * - JSON 직렬화 (2칸 들여쓰기)
 * - YAML 직렬화 (일반 인코딩 후 꼭짓점 인라인 변환)
 */

import { stringify } from 'yaml';
import type { Project } from '../model/Project';
import type { ProjectFormat, ProjectRecord, VertexPair } from './types';
import { inlineVertexSequences } from './yamlFlowVertices';

// =============================================================================
// Exporter Class
// =============================================================================

/**
 * 프로젝트 내보내기 클래스
 */
export class Exporter {
  /**
   * 프로젝트를 파일 스키마 객체로 변환
   */
  toRecord(project: Project): ProjectRecord {
    return {
      media_file: project.mediaFile,
      frame_width: project.frameWidth,
      frame_height: project.frameHeight,
      annotations: project.annotations.map((annotation) => ({
        name: annotation.name,
        type: annotation.kind,
        vertices: annotation.vertices.map((p) => ({ x: p.x, y: p.y })),
      })),
    };
  }

  /**
   * JSON 문자열로 변환 (pretty print)
   */
  toJSON(project: Project): string {
    return JSON.stringify(this.toRecord(project), null, 2);
  }

  /**
   * YAML 문자열로 변환
   *
   * 1. 꼭짓점을 [x, y] 시퀀스로 바꿔 일반 인코딩
   * 2. 블록 시퀀스를 인라인 리스트로 재작성
   */
  toYAML(project: Project): string {
    const record = this.toRecord(project);
    const pairRecord: ProjectRecord<VertexPair> = {
      ...record,
      annotations: record.annotations.map((annotation) => ({
        ...annotation,
        vertices: annotation.vertices.map((v): VertexPair => [v.x, v.y]),
      })),
    };

    return inlineVertexSequences(stringify(pairRecord));
  }

  /**
   * 포맷별 인코딩
   */
  encode(project: Project, format: ProjectFormat): string {
    switch (format) {
      case 'json':
        return this.toJSON(project);
      case 'yaml':
        return this.toYAML(project);
    }
  }
}

/**
 * 기본 내보내기 인스턴스
 */
export const exporter = new Exporter();
