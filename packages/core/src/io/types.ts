/**
 * External Collaborator Interfaces
 *
 * 에디터가 소비하는 외부 구현 (이미지 디코딩, 파일 입출력)
 * Node 구현은 @roimark/node 참고
 */

// =============================================================================
// Image Loader
// =============================================================================

/**
 * 디코딩된 이미지
 *
 * 원본 포맷/비트 깊이와 무관하게 8-bit RGBA
 */
export interface DecodedImage {
  /** 너비 (픽셀) */
  width: number;
  /** 높이 (픽셀) */
  height: number;
  /** RGBA 픽셀 버퍼 (length = width * height * 4) */
  pixels: Uint8Array;
}

/**
 * 이미지 로더
 *
 * 실패 시 reject (가능하면 AnnotationIoError - DECODE / MISSING_MEDIA)
 */
export interface ImageLoader {
  load(path: string): Promise<DecodedImage>;
}

// =============================================================================
// Project Storage
// =============================================================================

/**
 * 어노테이션 파일 저장소
 */
export interface ProjectStorage {
  /** UTF-8 텍스트 읽기 */
  readText(path: string): Promise<string>;
  /** UTF-8 텍스트 쓰기 */
  writeText(path: string, text: string): Promise<void>;
  /** 파일 존재 여부 */
  exists(path: string): Promise<boolean>;
  /**
   * 어노테이션 파일 기준 이미지 경로 해석 (선택적)
   *
   * 없으면 media_file 값을 그대로 사용
   */
  resolveMediaPath?(annotationPath: string, mediaFile: string): string;
}
