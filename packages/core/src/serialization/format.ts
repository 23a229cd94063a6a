/**
 * 파일 확장자 기반 포맷 판별
 *
 * 알 수 없는 확장자는 에러 - 기본 포맷으로 대체하지 않음
 */

import { AnnotationIoError } from '../errors';
import { FORMAT_EXTENSIONS, type ProjectFormat } from './types';

/**
 * 경로의 확장자 (소문자, 점 포함) - 없으면 빈 문자열
 */
export function getExtension(path: string): string {
  const fileName = path.split(/[\\/]/).pop() ?? '';
  const dot = fileName.lastIndexOf('.');
  return dot > 0 ? fileName.slice(dot).toLowerCase() : '';
}

/**
 * 포맷 판별 (실패 시 null)
 */
export function tryDetectFormat(path: string): ProjectFormat | null {
  return FORMAT_EXTENSIONS[getExtension(path)] ?? null;
}

/**
 * 포맷 판별
 *
 * @throws AnnotationIoError (UNSUPPORTED_EXTENSION)
 */
export function detectFormat(path: string): ProjectFormat {
  const format = tryDetectFormat(path);
  if (!format) {
    throw unsupportedExtensionError(path);
  }
  return format;
}

/**
 * 지원하지 않는 확장자 에러 생성
 */
export function unsupportedExtensionError(path: string): AnnotationIoError {
  const extension = getExtension(path) || '(none)';
  return new AnnotationIoError(
    `Unsupported annotation file extension: ${extension} (expected .json, .yaml or .yml)`,
    'UNSUPPORTED_EXTENSION',
    path
  );
}
