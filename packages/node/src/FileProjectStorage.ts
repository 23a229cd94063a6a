/**
 * File Project Storage
 *
 * 로컬 파일 시스템 기반 어노테이션 파일 저장소 (UTF-8)
 */

import { access, mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, isAbsolute, resolve } from 'path';
import { AnnotationIoError } from '@roimark/core';
import type { ProjectStorage } from '@roimark/core';

/**
 * FileProjectStorage 옵션
 */
export interface FileProjectStorageOptions {
  /** 저장 시 상위 디렉토리 자동 생성 (기본: true) */
  createDirectories?: boolean;
}

export class FileProjectStorage implements ProjectStorage {
  private readonly createDirectories: boolean;

  constructor(options: FileProjectStorageOptions = {}) {
    this.createDirectories = options.createDirectories ?? true;
  }

  async readText(path: string): Promise<string> {
    try {
      return await readFile(path, 'utf8');
    } catch (e) {
      throw toIoError(e, 'Failed to read file', path);
    }
  }

  async writeText(path: string, text: string): Promise<void> {
    try {
      if (this.createDirectories) {
        await mkdir(dirname(path), { recursive: true });
      }
      await writeFile(path, text, 'utf8');
    } catch (e) {
      throw toIoError(e, 'Failed to write file', path);
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * 상대 경로 media_file은 어노테이션 파일 위치 기준으로 해석
   */
  resolveMediaPath(annotationPath: string, mediaFile: string): string {
    if (isAbsolute(mediaFile)) {
      return mediaFile;
    }
    return resolve(dirname(annotationPath), mediaFile);
  }
}

function toIoError(error: unknown, action: string, path: string): AnnotationIoError {
  const message = error instanceof Error ? error.message : String(error);
  return new AnnotationIoError(`${action}: ${message}`, 'IO', path);
}
