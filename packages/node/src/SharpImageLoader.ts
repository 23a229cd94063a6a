/**
 * Sharp Image Loader
 *
 * 래스터 이미지 → 8-bit RGBA 디코딩 (Node.js)
 *
 * 원본 포맷/비트 깊이/채널 수와 무관하게:
 * 1. sRGB 색공간으로 변환
 * 2. 알파 채널 보장
 * 3. 8-bit raw 픽셀 추출
 */

import { access } from 'fs/promises';
import sharp from 'sharp';
import { AnnotationIoError } from '@roimark/core';
import type { DecodedImage, ImageLoader } from '@roimark/core';

/**
 * SharpImageLoader 옵션
 */
export interface SharpImageLoaderOptions {
  /** 최대 입력 픽셀 수 (sharp limitInputPixels, 기본: sharp 기본값) */
  limitInputPixels?: number;
}

const RGBA_CHANNELS = 4;

export class SharpImageLoader implements ImageLoader {
  private readonly limitInputPixels?: number;

  constructor(options: SharpImageLoaderOptions = {}) {
    this.limitInputPixels = options.limitInputPixels;
  }

  /**
   * 이미지 파일 디코딩
   *
   * @throws AnnotationIoError - MISSING_MEDIA (파일 없음), DECODE (디코딩 실패)
   */
  async load(path: string): Promise<DecodedImage> {
    try {
      await access(path);
    } catch {
      throw new AnnotationIoError('Image file not found', 'MISSING_MEDIA', path);
    }

    try {
      const { data, info } = await sharp(path, { limitInputPixels: this.limitInputPixels })
        .toColourspace('srgb')
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });

      if (info.channels !== RGBA_CHANNELS) {
        throw new Error(`Expected ${RGBA_CHANNELS} channels after conversion, got ${info.channels}`);
      }

      return {
        width: info.width,
        height: info.height,
        pixels: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
      };
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new AnnotationIoError(`Failed to decode image: ${message}`, 'DECODE', path);
    }
  }
}
