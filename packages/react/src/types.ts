/**
 * @roimark/react 공통 타입 정의
 */

import type { EditorTool } from '@roimark/core';

/**
 * 툴바 도구 정의
 */
export interface ToolDefinition {
  /** 에디터 도구 */
  id: EditorTool;
  /** 표시 이름 */
  name: string;
  /** 아이콘 (문자열) */
  icon?: string;
  /** 도구 설명 (툴팁용) */
  description?: string;
}

/**
 * 툴바 방향
 */
export type ToolbarOrientation = 'horizontal' | 'vertical';
