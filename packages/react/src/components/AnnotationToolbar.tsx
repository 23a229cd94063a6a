/**
 * AnnotationToolbar - 도구 선택 + 편집 명령 툴바
 *
 * 도구 버튼 (선택/다각형/선)과 Undo, Redo, 삭제 버튼
 * 명령 버튼의 활성화 상태는 렌더 상태를 따름
 */

import type { CSSProperties } from 'react';
import type { EditorTool } from '@roimark/core';
import type { ToolDefinition, ToolbarOrientation } from '../types';
import { cn } from '../utils';

/**
 * 기본 제공 도구 정의
 */
export const DEFAULT_TOOLS: ToolDefinition[] = [
  {
    id: 'select',
    name: 'Select',
    icon: '↖',
    description: 'Select, drag or remove vertices',
  },
  {
    id: 'polygon',
    name: 'Polygon',
    icon: '⬠',
    description: 'Draw a closed region (double-click to finish)',
  },
  {
    id: 'line',
    name: 'Line',
    icon: '⟋',
    description: 'Draw an open line (Escape to finish)',
  },
];

/**
 * AnnotationToolbar Props
 */
export interface AnnotationToolbarProps {
  /** 표시할 도구 목록 (기본: DEFAULT_TOOLS) */
  tools?: ToolDefinition[];
  /** 현재 도구 */
  activeTool: EditorTool;
  /** 도구 선택 콜백 */
  onToolChange: (tool: EditorTool) => void;
  /** Undo 가능 여부 */
  canUndo?: boolean;
  /** Redo 가능 여부 */
  canRedo?: boolean;
  /** 삭제 가능 여부 (선택된 어노테이션 있음) */
  canDelete?: boolean;
  onUndo?: () => void;
  onRedo?: () => void;
  onDelete?: () => void;
  /** 로드 중이면 모든 버튼 비활성화 */
  disabled?: boolean;
  /** 툴바 방향 */
  orientation?: ToolbarOrientation;
  /** 컴팩트 모드 (아이콘만 표시) */
  compact?: boolean;
  /** 커스텀 스타일 */
  style?: CSSProperties;
  /** 커스텀 클래스명 */
  className?: string;
}

const BUTTON_BASE =
  'flex items-center justify-center gap-1 rounded-md border-2 transition-all duration-150';

/**
 * AnnotationToolbar
 *
 * @example
 * ```tsx
 * const { state, setTool, undo, redo, deleteSelected } = useAnnotationEditor(editor);
 *
 * <AnnotationToolbar
 *   activeTool={state.tool}
 *   onToolChange={setTool}
 *   canUndo={state.canUndo}
 *   canRedo={state.canRedo}
 *   canDelete={state.selectedIndex !== null}
 *   onUndo={undo}
 *   onRedo={redo}
 *   onDelete={deleteSelected}
 *   disabled={state.isLoading}
 * />
 * ```
 */
export function AnnotationToolbar({
  tools = DEFAULT_TOOLS,
  activeTool,
  onToolChange,
  canUndo = false,
  canRedo = false,
  canDelete = false,
  onUndo,
  onRedo,
  onDelete,
  disabled = false,
  orientation = 'horizontal',
  compact = false,
  style,
  className,
}: AnnotationToolbarProps) {
  const isHorizontal = orientation === 'horizontal';
  const sizeClass = compact ? 'p-2 min-w-[36px] text-[16px]' : 'py-2 px-3 min-w-[60px] text-base';

  const commands = [
    { key: 'undo', label: 'Undo', icon: '↶', title: 'Undo (Ctrl+Z)', enabled: canUndo, onClick: onUndo },
    { key: 'redo', label: 'Redo', icon: '↷', title: 'Redo (Ctrl+Shift+Z)', enabled: canRedo, onClick: onRedo },
    { key: 'delete', label: 'Delete', icon: '✕', title: 'Delete selected (Del)', enabled: canDelete, onClick: onDelete },
  ];

  return (
    <div
      role="toolbar"
      aria-orientation={orientation}
      className={cn(
        'flex flex-wrap gap-1 p-2 bg-editor-surface rounded-md items-center',
        isHorizontal ? 'flex-row' : 'flex-col',
        className
      )}
      style={style}
    >
      {tools.map((tool) => {
        const isActive = tool.id === activeTool;

        return (
          <button
            key={tool.id}
            type="button"
            onClick={() => onToolChange(tool.id)}
            disabled={disabled}
            aria-pressed={isActive}
            title={tool.description || tool.name}
            className={cn(
              BUTTON_BASE,
              sizeClass,
              isActive
                ? 'bg-accent-primary text-text-primary border-border-active font-bold'
                : 'bg-editor-panel text-text-secondary border-transparent cursor-pointer',
              disabled && 'text-text-disabled cursor-not-allowed opacity-50'
            )}
          >
            {tool.icon && <span>{tool.icon}</span>}
            {!compact && <span>{tool.name}</span>}
          </button>
        );
      })}

      {/* 구분선 */}
      <div className={cn('bg-[#444]', isHorizontal ? 'w-px h-6 mx-1' : 'w-4/5 h-px my-1')} />

      {commands.map((command) => {
        const isDisabled = disabled || !command.enabled || !command.onClick;

        return (
          <button
            key={command.key}
            type="button"
            onClick={command.onClick}
            disabled={isDisabled}
            title={command.title}
            className={cn(
              BUTTON_BASE,
              sizeClass,
              'border-transparent',
              command.key === 'delete' ? 'bg-[#4a2a2a] text-accent-danger' : 'bg-editor-panel text-text-secondary',
              isDisabled ? 'text-text-disabled cursor-not-allowed opacity-50' : 'cursor-pointer'
            )}
          >
            <span>{command.icon}</span>
            {!compact && <span>{command.label}</span>}
          </button>
        );
      })}
    </div>
  );
}
