/**
 * 키보드 단축키 → 에디터 명령
 */

export type KeyCommand = 'escape' | 'delete' | 'undo' | 'redo';

/**
 * 수정자 키 상태 (KeyboardEvent의 부분집합)
 */
export interface KeyModifiers {
  ctrlKey?: boolean;
  metaKey?: boolean;
  shiftKey?: boolean;
  altKey?: boolean;
}

/**
 * 키 입력을 에디터 명령으로 해석
 *
 * - Escape → escape
 * - Delete / Backspace → delete
 * - Ctrl(Cmd)+Z → undo
 * - Ctrl(Cmd)+Shift+Z, Ctrl(Cmd)+Y → redo
 *
 * @returns 매핑되지 않은 키면 null
 */
export function resolveKeyCommand(key: string, modifiers: KeyModifiers = {}): KeyCommand | null {
  const command = Boolean(modifiers.ctrlKey) || Boolean(modifiers.metaKey);

  if (command && !modifiers.altKey) {
    switch (key.toLowerCase()) {
      case 'z':
        return modifiers.shiftKey ? 'redo' : 'undo';
      case 'y':
        return 'redo';
      default:
        return null;
    }
  }

  if (command || modifiers.altKey) {
    return null;
  }

  switch (key) {
    case 'Escape':
      return 'escape';
    case 'Delete':
    case 'Backspace':
      return 'delete';
    default:
      return null;
  }
}
