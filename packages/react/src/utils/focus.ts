/**
 * 텍스트 입력 포커스 판별
 *
 * AnnotationEditor의 isTextInputActive 옵션에 연결해
 * 이름 편집 중 Delete/Backspace가 어노테이션을 지우지 않게 함
 */

// 텍스트를 받는 input type
const TEXT_INPUT_TYPES = new Set([
  'text',
  'search',
  'email',
  'url',
  'tel',
  'password',
  'number',
]);

/**
 * 현재 포커스가 편집 가능한 텍스트 요소에 있는지
 */
export function isTextInputFocused(doc: Document = document): boolean {
  const element = doc.activeElement;

  if (element instanceof HTMLTextAreaElement) {
    return !element.readOnly && !element.disabled;
  }
  if (element instanceof HTMLInputElement) {
    return TEXT_INPUT_TYPES.has(element.type) && !element.readOnly && !element.disabled;
  }
  if (element instanceof HTMLElement) {
    return element.isContentEditable || element.getAttribute('contenteditable') === 'true';
  }
  return false;
}
