/**
 * YAML 꼭짓점 인라인 변환
 *
 * 일반 직렬화 결과의 블록 시퀀스를 [x, y] 쌍의 인라인 리스트로 재작성
 *
 * 변환 전:
 * ```yaml
 *     vertices:
 *       - - 0.1
 *         - 0.2
 *       - - 0.3
 *         - 0.4
 * ```
 *
 * 변환 후:
 * ```yaml
 *     vertices: [[0.1, 0.2], [0.3, 0.4]]
 * ```
 *
 * 순수 문자열 → 문자열 변환. 패턴에 맞지 않는 블록은 원문 그대로 통과
 * 블록 스칼라(|, >) 본문은 문자열 값이므로 건드리지 않음
 */

const VERTICES_KEY = 'vertices:';
const PAIR_START = '- - ';
const ITEM_START = '- ';

/** 블록 스칼라 헤더로 끝나는 줄 (예: `name: |-`, `- >2`) */
const BLOCK_SCALAR_HEADER = /(?:^|\s)[|>](?:[1-9][-+]?|[-+][1-9]?)?$/;

/** 줄 앞의 들여쓰기와 시퀀스 표시(`- `)들 */
const NODE_PREFIX = /^\s*(?:-\s+)*/;

/**
 * 수집된 꼭짓점 블록
 */
interface VertexBlock {
  /** [x, y] 원문 스칼라 쌍 */
  pairs: Array<[string, string]>;
  /** 블록 다음 줄 인덱스 */
  end: number;
}

/**
 * 모든 `vertices:` 블록을 인라인 리스트로 변환
 */
export function inlineVertexSequences(yaml: string): string {
  const lines = yaml.split('\n');
  const output: string[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i];

    const scalarIndent = blockScalarIndent(line);
    if (scalarIndent !== null) {
      output.push(line);
      i++;
      while (i < lines.length && (lines[i].trim() === '' || indentOf(lines[i]) > scalarIndent)) {
        output.push(lines[i]);
        i++;
      }
      continue;
    }

    if (line.trim() === VERTICES_KEY) {
      const block = readVertexBlock(lines, i);
      if (block) {
        const inline = block.pairs.map(([x, y]) => `[${x}, ${y}]`).join(', ');
        output.push(`${line.trimEnd()} [${inline}]`);
        i = block.end;
        continue;
      }
    }

    output.push(line);
    i++;
  }

  return output.join('\n');
}

/**
 * `vertices:` 줄 다음의 블록 시퀀스 읽기
 *
 * @param lines - 전체 줄
 * @param keyIndex - `vertices:` 줄 인덱스
 * @returns 패턴이 깨지면 null (블록 전체를 그대로 통과시킴)
 */
function readVertexBlock(lines: readonly string[], keyIndex: number): VertexBlock | null {
  const keyIndent = indentOf(lines[keyIndex]);
  let i = keyIndex + 1;

  if (i >= lines.length) {
    return null;
  }

  // 시퀀스 항목은 키와 같은 깊이 또는 더 깊게 (indentSeq 설정에 따라)
  const itemIndent = indentOf(lines[i]);
  if (itemIndent < keyIndent) {
    return null;
  }

  const pairs: Array<[string, string]> = [];

  while (i < lines.length) {
    const line = lines[i];
    const trimmed = line.trim();

    if (indentOf(line) !== itemIndent || !trimmed.startsWith(PAIR_START)) {
      break;
    }

    // "- - x" 다음 줄은 한 단계 깊은 "- y"
    const x = trimmed.slice(PAIR_START.length).trim();
    const next = lines[i + 1];
    if (next === undefined || indentOf(next) !== itemIndent + 2) {
      return null;
    }

    const nextTrimmed = next.trim();
    if (!nextTrimmed.startsWith(ITEM_START) || nextTrimmed.startsWith(PAIR_START)) {
      return null;
    }

    const y = nextTrimmed.slice(ITEM_START.length).trim();
    if (!isNumericScalar(x) || !isNumericScalar(y)) {
      return null;
    }

    pairs.push([x, y]);
    i += 2;
  }

  if (pairs.length === 0) {
    return null;
  }

  // 블록 뒤에 같은 시퀀스의 잔여 줄(세 번째 좌표 등)이 남으면 변환 포기
  const following = lines[i];
  if (following !== undefined && following.trim() !== '') {
    const followingIndent = indentOf(following);
    if (
      followingIndent > itemIndent ||
      (followingIndent === itemIndent && following.trim().startsWith('-'))
    ) {
      return null;
    }
  }

  return { pairs, end: i };
}

/**
 * 블록 스칼라 헤더 줄이면 본문이 넘어야 하는 들여쓰기, 아니면 null
 *
 * `  - name: |-` → 키 열(4), `  - |` → 마지막 `-` 열(2)
 */
function blockScalarIndent(line: string): number | null {
  const content = line.trimEnd();
  if (!BLOCK_SCALAR_HEADER.test(content)) {
    return null;
  }

  const prefix = NODE_PREFIX.exec(content)?.[0] ?? '';
  const rest = content.slice(prefix.length);
  if (rest.startsWith('|') || rest.startsWith('>')) {
    // 시퀀스 항목 자체가 스칼라
    const dash = prefix.lastIndexOf('-');
    return dash >= 0 ? dash : indentOf(content);
  }
  return prefix.length;
}

/**
 * 앞쪽 공백 수
 */
function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * 유한한 숫자 스칼라인지 (따옴표, 주석 등은 거부)
 */
function isNumericScalar(value: string): boolean {
  return value !== '' && /^[-+]?[0-9.eE+-]+$/.test(value) && Number.isFinite(Number(value));
}
