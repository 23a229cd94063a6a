/**
 * 입출력 에러 타입
 *
 * 로더/직렬화 경계에서 발생한 실패를 의미 있는 종류로 구분
 * 에디터는 종류에 따라 에러/경고로 다르게 보고함
 */
export type AnnotationIoErrorType =
  | 'UNSUPPORTED_EXTENSION' // .json/.yaml/.yml 외의 확장자
  | 'PARSE' // JSON/YAML 문법 오류
  | 'SCHEMA' // 구조 불일치 (필드 누락, 타입 오류)
  | 'DECODE' // 이미지 디코딩 실패
  | 'MISSING_MEDIA' // 참조된 이미지 파일 없음
  | 'IO' // 파일 읽기/쓰기 실패
  | 'NO_PROJECT' // 내보낼 프로젝트 없음
  | 'UNKNOWN'; // 기타

/**
 * 어노테이션 입출력 에러 클래스
 *
 * - 에러 종류와 관련 경로를 함께 저장
 * - instanceof로 입출력 에러 구분 가능
 */
export class AnnotationIoError extends Error {
  readonly type: AnnotationIoErrorType;
  readonly path?: string;

  constructor(message: string, type: AnnotationIoErrorType, path?: string) {
    super(message);
    this.name = 'AnnotationIoError';
    this.type = type;
    this.path = path;

    // Error 클래스를 상속할 때 필요한 프로토타입 체인 수정
    Object.setPrototypeOf(this, AnnotationIoError.prototype);
  }

  /**
   * 임의의 throw 값으로부터 AnnotationIoError 생성
   *
   * 이미 AnnotationIoError면 그대로 반환
   */
  static from(error: unknown, fallbackType: AnnotationIoErrorType = 'UNKNOWN', path?: string): AnnotationIoError {
    if (error instanceof AnnotationIoError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    return new AnnotationIoError(message, fallbackType, path);
  }

  /**
   * 사용자에게 보여줄 메시지 (경로 포함)
   */
  describe(): string {
    return this.path ? `${this.message} (${this.path})` : this.message;
  }
}
