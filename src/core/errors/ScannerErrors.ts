/**
 * 스캐너 예외 정의
 *
 * 에러 분류:
 * - 일시적 UI 실패: 예외 아님 ("EMPTY" 결과로 표현)
 * - 행 단위 예외: 행 경계에서 잡아 "ERROR" 결과로 표현
 * - 엔트리 단위 예외 (PanelActivationError 등): 실행 루프에서 잡고 다음 엔트리 진행
 * - 치명적 전제조건 (FatalPreconditionError): 실행 즉시 중단
 */

/**
 * 스캐너 예외 기본 클래스
 */
export class ScannerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScannerError";
  }
}

/**
 * 치명적 전제조건 위반
 * 세션 파일 없음, 인덱스 비어 있음, 자격 증명 없음, 설정 오류
 */
export class FatalPreconditionError extends ScannerError {
  constructor(message: string) {
    super(message);
    this.name = "FatalPreconditionError";
  }
}

/**
 * 탭 패널이 활성화되지 않음 (엔트리 단위 실패)
 */
export class PanelActivationError extends ScannerError {
  constructor(
    message: string,
    public readonly tabLabel: string,
  ) {
    super(message);
    this.name = "PanelActivationError";
  }
}

/**
 * 에러 메시지 추출
 */
export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
