/**
 * ResponseCorrelator
 *
 * 행 코드(data-code)가 URL에 포함된 네트워크 응답과 액션을 연결
 *
 * - 토큰이 비어 있으면 액션만 실행
 * - 응답 대기를 먼저 건 뒤 액션을 정확히 한 번 실행
 * - 응답 대기는 항상 resolve (타임아웃 = 매칭 없음, 실패 아님)
 * - 액션 재시도 없음
 */

import type { ISurfacePage } from "@/core/interfaces";

export interface CorrelatedOutcome<T> {
  result: T;
  /** 제한 시간 안에 매칭 응답 수신 여부 */
  matched: boolean;
}

export class ResponseCorrelator {
  constructor(private readonly responseTimeoutMs: number) {}

  async perform<T>(
    page: ISurfacePage,
    token: string,
    action: () => Promise<T>,
  ): Promise<CorrelatedOutcome<T>> {
    if (!token) {
      return { result: await action(), matched: false };
    }

    const response = page.waitForResponse(
      (url) => url.includes(token),
      this.responseTimeoutMs,
    );
    const result = await action();
    const matched = await response;

    return { result, matched };
  }
}
