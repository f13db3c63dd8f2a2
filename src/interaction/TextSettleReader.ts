/**
 * TextSettleReader
 *
 * 동적 결과 영역의 텍스트 읽기
 *
 * 2단계 전략:
 * 1. 짧은 시간 안에 핸들을 얻으면 텍스트가 채워질 때까지 bounded 대기
 * 2. 핸들을 못 얻으면 대기 없이 즉시 한 번 읽기
 *
 * 어떤 경우에도 예외를 던지지 않음 (영역이 사라지면 빈 문자열)
 */

import type { ISurfaceElement } from "@/core/interfaces";
import type { InteractionConfig } from "@/core/domain/ScannerConfig";
import { logger } from "@/config/logger";

export type TextSettleTimings = Pick<
  InteractionConfig,
  "handleAcquireMs" | "immediateReadMs"
>;

export class TextSettleReader {
  constructor(private readonly timings: TextSettleTimings) {}

  /**
   * 텍스트가 채워질 때까지 최대 maxWaitMs 대기 후 trim된 텍스트 반환
   */
  async read(region: ISurfaceElement, maxWaitMs: number): Promise<string> {
    const handle = await region.acquireHandle(this.timings.handleAcquireMs);

    if (handle) {
      const settled = await handle.waitForNonEmptyText(maxWaitMs);
      if (!settled) {
        logger.debug({ maxWaitMs }, "결과 텍스트 대기 타임아웃 - 현재 값 읽기");
      }
    }

    return this.readNow(region);
  }

  /**
   * 대기 없이 즉시 읽기
   */
  async readNow(region: ISurfaceElement): Promise<string> {
    try {
      const text = await region.textContent(this.timings.immediateReadMs);
      return (text ?? "").trim();
    } catch (error) {
      logger.debug({ error: String(error) }, "결과 영역 읽기 실패 - 빈 값 처리");
      return "";
    }
  }
}
