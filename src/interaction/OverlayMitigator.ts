/**
 * OverlayMitigator
 *
 * 클릭을 가로채는 모달 오버레이 제거
 * 1. Escape 키 입력
 * 2. 보이는 닫기 버튼 클릭 (최대 maxCloseClicks개, 각각 best-effort)
 * 3. 남은 오버레이 루트 노드 강제 제거
 *
 * 예외를 던지지 않음 (이후 클릭 자체가 fallback을 가지고 있음)
 */

import type { ISurfacePage } from "@/core/interfaces";
import type { InteractionConfig } from "@/core/domain/ScannerConfig";
import { OVERLAY_SELECTORS } from "@/catalog/CatalogSelectors";
import { logger } from "@/config/logger";
import { toErrorMessage } from "@/core/errors/ScannerErrors";

export type OverlayTimings = Pick<
  InteractionConfig,
  "overlayMaxCloseClicks" | "overlayProbeMs" | "clickTimeoutMs"
>;

/**
 * 오버레이 제거 결과 (디버그/테스트용)
 */
export interface MitigationReport {
  closeClicks: number;
  removedRoots: number;
}

export class OverlayMitigator {
  constructor(
    private readonly timings: OverlayTimings,
    private readonly closeSelectors: readonly string[] = OVERLAY_SELECTORS.CLOSE_CONTROLS,
    private readonly rootSelectors: readonly string[] = OVERLAY_SELECTORS.ROOTS,
  ) {}

  async mitigate(page: ISurfacePage): Promise<MitigationReport> {
    try {
      await page.pressKey("Escape");
    } catch (error) {
      logger.debug({ error: toErrorMessage(error) }, "Escape 입력 실패");
    }

    let closeClicks = 0;
    for (const selector of this.closeSelectors) {
      if (closeClicks >= this.timings.overlayMaxCloseClicks) break;

      const control = page.locator(selector);
      if (!(await control.isVisible(this.timings.overlayProbeMs))) continue;

      try {
        await control.click({
          force: true,
          noWaitAfter: true,
          timeoutMs: this.timings.clickTimeoutMs,
        });
        closeClicks++;
      } catch (error) {
        logger.debug(
          { selector, error: toErrorMessage(error) },
          "오버레이 닫기 버튼 클릭 실패",
        );
      }
    }

    let removedRoots = 0;
    try {
      removedRoots = await page.removeAll(this.rootSelectors.join(", "));
    } catch (error) {
      logger.debug({ error: toErrorMessage(error) }, "오버레이 노드 제거 실패");
    }

    if (closeClicks > 0 || removedRoots > 0) {
      logger.debug({ closeClicks, removedRoots }, "오버레이 정리");
    }

    return { closeClicks, removedRoots };
  }
}
