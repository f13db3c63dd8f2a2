/**
 * ActionTrigger
 *
 * 위젯 클릭 (best-effort)
 * 1. force + noWaitAfter 클릭 (짧은 타임아웃)
 * 2. 실패 시 핸들 획득 후 프로그래매틱 click() (hit-test 우회)
 * 3. 둘 다 실패하면 false (예외 없음)
 */

import type { ISurfaceElement } from "@/core/interfaces";
import type { InteractionConfig } from "@/core/domain/ScannerConfig";
import { logger } from "@/config/logger";
import { toErrorMessage } from "@/core/errors/ScannerErrors";

export type ActionTriggerTimings = Pick<
  InteractionConfig,
  "clickTimeoutMs" | "fallbackHandleMs"
>;

export class ActionTrigger {
  constructor(private readonly timings: ActionTriggerTimings) {}

  async trigger(widget: ISurfaceElement): Promise<boolean> {
    try {
      await widget.click({
        force: true,
        noWaitAfter: true,
        timeoutMs: this.timings.clickTimeoutMs,
      });
      return true;
    } catch (error) {
      logger.debug(
        { error: toErrorMessage(error) },
        "force 클릭 실패 - 프로그래매틱 클릭 시도",
      );
    }

    const handle = await widget.acquireHandle(this.timings.fallbackHandleMs);
    if (!handle) {
      return false;
    }

    try {
      await handle.dispatchClick();
      return true;
    } catch (error) {
      logger.debug({ error: toErrorMessage(error) }, "프로그래매틱 클릭 실패");
      return false;
    }
  }
}
