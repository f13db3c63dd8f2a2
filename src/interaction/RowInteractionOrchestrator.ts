/**
 * RowInteractionOrchestrator
 *
 * 카탈로그 행 하나에 대한 재고/가격 조회 프로토콜
 *
 * 흐름:
 * 1. 행 스크롤 + 오버레이 정리
 * 2. 상관관계 토큰(data-code) 읽기
 * 3. 행 범위 MOQ 힌트 수집
 * 4. 유효 수량 계산 (변경 시 로그)
 * 5. 수량 입력
 * 6~8. 결과 영역 비우기 → 두 조회 실행 → 결과 읽기 (EMPTY / ERROR 마커)
 * 9. 결과에 MOQ 메시지가 있으면 힌트 재스캔 후 수량이 바뀐 경우에만 1회 재시도
 * 10. 두 결과 모두 EMPTY면 오버레이 정리 후 짧은 대기로 마지막 1회
 *
 * 재시도는 구체적 신호가 있을 때만, 최대 3 라운드
 */

import type { ISurfaceElement, ISurfacePage } from "@/core/interfaces";
import type { InteractionConfig } from "@/core/domain/ScannerConfig";
import {
  MoqConstraint,
  RESULT_MARKER,
  RowInteractionResult,
} from "@/core/domain/CatalogRecord";
import { ROW_SELECTORS } from "@/catalog/CatalogSelectors";
import { logger as defaultLogger, Logger } from "@/config/logger";
import { toErrorMessage } from "@/core/errors/ScannerErrors";
import { TextSettleReader } from "./TextSettleReader";
import { ActionTrigger } from "./ActionTrigger";
import { ResponseCorrelator } from "./ResponseCorrelator";
import { MoqResolver, mergeMax } from "./MoqResolver";
import { OverlayMitigator } from "./OverlayMitigator";

/**
 * 조회 버튼 + 결과 영역 쌍
 */
interface LookupTarget {
  name: "stock" | "price";
  button: ISurfaceElement;
  result: ISurfaceElement;
}

interface LookupOutcome {
  stockText: string;
  priceText: string;
}

/**
 * 의존성 (테스트에서 교체 가능)
 */
export interface RowInteractionDeps {
  reader: TextSettleReader;
  trigger: ActionTrigger;
  correlator: ResponseCorrelator;
  moq: MoqResolver;
  overlay: OverlayMitigator;
}

export class RowInteractionOrchestrator {
  private readonly deps: RowInteractionDeps;

  constructor(
    private readonly timings: InteractionConfig,
    deps?: Partial<RowInteractionDeps>,
  ) {
    this.deps = {
      reader: deps?.reader ?? new TextSettleReader(timings),
      trigger: deps?.trigger ?? new ActionTrigger(timings),
      correlator:
        deps?.correlator ?? new ResponseCorrelator(timings.responseTimeoutMs),
      moq: deps?.moq ?? new MoqResolver(timings.attributeTimeoutMs),
      overlay: deps?.overlay ?? new OverlayMitigator(timings),
    };
  }

  async interact(
    page: ISurfacePage,
    row: ISurfaceElement,
    requestedQuantity: number,
    log: Logger = defaultLogger,
  ): Promise<RowInteractionResult> {
    const { moq, overlay } = this.deps;

    await this.bringIntoView(row);
    await overlay.mitigate(page);

    const token = await this.readCorrelationToken(row);

    const hints = await moq.readHints(row);
    let constraint: MoqConstraint = MoqResolver.toConstraint(hints);

    let usedQuantity = MoqResolver.bump(
      requestedQuantity,
      constraint.minimumQuantity,
      constraint.orderMultiple,
    );
    if (usedQuantity !== requestedQuantity) {
      log.info(
        {
          requested: requestedQuantity,
          used: usedQuantity,
          min: constraint.minimumQuantity,
          step: constraint.orderMultiple,
        },
        "MOQ 힌트로 수량 조정",
      );
    }

    await this.submitQuantity(row, usedQuantity);
    let outcome = await this.runLookups(
      page,
      row,
      token,
      this.timings.resultWaitMs,
      log,
    );

    // 제출 후에야 드러나는 MOQ 메시지
    if (MoqResolver.needsRetry(outcome.stockText, outcome.priceText)) {
      const rescan = await moq.readTextHints(row);
      const fromResults = MoqResolver.parseHintText(
        `${outcome.stockText}\n${outcome.priceText}`,
      );

      constraint = {
        minimumQuantity:
          mergeMax(
            constraint.minimumQuantity,
            mergeMax(rescan.min, fromResults.min),
          ) ?? 1,
        orderMultiple:
          mergeMax(
            constraint.orderMultiple,
            mergeMax(rescan.step, fromResults.step),
          ) ?? 1,
      };

      const retryQuantity = MoqResolver.bump(
        requestedQuantity,
        constraint.minimumQuantity,
        constraint.orderMultiple,
      );

      if (retryQuantity !== usedQuantity) {
        log.info(
          {
            previous: usedQuantity,
            used: retryQuantity,
            min: constraint.minimumQuantity,
            step: constraint.orderMultiple,
          },
          "결과에서 MOQ 감지 - 수량 보정 후 재조회",
        );
        usedQuantity = retryQuantity;
        await this.submitQuantity(row, usedQuantity);
        outcome = await this.runLookups(
          page,
          row,
          token,
          this.timings.resultWaitMs,
          log,
        );
      }
    }

    // 클릭 누락 복구 (마지막 1회)
    if (
      outcome.stockText === RESULT_MARKER.EMPTY &&
      outcome.priceText === RESULT_MARKER.EMPTY
    ) {
      log.debug("두 결과 모두 비어 있음 - 마지막 재시도");
      await overlay.mitigate(page);
      outcome = await this.runLookups(
        page,
        row,
        token,
        this.timings.fallbackWaitMs,
        log,
      );
    }

    return {
      stockText: outcome.stockText,
      priceText: outcome.priceText,
      usedQuantity,
      minimumQuantity: constraint.minimumQuantity,
      orderMultiple: constraint.orderMultiple,
    };
  }

  /**
   * 결과 영역 비우기 → 조회 → 읽기
   * 두 영역을 모두 비운 뒤에만 클릭 시작
   */
  private async runLookups(
    page: ISurfacePage,
    row: ISurfaceElement,
    token: string,
    waitMs: number,
    log: Logger,
  ): Promise<LookupOutcome> {
    const stock: LookupTarget = {
      name: "stock",
      button: row.locator(ROW_SELECTORS.STOCK_BUTTON),
      result: row.locator(ROW_SELECTORS.STOCK_RESULT),
    };
    const price: LookupTarget = {
      name: "price",
      button: row.locator(ROW_SELECTORS.PRICE_BUTTON),
      result: row.locator(ROW_SELECTORS.PRICE_RESULT),
    };

    await Promise.all([this.clearResult(stock), this.clearResult(price)]);

    if (this.timings.concurrentLookups) {
      const [stockText, priceText] = await Promise.all([
        this.lookup(page, stock, token, waitMs, log),
        this.lookup(page, price, token, waitMs, log),
      ]);
      return { stockText, priceText };
    }

    const stockText = await this.lookup(page, stock, token, waitMs, log);
    const priceText = await this.lookup(page, price, token, waitMs, log);
    return { stockText, priceText };
  }

  private async lookup(
    page: ISurfacePage,
    target: LookupTarget,
    token: string,
    waitMs: number,
    log: Logger,
  ): Promise<string> {
    const { correlator, trigger, reader } = this.deps;
    try {
      const { result: clicked, matched } = await correlator.perform(
        page,
        token,
        () => trigger.trigger(target.button),
      );
      const text = await reader.read(target.result, waitMs);
      log.debug(
        { lookup: target.name, clicked, matched, empty: !text },
        "조회 완료",
      );
      return text || RESULT_MARKER.EMPTY;
    } catch (error) {
      log.warn(
        { lookup: target.name, error: toErrorMessage(error) },
        "조회 중 예외",
      );
      return RESULT_MARKER.ERROR;
    }
  }

  private async clearResult(target: LookupTarget): Promise<void> {
    try {
      await target.result.clearTextContent(this.timings.attributeTimeoutMs);
    } catch (error) {
      defaultLogger.debug(
        { lookup: target.name, error: toErrorMessage(error) },
        "결과 영역 비우기 실패",
      );
    }
  }

  /**
   * value 직접 대입 + input/change 이벤트, 실패 시 fill + blur
   */
  private async submitQuantity(
    row: ISurfaceElement,
    quantity: number,
  ): Promise<void> {
    const input = row.locator(ROW_SELECTORS.QTY_INPUT);
    const value = String(quantity);

    const handle = await input.acquireHandle(this.timings.handleAcquireMs);
    if (handle) {
      try {
        await handle.assignValue(value);
        return;
      } catch (error) {
        defaultLogger.debug(
          { error: toErrorMessage(error) },
          "수량 직접 대입 실패 - fill 시도",
        );
      }
    }

    try {
      await input.fill(value, this.timings.clickTimeoutMs);
      await input.blur(this.timings.clickTimeoutMs);
    } catch (error) {
      defaultLogger.debug({ error: toErrorMessage(error) }, "수량 fill 실패");
    }
  }

  private async readCorrelationToken(row: ISurfaceElement): Promise<string> {
    try {
      const code = await row
        .locator(ROW_SELECTORS.INPUTS)
        .getAttribute(ROW_SELECTORS.CODE_ATTR, this.timings.attributeTimeoutMs);
      return code?.trim() ?? "";
    } catch (error) {
      defaultLogger.debug(
        { error: toErrorMessage(error) },
        "상관관계 토큰 없음",
      );
      return "";
    }
  }

  private async bringIntoView(row: ISurfaceElement): Promise<void> {
    try {
      await row.scrollIntoView(this.timings.attributeTimeoutMs);
    } catch (error) {
      defaultLogger.debug({ error: toErrorMessage(error) }, "행 스크롤 실패");
    }
  }
}
