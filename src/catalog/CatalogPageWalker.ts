/**
 * CatalogPageWalker
 *
 * 카탈로그 엔트리(컬러 페이지) 하나 처리
 *
 * 흐름:
 * 1. 페이지 이동 → 탭 컨테이너 대기 → 컬러 표시명 읽기
 * 2. 탭 목록 (없으면 synthetic "Default")
 * 3. 탭별: 활성화 → finish명 → 행 목록 (직전 H4 = family)
 * 4. 행별: 속성 추출 → (finish, SKU) 중복 제거 → 조회 → 레코드 조립 → sink append
 *
 * 행 단위 예외는 "ERROR" 레코드로 기록하고 다음 행 진행
 * 페이지/패널 단위 예외는 호출자(실행 루프)로 전파
 */

import type {
  IPersistenceSink,
  ISurfaceElement,
  ISurfacePage,
} from "@/core/interfaces";
import type { CatalogEntry } from "@/core/domain/CatalogEntry";
import type { ScannerConfig } from "@/core/domain/ScannerConfig";
import {
  RESULT_MARKER,
  RowInteractionResult,
} from "@/core/domain/CatalogRecord";
import { PAGE_SELECTORS } from "./CatalogSelectors";
import { PanelNavigator } from "./PanelNavigator";
import { RowSpecExtractor } from "./RowSpecExtractor";
import { RecordNormalizer } from "./RecordNormalizer";
import { RowDedupRegistry } from "./RowDedupRegistry";
import { RowInteractionOrchestrator } from "@/interaction/RowInteractionOrchestrator";
import { OverlayMitigator } from "@/interaction/OverlayMitigator";
import { ActionTrigger } from "@/interaction/ActionTrigger";
import { logger as defaultLogger, Logger } from "@/config/logger";
import { toErrorMessage } from "@/core/errors/ScannerErrors";

/**
 * 엔트리 처리 요약
 */
export interface WalkSummary {
  colourName: string;
  tabs: number;
  rowsSeen: number;
  recordsWritten: number;
  duplicatesSkipped: number;
  /** 이번 엔트리에서 기록한 카테고리 (정렬) */
  categories: string[];
}

export interface CatalogPageWalkerDeps {
  navigator: PanelNavigator;
  orchestrator: RowInteractionOrchestrator;
  extractor: RowSpecExtractor;
  normalizer: RecordNormalizer;
}

type WalkerConfig = Pick<ScannerConfig, "interaction" | "navigation">;

/**
 * 결과 텍스트 → 로그 플래그
 */
function resultFlag(text: string): string {
  return text === RESULT_MARKER.EMPTY || text === RESULT_MARKER.ERROR || !text
    ? text || RESULT_MARKER.EMPTY
    : "OK";
}

export class CatalogPageWalker {
  private readonly deps: CatalogPageWalkerDeps;

  constructor(
    private readonly config: WalkerConfig,
    deps?: Partial<CatalogPageWalkerDeps>,
  ) {
    const { interaction, navigation } = config;
    this.deps = {
      navigator:
        deps?.navigator ??
        new PanelNavigator(
          navigation,
          new OverlayMitigator(interaction),
          new ActionTrigger(interaction),
        ),
      orchestrator:
        deps?.orchestrator ?? new RowInteractionOrchestrator(interaction),
      extractor: deps?.extractor ?? new RowSpecExtractor(navigation.textReadMs),
      normalizer: deps?.normalizer ?? new RecordNormalizer(),
    };
  }

  async walk(
    page: ISurfacePage,
    entry: CatalogEntry,
    seen: RowDedupRegistry,
    sink: IPersistenceSink,
    log: Logger = defaultLogger,
  ): Promise<WalkSummary> {
    const { navigator } = this.deps;
    const { navigation } = this.config;

    log.info({ url: entry.url }, "컬러 처리 시작");
    await page.goto(entry.url);
    await page.waitForSelector(PAGE_SELECTORS.TAB_CONTAINER, navigation.tabsWaitMs);

    const colourName =
      (await this.safeText(page.locator(PAGE_SELECTORS.COLOUR_NAME))) ||
      entry.name;
    const tabs = await navigator.listTabs(page);
    log.info({ colourName, tabs: tabs.length }, "finish 탭 목록");

    const summary: WalkSummary = {
      colourName,
      tabs: tabs.length,
      rowsSeen: 0,
      recordsWritten: 0,
      duplicatesSkipped: 0,
      categories: [],
    };
    const categories = new Set<string>();

    for (const [tabIndex, tab] of tabs.entries()) {
      log.info(
        { tab: tab.label, index: `${tabIndex + 1}/${tabs.length}` },
        "탭 활성화",
      );
      const panel = await navigator.activate(page, tab);
      const finish =
        (await this.safeAttribute(panel, PAGE_SELECTORS.PANEL_FINISH_ATTR)) ||
        tab.label;

      const rows = panel.all(PAGE_SELECTORS.ROWS);
      const rowCount = await rows.count();
      log.info({ finish, rows: rowCount }, "패널 행 목록");

      let currentFamily: string | undefined;
      for (let i = 0; i < rowCount; i++) {
        const row = rows.nth(i);
        summary.rowsSeen++;

        const family = await this.safeFamily(row);
        if (family !== currentFamily) {
          currentFamily = family;
          log.info({ family: family || "Unknown" }, "family 변경");
        }

        const startedAt = Date.now();
        const spec = await this.deps.extractor.extract(row);

        if (!seen.markIfNew(finish, spec.identifier)) {
          summary.duplicatesSkipped++;
          log.debug({ finish, sku: spec.identifier }, "중복 행 건너뜀");
          continue;
        }

        const result = await this.interactSafely(page, row, log);
        const record = this.deps.normalizer.build({
          colourName,
          finish,
          entry,
          row: { family, ...spec },
          result,
        });

        await sink.append(record.category, record.core, record.specs);
        categories.add(record.category);
        summary.recordsWritten++;

        log.info(
          {
            row: i + 1,
            sku: record.core.sku_code,
            title: record.core.title_raw.slice(0, 60),
            qty: result.usedQuantity,
            stock: resultFlag(result.stockText),
            price: resultFlag(result.priceText),
            seconds: Number(((Date.now() - startedAt) / 1000).toFixed(2)),
          },
          "행 처리 완료",
        );
      }
    }

    summary.categories = [...categories].sort();
    log.info(
      { rows: summary.recordsWritten, duplicates: summary.duplicatesSkipped },
      "컬러 처리 종료",
    );
    return summary;
  }

  /**
   * 행 경계: 예외는 두 조회 모두 ERROR로 기록
   */
  private async interactSafely(
    page: ISurfacePage,
    row: ISurfaceElement,
    log: Logger,
  ): Promise<RowInteractionResult> {
    const requested = this.config.interaction.requestedQuantity;
    try {
      return await this.deps.orchestrator.interact(page, row, requested, log);
    } catch (error) {
      log.error({ error: toErrorMessage(error) }, "행 처리 중 예외");
      return {
        stockText: RESULT_MARKER.ERROR,
        priceText: RESULT_MARKER.ERROR,
        usedQuantity: requested,
        minimumQuantity: 1,
        orderMultiple: 1,
      };
    }
  }

  private async safeFamily(row: ISurfaceElement): Promise<string> {
    try {
      return await row.precedingSiblingText(
        PAGE_SELECTORS.FAMILY_HEADING_TAG,
        this.config.navigation.textReadMs,
      );
    } catch (error) {
      defaultLogger.debug({ error: toErrorMessage(error) }, "family 헤딩 읽기 실패");
      return "";
    }
  }

  private async safeText(element: ISurfaceElement): Promise<string> {
    try {
      return (
        (await element.textContent(this.config.navigation.textReadMs)) ?? ""
      ).trim();
    } catch (error) {
      defaultLogger.debug({ error: toErrorMessage(error) }, "텍스트 읽기 실패");
      return "";
    }
  }

  private async safeAttribute(
    element: ISurfaceElement,
    name: string,
  ): Promise<string> {
    try {
      return (
        (await element.getAttribute(name, this.config.navigation.textReadMs)) ??
        ""
      ).trim();
    } catch (error) {
      defaultLogger.debug({ name, error: toErrorMessage(error) }, "속성 읽기 실패");
      return "";
    }
  }
}
