/**
 * CatalogIndexCollector
 *
 * 컬러 목록 페이지 → 카탈로그 인덱스 (화면 순서 유지)
 *
 * 흐름:
 * 1. 인덱스 페이지 이동 → 타일 대기
 * 2. 타일 수가 N 라운드 연속 같을 때까지 스크롤 (최대 라운드 제한)
 * 3. 타일별 { name, url(절대), slug } 수집 (href 없는 타일 제외)
 */

import type { ISurfacePage } from "@/core/interfaces";
import type { IndexConfig } from "@/core/domain/ScannerConfig";
import { CatalogEntry, slugFromUrl } from "@/core/domain/CatalogEntry";
import { INDEX_SELECTORS } from "@/catalog/CatalogSelectors";
import { logger } from "@/config/logger";
import { toErrorMessage } from "@/core/errors/ScannerErrors";

export interface CatalogIndexCollectorOptions {
  /** 상대 href 기준 URL */
  baseUrl: string;
  /** 첫 타일 대기 */
  selectorWaitMs: number;
  textReadMs: number;
}

export class CatalogIndexCollector {
  constructor(
    private readonly config: IndexConfig,
    private readonly options: CatalogIndexCollectorOptions,
  ) {}

  async collect(page: ISurfacePage, indexUrl: string): Promise<CatalogEntry[]> {
    logger.info({ url: indexUrl }, "컬러 인덱스 페이지 이동");
    await page.goto(indexUrl);
    await page.waitForSelector(INDEX_SELECTORS.TILES, this.options.selectorWaitMs);

    const total = await this.scrollUntilStable(page);
    logger.info({ tiles: total }, "컬러 타일 감지");

    const entries = await this.readTiles(page);
    logger.info({ entries: entries.length }, "컬러 링크 수집 완료");
    return entries;
  }

  /**
   * 타일 수가 안정될 때까지 스크롤
   * @returns 최종 타일 수
   */
  async scrollUntilStable(page: ISurfacePage): Promise<number> {
    const tiles = page.all(INDEX_SELECTORS.TILES);
    let lastCount = 0;
    let stableRounds = 0;

    for (let round = 0; round < this.config.maxScrollRounds; round++) {
      const count = await tiles.count();
      if (count === lastCount) {
        stableRounds++;
      } else {
        stableRounds = 0;
        lastCount = count;
      }

      await page.scrollToBottom();
      await page.waitForNetworkIdle(this.config.networkIdleMs);
      await page.waitForTimeout(this.config.settleMs);

      if (stableRounds >= this.config.stableRounds) {
        break;
      }
    }

    return tiles.count();
  }

  private async readTiles(page: ISurfacePage): Promise<CatalogEntry[]> {
    const tiles = page.all(INDEX_SELECTORS.TILES);
    const count = await tiles.count();
    const entries: CatalogEntry[] = [];

    for (let i = 0; i < count; i++) {
      const tile = tiles.nth(i);
      const href = await this.safeRead(() =>
        tile
          .locator(INDEX_SELECTORS.TILE_LINK)
          .getAttribute("href", this.options.textReadMs),
      );
      if (!href) continue;

      const name = await this.safeRead(() =>
        tile
          .locator(INDEX_SELECTORS.TILE_NAME)
          .textContent(this.options.textReadMs),
      );

      let url: string;
      try {
        url = new URL(href, this.options.baseUrl).toString();
      } catch (error) {
        logger.warn({ href, error: toErrorMessage(error) }, "잘못된 타일 href - 건너뜀");
        continue;
      }

      entries.push({ name, url, slug: slugFromUrl(url) });
    }

    return entries;
  }

  private async safeRead(read: () => Promise<string | null>): Promise<string> {
    try {
      return ((await read()) ?? "").trim();
    } catch (error) {
      logger.debug({ error: toErrorMessage(error) }, "타일 읽기 실패");
      return "";
    }
  }
}
