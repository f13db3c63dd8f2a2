/**
 * CatalogIndexService
 *
 * 인덱스 수집 → 디버그 산출물 → colours_index.json 저장
 */

import type { IBrowserController } from "@/scrapers/controllers/IBrowserController";
import type { CatalogEntry } from "@/core/domain/CatalogEntry";
import { CatalogIndexCollector } from "@/scanners/CatalogIndexCollector";
import { CatalogIndexRepository } from "@/repositories/CatalogIndexRepository";
import { logImportant } from "@/utils/LoggerContext";
import { logger } from "@/config/logger";

const INDEX_ARTIFACT_NAME = "colours_page";

export class CatalogIndexService {
  constructor(
    private readonly controller: IBrowserController,
    private readonly collector: CatalogIndexCollector,
    private readonly repository: CatalogIndexRepository,
  ) {}

  async refresh(indexUrl: string): Promise<CatalogEntry[]> {
    const page = await this.controller.open();
    try {
      const entries = await this.collector.collect(page, indexUrl);
      await this.controller.captureArtifacts(INDEX_ARTIFACT_NAME);
      await this.repository.save(entries);
      logImportant(logger, "카탈로그 인덱스 갱신 완료", {
        entries: entries.length,
      });
      return entries;
    } finally {
      await this.controller.close();
    }
  }
}
