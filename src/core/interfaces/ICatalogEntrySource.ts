/**
 * Catalog Entry Source Interface
 */

import type { CatalogEntry } from "@/core/domain/CatalogEntry";

export interface ICatalogEntrySource {
  /**
   * 순서가 보장된 엔트리 목록
   * 비어 있으면 FatalPreconditionError
   */
  load(): Promise<CatalogEntry[]>;
}
