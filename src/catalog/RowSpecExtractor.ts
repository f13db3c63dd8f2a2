/**
 * RowSpecExtractor
 *
 * 행에서 SKU / 제목 / 속성 목록 추출 (모두 best-effort)
 * - span.label → SKU
 * - h5 → 제목
 * - ul.item-attributes li "Key: Value" → 속성
 * - h5.info "Pack Size: ..." → Pack Size 속성
 */

import type { ISurfaceElement } from "@/core/interfaces";
import { ROW_SELECTORS } from "./CatalogSelectors";
import { logger } from "@/config/logger";
import { toErrorMessage } from "@/core/errors/ScannerErrors";

export const SKU_KEY = "SKU";
export const TITLE_KEY = "Title";
export const PACK_SIZE_KEY = "Pack Size";

const PACK_SIZE_MARKER = "Pack Size:";

export interface ExtractedRowSpec {
  identifier: string;
  title: string;
  /** SKU / Title 포함 (누락 시 추가) */
  attributes: Map<string, string>;
}

/**
 * "Key: Value" 한 줄 파싱 (첫 번째 콜론 기준)
 */
export function parseAttributeLine(
  line: string,
): { key: string; value: string } | null {
  const index = line.indexOf(":");
  if (index < 0) return null;
  const key = line.slice(0, index).trim();
  const value = line.slice(index + 1).trim();
  return key && value ? { key, value } : null;
}

export class RowSpecExtractor {
  constructor(private readonly textTimeoutMs: number) {}

  async extract(row: ISurfaceElement): Promise<ExtractedRowSpec> {
    const identifier = await this.safeText(row.locator(ROW_SELECTORS.SKU));
    const title = await this.safeText(row.locator(ROW_SELECTORS.TITLE));

    const attributes = new Map<string, string>();

    const items = row.all(ROW_SELECTORS.ATTRIBUTES);
    let count = 0;
    try {
      count = await items.count();
    } catch (error) {
      logger.debug({ error: toErrorMessage(error) }, "속성 목록 읽기 실패");
    }
    for (let i = 0; i < count; i++) {
      const parsed = parseAttributeLine(await this.safeText(items.nth(i)));
      if (parsed) {
        attributes.set(parsed.key, parsed.value);
      }
    }

    const info = await this.safeText(row.locator(ROW_SELECTORS.INFO));
    const packIndex = info.indexOf(PACK_SIZE_MARKER);
    if (packIndex >= 0) {
      const packSize = info.slice(packIndex + PACK_SIZE_MARKER.length).trim();
      if (packSize) {
        attributes.set(PACK_SIZE_KEY, packSize);
      }
    }

    if (!attributes.has(SKU_KEY)) attributes.set(SKU_KEY, identifier);
    if (!attributes.has(TITLE_KEY)) attributes.set(TITLE_KEY, title);

    return {
      identifier: attributes.get(SKU_KEY) ?? identifier,
      title: attributes.get(TITLE_KEY) ?? title,
      attributes,
    };
  }

  private async safeText(element: ISurfaceElement): Promise<string> {
    try {
      return ((await element.textContent(this.textTimeoutMs)) ?? "").trim();
    } catch (error) {
      logger.debug({ error: toErrorMessage(error) }, "행 텍스트 읽기 실패");
      return "";
    }
  }
}
