/**
 * RecordNormalizer
 *
 * 행 속성 → CSV 가변 컬럼
 * - 알려진 키 이름 변경 (Substrate → substrate 등)
 * - SKU / Title 제외 (고정 컬럼)
 * - 고정 컬럼명과 겹치는 키 제외
 * - minimum_order_qty / order_multiple 추가
 * - 발견 순서 유지 (CSV 컬럼 순서 결정)
 */

import type {
  CatalogRecord,
  CatalogRowSpec,
  CoreFields,
  RowInteractionResult,
} from "@/core/domain/CatalogRecord";
import { isCoreField } from "@/core/domain/CatalogRecord";
import type { CatalogEntry } from "@/core/domain/CatalogEntry";
import { getUtcTimestampSeconds } from "@/utils/timestamp";
import { PACK_SIZE_KEY, SKU_KEY, TITLE_KEY } from "./RowSpecExtractor";

/**
 * 속성 키 이름 변경 테이블
 */
export const ATTRIBUTE_RENAMES: Readonly<Record<string, string>> = {
  Substrate: "substrate",
  Thickness: "thickness",
  Length: "length",
  Width: "width",
  [PACK_SIZE_KEY]: "pack_size",
  Finish: "finish_attr",
};

const EXCLUDED_KEYS = new Set([SKU_KEY, TITLE_KEY]);

export const MOQ_COLUMNS = {
  MINIMUM: "minimum_order_qty",
  MULTIPLE: "order_multiple",
} as const;

/**
 * 레코드 조립 입력
 */
export interface RecordInput {
  colourName: string;
  finish: string;
  entry: CatalogEntry;
  row: CatalogRowSpec;
  result: RowInteractionResult;
  checkedAt?: Date;
}

export class RecordNormalizer {
  /**
   * 속성 정규화 + MOQ 컬럼 추가
   */
  normalize(
    attributes: ReadonlyMap<string, string>,
    moq: Pick<RowInteractionResult, "minimumQuantity" | "orderMultiple">,
  ): Map<string, string> {
    const specs = new Map<string, string>();

    for (const [rawKey, value] of attributes) {
      if (EXCLUDED_KEYS.has(rawKey)) continue;
      const key = ATTRIBUTE_RENAMES[rawKey] ?? rawKey;
      if (isCoreField(key)) continue;
      specs.set(key, value);
    }

    specs.set(MOQ_COLUMNS.MINIMUM, String(moq.minimumQuantity));
    specs.set(MOQ_COLUMNS.MULTIPLE, String(moq.orderMultiple));
    return specs;
  }

  /**
   * 최종 레코드 조립
   */
  build(input: RecordInput): CatalogRecord {
    const { row, result } = input;

    const core: CoreFields = {
      colour_name: input.colourName,
      finish: input.finish,
      product_family: row.family,
      sku_code: row.identifier,
      title_raw: row.title,
      qty_used_for_checks: String(result.usedQuantity),
      stock_result_raw: result.stockText,
      price_result_raw: result.priceText,
      product_url: input.entry.url,
      checked_at_iso: getUtcTimestampSeconds(input.checkedAt),
    };

    return {
      category: row.family || "Unknown",
      core,
      specs: this.normalize(row.attributes, result),
    };
  }
}
