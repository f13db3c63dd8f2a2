/**
 * RecordNormalizer Test
 *
 * 목적: 속성 키 정규화 / 고정 컬럼 충돌 제거 / 레코드 조립 검증
 */

import { describe, it, expect } from "@jest/globals";
import { RecordNormalizer } from "@/catalog/RecordNormalizer";
import type { RowInteractionResult } from "@/core/domain/CatalogRecord";

const result: RowInteractionResult = {
  stockText: "In stock",
  priceText: "$42.00",
  usedQuantity: 4,
  minimumQuantity: 3,
  orderMultiple: 2,
};

describe("RecordNormalizer", () => {
  const normalizer = new RecordNormalizer();

  it("알려진 키 이름 변경 + 발견 순서 유지 + MOQ 컬럼 추가", () => {
    const specs = normalizer.normalize(
      new Map([
        ["SKU", "AW-1"],
        ["Substrate", "MR MDF"],
        ["Title", "Door"],
        ["Pack Size", "10"],
        ["Custom", "yes"],
      ]),
      result,
    );

    expect([...specs.entries()]).toEqual([
      ["substrate", "MR MDF"],
      ["pack_size", "10"],
      ["Custom", "yes"],
      ["minimum_order_qty", "3"],
      ["order_multiple", "2"],
    ]);
  });

  it("Finish 속성은 finish_attr로, 고정 컬럼명과 같은 키는 제외해야 함", () => {
    const specs = normalizer.normalize(
      new Map([
        ["Finish", "Gloss"],
        ["finish", "shadow"],
        ["sku_code", "shadow"],
      ]),
      result,
    );

    expect([...specs.keys()]).toEqual([
      "finish_attr",
      "minimum_order_qty",
      "order_multiple",
    ]);
    expect(specs.get("finish_attr")).toBe("Gloss");
  });

  it("레코드 고정 컬럼을 조립해야 함", () => {
    const record = normalizer.build({
      colourName: "Arctic White",
      finish: "Matt",
      entry: {
        name: "Arctic White",
        url: "https://www.example.com/colours/arctic-white/",
      },
      row: {
        family: "Doors",
        identifier: "AW-1",
        title: "Door 2400",
        attributes: new Map([["SKU", "AW-1"]]),
      },
      result,
      checkedAt: new Date("2025-03-04T05:06:07.890Z"),
    });

    expect(record.category).toBe("Doors");
    expect(record.core).toEqual({
      colour_name: "Arctic White",
      finish: "Matt",
      product_family: "Doors",
      sku_code: "AW-1",
      title_raw: "Door 2400",
      qty_used_for_checks: "4",
      stock_result_raw: "In stock",
      price_result_raw: "$42.00",
      product_url: "https://www.example.com/colours/arctic-white/",
      checked_at_iso: "2025-03-04T05:06:07Z",
    });
  });

  it("family가 비어 있으면 Unknown 카테고리", () => {
    const record = normalizer.build({
      colourName: "Arctic White",
      finish: "Default",
      entry: { name: "Arctic White", url: "https://www.example.com/colours/x/" },
      row: { family: "", identifier: "", title: "", attributes: new Map() },
      result,
    });

    expect(record.category).toBe("Unknown");
    expect(record.core.product_family).toBe("");
  });
});
