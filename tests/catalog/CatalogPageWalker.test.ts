/**
 * CatalogPageWalker Test
 *
 * 목적: 엔트리 단위 처리 흐름 검증
 * - 탭별 finish / family / 중복 제거
 * - 행 예외 → ERROR 레코드
 * - 탭 없는 페이지 → Default finish
 * - 페이지 로드 실패 전파
 */

import { describe, it, expect, afterEach } from "@jest/globals";
import { CatalogPageWalker } from "@/catalog/CatalogPageWalker";
import { RowDedupRegistry } from "@/catalog/RowDedupRegistry";
import { RowInteractionOrchestrator } from "@/interaction/RowInteractionOrchestrator";
import type { RowInteractionResult } from "@/core/domain/CatalogRecord";
import type { CatalogEntry } from "@/core/domain/CatalogEntry";
import { JsdomPage } from "../support/JsdomSurface";
import { MemorySink } from "../support/fakes";
import {
  createCatalogSite,
  renderColourPage,
  FixtureColour,
  SITE_ORIGIN,
  TEST_INTERACTION,
  TEST_NAVIGATION,
} from "../support/catalogSite";

const ENTRY: CatalogEntry = {
  name: "Arctic White (index)",
  url: `${SITE_ORIGIN}/colours/arctic-white/`,
  slug: "arctic-white",
};

const CONFIG = { interaction: TEST_INTERACTION, navigation: TEST_NAVIGATION };

const COLOUR: FixtureColour = {
  name: "Arctic White",
  panels: [
    {
      id: "panel-matt",
      label: "Matt",
      families: [
        {
          name: "Doors",
          rows: [
            { sku: "AW-1", title: "Door 2400", attributes: { Substrate: "MR MDF" } },
            { sku: "AW-1", title: "Door 2400 (repeat)" },
          ],
        },
      ],
    },
    {
      id: "panel-gloss",
      label: "Gloss Finish",
      finish: "Gloss",
      families: [{ name: "Edges", rows: [{ sku: "AW-2", title: "Edge", inputMin: 3 }] }],
    },
  ],
};

/**
 * 조회 없이 고정 결과 반환
 */
class FixedOrchestrator extends RowInteractionOrchestrator {
  async interact(): Promise<RowInteractionResult> {
    return {
      stockText: "In stock",
      priceText: "$1.00",
      usedQuantity: 1,
      minimumQuantity: 1,
      orderMultiple: 1,
    };
  }
}

class FailingOrchestrator extends RowInteractionOrchestrator {
  async interact(): Promise<RowInteractionResult> {
    throw new Error("row detached");
  }
}

function createPage(html: string): JsdomPage {
  const site = createCatalogSite(5);
  return new JsdomPage({ [ENTRY.url]: html }, site.script);
}

describe("CatalogPageWalker", () => {
  let page: JsdomPage | null = null;

  afterEach(() => {
    page?.close();
    page = null;
  });

  it("탭별로 행을 조회하고 (finish, SKU) 중복은 건너뛰어야 함", async () => {
    page = createPage(renderColourPage(COLOUR));
    const sink = new MemorySink();
    const walker = new CatalogPageWalker(CONFIG);

    const summary = await walker.walk(page, ENTRY, new RowDedupRegistry(), sink);

    expect(summary).toEqual({
      colourName: "Arctic White",
      tabs: 2,
      rowsSeen: 3,
      recordsWritten: 2,
      duplicatesSkipped: 1,
      categories: ["Doors", "Edges"],
    });

    const [door, edge] = sink.rows;
    expect(door.category).toBe("Doors");
    expect(door.core.finish).toBe("Matt");
    expect(door.core.colour_name).toBe("Arctic White");
    expect(door.core.stock_result_raw).toBe("In stock");
    expect(door.core.price_result_raw).toBe("$10.00 (qty 1)");
    expect(door.core.product_url).toBe(ENTRY.url);
    expect([...door.specs.entries()]).toEqual([
      ["substrate", "MR MDF"],
      ["minimum_order_qty", "1"],
      ["order_multiple", "1"],
    ]);

    expect(edge.category).toBe("Edges");
    expect(edge.core.finish).toBe("Gloss");
    expect(edge.core.qty_used_for_checks).toBe("3");
    expect(edge.specs.get("minimum_order_qty")).toBe("3");
  });

  it("같은 레지스트리를 공유하면 이미 본 행은 다시 기록하지 않아야 함", async () => {
    page = createPage(renderColourPage(COLOUR));
    const seen = new RowDedupRegistry();
    seen.markIfNew("Matt", "AW-1");
    const sink = new MemorySink();
    const walker = new CatalogPageWalker(CONFIG, {
      orchestrator: new FixedOrchestrator(TEST_INTERACTION),
    });

    const summary = await walker.walk(page, ENTRY, seen, sink);

    expect(summary.duplicatesSkipped).toBe(2);
    expect(sink.rows.map((row) => row.core.sku_code)).toEqual(["AW-2"]);
  });

  it("행 처리 예외는 ERROR 레코드로 기록하고 계속해야 함", async () => {
    page = createPage(renderColourPage(COLOUR));
    const sink = new MemorySink();
    const walker = new CatalogPageWalker(CONFIG, {
      orchestrator: new FailingOrchestrator(TEST_INTERACTION),
    });

    const summary = await walker.walk(page, ENTRY, new RowDedupRegistry(), sink);

    expect(summary.recordsWritten).toBe(2);
    expect(sink.rows.map((row) => row.core.stock_result_raw)).toEqual([
      "ERROR",
      "ERROR",
    ]);
    expect(sink.rows[0].core.price_result_raw).toBe("ERROR");
    expect(sink.rows[0].core.qty_used_for_checks).toBe("1");
  });

  it("탭이 없는 페이지는 Default finish로 처리해야 함", async () => {
    page = createPage(renderColourPage({ ...COLOUR, withoutTabs: true }));
    const sink = new MemorySink();
    const walker = new CatalogPageWalker(CONFIG, {
      orchestrator: new FixedOrchestrator(TEST_INTERACTION),
    });

    const summary = await walker.walk(page, ENTRY, new RowDedupRegistry(), sink);

    expect(summary.tabs).toBe(1);
    expect(sink.rows.map((row) => row.core.finish)).toEqual(["Default"]);
  });

  it("컬러 표시명이 없으면 엔트리 이름을 사용해야 함", async () => {
    page = createPage(
      renderColourPage(COLOUR).replace(
        '<div class="product-hero"><h1>Arctic White</h1></div>',
        "",
      ),
    );
    const walker = new CatalogPageWalker(CONFIG, {
      orchestrator: new FixedOrchestrator(TEST_INTERACTION),
    });

    const summary = await walker.walk(
      page,
      ENTRY,
      new RowDedupRegistry(),
      new MemorySink(),
    );

    expect(summary.colourName).toBe("Arctic White (index)");
  });

  it("탭 컨테이너가 없으면 예외를 전파해야 함", async () => {
    page = createPage("<!DOCTYPE html><body><p>maintenance</p></body>");
    const walker = new CatalogPageWalker(CONFIG);

    await expect(
      walker.walk(page, ENTRY, new RowDedupRegistry(), new MemorySink()),
    ).rejects.toThrow("#product-tabs");
  });
});
