/**
 * MoqResolver Test
 *
 * 목적: MOQ 힌트 파싱 / 유효 수량 계산 / 행 힌트 수집 검증
 */

import { describe, it, expect, afterEach } from "@jest/globals";
import { MoqResolver, mergeMax } from "@/interaction/MoqResolver";
import { JsdomPage } from "../support/JsdomSurface";
import { renderColourPage, SITE_ORIGIN, FixtureRow } from "../support/catalogSite";

const PAGE_URL = `${SITE_ORIGIN}/colours/arctic-white/`;

function pageWithRow(row: FixtureRow): JsdomPage {
  const html = renderColourPage({
    name: "Arctic White",
    panels: [
      {
        id: "panel-a",
        label: "Matt",
        families: [{ name: "Doors", rows: [row] }],
      },
    ],
  });
  return new JsdomPage({ [PAGE_URL]: html }, undefined, PAGE_URL);
}

describe("MoqResolver", () => {
  let page: JsdomPage | null = null;

  afterEach(() => {
    page?.close();
    page = null;
  });

  describe("parseHintText - 텍스트 패턴", () => {
    it("최소 수량과 배수를 함께 읽어야 함", () => {
      expect(
        MoqResolver.parseHintText("Minimum Order Qty: 10, multiples of 5"),
      ).toEqual({ min: 10, step: 5 });
    });

    it("MOQ 표기를 최소 수량으로 읽어야 함", () => {
      expect(MoqResolver.parseHintText("MOQ: 4").min).toBe(4);
    });

    it("여러 최소 수량 중 가장 큰 값을 사용해야 함", () => {
      expect(MoqResolver.parseHintText("min quantity 6 or MOQ 8").min).toBe(8);
    });

    it("pack 배수를 step으로 읽어야 함", () => {
      expect(MoqResolver.parseHintText("Sold in packs of 2").step).toBe(2);
    });

    it("신호가 없으면 둘 다 undefined", () => {
      expect(MoqResolver.parseHintText("In stock: 25")).toEqual({
        min: undefined,
        step: undefined,
      });
    });
  });

  describe("bump - 유효 수량", () => {
    it("최소 수량 이상의 step 배수로 올려야 함", () => {
      expect(MoqResolver.bump(1, 5, 3)).toBe(6);
    });

    it("제약이 없으면 요청 수량 그대로", () => {
      expect(MoqResolver.bump(7, 1, 1)).toBe(7);
    });

    it("이미 배수면 그대로", () => {
      expect(MoqResolver.bump(8, 1, 4)).toBe(8);
    });

    it("요청 수량이 step보다 작으면 step으로", () => {
      expect(MoqResolver.bump(2, 1, 4)).toBe(4);
    });
  });

  describe("needsRetry / toConstraint", () => {
    it("결과에 MOQ 메시지가 있을 때만 재시도", () => {
      expect(MoqResolver.needsRetry("In stock", "$10.00")).toBe(false);
      expect(
        MoqResolver.needsRetry("Minimum order quantity is 5", ""),
      ).toBe(true);
    });

    it("힌트가 없으면 (1, 1)", () => {
      expect(MoqResolver.toConstraint({})).toEqual({
        minimumQuantity: 1,
        orderMultiple: 1,
      });
    });

    it("mergeMax는 있는 값 중 큰 값", () => {
      expect(mergeMax(undefined, 3)).toBe(3);
      expect(mergeMax(4, undefined)).toBe(4);
      expect(mergeMax(4, 9)).toBe(9);
      expect(mergeMax(undefined, undefined)).toBeUndefined();
    });
  });

  describe("readHints - 행 힌트 수집", () => {
    const resolver = new MoqResolver(50);

    it("input min 속성과 경고 텍스트를 병합해야 함", async () => {
      page = pageWithRow({
        sku: "DR-1",
        title: "Door 2400",
        inputMin: 3,
        inputStep: "any",
        warning: "Sold in packs of 2",
      });
      const row = page.all("div.items > div.item").nth(0);

      const hints = await resolver.readHints(row);

      expect(hints.min).toBe(3);
      expect(hints.step).toBe(2);
      expect(hints.evidence).toEqual(["Sold in packs of 2"]);
    });

    it("step=any는 제약 없음으로 처리해야 함", async () => {
      page = pageWithRow({ sku: "DR-2", title: "Door", inputStep: "any" });
      const row = page.all("div.items > div.item").nth(0);

      const hints = await resolver.readHints(row);

      expect(hints.step).toBeUndefined();
      expect(hints.min).toBeUndefined();
    });

    it("숫자 step 속성을 읽어야 함", async () => {
      page = pageWithRow({ sku: "DR-3", title: "Door", inputStep: "5" });
      const row = page.all("div.items > div.item").nth(0);

      expect((await resolver.readHints(row)).step).toBe(5);
    });
  });
});
