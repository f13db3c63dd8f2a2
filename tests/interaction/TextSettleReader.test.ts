/**
 * TextSettleReader Test
 *
 * 목적: 결과 영역 텍스트 대기 / 즉시 읽기 / 예외 없음 검증
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { TextSettleReader } from "@/interaction/TextSettleReader";
import { JsdomPage } from "../support/JsdomSurface";

const PAGE_URL = "https://www.example.com/reader";

describe("TextSettleReader", () => {
  let page: JsdomPage;
  const reader = new TextSettleReader({ handleAcquireMs: 50, immediateReadMs: 50 });

  beforeEach(() => {
    page = new JsdomPage(
      {
        [PAGE_URL]: `<!DOCTYPE html><body>
          <div class="result"></div>
          <div class="ready">  In stock: 12  </div>
        </body>`,
      },
      undefined,
      PAGE_URL,
    );
  });

  afterEach(() => {
    page.close();
  });

  it("텍스트가 채워질 때까지 기다린 뒤 읽어야 함", async () => {
    const region = page.locator(".result");
    setTimeout(() => {
      const target = page.document.querySelector(".result");
      if (target) target.textContent = "In stock";
    }, 20);

    await expect(reader.read(region, 300)).resolves.toBe("In stock");
  });

  it("이미 채워진 텍스트는 trim해서 반환해야 함", async () => {
    await expect(reader.read(page.locator(".ready"), 300)).resolves.toBe(
      "In stock: 12",
    );
  });

  it("제한 시간 안에 채워지지 않으면 빈 문자열", async () => {
    await expect(reader.read(page.locator(".result"), 40)).resolves.toBe("");
  });

  it("영역이 없으면 예외 없이 빈 문자열", async () => {
    await expect(reader.read(page.locator(".missing"), 300)).resolves.toBe("");
  });

  it("readNow는 대기 없이 현재 값을 읽어야 함", async () => {
    await expect(reader.readNow(page.locator(".result"))).resolves.toBe("");
  });
});
