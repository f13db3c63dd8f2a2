/**
 * CatalogIndexCollector Test
 *
 * 목적: 무한 스크롤 안정화 / 타일 수집 / 절대 URL + slug 변환 검증
 */

import { describe, it, expect, afterEach } from "@jest/globals";
import { CatalogIndexCollector } from "@/scanners/CatalogIndexCollector";
import type { IndexConfig } from "@/core/domain/ScannerConfig";
import { JsdomPage } from "../support/JsdomSurface";
import { renderIndexPage, SITE_ORIGIN } from "../support/catalogSite";

const INDEX_URL = `${SITE_ORIGIN}/colours/`;

const INDEX_CONFIG: IndexConfig = {
  maxScrollRounds: 20,
  stableRounds: 2,
  networkIdleMs: 10,
  settleMs: 0,
};

const OPTIONS = { baseUrl: `${SITE_ORIGIN}/`, selectorWaitMs: 100, textReadMs: 50 };

function appendTile(page: JsdomPage, name: string, href: string): void {
  const { document } = page;
  const list = document.querySelector("ul.colour-thumbs");
  const item = document.createElement("li");
  const link = document.createElement("a");
  const heading = document.createElement("h5");
  link.setAttribute("href", href);
  heading.textContent = name;
  link.appendChild(heading);
  item.appendChild(link);
  list?.appendChild(item);
}

describe("CatalogIndexCollector", () => {
  let page: JsdomPage | null = null;

  afterEach(() => {
    page?.close();
    page = null;
  });

  it("스크롤로 늘어난 타일까지 화면 순서대로 수집해야 함", async () => {
    page = new JsdomPage({
      [INDEX_URL]: renderIndexPage([
        { name: "Arctic White", href: "/colours/arctic-white/" },
        { name: "Black Oak", href: `${SITE_ORIGIN}/colours/black-oak/` },
        { name: "Coming Soon" },
      ]),
    });
    let added = false;
    page.onScroll = (current) => {
      if (added) return;
      added = true;
      appendTile(current, "Special", "/specials/special");
    };

    const entries = await new CatalogIndexCollector(INDEX_CONFIG, OPTIONS).collect(
      page,
      INDEX_URL,
    );

    expect(entries).toEqual([
      {
        name: "Arctic White",
        url: "https://www.example.com/colours/arctic-white/",
        slug: "arctic-white",
      },
      {
        name: "Black Oak",
        url: "https://www.example.com/colours/black-oak/",
        slug: "black-oak",
      },
      {
        name: "Special",
        url: "https://www.example.com/specials/special",
        slug: "special",
      },
    ]);
    expect(page.scrolls).toBe(4);
  });

  it("타일이 계속 늘어나도 최대 라운드에서 멈춰야 함", async () => {
    page = new JsdomPage({
      [INDEX_URL]: renderIndexPage([{ name: "Arctic White", href: "/colours/arctic-white/" }]),
    });
    let counter = 0;
    page.onScroll = (current) => {
      counter++;
      appendTile(current, `Colour ${counter}`, `/colours/colour-${counter}/`);
    };

    const total = await new CatalogIndexCollector(
      { ...INDEX_CONFIG, maxScrollRounds: 3 },
      OPTIONS,
    ).scrollUntilStable(page);

    expect(page.scrolls).toBe(3);
    expect(total).toBe(4);
  });

  it("타일이 없으면 예외를 전파해야 함", async () => {
    page = new JsdomPage({ [INDEX_URL]: "<!DOCTYPE html><body></body>" });

    await expect(
      new CatalogIndexCollector(INDEX_CONFIG, OPTIONS).collect(page, INDEX_URL),
    ).rejects.toThrow("ul.colour-thumbs li");
  });
});
