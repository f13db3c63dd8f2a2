/**
 * PanelNavigator Test
 *
 * 목적: 탭 목록 / 라벨 매칭 / 패널 활성화 상태 전이 검증
 */

import { describe, it, expect, afterEach } from "@jest/globals";
import {
  DEFAULT_TAB,
  PanelNavigator,
  PanelState,
} from "@/catalog/PanelNavigator";
import { OverlayMitigator } from "@/interaction/OverlayMitigator";
import { ActionTrigger } from "@/interaction/ActionTrigger";
import { PanelActivationError } from "@/core/errors/ScannerErrors";
import { JsdomPage } from "../support/JsdomSurface";
import {
  createCatalogSite,
  renderColourPage,
  FixtureColour,
  SITE_ORIGIN,
  TEST_INTERACTION,
  TEST_NAVIGATION,
} from "../support/catalogSite";

const PAGE_URL = `${SITE_ORIGIN}/colours/black-oak/`;

const TWO_TABS: FixtureColour = {
  name: "Black Oak",
  panels: [
    { id: "panel-a", label: "Matt", families: [] },
    { id: "panel-b", label: "Gloss", families: [] },
  ],
};

function createPage(colour: FixtureColour): JsdomPage {
  const site = createCatalogSite();
  return new JsdomPage({ [PAGE_URL]: renderColourPage(colour) }, site.script, PAGE_URL);
}

function createNavigator(): PanelNavigator {
  return new PanelNavigator(
    TEST_NAVIGATION,
    new OverlayMitigator(TEST_INTERACTION),
    new ActionTrigger(TEST_INTERACTION),
  );
}

describe("PanelNavigator", () => {
  let page: JsdomPage | null = null;

  afterEach(() => {
    page?.close();
    page = null;
  });

  describe("listTabs", () => {
    it("탭 라벨을 순서대로 반환해야 함", async () => {
      page = createPage(TWO_TABS);

      await expect(createNavigator().listTabs(page)).resolves.toEqual([
        { label: "Matt", synthetic: false },
        { label: "Gloss", synthetic: false },
      ]);
    });

    it("탭이 없으면 synthetic Default 탭 하나", async () => {
      page = createPage({ ...TWO_TABS, withoutTabs: true });

      await expect(createNavigator().listTabs(page)).resolves.toEqual([
        DEFAULT_TAB,
      ]);
    });
  });

  describe("activate", () => {
    it("대소문자 무시 라벨 매칭으로 해당 패널을 활성화해야 함", async () => {
      page = createPage(TWO_TABS);
      const navigator = createNavigator();

      const panel = await navigator.activate(page, {
        label: "gloss",
        synthetic: false,
      });

      await expect(panel.getAttribute("id", 50)).resolves.toBe("panel-b");
      expect(navigator.getState()).toBe(PanelState.Active);
    });

    it("매칭되는 라벨이 없으면 첫 번째 탭을 사용해야 함", async () => {
      page = createPage(TWO_TABS);

      const panel = await createNavigator().activate(page, {
        label: "Satin",
        synthetic: false,
      });

      await expect(panel.getAttribute("id", 50)).resolves.toBe("panel-a");
    });

    it("synthetic 탭은 클릭 없이 현재 활성 패널을 사용해야 함", async () => {
      page = createPage({ ...TWO_TABS, withoutTabs: true });

      const panel = await createNavigator().activate(page, DEFAULT_TAB);

      await expect(panel.getAttribute("id", 50)).resolves.toBe("panel-a");
    });

    it("활성 패널이 없으면 PanelActivationError + Inactive", async () => {
      page = createPage({ ...TWO_TABS, withoutTabs: true });
      page.document
        .querySelectorAll("div.tabs-panel")
        .forEach((panel) => panel.classList.remove("is-active"));
      const navigator = createNavigator();

      await expect(navigator.activate(page, DEFAULT_TAB)).rejects.toBeInstanceOf(
        PanelActivationError,
      );
      expect(navigator.getState()).toBe(PanelState.Inactive);
    });
  });
});
