/**
 * PanelNavigator
 *
 * 카테고리 탭 활성화 상태 머신
 * Inactive → Activating → Active
 *
 * activate(tab):
 * 1. 오버레이 정리
 * 2. 라벨 대소문자 무시 매칭 (없으면 첫 번째 탭)
 * 3. force 클릭 최대 N회 (시도 사이 오버레이 정리)
 * 4. 탭 href fragment가 가리키는 패널의 is-active 대기 → 실패 시 아무 활성 패널 대기
 *
 * Active가 되지 않으면 PanelActivationError (엔트리 단위 실패)
 */

import type { ISurfaceElement, ISurfacePage } from "@/core/interfaces";
import type { NavigationConfig } from "@/core/domain/ScannerConfig";
import { PAGE_SELECTORS } from "./CatalogSelectors";
import { OverlayMitigator } from "@/interaction/OverlayMitigator";
import { ActionTrigger } from "@/interaction/ActionTrigger";
import { logger } from "@/config/logger";
import {
  PanelActivationError,
  toErrorMessage,
} from "@/core/errors/ScannerErrors";

/**
 * 패널 상태
 */
export enum PanelState {
  Inactive = "inactive",
  Activating = "activating",
  Active = "active",
}

/**
 * 탭 기술자
 * synthetic: 페이지에 탭이 없어 만든 "Default" 탭
 */
export interface TabDescriptor {
  label: string;
  synthetic: boolean;
}

export const DEFAULT_TAB: TabDescriptor = { label: "Default", synthetic: true };

/**
 * CSS 속성 selector 값 이스케이프
 */
function escapeAttributeValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

export class PanelNavigator {
  private state: PanelState = PanelState.Inactive;

  constructor(
    private readonly config: NavigationConfig,
    private readonly overlay: OverlayMitigator,
    private readonly trigger: ActionTrigger,
  ) {}

  getState(): PanelState {
    return this.state;
  }

  /**
   * 페이지의 탭 라벨 목록 (없으면 synthetic Default)
   */
  async listTabs(page: ISurfacePage): Promise<TabDescriptor[]> {
    const links = page.all(PAGE_SELECTORS.TAB_LINKS);
    const count = await links.count();
    if (count === 0) {
      return [DEFAULT_TAB];
    }

    const tabs: TabDescriptor[] = [];
    for (let i = 0; i < count; i++) {
      const label = await this.safeText(links.nth(i));
      tabs.push({ label, synthetic: false });
    }
    return tabs;
  }

  /**
   * 탭 활성화 후 활성 패널 반환
   */
  async activate(
    page: ISurfacePage,
    tab: TabDescriptor,
  ): Promise<ISurfaceElement> {
    this.state = PanelState.Activating;
    await this.overlay.mitigate(page);

    let fragment = "";
    if (!tab.synthetic) {
      const link = await this.findTabLink(page, tab.label);
      fragment = await this.readFragment(link);
      await this.clickWithRetry(page, link, tab.label);
    }

    const activated =
      (fragment && (await this.waitForPanel(page, this.panelSelector(fragment)))) ||
      (await this.waitForPanel(page, PAGE_SELECTORS.ACTIVE_PANEL));

    if (!activated) {
      this.state = PanelState.Inactive;
      throw new PanelActivationError(
        `Panel did not become active for tab "${tab.label}"`,
        tab.label,
      );
    }

    this.state = PanelState.Active;
    return page.locator(PAGE_SELECTORS.ACTIVE_PANEL);
  }

  /**
   * 대소문자 무시 라벨 매칭, 없으면 첫 번째 탭
   */
  private async findTabLink(
    page: ISurfacePage,
    label: string,
  ): Promise<ISurfaceElement> {
    const links = page.all(PAGE_SELECTORS.TAB_LINKS);
    const count = await links.count();
    const wanted = label.trim().toLowerCase();

    for (let i = 0; i < count; i++) {
      const link = links.nth(i);
      const text = await this.safeText(link);
      if (text.toLowerCase() === wanted) {
        return link;
      }
    }

    logger.warn({ label }, "탭 라벨 매칭 실패 - 첫 번째 탭 사용");
    return links.nth(0);
  }

  private async clickWithRetry(
    page: ISurfacePage,
    link: ISurfaceElement,
    label: string,
  ): Promise<void> {
    for (let attempt = 1; attempt <= this.config.tabClickAttempts; attempt++) {
      if (await this.trigger.trigger(link)) {
        return;
      }
      logger.debug({ label, attempt }, "탭 클릭 실패 - 오버레이 정리 후 재시도");
      await this.overlay.mitigate(page);
    }
    logger.warn({ label }, "탭 클릭 재시도 소진 - 패널 대기로 진행");
  }

  private async readFragment(link: ISurfaceElement): Promise<string> {
    try {
      const href = await link.getAttribute("href", this.config.textReadMs);
      const hashIndex = href?.indexOf("#") ?? -1;
      return href && hashIndex >= 0 ? href.slice(hashIndex + 1).trim() : "";
    } catch (error) {
      logger.debug({ error: toErrorMessage(error) }, "탭 href 읽기 실패");
      return "";
    }
  }

  private panelSelector(fragment: string): string {
    return `${PAGE_SELECTORS.PANEL}[id="${escapeAttributeValue(fragment)}"].${PAGE_SELECTORS.ACTIVE_CLASS}`;
  }

  private async waitForPanel(
    page: ISurfacePage,
    selector: string,
  ): Promise<boolean> {
    try {
      await page.waitForSelector(selector, this.config.panelWaitMs);
      return true;
    } catch (error) {
      logger.debug(
        { selector, error: toErrorMessage(error) },
        "활성 패널 대기 타임아웃",
      );
      return false;
    }
  }

  private async safeText(element: ISurfaceElement): Promise<string> {
    try {
      return ((await element.textContent(this.config.textReadMs)) ?? "").trim();
    } catch (error) {
      logger.debug({ error: toErrorMessage(error) }, "탭 라벨 읽기 실패");
      return "";
    }
  }
}
