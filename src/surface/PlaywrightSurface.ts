/**
 * Playwright Surface 구현체
 *
 * ISurface* 인터페이스 → Playwright Page / Locator / ElementHandle 어댑터
 *
 * SOLID 원칙:
 * - SRP: Playwright 호출 변환만 담당 (재시도/판단 로직 X)
 * - LSP: ISurfacePage 대체 가능 (테스트는 jsdom 구현체 사용)
 *
 * 규칙:
 * - 모든 locator는 first()로 첫 번째 매칭 요소에 고정
 * - "예외 없음" 메서드는 Playwright 타임아웃을 false / null로 변환
 */

import type { ElementHandle, Locator, Page } from "playwright";

import type {
  ClickOptions,
  ISurfaceElement,
  ISurfaceHandle,
  ISurfaceList,
  ISurfacePage,
} from "@/core/interfaces";
import { logger } from "@/config/logger";
import { toErrorMessage } from "@/core/errors/ScannerErrors";

type DomHandle = ElementHandle<HTMLElement | SVGElement>;

/**
 * ElementHandle 어댑터
 */
export class PlaywrightHandle implements ISurfaceHandle {
  constructor(
    private readonly page: Page,
    private readonly handle: DomHandle,
  ) {}

  async waitForNonEmptyText(timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForFunction(
        (el) => Boolean(el.textContent && el.textContent.trim()),
        this.handle,
        { timeout: timeoutMs },
      );
      return true;
    } catch (error) {
      logger.debug({ error: toErrorMessage(error) }, "텍스트 대기 종료");
      return false;
    }
  }

  async dispatchClick(): Promise<void> {
    await this.handle.evaluate((el) => {
      if (el instanceof HTMLElement) {
        el.click();
        return;
      }
      el.dispatchEvent(new MouseEvent("click", { bubbles: true }));
    });
  }

  async assignValue(value: string): Promise<void> {
    await this.handle.evaluate((el, v) => {
      if (!(el instanceof HTMLInputElement)) {
        throw new Error("value 대입 대상이 input이 아님");
      }
      el.value = v;
      el.dispatchEvent(new Event("input", { bubbles: true }));
      el.dispatchEvent(new Event("change", { bubbles: true }));
    }, value);
  }
}

/**
 * Locator 어댑터 (첫 번째 매칭 요소)
 */
export class PlaywrightElement implements ISurfaceElement {
  private readonly target: Locator;

  constructor(
    private readonly page: Page,
    locator: Locator,
  ) {
    this.target = locator.first();
  }

  locator(selector: string): ISurfaceElement {
    return new PlaywrightElement(this.page, this.target.locator(selector));
  }

  all(selector: string): ISurfaceList {
    return new PlaywrightList(this.page, this.target.locator(selector));
  }

  async acquireHandle(timeoutMs: number): Promise<ISurfaceHandle | null> {
    try {
      const handle = await this.target.elementHandle({ timeout: timeoutMs });
      return handle ? new PlaywrightHandle(this.page, handle) : null;
    } catch (error) {
      logger.debug({ error: toErrorMessage(error) }, "핸들 획득 실패");
      return null;
    }
  }

  textContent(timeoutMs: number): Promise<string | null> {
    return this.target.textContent({ timeout: timeoutMs });
  }

  getAttribute(name: string, timeoutMs: number): Promise<string | null> {
    return this.target.getAttribute(name, { timeout: timeoutMs });
  }

  click(options: ClickOptions): Promise<void> {
    return this.target.click({
      force: options.force,
      noWaitAfter: options.noWaitAfter,
      timeout: options.timeoutMs,
    });
  }

  fill(value: string, timeoutMs: number): Promise<void> {
    return this.target.fill(value, { timeout: timeoutMs });
  }

  blur(timeoutMs: number): Promise<void> {
    return this.target.blur({ timeout: timeoutMs });
  }

  async isVisible(timeoutMs: number): Promise<boolean> {
    try {
      await this.target.waitFor({ state: "visible", timeout: timeoutMs });
      return true;
    } catch {
      return false;
    }
  }

  scrollIntoView(timeoutMs: number): Promise<void> {
    return this.target.scrollIntoViewIfNeeded({ timeout: timeoutMs });
  }

  async clearTextContent(timeoutMs: number): Promise<void> {
    await this.target.evaluate(
      (el) => {
        el.textContent = "";
        el.classList.remove("hide");
      },
      undefined,
      { timeout: timeoutMs },
    );
  }

  precedingSiblingText(tagName: string, timeoutMs: number): Promise<string> {
    return this.target.evaluate(
      (el, tag) => {
        let node = el.previousElementSibling;
        while (node) {
          if (node.tagName === tag.toUpperCase()) {
            return (node.textContent ?? "").trim();
          }
          node = node.previousElementSibling;
        }
        return "";
      },
      tagName,
      { timeout: timeoutMs },
    );
  }
}

/**
 * Locator 목록 어댑터
 */
export class PlaywrightList implements ISurfaceList {
  constructor(
    private readonly page: Page,
    private readonly target: Locator,
  ) {}

  count(): Promise<number> {
    return this.target.count();
  }

  nth(index: number): ISurfaceElement {
    return new PlaywrightElement(this.page, this.target.nth(index));
  }
}

/**
 * Page 어댑터
 */
export class PlaywrightPage implements ISurfacePage {
  constructor(private readonly page: Page) {}

  /** 로그인 등 Playwright 전용 흐름용 */
  get raw(): Page {
    return this.page;
  }

  url(): string {
    return this.page.url();
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded" });
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<void> {
    await this.page.waitForSelector(selector, {
      state: "attached",
      timeout: timeoutMs,
    });
  }

  locator(selector: string): ISurfaceElement {
    return new PlaywrightElement(this.page, this.page.locator(selector));
  }

  all(selector: string): ISurfaceList {
    return new PlaywrightList(this.page, this.page.locator(selector));
  }

  pressKey(key: string): Promise<void> {
    return this.page.keyboard.press(key);
  }

  removeAll(selector: string): Promise<number> {
    return this.page.evaluate((sel) => {
      const nodes = document.querySelectorAll(sel);
      nodes.forEach((node) => node.remove());
      return nodes.length;
    }, selector);
  }

  waitForResponse(
    predicate: (url: string) => boolean,
    timeoutMs: number,
  ): Promise<boolean> {
    return this.page
      .waitForResponse((response) => predicate(response.url()), {
        timeout: timeoutMs,
      })
      .then(
        () => true,
        (error: unknown) => {
          logger.debug({ error: toErrorMessage(error) }, "응답 대기 타임아웃");
          return false;
        },
      );
  }

  waitForNetworkIdle(timeoutMs: number): Promise<boolean> {
    return this.page
      .waitForLoadState("networkidle", { timeout: timeoutMs })
      .then(
        () => true,
        (error: unknown) => {
          logger.debug({ error: toErrorMessage(error) }, "networkidle 타임아웃");
          return false;
        },
      );
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => {
      window.scrollTo(0, document.body.scrollHeight);
    });
  }

  waitForTimeout(ms: number): Promise<void> {
    return this.page.waitForTimeout(ms);
  }
}
