/**
 * Browser Controller 구현체
 *
 * 브라우저 생명주기 및 세션 관리
 *
 * SOLID 원칙:
 * - SRP: 브라우저 제어만 담당 (추출/조회 X)
 * - LSP: IBrowserController / ISessionProvider 대체 가능
 * - DIP: 코어에는 PlaywrightPage(ISurfacePage)만 노출
 *
 * 책임:
 * 1. 브라우저/컨텍스트/페이지 생명주기 관리
 * 2. 저장된 세션(storage state) 로드 / 저장
 * 3. 기본 타임아웃 적용 (action / navigation)
 * 4. 디버그 산출물 (스크린샷 + HTML)
 */

import { chromium } from "playwright-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";
import type { Browser, BrowserContext, Page } from "playwright";
import * as path from "path";
import * as fs from "fs/promises";
import { existsSync } from "fs";

import {
  ArtifactPaths,
  BrowserInitOptions,
  IBrowserController,
} from "./IBrowserController";
import type { BrowserConfig, PathConfig } from "@/core/domain/ScannerConfig";
import { PlaywrightPage } from "@/surface/PlaywrightSurface";
import {
  FatalPreconditionError,
  toErrorMessage,
} from "@/core/errors/ScannerErrors";
import { logger } from "@/config/logger";

// Stealth 플러그인 적용 (모듈 레벨)
chromium.use(StealthPlugin());

/**
 * 봇 탐지 우회 Chrome 플래그
 */
const LAUNCH_ARGS = ["--disable-blink-features=AutomationControlled"];

/**
 * Browser Controller 구현체
 */
export class BrowserController implements IBrowserController {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  private surface: PlaywrightPage | null = null;

  constructor(
    private readonly browserConfig: BrowserConfig,
    private readonly paths: Pick<PathConfig, "sessionFile" | "artifactsDir">,
  ) {}

  /**
   * 세션 파일 절대경로
   */
  get sessionFile(): string {
    return path.resolve(this.paths.sessionFile);
  }

  /**
   * 저장된 세션으로 열기 (ISessionProvider)
   */
  open(): Promise<PlaywrightPage> {
    return this.initialize({ withSession: true });
  }

  /**
   * 브라우저 초기화
   */
  async initialize(options: BrowserInitOptions): Promise<PlaywrightPage> {
    if (this.surface) {
      logger.debug("BrowserController 이미 초기화됨");
      return this.surface;
    }

    if (options.withSession && !existsSync(this.sessionFile)) {
      throw new FatalPreconditionError(
        `Session file not found: ${this.sessionFile} (run "login" first)`,
      );
    }

    logger.info(
      { headless: this.browserConfig.headless, withSession: options.withSession },
      "브라우저 초기화 시작",
    );

    this.browser = await chromium.launch({
      headless: this.browserConfig.headless,
      args: LAUNCH_ARGS,
    });

    this.context = await this.browser.newContext(
      options.withSession ? { storageState: this.sessionFile } : {},
    );

    // Anti-detection 설정
    await this.context.addInitScript(() => {
      Object.defineProperty(navigator, "webdriver", {
        get: () => false,
      });
    });

    this.context.setDefaultTimeout(this.browserConfig.defaultTimeoutMs);
    this.context.setDefaultNavigationTimeout(
      this.browserConfig.navigationTimeoutMs,
    );

    this.page = await this.context.newPage();
    this.surface = new PlaywrightPage(this.page);

    logger.info("브라우저 초기화 완료");
    return this.surface;
  }

  async saveSession(): Promise<string> {
    if (!this.context) {
      throw new Error("BrowserController가 초기화되지 않음");
    }
    await fs.mkdir(path.dirname(this.sessionFile), { recursive: true });
    await this.context.storageState({ path: this.sessionFile });
    logger.info({ sessionFile: this.sessionFile }, "세션 저장 완료");
    return this.sessionFile;
  }

  /**
   * 스크린샷 + HTML 저장 (artifactsDir/{name}.png|html)
   */
  async captureArtifacts(name: string): Promise<ArtifactPaths | null> {
    if (!this.page) {
      return null;
    }

    try {
      const dir = path.resolve(this.paths.artifactsDir);
      await fs.mkdir(dir, { recursive: true });

      const artifacts: ArtifactPaths = {
        screenshot: path.join(dir, `${name}.png`),
        html: path.join(dir, `${name}.html`),
      };

      await this.page.screenshot({ path: artifacts.screenshot, fullPage: true });
      await fs.writeFile(artifacts.html, await this.page.content(), "utf-8");

      logger.debug(artifacts, "디버그 산출물 저장 완료");
      return artifacts;
    } catch (error) {
      logger.warn(
        { name, error: toErrorMessage(error) },
        "디버그 산출물 저장 실패 - 무시",
      );
      return null;
    }
  }

  getPage(): Page | null {
    return this.page;
  }

  isInitialized(): boolean {
    return this.surface !== null;
  }

  /**
   * 리소스 정리
   */
  async close(): Promise<void> {
    if (!this.browser) {
      return;
    }

    logger.info("BrowserController 정리 중...");

    if (this.page) {
      await this.page.close();
      this.page = null;
    }

    if (this.context) {
      await this.context.close();
      this.context = null;
    }

    await this.browser.close();
    this.browser = null;
    this.surface = null;

    logger.info("BrowserController 정리 완료");
  }
}
