/**
 * LoginService
 *
 * 카탈로그 사이트 로그인 후 세션(storage state) 저장
 *
 * 흐름:
 * 1. 로그인 페이지 이동
 * 2. 아이디 입력 → Tab (클라이언트 훅 트리거) → 비밀번호 입력
 * 3. "Login" 버튼 클릭
 * 4. URL이 로그인 페이지를 벗어날 때까지 대기 (타임아웃 허용)
 * 5. network idle → 산출물 저장 → 세션 저장
 * 6. 알림 패널이 보이면 경고 로그
 *
 * 자격 증명은 환경변수에서만 읽음
 */

import type { Page } from "playwright";

import type { IBrowserController } from "@/scrapers/controllers/IBrowserController";
import type { SiteConfig } from "@/core/domain/ScannerConfig";
import { LOGIN_SELECTORS } from "@/catalog/CatalogSelectors";
import { CREDENTIAL_ENV } from "@/config/constants";
import { logger } from "@/config/logger";
import {
  FatalPreconditionError,
  toErrorMessage,
} from "@/core/errors/ScannerErrors";

const LOGIN_TIMEOUTS = {
  /** 로그인 후 URL 변경 대기 */
  REDIRECT_MS: 20000,
  NETWORK_IDLE_MS: 10000,
} as const;

export interface Credentials {
  username: string;
  password: string;
}

export interface LoginResult {
  sessionFile: string;
  /** 로그인 후 보이는 알림 패널 내용 (없으면 null) */
  alert: string | null;
}

/**
 * 환경변수에서 자격 증명 읽기
 * 하나라도 없으면 FatalPreconditionError
 */
export function readCredentials(
  env: NodeJS.ProcessEnv = process.env,
): Credentials {
  const username = env[CREDENTIAL_ENV.USERNAME]?.trim();
  const password = env[CREDENTIAL_ENV.PASSWORD];

  if (!username || !password) {
    throw new FatalPreconditionError(
      `Missing credentials: set ${CREDENTIAL_ENV.USERNAME} and ${CREDENTIAL_ENV.PASSWORD}`,
    );
  }
  return { username, password };
}

export class LoginService {
  constructor(
    private readonly controller: IBrowserController,
    private readonly site: SiteConfig,
  ) {}

  async login(credentials: Credentials): Promise<LoginResult> {
    await this.controller.initialize({ withSession: false });
    const page = this.controller.getPage();
    if (!page) {
      throw new Error("BrowserController가 초기화되지 않음");
    }

    logger.info({ url: this.site.loginUrl }, "로그인 페이지 이동");
    await page.goto(this.site.loginUrl, { waitUntil: "domcontentloaded" });

    const username = page.locator(LOGIN_SELECTORS.USERNAME);
    await username.fill(credentials.username);
    await username.press("Tab");
    await page.locator(LOGIN_SELECTORS.PASSWORD).fill(credentials.password);

    await page
      .getByRole("button", { name: LOGIN_SELECTORS.SUBMIT_BUTTON_NAME })
      .click();

    await this.waitForRedirect(page);

    try {
      await page.waitForLoadState("networkidle", {
        timeout: LOGIN_TIMEOUTS.NETWORK_IDLE_MS,
      });
    } catch (error) {
      logger.debug({ error: toErrorMessage(error) }, "로그인 후 networkidle 타임아웃");
    }

    await this.controller.captureArtifacts("post_login");
    const sessionFile = await this.controller.saveSession();

    const alert = await this.readAlert(page);
    if (alert) {
      logger.warn({ alert }, "로그인 알림 패널 표시됨");
    }

    logger.info({ sessionFile, url: page.url() }, "로그인 완료");
    return { sessionFile, alert };
  }

  /**
   * 로그인 페이지를 벗어날 때까지 대기
   * JS 제출 후 잠시 login 경로에 머무는 경우가 있어 타임아웃은 허용
   */
  private async waitForRedirect(page: Page): Promise<void> {
    try {
      await page.waitForURL((url) => !url.pathname.includes("/login"), {
        timeout: LOGIN_TIMEOUTS.REDIRECT_MS,
      });
    } catch (error) {
      logger.warn(
        { url: page.url(), error: toErrorMessage(error) },
        "로그인 후 URL 변경 없음 - 계속 진행",
      );
    }
  }

  private async readAlert(page: Page): Promise<string | null> {
    const visible = await page.locator(LOGIN_SELECTORS.ALERT_PANEL).count();
    if (visible === 0) {
      return null;
    }
    const text = (
      await page.locator(LOGIN_SELECTORS.ALERT_PANEL).first().innerText()
    ).trim();
    return text || null;
  }
}
