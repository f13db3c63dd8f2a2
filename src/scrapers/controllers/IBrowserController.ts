/**
 * Browser Controller Interface
 *
 * 브라우저 생명주기 + 세션(storage state) 관리 인터페이스
 *
 * SOLID 원칙:
 * - SRP: 브라우저 제어만 담당
 * - ISP: 최소 인터페이스 (브라우저 작업에 필요한 것만)
 * - DIP: 상위 모듈은 이 인터페이스에 의존
 */

import type { Page } from "playwright";
import type { ISessionProvider } from "@/core/interfaces";
import type { PlaywrightPage } from "@/surface/PlaywrightSurface";

/**
 * 브라우저 초기화 옵션
 */
export interface BrowserInitOptions {
  /**
   * 저장된 세션으로 컨텍스트 생성
   * true인데 세션 파일이 없으면 FatalPreconditionError
   */
  withSession: boolean;
}

/**
 * 디버그 산출물 (스크린샷 + HTML) 경로
 */
export interface ArtifactPaths {
  screenshot: string;
  html: string;
}

/**
 * Browser Controller 인터페이스
 */
export interface IBrowserController extends ISessionProvider {
  /**
   * 브라우저 초기화 후 Surface 페이지 반환
   */
  initialize(options: BrowserInitOptions): Promise<PlaywrightPage>;

  /**
   * 현재 컨텍스트의 storage state를 세션 파일로 저장
   */
  saveSession(): Promise<string>;

  /**
   * 현재 페이지 스크린샷 + HTML 저장
   * 실패해도 예외 없음 (null)
   */
  captureArtifacts(name: string): Promise<ArtifactPaths | null>;

  /**
   * 현재 Page 인스턴스 반환
   */
  getPage(): Page | null;

  isInitialized(): boolean;
}
