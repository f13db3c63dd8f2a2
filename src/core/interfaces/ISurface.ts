/**
 * Rendering Surface 인터페이스
 *
 * 브라우저 페이지에 대한 최소 capability 집합
 * - 코어(상호작용/워커)는 이 인터페이스에만 의존
 * - Playwright 구현체: PlaywrightSurface
 *
 * SOLID 원칙:
 * - ISP: 코어가 실제로 쓰는 동작만 노출
 * - DIP: 코어는 Playwright가 아닌 인터페이스에 의존
 *
 * 규칙:
 * - ISurfaceElement는 지연 참조(locator)이며 매 호출 시 다시 해석됨
 * - 타임아웃이 있는 메서드는 요소를 찾지 못하면 예외를 던짐
 * - 예외를 던지지 않는 메서드는 주석에 명시
 */

/**
 * 클릭 옵션
 */
export interface ClickOptions {
  /** actionability 체크 생략 */
  force: boolean;
  /** 클릭 후 네비게이션 대기 생략 */
  noWaitAfter: boolean;
  timeoutMs: number;
}

/**
 * DOM 노드 직접 핸들 (attach 확인된 요소)
 */
export interface ISurfaceHandle {
  /**
   * 텍스트가 비어 있지 않게 될 때까지 대기
   * 예외 없음: 타임아웃/노드 분리 시 false
   */
  waitForNonEmptyText(timeoutMs: number): Promise<boolean>;

  /** 프로그래매틱 클릭 (hit-test 우회) */
  dispatchClick(): Promise<void>;

  /** value 직접 대입 + input/change 이벤트 발생 */
  assignValue(value: string): Promise<void>;
}

/**
 * 요소 지연 참조 (첫 번째 매칭 요소)
 */
export interface ISurfaceElement {
  /** 하위 selector의 첫 번째 요소 */
  locator(selector: string): ISurfaceElement;

  /** 하위 selector의 전체 목록 */
  all(selector: string): ISurfaceList;

  /**
   * 핸들 획득
   * 예외 없음: 제한 시간 내 attach되지 않으면 null
   */
  acquireHandle(timeoutMs: number): Promise<ISurfaceHandle | null>;

  textContent(timeoutMs: number): Promise<string | null>;

  getAttribute(name: string, timeoutMs: number): Promise<string | null>;

  click(options: ClickOptions): Promise<void>;

  fill(value: string, timeoutMs: number): Promise<void>;

  blur(timeoutMs: number): Promise<void>;

  /** 예외 없음: 없거나 숨김이면 false */
  isVisible(timeoutMs: number): Promise<boolean>;

  scrollIntoView(timeoutMs: number): Promise<void>;

  /** textContent 비우기 + hide 클래스 제거 */
  clearTextContent(timeoutMs: number): Promise<void>;

  /**
   * 직전 형제 중 tagName이 일치하는 첫 요소의 텍스트
   * 없으면 빈 문자열
   */
  precedingSiblingText(tagName: string, timeoutMs: number): Promise<string>;
}

/**
 * 요소 목록 지연 참조
 */
export interface ISurfaceList {
  count(): Promise<number>;
  nth(index: number): ISurfaceElement;
}

/**
 * 페이지
 */
export interface ISurfacePage {
  url(): string;

  goto(url: string): Promise<void>;

  /** selector가 DOM에 붙을 때까지 대기 (타임아웃 시 예외) */
  waitForSelector(selector: string, timeoutMs: number): Promise<void>;

  locator(selector: string): ISurfaceElement;

  all(selector: string): ISurfaceList;

  pressKey(key: string): Promise<void>;

  /** 매칭되는 노드 모두 제거, 제거 개수 반환 */
  removeAll(selector: string): Promise<number>;

  /**
   * URL 조건을 만족하는 응답 대기
   * 예외 없음: 매칭 시 true, 타임아웃 시 false
   */
  waitForResponse(
    predicate: (url: string) => boolean,
    timeoutMs: number,
  ): Promise<boolean>;

  /** 예외 없음: network idle 도달 시 true */
  waitForNetworkIdle(timeoutMs: number): Promise<boolean>;

  scrollToBottom(): Promise<void>;

  waitForTimeout(ms: number): Promise<void>;
}
