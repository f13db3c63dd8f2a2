/**
 * CatalogSelectors
 *
 * 목적: 카탈로그 사이트 DOM selector 상수
 * 패턴: Constants Pattern
 * 참고: 지원 사이트 레이아웃은 하나뿐이므로 추상화 없이 상수로 관리
 */

/**
 * 컬러 상세 페이지
 */
export const PAGE_SELECTORS = {
  /** 탭 컨테이너 (페이지 로드 완료 신호) */
  TAB_CONTAINER: "#product-tabs",
  /** 탭 링크 목록 */
  TAB_LINKS: "#product-tabs li.tabs-title a",
  /** 컬러 표시명 */
  COLOUR_NAME: ".product-hero h1",
  /** 패널 공통 */
  PANEL: "div.tabs-panel",
  /** 활성 패널 */
  ACTIVE_PANEL: "div.tabs-panel.content.is-active",
  /** 활성 마커 클래스 */
  ACTIVE_CLASS: "is-active",
  /** 패널 finish 표시명 속성 */
  PANEL_FINISH_ATTR: "data-finish",
  /** 패널 안 행 목록 */
  ROWS: "div.items > div.item",
  /** family 헤딩 태그 */
  FAMILY_HEADING_TAG: "H4",
} as const;

/**
 * 행 내부
 */
export const ROW_SELECTORS = {
  SKU: "span.label",
  TITLE: "h5",
  ATTRIBUTES: "ul.item-attributes li",
  INFO: "h5.info",
  /** 상관관계 토큰(data-code) 보유 요소 */
  INPUTS: ".item-inputs",
  CODE_ATTR: "data-code",
  QTY_INPUT: "input[name='truck-item-qty']",
  STOCK_BUTTON: "button.check-stock",
  STOCK_RESULT: "div.check-stock-result",
  PRICE_BUTTON: "button.get-price",
  PRICE_RESULT: "div.get-price-result",
  /** MOQ 안내/경고 텍스트 영역 */
  WARNINGS: ".moq-warning, .qty-warning, .item-warning, .callout.alert",
} as const;

/**
 * 오버레이
 */
export const OVERLAY_SELECTORS = {
  /** 닫기 버튼 후보 (순서대로 시도) */
  CLOSE_CONTROLS: [
    ".reveal-overlay .close-button",
    ".reveal .close-button",
    "[data-close]",
    "button[aria-label='Close']",
    "button[aria-label='Dismiss']",
    "[class*='modal'] button[class*='close']",
    "[class*='popup'] button[class*='close']",
  ],
  /** 강제 제거할 오버레이 루트 */
  ROOTS: [".reveal-overlay", ".modal-backdrop", "[class*='popup-overlay']"],
} as const;

/**
 * 로그인 페이지
 */
export const LOGIN_SELECTORS = {
  USERNAME: "#UserName",
  PASSWORD: "#password",
  SUBMIT_BUTTON_NAME: "Login",
  ALERT_PANEL: "#alert-panel:not(.hide)",
} as const;

/**
 * 컬러 인덱스 페이지
 */
export const INDEX_SELECTORS = {
  LIST: "ul.colour-thumbs",
  TILES: "ul.colour-thumbs li",
  TILE_LINK: "a",
  TILE_NAME: "h5",
} as const;

/**
 * 수량 input step 속성값: 제약 없음
 */
export const STEP_NO_CONSTRAINT = "any";
