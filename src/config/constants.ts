/**
 * 애플리케이션 설정 상수
 */

/**
 * 애플리케이션 메타데이터
 *
 * ⚠️ package.json의 "version"과 수동 동기화 필요
 */
export const APP_METADATA = {
  VERSION: "1.0.0",
  NAME: "Catalog Scanner",
} as const;

/**
 * CSV 고정 컬럼 (순서 = CSV 헤더 순서)
 */
export const CORE_FIELDS = [
  "colour_name",
  "finish",
  "product_family",
  "sku_code",
  "title_raw",
  "qty_used_for_checks",
  "stock_result_raw",
  "price_result_raw",
  "product_url",
  "checked_at_iso",
] as const;

/**
 * 로그인 자격 증명 환경변수명
 */
export const CREDENTIAL_ENV = {
  USERNAME: "CATALOG_USERNAME",
  PASSWORD: "CATALOG_PASSWORD",
} as const;
