/**
 * Catalog Row / Record 도메인 모델
 *
 * - CatalogRowSpec: 행에서 읽은 원본 정보 (상호작용 전)
 * - MoqConstraint: 행별 최소 주문 수량 규칙
 * - RowInteractionResult: 재고/가격 조회 결과
 * - CatalogRecord: CSV로 넘어가는 최종 레코드 (불변)
 */

import { CORE_FIELDS } from "@/config/constants";

/**
 * 결과 텍스트 마커
 */
export const RESULT_MARKER = {
  /** 결과 영역이 비어 있음 */
  EMPTY: "EMPTY",
  /** 조회 중 예외 발생 */
  ERROR: "ERROR",
} as const;

/**
 * 행 원본 정보
 */
export interface CatalogRowSpec {
  /** 직전 H4 헤딩 (없으면 빈 문자열) */
  family: string;
  /** SKU (span.label) */
  identifier: string;
  /** 표시명 (h5) */
  title: string;
  /** 속성 목록 (발견 순서 유지) */
  attributes: ReadonlyMap<string, string>;
}

/**
 * MOQ 규칙 (둘 다 1 이상)
 */
export interface MoqConstraint {
  minimumQuantity: number;
  orderMultiple: number;
}

/**
 * 행 상호작용 결과
 */
export interface RowInteractionResult extends MoqConstraint {
  stockText: string;
  priceText: string;
  usedQuantity: number;
}

/**
 * CSV 고정 컬럼명
 */
export type CoreField = (typeof CORE_FIELDS)[number];

/**
 * 고정 컬럼 값
 */
export type CoreFields = Readonly<Record<CoreField, string>>;

/**
 * 최종 레코드
 */
export interface CatalogRecord {
  /** 저장 카테고리 (product family, 비어 있으면 "Unknown") */
  category: string;
  core: CoreFields;
  /** 정규화된 가변 컬럼 (발견 순서 유지) */
  specs: ReadonlyMap<string, string>;
}

/**
 * 고정 컬럼명 여부
 */
export function isCoreField(key: string): key is CoreField {
  const fields: readonly string[] = CORE_FIELDS;
  return fields.includes(key);
}
