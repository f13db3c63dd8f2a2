/**
 * Persistence Sink Interface
 *
 * 카테고리별 테이블 파일에 레코드 append
 * - 카테고리 최초 사용 시 파일 생성
 * - 새 가변 컬럼 발견 시 헤더 확장 (기존 컬럼 삭제 없음)
 * - 헤더 확장 시 기존 행 보존
 */

import type { CoreFields } from "@/core/domain/CatalogRecord";

export interface IPersistenceSink {
  append(
    category: string,
    core: CoreFields,
    specs: ReadonlyMap<string, string>,
  ): Promise<void>;
}
