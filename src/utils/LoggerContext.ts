/**
 * 로거 컨텍스트 유틸리티
 *
 * 컨텍스트 인식 로거 생성 헬퍼 함수
 * Run ID, 카탈로그 엔트리 slug 추적 지원
 */

import { logger, Logger } from "@/config/logger";
import { CatalogEntry, slugFromUrl } from "@/core/domain/CatalogEntry";

/**
 * 파일명으로 쓸 수 있는 slug 생성
 * 소문자, 영숫자 외 문자 → "-", 앞뒤 "-" 제거
 */
export function slugify(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * 엔트리 로그 파일명 (인덱스 slug → URL 경로 → 이름 순)
 */
export function entrySlug(entry: CatalogEntry): string {
  return (
    slugify(entry.slug ?? "") ||
    slugify(slugFromUrl(entry.url)) ||
    slugify(entry.name) ||
    "entry"
  );
}

/**
 * 실행(run) 전용 로거 생성
 * @param runId - 실행 식별자 (시작 시각 기반)
 */
export function createRunLogger(runId: string): Logger {
  return logger.child({ run_id: runId });
}

/**
 * 엔트리 전용 로거 생성
 * entry_slug 필드로 컬러별 로그 파일에도 기록됨
 */
export function createEntryLogger(parent: Logger, entry: CatalogEntry): Logger {
  return parent.child({
    entry_slug: entrySlug(entry),
    colour: entry.name,
  });
}

/**
 * 중요 정보 로깅 (콘솔에 표시됨)
 */
export function logImportant(
  target: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  target.info({ ...data, important: true }, message);
}
