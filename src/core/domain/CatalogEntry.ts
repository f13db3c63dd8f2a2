/**
 * CatalogEntry 도메인 모델
 * 카탈로그 엔트리(컬러 페이지) 한 건
 */

import { z } from "zod";

/**
 * colours_index.json 항목 스키마
 * slug는 구버전 인덱스 파일에 없을 수 있음
 */
export const CatalogEntrySchema = z.object({
  name: z.string(),
  url: z.string().url(),
  slug: z.string().optional(),
});

export const CatalogIndexSchema = z.array(CatalogEntrySchema);

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;

/**
 * URL → 엔트리 slug
 * /colours/{slug}/... 형태면 두 번째 경로, 아니면 마지막 경로
 */
export function slugFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return url;
  }
  const parts = pathname.split("/").filter(Boolean);
  if (parts.length >= 2 && parts[0].startsWith("colour")) {
    return parts[1];
  }
  return parts[parts.length - 1] ?? "";
}
