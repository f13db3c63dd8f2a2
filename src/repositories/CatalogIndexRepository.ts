/**
 * Catalog Index Repository
 * colours_index.json 읽기/쓰기
 *
 * SOLID 원칙:
 * - SRP: 인덱스 파일 입출력만 담당
 * - DIP: ICatalogEntrySource 구현
 */

import * as fs from "fs/promises";
import * as path from "path";

import type { ICatalogEntrySource } from "@/core/interfaces";
import { CatalogEntry, CatalogIndexSchema } from "@/core/domain/CatalogEntry";
import { FatalPreconditionError } from "@/core/errors/ScannerErrors";
import { logger } from "@/config/logger";

export class CatalogIndexRepository implements ICatalogEntrySource {
  constructor(private readonly filePath: string) {}

  /**
   * 인덱스 로드 (순서 유지)
   * 없음 / 형식 오류 / 빈 목록 → FatalPreconditionError
   */
  async load(): Promise<CatalogEntry[]> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf-8");
    } catch {
      throw new FatalPreconditionError(
        `Catalog index not found: ${this.filePath} (run "index" first)`,
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      throw new FatalPreconditionError(
        `Catalog index is not valid JSON: ${this.filePath}`,
      );
    }

    const result = CatalogIndexSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.errors
        .map((e) => `${e.path.join(".")}: ${e.message}`)
        .join(", ");
      throw new FatalPreconditionError(
        `Catalog index is malformed: ${this.filePath} (${issues})`,
      );
    }

    if (result.data.length === 0) {
      throw new FatalPreconditionError(`Catalog index is empty: ${this.filePath}`);
    }

    logger.info(
      { filePath: this.filePath, entries: result.data.length },
      "카탈로그 인덱스 로드 완료",
    );
    return result.data;
  }

  async save(entries: CatalogEntry[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(entries, null, 2), "utf-8");
    logger.info(
      { filePath: this.filePath, entries: entries.length },
      "카탈로그 인덱스 저장 완료",
    );
  }
}
