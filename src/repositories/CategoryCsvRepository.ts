/**
 * Category CSV Repository
 *
 * SOLID 원칙:
 * - SRP: 카테고리별 CSV 파일 저장만 담당
 * - DIP: IPersistenceSink 구현
 *
 * 목적:
 * - 카테고리(product family)마다 CSV 파일 하나 (csv/{category_key}.csv)
 * - 고정 컬럼 + 발견 순서대로 늘어나는 가변 컬럼
 * - 헤더가 늘어나면 기존 행을 보존한 채 파일 1회 재작성
 * - 행은 즉시 append (중단 시에도 이미 처리한 행 보존)
 */

import * as fs from "fs/promises";
import * as path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";

import type { IPersistenceSink } from "@/core/interfaces";
import type { CoreFields } from "@/core/domain/CatalogRecord";
import { isCoreField } from "@/core/domain/CatalogRecord";
import { CORE_FIELDS } from "@/config/constants";
import { logger } from "@/config/logger";
import { toErrorMessage } from "@/core/errors/ScannerErrors";

const CsvRowsSchema = z.array(z.array(z.string()));

const UNKNOWN_CATEGORY_KEY = "unknown_range";

/**
 * 카테고리별 스키마 상태
 */
interface CategorySchema {
  /** 고정 + 가변 컬럼 (발견 순서) */
  columns: string[];
  /** 디스크에 기록된 헤더 (파일이 없거나 비었으면 null) */
  onDisk: string[] | null;
}

export class CategoryCsvRepository implements IPersistenceSink {
  /** category key → 스키마 상태 */
  private readonly schemas = new Map<string, CategorySchema>();
  private dirReady = false;

  constructor(private readonly baseDir: string) {}

  /**
   * 카테고리명 → 파일 키
   * 소문자, 공백 → "_", [a-z0-9_] 외 제거, 비면 unknown_range
   */
  static categoryKey(category: string): string {
    const key = category
      .trim()
      .toLowerCase()
      .replace(/ /g, "_")
      .replace(/[^a-z0-9_]+/g, "");
    return key || UNKNOWN_CATEGORY_KEY;
  }

  filePathFor(category: string): string {
    return path.join(
      this.baseDir,
      `${CategoryCsvRepository.categoryKey(category)}.csv`,
    );
  }

  async append(
    category: string,
    core: CoreFields,
    specs: ReadonlyMap<string, string>,
  ): Promise<void> {
    await this.ensureDir();

    const key = CategoryCsvRepository.categoryKey(category);
    const filePath = this.filePathFor(category);

    // 고정 컬럼과 겹치는 가변 키 제외
    const safeSpecs = new Map<string, string>();
    for (const [name, value] of specs) {
      if (!isCoreField(name)) safeSpecs.set(name, value);
    }

    const schema = await this.ensureSchema(key, filePath, safeSpecs.keys());
    const header = schema.columns;

    const values = header.map((column) =>
      isCoreField(column) ? core[column] : (safeSpecs.get(column) ?? ""),
    );

    const text = stringify(schema.onDisk ? [values] : [header, values]);

    try {
      await fs.appendFile(filePath, text, "utf-8");
    } catch (error) {
      logger.error(
        { filePath, error: toErrorMessage(error) },
        "CSV 행 append 실패",
      );
      throw error;
    }
    schema.onDisk = [...header];
  }

  /**
   * 스키마 확보
   * 처음 보는 카테고리만 디스크 헤더를 읽음 (없으면 고정 컬럼에서 시작)
   * 컬럼이 늘어 디스크 헤더와 달라졌을 때만 전체 재작성
   */
  private async ensureSchema(
    key: string,
    filePath: string,
    specKeys: Iterable<string>,
  ): Promise<CategorySchema> {
    let schema = this.schemas.get(key);
    if (!schema) {
      const diskHeader = (await this.readRows(filePath))[0] ?? [];
      schema =
        diskHeader.length > 0
          ? { columns: [...diskHeader], onDisk: [...diskHeader] }
          : { columns: [...CORE_FIELDS], onDisk: null };
      this.schemas.set(key, schema);
    }

    const { columns } = schema;
    for (const name of specKeys) {
      if (name && !columns.includes(name)) {
        columns.push(name);
      }
    }

    if (schema.onDisk && !sameColumns(schema.onDisk, columns)) {
      const [diskHeader = [], ...rows] = await this.readRows(filePath);
      await this.rewrite(filePath, diskHeader, columns, rows);
      schema.onDisk = [...columns];
    }

    return schema;
  }

  /**
   * 새 헤더로 재작성 (기존 행은 컬럼명 기준으로 재배치, 없는 값은 "")
   */
  private async rewrite(
    filePath: string,
    oldHeader: string[],
    newHeader: string[],
    rows: string[][],
  ): Promise<void> {
    const remapped = rows.map((row) => {
      const byName = new Map<string, string>();
      oldHeader.forEach((column, i) => byName.set(column, row[i] ?? ""));
      return newHeader.map((column) => byName.get(column) ?? "");
    });

    await fs.writeFile(filePath, stringify([newHeader, ...remapped]), "utf-8");

    logger.info(
      {
        filePath,
        columns: newHeader.length,
        added: newHeader.length - oldHeader.length,
        rows: rows.length,
      },
      "CSV 헤더 확장 - 파일 재작성",
    );
  }

  private async readRows(filePath: string): Promise<string[][]> {
    let text: string;
    try {
      text = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const parsed: unknown = parse(text, {
      skip_empty_lines: true,
      relax_column_count: true,
    });
    return CsvRowsSchema.parse(parsed);
  }

  private async ensureDir(): Promise<void> {
    if (this.dirReady) return;
    await fs.mkdir(this.baseDir, { recursive: true });
    this.dirReady = true;
  }
}

function sameColumns(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((column, i) => column === b[i]);
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
