/**
 * CatalogRunService
 *
 * 카탈로그 전체 실행 루프
 *
 * 흐름:
 * 1. 인덱스 로드 (비어 있으면 FatalPreconditionError) → start / limit 슬라이스
 * 2. 세션 열기 (세션 파일 없으면 FatalPreconditionError)
 * 3. 엔트리별: 완료 여부 확인 → 엔트리 로거로 walk → 성공 시에만 완료 기록
 * 4. 엔트리 단위 예외는 로그 후 다음 엔트리 진행
 * 5. 엔트리 사이 짧은 휴식, 종료 시 요약
 *
 * SOLID 원칙:
 * - SRP: 실행 순서/재개만 담당 (행 처리는 CatalogPageWalker)
 * - DIP: 인덱스 / 진행 상태 / sink / 세션 모두 인터페이스 주입
 */

import type {
  ICatalogEntrySource,
  IPersistenceSink,
  IRunProgressStore,
  ISessionProvider,
} from "@/core/interfaces";
import type { CatalogEntry } from "@/core/domain/CatalogEntry";
import type { RunConfig } from "@/core/domain/ScannerConfig";
import { CatalogPageWalker } from "@/catalog/CatalogPageWalker";
import { RowDedupRegistry } from "@/catalog/RowDedupRegistry";
import {
  FatalPreconditionError,
  toErrorMessage,
} from "@/core/errors/ScannerErrors";
import { logger as defaultLogger, Logger } from "@/config/logger";
import { createEntryLogger, logImportant } from "@/utils/LoggerContext";

export interface RunOptions {
  /** 0부터 시작하는 시작 위치 */
  startIndex?: number;
  /** 0 이하면 제한 없음 */
  limit?: number;
  /** 완료 상태를 읽지도 기록하지도 않음 (단일 엔트리 점검용) */
  ignoreProgress?: boolean;
}

export interface RunSummary {
  selected: number;
  processed: number;
  skipped: number;
  failed: number;
  recordsWritten: number;
  /** 실행 중 기록된 카테고리 (정렬) */
  categories: string[];
}

export interface CatalogRunDeps {
  entries: ICatalogEntrySource;
  progress: IRunProgressStore;
  sink: IPersistenceSink;
  session: ISessionProvider;
  walker: CatalogPageWalker;
}

/**
 * start / limit 적용
 */
export function sliceEntries(
  entries: CatalogEntry[],
  startIndex = 0,
  limit = 0,
): CatalogEntry[] {
  const sliced = startIndex > 0 ? entries.slice(startIndex) : entries;
  return limit > 0 ? sliced.slice(0, limit) : sliced;
}

export class CatalogRunService {
  constructor(
    private readonly deps: CatalogRunDeps,
    private readonly config: RunConfig,
    private readonly log: Logger = defaultLogger,
  ) {}

  async run(options: RunOptions = {}): Promise<RunSummary> {
    const { entries, progress, session } = this.deps;
    const useProgress = !options.ignoreProgress;

    const all = await entries.load();
    const selected = sliceEntries(all, options.startIndex, options.limit);
    if (useProgress) {
      await progress.load();
    }

    const summary: RunSummary = {
      selected: selected.length,
      processed: 0,
      skipped: 0,
      failed: 0,
      recordsWritten: 0,
      categories: [],
    };
    const categories = new Set<string>();

    logImportant(this.log, "카탈로그 실행 시작", {
      total: all.length,
      selected: selected.length,
      startIndex: options.startIndex ?? 0,
    });

    const seen = new RowDedupRegistry();
    const page = await session.open();
    try {
      for (const [i, entry] of selected.entries()) {
        const position = `${i + 1}/${selected.length}`;

        if (useProgress && progress.isDone(entry.url)) {
          summary.skipped++;
          this.log.info({ position, colour: entry.name }, "이미 완료된 엔트리 - 건너뜀");
          continue;
        }

        const entryLog = createEntryLogger(this.log, entry);
        try {
          entryLog.info({ position, url: entry.url }, "엔트리 처리 시작");
          const walked = await this.deps.walker.walk(
            page,
            entry,
            seen,
            this.deps.sink,
            entryLog,
          );

          if (useProgress) {
            await progress.markDone(entry.url);
          }

          summary.processed++;
          summary.recordsWritten += walked.recordsWritten;
          walked.categories.forEach((category) => categories.add(category));

          entryLog.info(
            {
              position,
              rows: walked.recordsWritten,
              categories: walked.categories,
            },
            "엔트리 처리 완료",
          );
        } catch (error) {
          if (error instanceof FatalPreconditionError) {
            throw error;
          }
          summary.failed++;
          entryLog.error(
            { position, error: toErrorMessage(error) },
            "엔트리 처리 실패 - 다음 엔트리 진행",
          );
        } finally {
          await page.waitForTimeout(this.config.breatherMs);
        }
      }
    } finally {
      await session.close();
    }

    summary.categories = [...categories].sort();
    logImportant(this.log, "카탈로그 실행 완료", { ...summary });
    return summary;
  }
}
