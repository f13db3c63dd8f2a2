#!/usr/bin/env node
/**
 * Catalog Scanner CLI
 *
 * 사용법:
 *   npx tsx src/cli.ts <login|index|run|run-one> [OPTIONS]
 *
 * 환경변수:
 *   - CATALOG_USERNAME / CATALOG_PASSWORD (login)
 *   - CATALOG_BASE_URL, CATALOG_HEADLESS (설정 override)
 *   - SCANNER_CONFIG_PATH (설정 파일 경로)
 */

import "dotenv/config";
import * as path from "path";

import { ConfigLoader } from "@/config/ConfigLoader";
import { closeLogStreams, logger } from "@/config/logger";
import { APP_METADATA } from "@/config/constants";
import type { ScannerConfig } from "@/core/domain/ScannerConfig";
import {
  FatalPreconditionError,
  toErrorMessage,
} from "@/core/errors/ScannerErrors";
import { BrowserController } from "@/scrapers/controllers/BrowserController";
import { CatalogIndexRepository } from "@/repositories/CatalogIndexRepository";
import { CategoryCsvRepository } from "@/repositories/CategoryCsvRepository";
import { RunStateRepository } from "@/repositories/RunStateRepository";
import { CatalogIndexCollector } from "@/scanners/CatalogIndexCollector";
import { CatalogPageWalker } from "@/catalog/CatalogPageWalker";
import { CatalogIndexService } from "@/services/CatalogIndexService";
import { CatalogRunService, RunOptions } from "@/services/CatalogRunService";
import { LoginService, readCredentials } from "@/services/LoginService";
import { CliArgs, parseCliArgs, USAGE } from "@/utils/CliArgs";
import { createRunLogger } from "@/utils/LoggerContext";
import { getTimestampWithTimezone } from "@/utils/timestamp";

function createController(config: ScannerConfig): BrowserController {
  return new BrowserController(config.browser, config.paths);
}

async function runLogin(config: ScannerConfig): Promise<void> {
  const credentials = readCredentials();
  const controller = createController(config);
  try {
    const result = await new LoginService(controller, config.site).login(
      credentials,
    );
    console.log(`세션 저장 완료: ${result.sessionFile}`);
  } finally {
    await controller.close();
  }
}

async function runIndex(config: ScannerConfig): Promise<void> {
  const service = new CatalogIndexService(
    createController(config),
    new CatalogIndexCollector(config.index, {
      baseUrl: config.site.baseUrl,
      selectorWaitMs: config.browser.navigationTimeoutMs,
      textReadMs: config.navigation.textReadMs,
    }),
    new CatalogIndexRepository(path.resolve(config.paths.indexFile)),
  );
  const entries = await service.refresh(config.site.indexUrl);
  console.log(`인덱스 저장 완료: ${entries.length}개 엔트리`);
}

async function runCatalog(
  config: ScannerConfig,
  options: RunOptions,
): Promise<void> {
  const runLog = createRunLogger(getTimestampWithTimezone());
  const service = new CatalogRunService(
    {
      entries: new CatalogIndexRepository(path.resolve(config.paths.indexFile)),
      progress: new RunStateRepository(path.resolve(config.paths.stateFile)),
      sink: new CategoryCsvRepository(path.resolve(config.paths.csvDir)),
      session: createController(config),
      walker: new CatalogPageWalker(config),
    },
    config.run,
    runLog,
  );

  const summary = await service.run(options);
  console.log(`
처리: ${summary.processed} / 선택: ${summary.selected}
  - 건너뜀: ${summary.skipped}
  - 실패:   ${summary.failed}
기록 행:  ${summary.recordsWritten}
카테고리: ${summary.categories.join(", ") || "-"}
CSV 경로: ${path.resolve(config.paths.csvDir)}
`);
}

async function dispatch(args: CliArgs): Promise<void> {
  if (args.command === "help") {
    console.log(USAGE);
    return;
  }

  const config = ConfigLoader.getInstance().load();
  logger.info(
    { version: APP_METADATA.VERSION, command: args.command },
    `${APP_METADATA.NAME} 시작`,
  );

  switch (args.command) {
    case "login":
      await runLogin(config);
      break;
    case "index":
      await runIndex(config);
      break;
    case "run":
      await runCatalog(config, {
        startIndex: args.startIndex,
        limit: args.limit,
      });
      break;
    case "run-one":
      await runCatalog(config, { limit: 1, ignoreProgress: true });
      break;
  }
}

async function main(): Promise<void> {
  try {
    await dispatch(parseCliArgs(process.argv.slice(2)));
  } catch (error) {
    if (error instanceof FatalPreconditionError) {
      logger.fatal({ error: error.message }, "실행 전제조건 실패");
      console.error(`중단: ${error.message}`);
    } else {
      logger.error({ error: toErrorMessage(error) }, "실행 실패");
      console.error(`실패: ${toErrorMessage(error)}`);
    }
    process.exitCode = 1;
  } finally {
    await closeLogStreams();
  }
}

void main();
