/**
 * ScannerConfig - scanner.yaml 설정 스키마
 *
 * SOLID 원칙:
 * - SRP: 설정 스키마 정의만 담당
 *
 * 모든 필드에 기본값이 있어 빈 YAML로도 동작
 */

import { z } from "zod";

/**
 * 사이트 URL 설정
 */
export const SiteConfigSchema = z
  .object({
    baseUrl: z.string().url().default("https://www.example.com/"),
    loginUrl: z.string().url().default("https://www.example.com/login.php"),
    indexUrl: z.string().url().default("https://www.example.com/colours/"),
  })
  .default({});

export type SiteConfig = z.infer<typeof SiteConfigSchema>;

/**
 * 브라우저 설정
 */
export const BrowserConfigSchema = z
  .object({
    headless: z.boolean().default(false),
    defaultTimeoutMs: z.number().int().positive().default(1800),
    navigationTimeoutMs: z.number().int().positive().default(6000),
  })
  .default({});

export type BrowserConfig = z.infer<typeof BrowserConfigSchema>;

/**
 * 파일 경로 설정 (프로젝트 루트 기준 상대경로 허용)
 */
export const PathConfigSchema = z
  .object({
    sessionFile: z.string().default("storage_state.json"),
    indexFile: z.string().default("colours_index.json"),
    stateFile: z.string().default("run_state.json"),
    csvDir: z.string().default("csv"),
    artifactsDir: z.string().default("artifacts"),
  })
  .default({});

export type PathConfig = z.infer<typeof PathConfigSchema>;

/**
 * 행 단위 상호작용 타이밍 (모든 대기는 bounded)
 */
export const InteractionConfigSchema = z
  .object({
    requestedQuantity: z.number().int().min(1).default(1),
    concurrentLookups: z.boolean().default(true),
    handleAcquireMs: z.number().int().positive().default(400),
    immediateReadMs: z.number().int().positive().default(300),
    resultWaitMs: z.number().int().positive().default(1200),
    fallbackWaitMs: z.number().int().positive().default(600),
    clickTimeoutMs: z.number().int().positive().default(700),
    fallbackHandleMs: z.number().int().positive().default(300),
    responseTimeoutMs: z.number().int().positive().default(1200),
    attributeTimeoutMs: z.number().int().positive().default(500),
    overlayMaxCloseClicks: z.number().int().min(0).default(3),
    overlayProbeMs: z.number().int().positive().default(150),
  })
  .default({});

export type InteractionConfig = z.infer<typeof InteractionConfigSchema>;

/**
 * 탭/패널 네비게이션 설정
 */
export const NavigationConfigSchema = z
  .object({
    tabClickAttempts: z.number().int().min(1).default(3),
    tabsWaitMs: z.number().int().positive().default(6000),
    panelWaitMs: z.number().int().positive().default(3000),
    textReadMs: z.number().int().positive().default(800),
  })
  .default({});

export type NavigationConfig = z.infer<typeof NavigationConfigSchema>;

/**
 * 인덱스 수집 설정
 */
export const IndexConfigSchema = z
  .object({
    maxScrollRounds: z.number().int().min(1).default(20),
    stableRounds: z.number().int().min(1).default(2),
    networkIdleMs: z.number().int().positive().default(3000),
    settleMs: z.number().int().min(0).default(300),
  })
  .default({});

export type IndexConfig = z.infer<typeof IndexConfigSchema>;

/**
 * 실행 루프 설정
 */
export const RunConfigSchema = z
  .object({
    breatherMs: z.number().int().min(0).default(120),
  })
  .default({});

export type RunConfig = z.infer<typeof RunConfigSchema>;

/**
 * 전체 설정 스키마
 */
export const ScannerConfigSchema = z.object({
  site: SiteConfigSchema,
  browser: BrowserConfigSchema,
  paths: PathConfigSchema,
  interaction: InteractionConfigSchema,
  navigation: NavigationConfigSchema,
  index: IndexConfigSchema,
  run: RunConfigSchema,
});

export type ScannerConfig = z.infer<typeof ScannerConfigSchema>;
