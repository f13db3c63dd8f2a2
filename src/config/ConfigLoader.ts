/**
 * YAML 설정 로더
 * Singleton Pattern 적용
 *
 * 역할:
 * - config/scanner.yaml 로딩 (SCANNER_CONFIG_PATH로 경로 변경 가능)
 * - zod 스키마 검증 + 기본값 채우기
 * - 환경변수 override (CATALOG_BASE_URL, CATALOG_HEADLESS)
 * - 설정 캐싱
 *
 * SOLID 원칙:
 * - SRP: 설정 로딩만 담당
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { z } from "zod";

import {
  ScannerConfig,
  ScannerConfigSchema,
} from "@/core/domain/ScannerConfig";
import { FatalPreconditionError } from "@/core/errors/ScannerErrors";
import { logger } from "./logger";

/**
 * 기본 설정 파일 경로 (src/config, dist/config 양쪽에서 동일)
 */
const DEFAULT_CONFIG_PATH = path.resolve(
  __dirname,
  "../../config/scanner.yaml",
);

const ENV_KEYS = {
  CONFIG_PATH: "SCANNER_CONFIG_PATH",
  BASE_URL: "CATALOG_BASE_URL",
  HEADLESS: "CATALOG_HEADLESS",
} as const;

/**
 * "true" / "1" / "false" / "0" → boolean, 그 외 undefined
 */
function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

/**
 * URL의 경로/쿼리를 유지한 채 origin만 교체
 */
export function rebaseUrl(url: string, baseUrl: string): string {
  const parsed = new URL(url);
  return new URL(`${parsed.pathname}${parsed.search}`, baseUrl).toString();
}

/**
 * ConfigLoader 클래스 (Singleton)
 */
export class ConfigLoader {
  private static instance: ConfigLoader;
  private cached: ScannerConfig | null = null;

  private constructor() {}

  /**
   * Singleton 인스턴스 반환
   */
  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  getConfigPath(): string {
    return process.env[ENV_KEYS.CONFIG_PATH] || DEFAULT_CONFIG_PATH;
  }

  /**
   * 설정 로드 (캐시)
   * 파일이 없으면 전부 기본값, 형식 오류는 FatalPreconditionError
   */
  load(): ScannerConfig {
    if (this.cached) {
      return this.cached;
    }

    const configPath = this.getConfigPath();
    let raw: unknown = {};

    if (fs.existsSync(configPath)) {
      try {
        raw = yaml.load(fs.readFileSync(configPath, "utf-8")) ?? {};
      } catch (error) {
        throw new FatalPreconditionError(
          `설정 파일 파싱 실패 (${configPath}): ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    } else {
      logger.debug({ configPath }, "[ConfigLoader] 설정 파일 없음 - 기본값 사용");
    }

    let config: ScannerConfig;
    try {
      config = ScannerConfigSchema.parse(raw);
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new FatalPreconditionError(
          `설정 검증 실패 (${configPath}): ${error.errors
            .map((e) => `${e.path.join(".")}: ${e.message}`)
            .join(", ")}`,
        );
      }
      throw error;
    }

    this.cached = this.applyEnvOverrides(config);
    logger.debug(
      { configPath, baseUrl: this.cached.site.baseUrl },
      "[ConfigLoader] 설정 로드 완료",
    );
    return this.cached;
  }

  /**
   * 캐시 초기화 (테스트용)
   */
  clearCache(): void {
    this.cached = null;
  }

  private applyEnvOverrides(config: ScannerConfig): ScannerConfig {
    const baseUrl = process.env[ENV_KEYS.BASE_URL]?.trim();
    const headless = parseBooleanEnv(process.env[ENV_KEYS.HEADLESS]);

    let site = config.site;
    if (baseUrl) {
      try {
        site = {
          baseUrl: new URL(baseUrl).toString(),
          loginUrl: rebaseUrl(config.site.loginUrl, baseUrl),
          indexUrl: rebaseUrl(config.site.indexUrl, baseUrl),
        };
      } catch {
        throw new FatalPreconditionError(
          `${ENV_KEYS.BASE_URL} is not a valid URL: ${baseUrl}`,
        );
      }
    }

    return {
      ...config,
      site,
      browser:
        headless === undefined ? config.browser : { ...config.browser, headless },
    };
  }
}
