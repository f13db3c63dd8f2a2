/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 다중 출력 (콘솔 + 파일) - 동일 내용 출력
 * - 카탈로그 엔트리(컬러)별 로그 파일 분리 (entry_slug 필드 기반)
 * - 일일 로그 로테이션 (YYYY-MM-DD 디렉터리)
 * - 구조화된 JSON 로깅
 *
 * 콘솔 출력:
 * - 개발 환경 + LOG_PRETTY=true: 색상 포맷
 * - 그 외: JSON 포맷
 *
 * 파일 출력:
 * - logs/YYYY-MM-DD/scanner.log (전체 실행 로그)
 * - logs/YYYY-MM-DD/{entry_slug}.log (컬러별 로그)
 * - logs/YYYY-MM-DD/error.log (에러 통합)
 *
 * 테스트 환경(NODE_ENV=test)에서는 파일을 열지 않음
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream, RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { getTimestampWithTimezone, getDateStringWithDash } from "@/utils/timestamp";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const IS_TEST = NODE_ENV === "test";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (IS_TEST ? "silent" : NODE_ENV === "production" ? "info" : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const SERVICE_NAME = process.env.SERVICE_NAME || "scanner";

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string): RotatingFileStream {
  return createStream(
    () => {
      const dateDir = getDateStringWithDash();
      const fullDir = path.join(LOG_DIR, dateDir);

      if (!fs.existsSync(fullDir)) {
        fs.mkdirSync(fullDir, { recursive: true });
      }

      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d", // 일일 로테이션
      intervalBoundary: true, // 자정(00:00) 기준 정렬
      initialRotation: true,
      immutable: true,
      path: LOG_DIR,
      maxFiles: 30,
      maxSize: "20M",
    },
  );
}

/**
 * 파일 스트림 맵 (동적 생성)
 * key: 서비스명 또는 entry slug
 */
const fileStreams = new Map<string, RotatingFileStream>();

function getOrCreateStream(name: string): RotatingFileStream {
  const existing = fileStreams.get(name);
  if (existing) {
    return existing;
  }
  const created = createRotatingStream(name);
  fileStreams.set(name, created);
  return created;
}

/**
 * 라우팅 대상 필드 (JSON 라인에서 읽는 값)
 */
interface RoutedLogLine {
  level?: string | number;
  service_name?: string;
  entry_slug?: string;
}

function isRoutedLogLine(value: unknown): value is RoutedLogLine {
  return typeof value === "object" && value !== null;
}

/**
 * 파일 라우팅 스트림 (커스텀 destination)
 * - 모든 로그: 서비스 파일
 * - entry_slug 포함 로그: 컬러별 파일에도 기록
 * - error 레벨: error.log에도 기록
 */
class EntryRoutingStream implements DestinationStream {
  write(chunk: string): boolean {
    let parsed: unknown;
    try {
      parsed = JSON.parse(chunk);
    } catch {
      // JSON 파싱 실패 시 서비스 파일에만 기록
      getOrCreateStream(SERVICE_NAME).write(chunk);
      return true;
    }

    const line: RoutedLogLine = isRoutedLogLine(parsed) ? parsed : {};
    getOrCreateStream(line.service_name || SERVICE_NAME).write(chunk);

    if (line.entry_slug) {
      getOrCreateStream(line.entry_slug).write(chunk);
    }

    if (line.level === "error" || line.level === "fatal") {
      getOrCreateStream("error").write(chunk);
    }
    return true;
  }
}

/**
 * Pino 로그 레벨 상수
 */
const LOG_LEVELS = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
} as const;

const shouldLogToConsole = (level: number): boolean => {
  const levelThreshold =
    LOG_LEVEL === "trace"
      ? LOG_LEVELS.TRACE
      : LOG_LEVEL === "debug"
        ? LOG_LEVELS.DEBUG
        : LOG_LEVEL === "info"
          ? LOG_LEVELS.INFO
          : LOG_LEVEL === "warn"
            ? LOG_LEVELS.WARN
            : LOG_LEVELS.ERROR;
  return level >= levelThreshold;
};

type ConsoleFormatter = (logObj: Record<string, unknown>, level: number) => void;

/**
 * 개발 환경용 콘솔 포맷터 (색상 + 구조화)
 */
const formatConsolePretty: ConsoleFormatter = (logObj, level) => {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const important = Boolean(logObj.important);
  const time = new Date().toLocaleTimeString("en-US", { hour12: false });
  const levelColor =
    level >= LOG_LEVELS.ERROR
      ? "\x1b[31m"
      : level >= LOG_LEVELS.WARN
        ? "\x1b[33m"
        : "\x1b[32m";
  const levelText =
    level >= LOG_LEVELS.ERROR
      ? "ERROR"
      : level >= LOG_LEVELS.WARN
        ? "WARN"
        : level >= LOG_LEVELS.INFO
          ? "INFO"
          : "DEBUG";
  const star = important ? " ⭐" : "";

  console.error(
    `[${time}] ${levelColor}${levelText}\x1b[0m${star} \x1b[36m${msg}\x1b[0m`,
  );

  const excludedFields = ["msg", "important", "skip_file_log"];
  for (const field of Object.keys(logObj)) {
    if (excludedFields.includes(field)) continue;
    const value = logObj[field];
    const rendered =
      typeof value === "object" ? JSON.stringify(value) : String(value);
    console.error(`  ${field}: ${rendered}`);
  }
};

/**
 * 프로덕션 환경용 콘솔 포맷터 (JSON)
 */
const formatConsoleJson: ConsoleFormatter = (logObj, level) => {
  console.log(JSON.stringify({ ...logObj, level }));
};

/**
 * 콘솔 출력 Hook 생성 함수
 * Pino 형식: logger.info(obj, msg) 또는 logger.info(msg)
 */
function createConsoleHook(
  formatter: ConsoleFormatter,
): pino.LoggerOptions["hooks"] {
  return {
    logMethod(inputArgs, method, level) {
      method.apply(this, inputArgs);

      const [first, second] = inputArgs;
      const logObj: Record<string, unknown> = {};

      if (typeof first === "string") {
        logObj.msg = first;
      } else if (typeof first === "object" && first !== null) {
        Object.assign(logObj, first);
        if (typeof second === "string") {
          logObj.msg = second;
        }
      }

      if (shouldLogToConsole(level)) {
        formatter(logObj, level);
      }
    },
  };
}

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "catalog_scanner",
    env: NODE_ENV,
    service_name: SERVICE_NAME,
  },
};

/**
 * 메인 로거 인스턴스
 */
let logger: pino.Logger;

if (IS_TEST) {
  // 테스트: 파일 스트림 없음
  logger = pino(baseConfig);
} else {
  const streams: pino.StreamEntry[] = [
    { level: "debug", stream: new EntryRoutingStream() },
  ];
  const hooks = createConsoleHook(
    NODE_ENV === "development" && LOG_PRETTY
      ? formatConsolePretty
      : formatConsoleJson,
  );
  logger = pino({ ...baseConfig, hooks }, pino.multistream(streams));
}

/**
 * 열린 파일 스트림 모두 종료 (CLI 종료 직전 호출)
 */
async function closeLogStreams(): Promise<void> {
  const closing = [...fileStreams.values()].map(
    (stream) =>
      new Promise<void>((resolve) => {
        stream.end(() => resolve());
      }),
  );
  fileStreams.clear();
  await Promise.all(closing);
}

export { logger, closeLogStreams, LOG_DIR };

export type Logger = pino.Logger;
