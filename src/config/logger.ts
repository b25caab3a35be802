/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 다중 출력 (콘솔 + 파일)
 * - 일일 로그 로테이션 (logs/YYYY-MM-DD/scraper.log, error.log)
 * - 구조화된 JSON 로깅
 *
 * 콘솔 출력:
 * - 개발 환경 + LOG_PRETTY=true: 색상 포맷
 * - 그 외: JSON 포맷
 *
 * 테스트 환경(NODE_ENV=test):
 * - 파일 출력 비활성화, 기본 레벨 silent
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream, RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { getTimestampWithTimezone, getLocalDateString } from "@/utils/timestamp";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const IS_TEST = NODE_ENV === "test";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (IS_TEST ? "silent" : NODE_ENV === "production" ? "info" : "debug");
export const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_TO_FILE = process.env.LOG_TO_FILE
  ? process.env.LOG_TO_FILE === "true"
  : !IS_TEST;

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: {logDir}/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(logDir: string, prefix: string): RotatingFileStream {
  return createStream(
    () => {
      const dateDir = getLocalDateString();
      const fullDir = path.join(logDir, dateDir);

      if (!fs.existsSync(fullDir)) {
        fs.mkdirSync(fullDir, { recursive: true });
      }

      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d", // 일일 로테이션
      intervalBoundary: true, // 자정 기준 정렬
      initialRotation: true,
      immutable: true,
      path: logDir,
      maxFiles: 30, // 30일 보관
      maxSize: "50M",
    },
  );
}

/**
 * 종료 전 버퍼 비우기가 가능한 출력 스트림
 */
interface ClosableDestination extends DestinationStream {
  close(): Promise<void>;
}

function endStream(stream: RotatingFileStream): Promise<void> {
  return new Promise((resolve) => {
    stream.end(() => resolve());
  });
}

/**
 * 파일 라우팅 스트림
 * - 모든 로그: scraper.log
 * - error 이상: error.log 추가 기록
 */
export class FileRoutingStream implements ClosableDestination {
  private readonly mainStream: RotatingFileStream;
  private readonly errorStream: RotatingFileStream;

  constructor(logDir: string = LOG_DIR) {
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    this.mainStream = createRotatingStream(logDir, "scraper");
    this.errorStream = createRotatingStream(logDir, "error");
  }

  /**
   * 버퍼에 남은 로그를 파일에 기록하고 스트림 종료
   */
  async close(): Promise<void> {
    await Promise.all([endStream(this.mainStream), endStream(this.errorStream)]);
  }

  write(chunk: string): boolean {
    try {
      const log: unknown = JSON.parse(chunk);
      if (isErrorRecord(log)) {
        this.errorStream.write(chunk);
      }
    } catch {
      // JSON 파싱 실패 시 scraper.log에만 기록
    }
    this.mainStream.write(chunk);
    return true;
  }
}

/**
 * 파일 출력 비활성화 시 사용하는 빈 스트림
 */
class NullStream implements ClosableDestination {
  write(_chunk: string): boolean {
    return true;
  }

  async close(): Promise<void> {}
}

function isErrorRecord(log: unknown): boolean {
  if (typeof log !== "object" || log === null || !("level" in log)) {
    return false;
  }
  const level = log.level;
  return level === "error" || level === "fatal" || level === 50 || level === 60;
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
  if (LOG_LEVEL === "silent") return false;
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

  console.error(`[${time}] ${levelColor}${levelText}\x1b[0m \x1b[36m${msg}\x1b[0m`);

  const fields = Object.keys(logObj).filter((k) => k !== "msg");
  fields.forEach((field) => {
    const raw = logObj[field];
    const value =
      typeof raw === "object"
        ? JSON.stringify(raw, null, 2)
            .split("\n")
            .map((l) => "  " + l)
            .join("\n")
        : String(raw);
    console.error(`  ${field}: ${value}`);
  });
};

/**
 * JSON 콘솔 포맷터
 */
const formatConsoleJson: ConsoleFormatter = (logObj, level) => {
  console.log(JSON.stringify({ ...logObj, level, time: getTimestampWithTimezone() }));
};

/**
 * 콘솔 출력 Hook 생성
 * Pino 형식: logger.info(obj, msg) 또는 logger.info(msg)
 */
function createConsoleHook(
  formatter: ConsoleFormatter,
): pino.LoggerOptions["hooks"] {
  return {
    logMethod(inputArgs, method, level) {
      method.apply(this, inputArgs);

      if (!shouldLogToConsole(level)) {
        return;
      }

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

      formatter(logObj, level);
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
    service: "place_review_scraper",
    env: NODE_ENV,
  },
  serializers: {
    error: pino.stdSerializers.err,
  },
};

const destination: ClosableDestination = LOG_TO_FILE
  ? new FileRoutingStream()
  : new NullStream();

const hooks = createConsoleHook(
  NODE_ENV === "development" && LOG_PRETTY ? formatConsolePretty : formatConsoleJson,
);

/**
 * 메인 로거 인스턴스
 */
export const logger: pino.Logger = pino({ ...baseConfig, hooks }, destination);

/**
 * 로그 파일 flush (process.exit 전에 호출)
 * 호출 후 파일 출력은 종료됨
 */
export function flushLogger(): Promise<void> {
  return destination.close();
}

export type Logger = pino.Logger;
