/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 다중 출력 (콘솔 + 파일)
 * - 서비스별 로그 파일 분리 (SERVICE_NAME 환경변수 / service_name 필드 기반)
 * - 일일 로그 로테이션 (날짜별 디렉터리)
 * - 구조화된 JSON 로깅
 *
 * 콘솔 출력:
 * - 개발 환경 + LOG_PRETTY=true: 색상 포맷
 * - 그 외: JSON 포맷
 *
 * 파일 출력 (LOG_TO_FILE, test 환경에서는 기본 비활성):
 * - logs/YYYY-MM-DD/server.log
 * - logs/YYYY-MM-DD/error.log (에러 통합)
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import {
  getDateStringWithDash,
  getTimestampWithTimezone,
} from "@/utils/timestamp";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (NODE_ENV === "production"
    ? "info"
    : NODE_ENV === "test"
      ? "silent"
      : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_TO_FILE = process.env.LOG_TO_FILE
  ? process.env.LOG_TO_FILE === "true"
  : NODE_ENV !== "test";
const SERVICE_NAME = process.env.SERVICE_NAME || "server";

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string) {
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
      maxFiles: 90, // 90일 보관
      maxSize: "100M",
    },
  );
}

type RotatingStream = ReturnType<typeof createRotatingStream>;

/**
 * 기본 로거 설정
 */
const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "product_catalog",
    env: NODE_ENV,
    service_name: SERVICE_NAME,
  },
};

/**
 * 서비스별 라우팅 스트림
 * - skip_file_log 플래그가 있는 로그는 파일에 저장하지 않음
 * - 에러 로그는 error.log에도 기록
 */
class ServiceRoutingStream implements DestinationStream {
  private readonly streams = new Map<string, RotatingStream>();
  private errorStream: RotatingStream | null = null;

  write(chunk: string): boolean {
    let serviceName = "server";

    try {
      const log: unknown = JSON.parse(chunk);

      if (typeof log === "object" && log !== null) {
        if ("skip_file_log" in log && log.skip_file_log === true) {
          return true;
        }
        if ("service_name" in log && typeof log.service_name === "string") {
          serviceName = log.service_name;
        }
        if ("level" in log && (log.level === "error" || log.level === 50)) {
          this.getErrorStream().write(chunk);
        }
      }
    } catch {
      // JSON 파싱 실패 시 server.log에 기록
      serviceName = "server";
    }

    this.getStream(serviceName).write(chunk);
    return true;
  }

  private getStream(serviceName: string): RotatingStream {
    const existing = this.streams.get(serviceName);
    if (existing) {
      return existing;
    }

    const stream = createRotatingStream(serviceName);
    this.streams.set(serviceName, stream);
    return stream;
  }

  private getErrorStream(): RotatingStream {
    if (!this.errorStream) {
      this.errorStream = createRotatingStream("error");
    }
    return this.errorStream;
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

/**
 * 콘솔 출력 포맷터 타입
 */
type ConsoleFormatter = (logObj: Record<string, unknown>, level: number) => void;

/**
 * 개발 환경용 콘솔 포맷터 (색상 + 구조화)
 */
const formatConsolePretty: ConsoleFormatter = (logObj, level) => {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const star = logObj.important === true ? " ⭐" : "";
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

  console.error(
    `[${time}] ${levelColor}${levelText}\x1b[0m${star} \x1b[36m${msg}\x1b[0m`,
  );

  const excludedFields = ["msg", "important", "skip_file_log"];
  Object.keys(logObj)
    .filter((field) => !excludedFields.includes(field))
    .forEach((field) => {
      const value = logObj[field];
      const text =
        typeof value === "object"
          ? JSON.stringify(value, null, 2)
              .split("\n")
              .map((line) => "  " + line)
              .join("\n")
          : String(value);
      console.error(`  ${field}: ${text}`);
    });
};

/**
 * 프로덕션 환경용 콘솔 포맷터 (JSON)
 */
const formatConsoleJson: ConsoleFormatter = (logObj, level) => {
  console.log(JSON.stringify({ ...logObj, level }));
};

/**
 * 콘솔 출력 Hook 생성 함수
 * 파일 스트림과 별개로 콘솔에 동일 내용 출력
 */
function createConsoleHook(
  formatter: ConsoleFormatter,
): pino.LoggerOptions["hooks"] {
  return {
    logMethod(inputArgs, method, level) {
      method.apply(this, inputArgs);

      // Pino 형식: logger.info(obj, msg) 또는 logger.info(msg)
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

const streams: pino.StreamEntry[] = LOG_TO_FILE
  ? [{ level: "debug", stream: new ServiceRoutingStream() }]
  : [];

const hooks = createConsoleHook(
  NODE_ENV === "development" && LOG_PRETTY
    ? formatConsolePretty
    : formatConsoleJson,
);

/**
 * 메인 로거 인스턴스
 */
const logger: pino.Logger = pino(
  { ...baseConfig, hooks },
  pino.multistream(streams),
);

export { logger };

export type Logger = pino.Logger;
