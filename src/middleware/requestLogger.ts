/**
 * Request Logger 미들웨어
 *
 * 기능:
 * - 모든 HTTP 요청 로깅
 * - Request ID 생성 (x-request-id 헤더가 있으면 재사용)
 * - 응답 시간 측정
 * - Health check 요청은 파일 로그 제외 (콘솔만)
 */

import { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";
import { createRequestLogger } from "@/utils/LoggerContext";

/**
 * 파일 로그에서 제외할 경로 목록
 */
const SKIP_FILE_LOG_PATHS = ["/health"];

export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const headerId = req.headers["x-request-id"];
  const requestId =
    typeof headerId === "string" && headerId.length > 0 ? headerId : uuidv4();
  const startTime = Date.now();
  const skipFileLog = SKIP_FILE_LOG_PATHS.includes(req.path);

  const logger = createRequestLogger(requestId, req.method, req.path);
  req.log = logger;
  req.id = requestId;
  res.setHeader("x-request-id", requestId);

  logger.info(
    {
      query: req.query,
      ip: req.ip,
      skip_file_log: skipFileLog,
    },
    "요청 수신",
  );

  res.on("finish", () => {
    const duration = Date.now() - startTime;
    const logLevel = res.statusCode >= 500 ? "error" : "info";

    logger[logLevel](
      {
        status: res.statusCode,
        duration_ms: duration,
        skip_file_log: skipFileLog,
      },
      "요청 완료",
    );
  });

  next();
}
