/**
 * 에러 핸들러 미들웨어
 * Express 전역 에러 처리
 *
 * 상태 코드 매핑:
 * - DataValidationError → 400
 * - ProductNotFoundError → 404
 * - body-parser 등 status 필드가 있는 HTTP 에러 → 해당 status
 * - 그 외 → 500
 */

import { Request, Response, NextFunction } from "express";
import { logger } from "@/config/logger";
import {
  DataValidationError,
  ProductNotFoundError,
} from "@/core/domain/ProductErrors";

const STATUS_LABELS: Record<number, string> = {
  400: "Bad Request",
  404: "Not Found",
  405: "Method not Allowed",
  415: "Unsupported media type",
  500: "Internal server error",
};

/**
 * 에러 → HTTP 상태 코드
 */
export function resolveStatus(err: Error): number {
  if (err instanceof DataValidationError) {
    return 400;
  }
  if (err instanceof ProductNotFoundError) {
    return 404;
  }
  if (
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 600
  ) {
    return err.status;
  }
  return 500;
}

/**
 * 전역 에러 핸들러
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const status = resolveStatus(err);
  const requestLogger = req.log ?? logger;

  if (status >= 500) {
    requestLogger.error(
      {
        error: {
          message: err.message,
          stack: err.stack,
          name: err.name,
        },
        request_id: req.id,
        method: req.method,
        path: req.path,
      },
      "처리되지 않은 오류",
    );
  } else {
    requestLogger.warn(
      { error: { message: err.message, name: err.name }, status },
      "요청 처리 실패",
    );
  }

  res.status(status).json({
    error: STATUS_LABELS[status] ?? "Error",
    message: err.message,
    ...(process.env.NODE_ENV === "development" &&
      status >= 500 && {
        stack: err.stack,
      }),
  });
}

/**
 * 404 핸들러
 */
export function notFoundHandler(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  (req.log ?? logger).warn(
    {
      request_id: req.id,
      method: req.method,
      path: req.path,
    },
    "경로를 찾을 수 없음",
  );

  res.status(404).json({
    error: STATUS_LABELS[404],
    message: `Path ${req.path} was not found`,
  });
}
