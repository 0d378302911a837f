/**
 * 로거 컨텍스트 유틸리티
 *
 * 컨텍스트 인식 로거 생성 헬퍼 함수
 * Service 이름, Request ID 추적 지원
 */

import { logger, Logger } from "@/config/logger";

/**
 * 서비스 전용 로거 생성
 * service_name 필드로 로그 파일이 분리됨
 */
export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service_name: serviceName });
}

/**
 * Request 전용 로거 생성
 * @param requestId - Request ID (UUID)
 * @param method - HTTP method
 * @param path - 요청 경로
 * @returns Request 컨텍스트가 포함된 자식 로거
 */
export function createRequestLogger(
  requestId: string,
  method: string,
  path: string,
): Logger {
  return logger.child({
    request_id: requestId,
    method,
    path,
  });
}

/**
 * 중요 정보 로깅 (콘솔에 ⭐ 표시)
 */
export function logImportant(
  target: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  target.info({ ...data, important: true }, message);
}
