/**
 * Express 애플리케이션 조립
 * server.ts(프로세스 진입점)와 분리하여 Store 주입 가능
 */

import express, {
  Express,
  NextFunction,
  Request,
  RequestHandler,
  Response,
} from "express";
import { createV1Router } from "@/routes/v1";
import { errorHandler, notFoundHandler } from "@/middleware/errorHandler";
import { requestLogger } from "@/middleware/requestLogger";
import { IProductStore } from "@/core/interfaces/IProductStore";
import { APP_METADATA } from "@/config/constants";

/**
 * GET /health
 * 저장소 응답 여부에 따라 200 OK / 503 DEGRADED
 */
export function createHealthHandler(store: IProductStore): RequestHandler {
  return async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const isHealthy = await store.healthCheck();

      res.status(isHealthy ? 200 : 503).json({
        status: isHealthy ? "OK" : "DEGRADED",
        message: `${APP_METADATA.NAME} is running`,
        version: APP_METADATA.VERSION,
      });
    } catch (error) {
      next(error);
    }
  };
}

export function createApp(store: IProductStore): Express {
  const app = express();

  // 미들웨어
  app.use(express.json());
  app.use(requestLogger);

  // 헬스체크 엔드포인트
  app.get("/health", createHealthHandler(store));

  // API v1 라우터
  app.use("/api/v1", createV1Router(store));

  // 404 핸들러
  app.use(notFoundHandler);

  // 전역 에러 핸들러
  app.use(errorHandler);

  return app;
}
