/**
 * Product Catalog 서버
 */

import "dotenv/config";
import { createApp } from "@/app";
import { ProductStore } from "@/services/ProductStore";
import { createServiceLogger, logImportant } from "@/utils/LoggerContext";
import {
  APP_METADATA,
  SERVER_CONFIG,
  SERVICE_NAMES,
} from "@/config/constants";

const logger = createServiceLogger(SERVICE_NAMES.SERVER);

const PORT = SERVER_CONFIG.PORT;
const BASE_URL = process.env.BASE_URL || `http://localhost:${PORT}`;

const app = createApp(new ProductStore());

// 서버 시작
const server = app.listen(PORT, () => {
  logImportant(logger, `${APP_METADATA.NAME} 서버 시작`, {
    port: PORT,
    env: process.env.NODE_ENV || "development",
    version: APP_METADATA.VERSION,
  });

  logger.info(
    {
      baseUrl: BASE_URL,
      endpoints: {
        health: `${BASE_URL}/health`,
        list: "GET /api/v1/products",
        create: "POST /api/v1/products",
        read: "GET /api/v1/products/:id",
        update: "PUT /api/v1/products/:id",
        delete: "DELETE /api/v1/products/:id",
      },
    },
    "API v1 엔드포인트 등록 완료",
  );
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.warn(`${signal} 수신, 서버 종료 중...`);

  server.close(() => {
    logImportant(logger, "서버 종료 완료", {});
    process.exit(0);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
