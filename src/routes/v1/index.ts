/**
 * API v1 메인 라우터
 * 모든 v1 엔드포인트 통합
 */

import { Router } from "express";
import { IProductStore } from "@/core/interfaces/IProductStore";
import { createProductsRouter } from "./products.router";

export function createV1Router(store: IProductStore): Router {
  const router = Router();

  router.use("/products", createProductsRouter(store));

  return router;
}
