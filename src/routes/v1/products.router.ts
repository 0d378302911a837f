/**
 * 상품 라우터
 * /api/v1/products/* - 상품 CRUD 및 조회
 */

import { Router, Request, Response, NextFunction } from "express";
import { ProductController } from "@/controllers/ProductController";
import { IProductStore } from "@/core/interfaces/IProductStore";
import {
  requireJsonContentType,
  validateProductIdParam,
} from "@/middleware/validation";

export function createProductsRouter(store: IProductStore): Router {
  const router = Router();
  const controller = new ProductController(store);

  /**
   * GET /api/v1/products
   * 쿼리: name | category | available | price
   */
  router.get("/", (req: Request, res: Response, next: NextFunction) =>
    controller.list(req, res, next),
  );

  /**
   * POST /api/v1/products
   */
  router.post(
    "/",
    requireJsonContentType,
    (req: Request, res: Response, next: NextFunction) =>
      controller.create(req, res, next),
  );

  router.get(
    "/:id",
    validateProductIdParam,
    (req: Request, res: Response, next: NextFunction) =>
      controller.get(req, res, next),
  );

  router.put(
    "/:id",
    validateProductIdParam,
    requireJsonContentType,
    (req: Request, res: Response, next: NextFunction) =>
      controller.update(req, res, next),
  );

  router.delete(
    "/:id",
    validateProductIdParam,
    (req: Request, res: Response, next: NextFunction) =>
      controller.remove(req, res, next),
  );

  return router;
}
