/**
 * 요청 검증 미들웨어
 *
 * SOLID 원칙:
 * - SRP: 요청 형식 검증만 담당 (필드 검증은 Product.deserialize)
 */

import { Request, Response, NextFunction } from "express";
import { PRODUCT_CONSTRAINTS } from "@/config/constants";

/**
 * Content-Type: application/json 필수
 */
export function requireJsonContentType(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const contentType = req.headers["content-type"];

  if (!contentType) {
    res.status(415).json({
      error: "Unsupported media type",
      message: "Content-Type must be application/json",
    });
    return;
  }

  if (!req.is("application/json")) {
    res.status(415).json({
      error: "Unsupported media type",
      message: `Content-Type must be application/json, got ${contentType}`,
    });
    return;
  }

  next();
}

/**
 * :id 파라미터 검증 (products.id 범위의 양의 정수)
 */
export function validateProductIdParam(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const { id } = req.params;

  if (!id || !/^[1-9]\d*$/.test(id)) {
    res.status(400).json({
      error: "Bad Request",
      message: "id parameter must be a positive integer",
    });
    return;
  }

  if (Number(id) > PRODUCT_CONSTRAINTS.ID_MAX) {
    res.status(400).json({
      error: "Bad Request",
      message: `id parameter must not exceed ${PRODUCT_CONSTRAINTS.ID_MAX}`,
    });
    return;
  }

  next();
}
