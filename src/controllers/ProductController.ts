/**
 * Product 컨트롤러
 * HTTP 요청 처리
 *
 * SOLID 원칙:
 * - SRP: HTTP 요청/응답 변환만 담당
 * - DIP: IProductStore 인터페이스에 의존
 *
 * 에러는 next()로 전달하여 errorHandler에서 상태 코드로 변환
 */

import { Request, Response, NextFunction } from "express";
import { IProductStore } from "@/core/interfaces/IProductStore";
import { parseCategory } from "@/core/domain/Category";
import { Product } from "@/core/domain/Product";
import {
  DataValidationError,
  ProductNotFoundError,
} from "@/core/domain/ProductErrors";

/**
 * available 쿼리 파라미터 해석 ("true" | "yes" | "1" → true)
 */
export function parseAvailabilityQuery(value: string): boolean {
  return ["true", "yes", "1"].includes(value.toLowerCase());
}

/**
 * 필터 쿼리 파라미터 읽기
 * 반복 지정(?name=a&name=b) 등 문자열이 아니면 DataValidationError
 */
export function readQueryFilter(
  query: Request["query"],
  key: string,
): string | undefined {
  const value = query[key];
  if (value === undefined || typeof value === "string") {
    return value;
  }
  throw new DataValidationError(
    `Query parameter '${key}' must be a single value`,
  );
}

export class ProductController {
  constructor(private readonly store: IProductStore) {}

  /**
   * GET /api/v1/products
   * 전체 조회 또는 필터 조회 (name → category → available → price 순으로 첫 번째 조건 적용)
   */
  async list(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const name = readQueryFilter(req.query, "name");
      const category = readQueryFilter(req.query, "category");
      const available = readQueryFilter(req.query, "available");
      const price = readQueryFilter(req.query, "price");
      let products: Product[];

      if (name !== undefined) {
        products = await this.store.findByName(name);
      } else if (category !== undefined) {
        const parsed = parseCategory(category.toUpperCase());
        if (!parsed.valid) {
          throw new DataValidationError(parsed.error);
        }
        products = await this.store.findByCategory(parsed.category);
      } else if (available !== undefined) {
        products = await this.store.findByAvailability(
          parseAvailabilityQuery(available),
        );
      } else if (price !== undefined) {
        products = await this.store.findByPrice(price);
      } else {
        products = await this.store.all();
      }

      req.log?.info({ count: products.length }, "[Controller] 상품 목록 조회");
      res.status(200).json(products.map((product) => product.serialize()));
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/products
   */
  async create(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const product = Product.fromPayload(req.body);
      await this.store.create(product);

      req.log?.info(
        { id: product.id },
        `[Controller] 상품 생성 완료: ${product.name}`,
      );
      res
        .status(201)
        .location(`${req.baseUrl}/${product.id}`)
        .json(product.serialize());
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/v1/products/:id
   */
  async get(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const product = await this.findOrFail(Number(req.params.id));
      res.status(200).json(product.serialize());
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /api/v1/products/:id
   */
  async update(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const product = await this.findOrFail(Number(req.params.id));
      product.deserialize(req.body);
      await this.store.update(product);

      res.status(200).json(product.serialize());
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/v1/products/:id
   * 존재하지 않아도 204
   */
  async remove(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const product = await this.store.find(Number(req.params.id));
      if (product) {
        await this.store.delete(product);
      }
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  }

  private async findOrFail(id: number): Promise<Product> {
    const product = await this.store.find(id);
    if (!product) {
      throw new ProductNotFoundError(id);
    }
    return product;
  }
}
