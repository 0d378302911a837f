/**
 * Product Store
 *
 * 역할:
 * - Product 엔티티와 products 테이블 row 바인딩
 * - 생성/수정/삭제 및 속성별 조회
 *
 * Repository는 생성자로 주입 (전역 세션 없음)
 * 각 메서드는 저장소 호출이 완료된 뒤에 반환
 */

import {
  IProductRepository,
  ProductFilter,
} from "@/core/interfaces/IProductRepository";
import { IProductStore } from "@/core/interfaces/IProductStore";
import { Category } from "@/core/domain/Category";
import { parsePrice } from "@/core/domain/Price";
import { Product, ProductRecord } from "@/core/domain/Product";
import {
  DataValidationError,
  ProductNotFoundError,
} from "@/core/domain/ProductErrors";
import { SupabaseProductRepository } from "@/repositories/SupabaseProductRepository";
import { logger } from "@/config/logger";

function toProducts(records: ProductRecord[]): Product[] {
  return records.map((record) => Product.fromRecord(record));
}

export class ProductStore implements IProductStore {
  private readonly repository: IProductRepository;

  constructor(repository?: IProductRepository) {
    // Dependency Injection (테스트 가능하도록)
    this.repository = repository ?? new SupabaseProductRepository();
  }

  async create(product: Product): Promise<void> {
    const fields = product.validate();
    logger.info({ product: product.toString() }, "상품 생성");

    const record = await this.repository.insert(fields);
    this.apply(product, record);
  }

  async update(product: Product): Promise<void> {
    if (product.id === null) {
      throw new DataValidationError("Update called with empty ID field");
    }

    const fields = product.validate();
    logger.info({ product: product.toString() }, "상품 수정");

    const record = await this.repository.update(product.id, fields);
    if (!record) {
      throw new ProductNotFoundError(product.id);
    }
    this.apply(product, record);
  }

  async delete(product: Product): Promise<void> {
    if (product.id === null) {
      throw new DataValidationError("Delete called with empty ID field");
    }

    logger.info({ product: product.toString() }, "상품 삭제");
    await this.repository.delete(product.id);
  }

  async all(): Promise<Product[]> {
    logger.info("전체 상품 조회");
    return toProducts(await this.repository.findAll());
  }

  async find(id: number): Promise<Product | null> {
    logger.info({ id }, "상품 ID 조회");
    const record = await this.repository.findById(id);
    return record ? Product.fromRecord(record) : null;
  }

  async findByName(name: string): Promise<Product[]> {
    logger.info({ name }, "상품명 조회");
    return this.findBy({ name });
  }

  async findByAvailability(available = true): Promise<Product[]> {
    logger.info({ available }, "판매 가능 여부 조회");
    return this.findBy({ available });
  }

  async findByCategory(
    category: Category = Category.UNKNOWN,
  ): Promise<Product[]> {
    logger.info({ category }, "카테고리 조회");
    return this.findBy({ category });
  }

  async findByPrice(price: string | number): Promise<Product[]> {
    const parsed = parsePrice(price);
    if (!parsed.valid) {
      throw new DataValidationError(parsed.error);
    }

    logger.info({ price: parsed.price }, "가격 조회");
    return this.findBy({ price: parsed.price });
  }

  async healthCheck(): Promise<boolean> {
    try {
      return await this.repository.healthCheck();
    } catch (error) {
      logger.error({ error }, "Health check 실패");
      return false;
    }
  }

  /**
   * 저장된 row를 인스턴스에 반영 (정규화된 price 등)
   */
  private apply(product: Product, record: ProductRecord): void {
    product.id = record.id;
    product.name = record.name;
    product.description = record.description;
    product.price = record.price;
    product.available = record.available;
    product.category = record.category;
  }

  private async findBy(filter: ProductFilter): Promise<Product[]> {
    return toProducts(await this.repository.findBy(filter));
  }
}
