/**
 * Product Repository 인터페이스
 *
 * SOLID 원칙:
 * - DIP: 추상화에 의존 (Supabase 구체 구현에 의존하지 않음)
 */

import { Category } from "@/core/domain/Category";
import { ProductFields, ProductRecord } from "@/core/domain/Product";

/**
 * 상품 조회 조건 (모두 완전 일치)
 */
export interface ProductFilter {
  name?: string;
  available?: boolean;
  category?: Category;
  /** 정규화된 decimal 문자열 ("12.50") */
  price?: string;
}

/**
 * Product Repository 인터페이스
 */
export interface IProductRepository {
  /**
   * 상품 INSERT
   * @returns DB가 할당한 id를 포함한 레코드
   */
  insert(fields: ProductFields): Promise<ProductRecord>;

  /**
   * 상품 UPDATE
   * @returns 갱신된 레코드, 해당 id의 row가 없으면 null
   */
  update(id: number, fields: ProductFields): Promise<ProductRecord | null>;

  /**
   * 상품 DELETE (row가 없어도 에러 없음)
   */
  delete(id: number): Promise<void>;

  findAll(): Promise<ProductRecord[]>;

  findById(id: number): Promise<ProductRecord | null>;

  /**
   * 조건 조회 (id 오름차순)
   */
  findBy(filter: ProductFilter): Promise<ProductRecord[]>;

  /**
   * 연결 상태 확인
   */
  healthCheck(): Promise<boolean>;
}
