/**
 * Product Store 인터페이스
 *
 * Controller는 이 인터페이스에만 의존 (테스트 시 mock 주입)
 */

import { Category } from "@/core/domain/Category";
import { Product } from "@/core/domain/Product";

export interface IProductStore {
  /**
   * 상품 생성 후 할당된 id를 인스턴스에 기록
   */
  create(product: Product): Promise<void>;

  /**
   * 기존 row에 현재 필드 저장 (id 필수)
   */
  update(product: Product): Promise<void>;

  delete(product: Product): Promise<void>;

  all(): Promise<Product[]>;

  find(id: number): Promise<Product | null>;

  findByName(name: string): Promise<Product[]>;

  findByAvailability(available?: boolean): Promise<Product[]>;

  findByCategory(category?: Category): Promise<Product[]>;

  /**
   * @param price decimal 문자열 또는 숫자
   */
  findByPrice(price: string | number): Promise<Product[]>;

  healthCheck(): Promise<boolean>;
}
