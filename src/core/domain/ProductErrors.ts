/**
 * 상품 도메인 에러
 */

/**
 * 데이터 검증 실패
 * - 잘못된 역직렬화 입력 (available, category, price 등)
 * - ID 없는 상품의 update/delete
 */
export class DataValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DataValidationError";
  }
}

/**
 * 저장소에 해당 ID의 상품 row가 없음
 */
export class ProductNotFoundError extends Error {
  public readonly productId: number;

  constructor(productId: number) {
    super(`Product with id '${productId}' was not found.`);
    this.name = "ProductNotFoundError";
    this.productId = productId;
  }
}
