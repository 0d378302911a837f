/**
 * Product 도메인 모델
 *
 * 상태:
 * - Transient: id === null (DB row 없음)
 * - Persisted: id 할당됨 (ProductStore.create 이후)
 *
 * 직렬화 형식: { id, name, description, price, available, category }
 * - price: 정규화된 decimal 문자열 ("12.50")
 * - category: enum 이름
 */

import { z } from "zod";
import { PRODUCT_CONSTRAINTS } from "@/config/constants";
import { Category, parseCategory } from "@/core/domain/Category";
import { parsePrice } from "@/core/domain/Price";
import { DataValidationError } from "@/core/domain/ProductErrors";

/**
 * 가격 스키마 (문자열/숫자 → 정규화된 decimal 문자열)
 */
const PriceSchema = z.unknown().transform((value, ctx) => {
  const result = parsePrice(value);
  if (!result.valid) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error });
    return z.NEVER;
  }
  return result.price;
});

/**
 * 카테고리 스키마 (이름 → Category)
 */
const CategorySchema = z.unknown().transform((value, ctx) => {
  const result = parseCategory(value);
  if (!result.valid) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error });
    return z.NEVER;
  }
  return result.category;
});

/**
 * 상품 필드 Zod 스키마
 * 직렬화된 payload와 DB 레코드 모두 이 스키마로 검증
 */
export const ProductFieldsSchema = z.object({
  name: z
    .string({
      required_error: "name is required",
      invalid_type_error: "name must be a string",
    })
    .min(1, "name must not be empty")
    .max(PRODUCT_CONSTRAINTS.NAME_MAX_LENGTH),
  description: z
    .string({
      required_error: "description is required",
      invalid_type_error: "description must be a string",
    })
    .max(PRODUCT_CONSTRAINTS.DESCRIPTION_MAX_LENGTH),
  price: PriceSchema,
  available: z.boolean({
    required_error: "available is required",
    invalid_type_error: "Invalid type for boolean [available]",
  }),
  category: CategorySchema,
});

export type ProductFields = z.output<typeof ProductFieldsSchema>;

/**
 * DB 레코드 스키마 (id 포함)
 */
export const ProductRecordSchema = ProductFieldsSchema.extend({
  id: z.number().int().positive(),
});

export type ProductRecord = z.output<typeof ProductRecordSchema>;

/**
 * 직렬화 결과 (전송용)
 */
export interface SerializedProduct {
  id: number | null;
  name: string;
  description: string;
  price: string;
  available: boolean;
  category: Category;
}

/**
 * 생성자 입력 (price는 숫자도 허용)
 */
export interface ProductInit {
  id?: number | null;
  name: string;
  description: string;
  price: string | number;
  available: boolean;
  category: Category;
}

export type ProductDecodeResult =
  | { success: true; data: ProductFields }
  | { success: false; error: string };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join(", ");
}

/**
 * 비정형 데이터 → 상품 필드 디코딩
 * 예외를 던지지 않고 성공/실패 결과를 반환
 */
export function decodeProduct(data: unknown): ProductDecodeResult {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return {
      success: false,
      error: "Invalid product: body of request contained bad or no data",
    };
  }

  const parsed = ProductFieldsSchema.safeParse(data);
  if (!parsed.success) {
    return {
      success: false,
      error: `Invalid product: ${formatIssues(parsed.error)}`,
    };
  }

  return { success: true, data: parsed.data };
}

/**
 * Product 엔티티
 */
export class Product {
  id: number | null;
  name: string;
  description: string;
  price: string;
  available: boolean;
  category: Category;

  constructor(init: ProductInit) {
    const decoded = decodeProduct(init);
    if (!decoded.success) {
      throw new DataValidationError(decoded.error);
    }

    this.id = init.id ?? null;
    this.name = decoded.data.name;
    this.description = decoded.data.description;
    this.price = decoded.data.price;
    this.available = decoded.data.available;
    this.category = decoded.data.category;
  }

  toString(): string {
    return `<Product ${this.name} id=[${this.id}]>`;
  }

  /**
   * 현재 필드 검증
   * 필드는 외부에서 변경될 수 있으므로 저장 직전에 다시 검증
   * @returns 정규화된 필드
   */
  validate(): ProductFields {
    const decoded = decodeProduct({
      name: this.name,
      description: this.description,
      price: this.price,
      available: this.available,
      category: this.category,
    });
    if (!decoded.success) {
      throw new DataValidationError(decoded.error);
    }
    return decoded.data;
  }

  /**
   * 전송용 flat 객체로 변환
   */
  serialize(): SerializedProduct {
    return {
      id: this.id,
      name: this.name,
      description: this.description,
      price: this.price,
      available: this.available,
      category: this.category,
    };
  }

  /**
   * 직렬화된 데이터로 필드 갱신
   * 검증 실패 시 DataValidationError, 인스턴스는 변경되지 않음
   * payload의 id는 무시
   */
  deserialize(data: unknown): this {
    const decoded = decodeProduct(data);
    if (!decoded.success) {
      throw new DataValidationError(decoded.error);
    }

    this.name = decoded.data.name;
    this.description = decoded.data.description;
    this.price = decoded.data.price;
    this.available = decoded.data.available;
    this.category = decoded.data.category;
    return this;
  }

  /**
   * 팩토리 메서드: 직렬화된 payload로부터 Transient 상품 생성
   */
  static fromPayload(data: unknown): Product {
    const decoded = decodeProduct(data);
    if (!decoded.success) {
      throw new DataValidationError(decoded.error);
    }
    return new Product(decoded.data);
  }

  /**
   * 팩토리 메서드: DB 레코드로부터 Persisted 상품 생성
   */
  static fromRecord(record: ProductRecord): Product {
    return new Product(record);
  }
}
