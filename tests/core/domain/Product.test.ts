/**
 * Product 도메인 모델 테스트
 * 생성, 직렬화, 역직렬화 검증
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { Category } from "@/core/domain/Category";
import {
  decodeProduct,
  Product,
  SerializedProduct,
} from "@/core/domain/Product";
import { DataValidationError } from "@/core/domain/ProductErrors";

const createFedora = (): Product =>
  new Product({
    name: "Fedora",
    description: "A red hat",
    price: 12.5,
    available: true,
    category: Category.CLOTHS,
  });

describe("Product", () => {
  describe("생성", () => {
    it("Transient 상품 생성", () => {
      const product = createFedora();

      expect(String(product)).toBe("<Product Fedora id=[null]>");
      expect(product.id).toBeNull();
      expect(product.name).toBe("Fedora");
      expect(product.description).toBe("A red hat");
      expect(product.available).toBe(true);
      expect(product.price).toBe("12.50");
      expect(product.category).toBe(Category.CLOTHS);
    });

    it("id 지정 시 toString에 반영", () => {
      const product = new Product({
        id: 7,
        name: "Hammer",
        description: "Steel",
        price: "9.99",
        available: false,
        category: Category.TOOLS,
      });

      expect(product.toString()).toBe("<Product Hammer id=[7]>");
    });

    it("잘못된 가격이면 DataValidationError", () => {
      expect(
        () =>
          new Product({
            name: "Hat",
            description: "",
            price: "twelve",
            available: true,
            category: Category.CLOTHS,
          }),
      ).toThrow(DataValidationError);
    });

    it("빈 이름이면 DataValidationError", () => {
      expect(
        () =>
          new Product({
            name: "",
            description: "",
            price: "1.00",
            available: true,
            category: Category.CLOTHS,
          }),
      ).toThrow("Invalid product: name: name must not be empty");
    });
  });

  describe("serialize()", () => {
    it("flat 객체로 변환 (price 문자열, category 이름)", () => {
      const product = createFedora();
      product.id = 3;

      expect(product.serialize()).toEqual({
        id: 3,
        name: "Fedora",
        description: "A red hat",
        price: "12.50",
        available: true,
        category: "CLOTHS",
      });
    });
  });

  describe("deserialize()", () => {
    let product: Product;
    let serialized: SerializedProduct;

    beforeEach(() => {
      product = createFedora();
      product.id = 5;
      serialized = product.serialize();
    });

    it("유효한 데이터로 필드 갱신", () => {
      const result = product.deserialize({
        name: "Banana",
        description: "Yellow",
        price: "0.5",
        available: false,
        category: "FOOD",
      });

      expect(result).toBe(product);
      expect(product.serialize()).toEqual({
        id: 5,
        name: "Banana",
        description: "Yellow",
        price: "0.50",
        available: false,
        category: Category.FOOD,
      });
    });

    it("payload의 id는 무시", () => {
      product.deserialize({ ...serialized, id: 99 });
      expect(product.id).toBe(5);
    });

    it("available이 boolean이 아니면 DataValidationError", () => {
      const data = { ...serialized, available: "I'm not a Bool" };

      expect(() => product.deserialize(data)).toThrow(DataValidationError);
    });

    it("category가 null이면 DataValidationError", () => {
      const data = { ...serialized, category: null };

      expect(() => product.deserialize(data)).toThrow(DataValidationError);
    });

    it("category가 정의되지 않은 값이면 DataValidationError", () => {
      const data = { ...serialized, category: "Wrong data" };

      expect(() => product.deserialize(data)).toThrow(DataValidationError);
    });

    it("필수 키가 없으면 DataValidationError", () => {
      const { description, ...data } = serialized;

      expect(description).toBe("A red hat");
      expect(() => product.deserialize(data)).toThrow(
        "Invalid product: description: description is required",
      );
    });

    it("가격 형식이 잘못되면 DataValidationError", () => {
      const data = { ...serialized, price: "12.3.4" };

      expect(() => product.deserialize(data)).toThrow(DataValidationError);
    });

    it("객체가 아니면 DataValidationError", () => {
      expect(() => product.deserialize(null)).toThrow(DataValidationError);
      expect(() => product.deserialize("text")).toThrow(DataValidationError);
      expect(() => product.deserialize([])).toThrow(DataValidationError);
    });

    it("실패 시 인스턴스는 변경되지 않음", () => {
      const before = product.serialize();

      expect(() =>
        product.deserialize({
          name: "Changed",
          description: "Changed",
          price: "1.00",
          available: "no",
          category: "FOOD",
        }),
      ).toThrow(DataValidationError);
      expect(product.serialize()).toEqual(before);
    });
  });

  describe("validate()", () => {
    it("정규화된 필드 반환", () => {
      expect(createFedora().validate()).toEqual({
        name: "Fedora",
        description: "A red hat",
        price: "12.50",
        available: true,
        category: Category.CLOTHS,
      });
    });

    it("외부에서 잘못 변경된 필드 검출", () => {
      const product = createFedora();
      product.price = "abc";

      expect(() => product.validate()).toThrow(
        "Invalid product: price: Invalid price: abc",
      );
    });
  });

  describe("fromPayload()", () => {
    it("payload로 Transient 상품 생성", () => {
      const product = Product.fromPayload({
        id: 10,
        name: "Pots",
        description: "Cast iron",
        price: 45,
        available: true,
        category: "HOUSEWARES",
      });

      expect(product.id).toBeNull();
      expect(product.price).toBe("45.00");
      expect(product.category).toBe(Category.HOUSEWARES);
    });
  });
});

describe("decodeProduct", () => {
  const valid = {
    name: "Towels",
    description: "Cotton",
    price: "8.25",
    available: true,
    category: "HOUSEWARES",
  };

  it("성공 결과 반환", () => {
    expect(decodeProduct(valid)).toEqual({
      success: true,
      data: { ...valid, category: Category.HOUSEWARES },
    });
  });

  it("available 타입 오류 메시지", () => {
    expect(decodeProduct({ ...valid, available: "yes" })).toEqual({
      success: false,
      error: "Invalid product: available: Invalid type for boolean [available]",
    });
  });

  it("category 누락 메시지", () => {
    const { category, ...data } = valid;

    expect(category).toBe("HOUSEWARES");
    expect(decodeProduct(data)).toEqual({
      success: false,
      error: "Invalid product: category: category is required",
    });
  });

  it("객체가 아닌 입력", () => {
    expect(decodeProduct(undefined)).toEqual({
      success: false,
      error: "Invalid product: body of request contained bad or no data",
    });
  });
});
