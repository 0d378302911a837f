/**
 * ProductStore 테스트
 * In-memory Repository로 생성/조회/수정/삭제 및 속성별 조회 검증
 */

import { describe, it, expect, beforeEach, jest } from "@jest/globals";
import { ProductStore } from "@/services/ProductStore";
import { Category } from "@/core/domain/Category";
import { pricesEqual } from "@/core/domain/Price";
import { Product } from "@/core/domain/Product";
import {
  DataValidationError,
  ProductNotFoundError,
} from "@/core/domain/ProductErrors";
import { InMemoryProductRepository } from "../helpers/InMemoryProductRepository";
import { ProductFactory } from "../factories/ProductFactory";

const createAll = async (
  store: ProductStore,
  products: Product[],
): Promise<void> => {
  for (const product of products) {
    await store.create(product);
  }
};

describe("ProductStore", () => {
  let repository: InMemoryProductRepository;
  let store: ProductStore;

  beforeEach(() => {
    repository = new InMemoryProductRepository();
    store = new ProductStore(repository);
  });

  describe("create()", () => {
    it("id를 할당하고 DB에 저장", async () => {
      expect(await store.all()).toEqual([]);

      const product = ProductFactory.build();
      await store.create(product);

      expect(product.id).not.toBeNull();

      const products = await store.all();
      expect(products).toHaveLength(1);

      const stored = products[0];
      expect(stored.id).toBe(product.id);
      expect(stored.name).toBe(product.name);
      expect(stored.description).toBe(product.description);
      expect(pricesEqual(stored.price, product.price)).toBe(true);
      expect(stored.available).toBe(product.available);
      expect(stored.category).toBe(product.category);
    });

    it("서로 다른 id 할당", async () => {
      const [first, second] = ProductFactory.buildBatch(2);
      await createAll(store, [first, second]);

      expect(first.id).not.toBe(second.id);
    });

    it("잘못된 필드면 DataValidationError, 저장하지 않음", async () => {
      const product = ProductFactory.build();
      product.name = "";

      await expect(store.create(product)).rejects.toThrow(DataValidationError);
      expect(repository.size).toBe(0);
      expect(product.id).toBeNull();
    });

    it("저장된 row의 정규화된 값을 인스턴스에 반영", async () => {
      const product = ProductFactory.build();
      product.price = "12.5";

      await store.create(product);

      expect(product.price).toBe("12.50");
      expect(product.serialize().price).toBe("12.50");
      const stored = await store.find(product.id ?? -1);
      expect(stored?.price).toBe(product.price);
    });
  });

  describe("find()", () => {
    it("id로 조회", async () => {
      const product = ProductFactory.build();
      await store.create(product);
      expect(product.id).not.toBeNull();

      const found = await store.find(product.id ?? -1);

      expect(found).not.toBeNull();
      expect(found?.id).toBe(product.id);
      expect(found?.name).toBe(product.name);
      expect(found?.description).toBe(product.description);
      expect(found?.price).toBe(product.price);
    });

    it("없으면 null", async () => {
      expect(await store.find(999)).toBeNull();
    });
  });

  describe("update()", () => {
    it("id를 유지하고 변경 필드만 저장", async () => {
      const product = ProductFactory.build();
      await store.create(product);
      const persistedId = product.id;

      product.description = "Updated description";
      await store.update(product);

      expect(product.id).toBe(persistedId);
      expect(product.description).toBe("Updated description");

      const products = await store.all();
      expect(products).toHaveLength(1);
      expect(products[0].id).toBe(persistedId);
      expect(products[0].description).toBe("Updated description");
      expect(products[0].name).toBe(product.name);
    });

    it("id가 null이면 DataValidationError", async () => {
      const product = ProductFactory.build();
      await store.create(product);
      expect(product.id).not.toBeNull();

      product.id = null;
      product.description = "Updated description";

      await expect(store.update(product)).rejects.toThrow(DataValidationError);
      await expect(store.update(product)).rejects.toThrow(
        "Update called with empty ID field",
      );
    });

    it("row가 삭제된 상품이면 ProductNotFoundError", async () => {
      const product = ProductFactory.build();
      await store.create(product);
      await store.delete(product);

      await expect(store.update(product)).rejects.toThrow(ProductNotFoundError);
    });

    it("수정 후 인스턴스와 row가 일치", async () => {
      const product = ProductFactory.build();
      await store.create(product);

      product.price = "007.5";
      await store.update(product);

      expect(product.price).toBe("7.50");
      const stored = await store.find(product.id ?? -1);
      expect(stored?.serialize()).toEqual(product.serialize());
    });
  });

  describe("delete()", () => {
    it("삭제 후 all()에서 제외", async () => {
      const product = ProductFactory.build();
      await store.create(product);
      expect(await store.all()).toHaveLength(1);

      await store.delete(product);

      expect(await store.all()).toHaveLength(0);
      expect(product.id).not.toBeNull();
      expect(await store.find(product.id ?? -1)).toBeNull();
    });

    it("개수가 정확히 1 감소", async () => {
      const products = ProductFactory.buildBatch(3);
      await createAll(store, products);

      await store.delete(products[1]);

      const remaining = await store.all();
      expect(remaining.map((p) => p.id)).toEqual([
        products[0].id,
        products[2].id,
      ]);
    });

    it("이미 삭제된 상품도 에러 없음", async () => {
      const product = ProductFactory.build();
      await store.create(product);
      await store.delete(product);

      await expect(store.delete(product)).resolves.toBeUndefined();
    });

    it("Transient 상품이면 DataValidationError", async () => {
      await expect(store.delete(ProductFactory.build())).rejects.toThrow(
        DataValidationError,
      );
    });
  });

  describe("all()", () => {
    it("저장된 모든 상품", async () => {
      expect(await store.all()).toEqual([]);

      await createAll(store, ProductFactory.buildBatch(5));

      expect(await store.all()).toHaveLength(5);
    });
  });

  describe("findByName()", () => {
    it("같은 이름의 상품만 반환", async () => {
      const products = ProductFactory.buildBatch(5);
      await createAll(store, products);

      const name = products[0].name;
      const expected = products.filter((p) => p.name === name).length;
      const found = await store.findByName(name);

      expect(found).toHaveLength(expected);
      found.forEach((product) => expect(product.name).toBe(name));
    });

    it("일치하는 상품이 없으면 빈 배열", async () => {
      await createAll(store, [ProductFactory.build({ name: "Hat" })]);

      expect(await store.findByName("Fedora")).toEqual([]);
    });
  });

  describe("findByAvailability()", () => {
    it("판매 가능 여부가 같은 상품만 반환", async () => {
      const products = ProductFactory.buildBatch(10);
      await createAll(store, products);

      const available = products[0].available;
      const expected = products.filter((p) => p.available === available).length;
      const found = await store.findByAvailability(available);

      expect(found).toHaveLength(expected);
      found.forEach((product) => expect(product.available).toBe(available));
    });

    it("기본값은 available=true", async () => {
      const onSale = ProductFactory.build({ available: true });
      const soldOut = ProductFactory.build({ available: false });
      await createAll(store, [onSale, soldOut]);

      const found = await store.findByAvailability();

      expect(found.map((p) => p.id)).toEqual([onSale.id]);
    });
  });

  describe("findByCategory()", () => {
    it("카테고리가 같은 상품만 반환", async () => {
      const products = ProductFactory.buildBatch(10);
      await createAll(store, products);

      const category = products[0].category;
      const expected = products.filter((p) => p.category === category).length;
      const found = await store.findByCategory(category);

      expect(found).toHaveLength(expected);
      found.forEach((product) => expect(product.category).toBe(category));
    });

    it("기본값은 UNKNOWN", async () => {
      const unknown = ProductFactory.build({ category: Category.UNKNOWN });
      const food = ProductFactory.build({ category: Category.FOOD });
      await createAll(store, [food, unknown]);

      const found = await store.findByCategory();

      expect(found.map((p) => p.id)).toEqual([unknown.id]);
    });
  });

  describe("findByPrice()", () => {
    it("문자열 가격으로 조회", async () => {
      const products = ProductFactory.buildBatch(10);
      await createAll(store, products);

      const price = products[0].price;
      const expected = products.filter((p) => p.price === price).length;
      const found = await store.findByPrice(String(price));

      expect(found).toHaveLength(expected);
      found.forEach((product) => expect(product.price).toBe(price));
    });

    it("숫자 및 비정규화 문자열도 decimal 기준으로 일치", async () => {
      const target = ProductFactory.build({ price: "12.50" });
      const other = ProductFactory.build({ price: "12.05" });
      await createAll(store, [target, other]);

      expect((await store.findByPrice(12.5)).map((p) => p.id)).toEqual([
        target.id,
      ]);
      expect((await store.findByPrice("12.5")).map((p) => p.id)).toEqual([
        target.id,
      ]);
      expect((await store.findByPrice("012.50")).map((p) => p.id)).toEqual([
        target.id,
      ]);
    });

    it("잘못된 가격 문자열이면 DataValidationError", async () => {
      await expect(store.findByPrice("not-a-price")).rejects.toThrow(
        DataValidationError,
      );
    });
  });

  describe("healthCheck()", () => {
    it("저장소 상태 반환", async () => {
      expect(await store.healthCheck()).toBe(true);

      repository.healthy = false;
      expect(await store.healthCheck()).toBe(false);
    });

    it("저장소 예외 시 false", async () => {
      jest
        .spyOn(repository, "healthCheck")
        .mockRejectedValue(new Error("connection refused"));

      expect(await store.healthCheck()).toBe(false);
    });
  });
});
