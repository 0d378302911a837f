/**
 * 상품 카테고리
 *
 * DB에는 이름(enum label)으로 저장되고, 직렬화도 이름으로 수행
 */
export enum Category {
  UNKNOWN = "UNKNOWN",
  CLOTHS = "CLOTHS",
  FOOD = "FOOD",
  HOUSEWARES = "HOUSEWARES",
  AUTOMOTIVE = "AUTOMOTIVE",
  TOOLS = "TOOLS",
}

export const CATEGORY_NAMES: readonly Category[] = Object.values(Category);

export type CategoryParseResult =
  | { valid: true; category: Category }
  | { valid: false; error: string };

/**
 * 카테고리 이름 파싱 (대소문자 구분)
 */
export function parseCategory(value: unknown): CategoryParseResult {
  if (value === undefined || value === null) {
    return { valid: false, error: "category is required" };
  }

  if (typeof value !== "string") {
    return {
      valid: false,
      error: `Invalid type for category: ${typeof value}`,
    };
  }

  const category = CATEGORY_NAMES.find((name) => name === value);
  if (!category) {
    return { valid: false, error: `Invalid category: ${value}` };
  }

  return { valid: true, category };
}
