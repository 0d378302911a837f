/**
 * 가격 (NUMERIC(10,2)) 파싱/비교
 *
 * 가격은 소수점 2자리 고정의 정규화된 문자열("12.50")로 다룬다.
 * 부동소수점 비교를 피하기 위해 비교도 정규화된 문자열 기준으로 수행
 */

import { PRODUCT_CONSTRAINTS } from "@/config/constants";

const PRICE_PATTERN = /^(\d+)(?:\.(\d+))?$/;

export type PriceParseResult =
  | { valid: true; price: string }
  | { valid: false; error: string };

/**
 * 가격 파싱
 * @param value 문자열("12.5") 또는 숫자(12.5)
 * @returns 정규화된 가격 문자열("12.50") 또는 에러
 */
export function parsePrice(value: unknown): PriceParseResult {
  let text: string;

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      return { valid: false, error: `Invalid price: ${value}` };
    }
    text = String(value);
  } else if (typeof value === "string") {
    text = value.trim();
  } else if (value === undefined || value === null) {
    return { valid: false, error: "price is required" };
  } else {
    return { valid: false, error: `Invalid type for price: ${typeof value}` };
  }

  const match = PRICE_PATTERN.exec(text);
  if (!match) {
    return { valid: false, error: `Invalid price: ${text}` };
  }

  const integerPart = match[1].replace(/^0+(?=\d)/, "");
  const fractionPart = match[2] ?? "";

  if (fractionPart.length > PRODUCT_CONSTRAINTS.PRICE_SCALE) {
    return {
      valid: false,
      error: `Price must have at most ${PRODUCT_CONSTRAINTS.PRICE_SCALE} decimal places: ${text}`,
    };
  }

  if (integerPart.length > PRODUCT_CONSTRAINTS.PRICE_INTEGER_DIGITS) {
    return { valid: false, error: `Price out of range: ${text}` };
  }

  return {
    valid: true,
    price: `${integerPart}.${fractionPart.padEnd(PRODUCT_CONSTRAINTS.PRICE_SCALE, "0")}`,
  };
}

/**
 * 가격 동등 비교 (decimal 기준)
 * 어느 한쪽이라도 파싱 불가하면 false
 */
export function pricesEqual(a: string | number, b: string | number): boolean {
  const left = parsePrice(a);
  const right = parsePrice(b);
  return left.valid && right.valid && left.price === right.price;
}
