/**
 * 애플리케이션 설정 상수
 *
 * 환경변수 기반 설정 관리
 * - 환경변수가 없으면 기본값 사용
 */

/**
 * 애플리케이션 메타데이터
 *
 * ⚠️ VERSION은 package.json의 version 필드와 수동 동기화 필요
 */
export const APP_METADATA = {
  VERSION: "1.0.0",
  NAME: "Product Catalog Service",
  ARCHITECTURE: "API v1 REST",
} as const;

/**
 * 서버 설정
 */
export const SERVER_CONFIG = {
  /**
   * 환경변수: PORT
   * 기본값: 3000
   */
  PORT: Number(process.env.PORT) || 3000,
} as const;

/**
 * 데이터베이스 설정
 */
export const DATABASE_CONFIG = {
  /**
   * 상품 테이블명
   * 환경변수: PRODUCT_TABLE_NAME
   * 기본값: "products"
   */
  PRODUCT_TABLE_NAME: process.env.PRODUCT_TABLE_NAME || "products",
} as const;

/**
 * Repository 설정
 */
export const REPOSITORY_CONFIG = {
  /**
   * 기본 SELECT 필드 목록
   */
  PRODUCT_FIELDS: [
    "id",
    "name",
    "description",
    "price",
    "available",
    "category",
  ] as const,
} as const;

/**
 * 상품 필드 제약 (sql/schema.sql 컬럼 정의와 일치)
 */
export const PRODUCT_CONSTRAINTS = {
  /** products.id SERIAL (int4) 상한 */
  ID_MAX: 2147483647,

  /** products.name VARCHAR(100) */
  NAME_MAX_LENGTH: 100,

  /** products.description VARCHAR(250) */
  DESCRIPTION_MAX_LENGTH: 250,

  /** products.price NUMERIC(10,2) 정수부 자릿수 */
  PRICE_INTEGER_DIGITS: 8,

  /** products.price NUMERIC(10,2) 소수부 자릿수 */
  PRICE_SCALE: 2,
} as const;

/**
 * 로깅 서비스 이름
 * 서비스별 로그 파일 라우팅에 사용
 */
export const SERVICE_NAMES = {
  /**
   * Express 서버
   * 로그 파일: logs/YYYY-MM-DD/server.log
   */
  SERVER: "server",

  /**
   * Supabase Repository
   */
  PRODUCT_REPOSITORY: "product-repository",
} as const;
