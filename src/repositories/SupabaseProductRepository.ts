/**
 * Supabase Product Repository 구현
 *
 * SOLID 원칙:
 * - SRP: Supabase(PostgREST)와의 데이터 통신만 담당
 * - DIP: IProductRepository 인터페이스 구현
 *
 * Design Pattern:
 * - Repository Pattern: 데이터 접근 로직 캡슐화
 * - Singleton Pattern: 환경변수 기반 Supabase 클라이언트 재사용 (주입 가능)
 */

import {
  createClient,
  PostgrestError,
  SupabaseClient,
} from "@supabase/supabase-js";
import {
  IProductRepository,
  ProductFilter,
} from "@/core/interfaces/IProductRepository";
import {
  ProductFields,
  ProductRecord,
  ProductRecordSchema,
} from "@/core/domain/Product";
import {
  DATABASE_CONFIG,
  REPOSITORY_CONFIG,
  SERVICE_NAMES,
} from "@/config/constants";
import { createServiceLogger } from "@/utils/LoggerContext";

const logger = createServiceLogger(SERVICE_NAMES.PRODUCT_REPOSITORY);

/**
 * PostgREST: .single() 결과 row 없음
 */
const NO_ROWS_CODE = "PGRST116";

/**
 * 상품 필드 → DB row
 */
function toRow(fields: ProductFields) {
  return {
    name: fields.name,
    description: fields.description,
    price: fields.price,
    available: fields.available,
    category: fields.category,
  };
}

/**
 * DB row 목록 검증 및 변환
 */
function toRecords(data: unknown): ProductRecord[] {
  const rows: unknown[] = Array.isArray(data) ? data : [];
  return rows.map((row) => ProductRecordSchema.parse(row));
}

/**
 * Supabase Product Repository
 */
export class SupabaseProductRepository implements IProductRepository {
  private static instance: SupabaseClient | null = null;
  private readonly client: SupabaseClient;
  private readonly tableName = DATABASE_CONFIG.PRODUCT_TABLE_NAME;
  private readonly selectFields = REPOSITORY_CONFIG.PRODUCT_FIELDS.join(", ");

  constructor(client?: SupabaseClient) {
    this.client = client ?? SupabaseProductRepository.getSupabaseClient();
  }

  /**
   * Supabase 클라이언트 가져오기 (Singleton)
   */
  private static getSupabaseClient(): SupabaseClient {
    if (SupabaseProductRepository.instance) {
      return SupabaseProductRepository.instance;
    }

    const supabaseUrl = process.env.SUPABASE_URL;
    const supabaseKey = process.env.SUPABASE_SERVICE_ROLE_KEY;

    if (!supabaseUrl || !supabaseKey) {
      throw new Error(
        "SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set in environment variables",
      );
    }

    SupabaseProductRepository.instance = createClient(supabaseUrl, supabaseKey, {
      auth: { persistSession: false },
    });
    logger.info("Supabase client 초기화 완료");

    return SupabaseProductRepository.instance;
  }

  private queryFailed(error: PostgrestError): Error {
    logger.error(
      { error: error.message, code: error.code },
      "[Repository] Supabase 쿼리 실패",
    );
    return new Error(`Supabase query failed: ${error.message}`);
  }

  async insert(fields: ProductFields): Promise<ProductRecord> {
    logger.info({ name: fields.name }, "[Repository] 상품 생성 시작");

    try {
      const { data, error } = await this.client
        .from(this.tableName)
        .insert(toRow(fields))
        .select(this.selectFields)
        .single();

      if (error) {
        throw this.queryFailed(error);
      }

      const record = ProductRecordSchema.parse(data);
      logger.info({ id: record.id }, "[Repository] 상품 생성 완료");
      return record;
    } catch (error) {
      logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        "[Repository] 상품 생성 실패",
      );
      throw error;
    }
  }

  async update(
    id: number,
    fields: ProductFields,
  ): Promise<ProductRecord | null> {
    logger.info({ id }, "[Repository] 상품 수정 시작");

    try {
      const { data, error } = await this.client
        .from(this.tableName)
        .update(toRow(fields))
        .eq("id", id)
        .select(this.selectFields)
        .single();

      if (error) {
        if (error.code === NO_ROWS_CODE) {
          logger.info({ id }, "[Repository] 수정할 상품을 찾을 수 없음");
          return null;
        }
        throw this.queryFailed(error);
      }

      logger.info({ id }, "[Repository] 상품 수정 완료");
      return ProductRecordSchema.parse(data);
    } catch (error) {
      logger.error(
        { id, error: error instanceof Error ? error.message : String(error) },
        "[Repository] 상품 수정 실패",
      );
      throw error;
    }
  }

  async delete(id: number): Promise<void> {
    logger.info({ id }, "[Repository] 상품 삭제 시작");

    try {
      const { error } = await this.client
        .from(this.tableName)
        .delete()
        .eq("id", id);

      if (error) {
        throw this.queryFailed(error);
      }

      logger.info({ id }, "[Repository] 상품 삭제 완료");
    } catch (error) {
      logger.error(
        { id, error: error instanceof Error ? error.message : String(error) },
        "[Repository] 상품 삭제 실패",
      );
      throw error;
    }
  }

  async findAll(): Promise<ProductRecord[]> {
    return this.findBy({});
  }

  async findById(id: number): Promise<ProductRecord | null> {
    logger.debug({ id }, "[Repository] 상품 조회 시작");

    try {
      const { data, error } = await this.client
        .from(this.tableName)
        .select(this.selectFields)
        .eq("id", id)
        .single();

      if (error) {
        // 404는 정상 케이스
        if (error.code === NO_ROWS_CODE) {
          logger.info({ id }, "[Repository] 상품을 찾을 수 없음");
          return null;
        }
        throw this.queryFailed(error);
      }

      return ProductRecordSchema.parse(data);
    } catch (error) {
      logger.error(
        { id, error: error instanceof Error ? error.message : String(error) },
        "[Repository] 상품 조회 실패",
      );
      throw error;
    }
  }

  async findBy(filter: ProductFilter): Promise<ProductRecord[]> {
    logger.debug({ filter }, "[Repository] 상품 검색 시작");

    try {
      let query = this.client.from(this.tableName).select(this.selectFields);

      // WHERE 조건 (완전 일치)
      if (filter.name !== undefined) {
        query = query.eq("name", filter.name);
      }
      if (filter.available !== undefined) {
        query = query.eq("available", filter.available);
      }
      if (filter.category !== undefined) {
        query = query.eq("category", filter.category);
      }
      if (filter.price !== undefined) {
        // NUMERIC 컬럼과 decimal 문자열 비교 (DB 측 decimal semantics)
        query = query.eq("price", filter.price);
      }

      const { data, error } = await query.order("id", { ascending: true });

      if (error) {
        throw this.queryFailed(error);
      }

      const records = toRecords(data);
      logger.debug(
        { filter, count: records.length },
        "[Repository] 상품 검색 완료",
      );
      return records;
    } catch (error) {
      logger.error(
        {
          filter,
          error: error instanceof Error ? error.message : String(error),
        },
        "[Repository] 상품 검색 실패",
      );
      throw error;
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const { error } = await this.client
        .from(this.tableName)
        .select("id")
        .limit(1);

      if (error) {
        logger.error(
          { error: error.message },
          "[Repository] Health check 실패",
        );
        return false;
      }

      logger.debug("[Repository] Health check 성공");
      return true;
    } catch (error) {
      logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        "[Repository] Health check 실패",
      );
      return false;
    }
  }
}
