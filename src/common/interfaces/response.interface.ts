/**
 * 统一响应格式
 * { data: T | null, error: { code, message, details? } | null }
 */
export interface ApiResponse<T = unknown> {
  data: T | null;
  error: ApiError | null;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * 错误码枚举
 */
export enum ErrorCode {
  INVALID_INPUT = 'INVALID_INPUT',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  INSUFFICIENT_BALANCE = 'INSUFFICIENT_BALANCE',
  PROVIDER_VERIFICATION_FAILED = 'PROVIDER_VERIFICATION_FAILED',
  PERSISTENCE_ERROR = 'PERSISTENCE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * offset 分页响应
 */
export interface OffsetPage<T> {
  items: T[];
  total: number;
  limit: number; // 实际生效的 limit（已按上限截断）
  offset: number;
  has_more: boolean;
  next_offset: number | null;
}

export function toOffsetPage<T>(items: T[], total: number, limit: number, offset: number): OffsetPage<T> {
  const hasMore = offset + limit < total;
  return {
    items,
    total,
    limit,
    offset,
    has_more: hasMore,
    next_offset: hasMore ? offset + limit : null,
  };
}
