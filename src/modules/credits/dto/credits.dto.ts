import {
  IsDecimal,
  IsEnum,
  IsISO8601,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { Type } from 'class-transformer';
import { CreditTransactionType } from '../../../database/entities';

export const HISTORY_MAX_LIMIT = 100;

// 金额一律用字符串传递，最多两位小数
const DECIMAL_OPTIONS = { decimal_digits: '0,2' };

export class ProviderQueryDto {
  @IsString()
  @IsOptional()
  @MaxLength(100)
  provider?: string;
}

export class CreditHistoryQueryDto extends ProviderQueryDto {
  @IsInt()
  @Type(() => Number)
  @Min(1)
  @Max(HISTORY_MAX_LIMIT)
  @IsOptional()
  limit?: number = 20;

  @IsInt()
  @Type(() => Number)
  @Min(0)
  @IsOptional()
  offset?: number = 0;

  @IsEnum(CreditTransactionType)
  @IsOptional()
  transaction_type?: CreditTransactionType;

  @IsISO8601()
  @IsOptional()
  start_date?: string;

  @IsISO8601()
  @IsOptional()
  end_date?: string;
}

export class AllocateCreditsDto extends ProviderQueryDto {
  @IsDecimal(DECIMAL_OPTIONS)
  amount!: string;

  @IsString()
  @IsNotEmpty()
  description!: string;

  @IsString()
  @IsOptional()
  @MaxLength(200)
  reference_id?: string;
}

export class UseCreditsDto extends ProviderQueryDto {
  @IsDecimal(DECIMAL_OPTIONS)
  amount!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  feature_name!: string;

  @IsString()
  @IsOptional()
  description?: string;

  @IsString()
  @IsOptional()
  @MaxLength(200)
  idempotency_key?: string;

  @IsObject()
  @IsOptional()
  usage_metadata?: Record<string, unknown>;
}

export class AdjustCreditsDto extends ProviderQueryDto {
  @IsDecimal(DECIMAL_OPTIONS)
  amount!: string; // 可为负

  @IsString()
  @IsNotEmpty()
  description!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  reference_id!: string;
}

export interface CreditBalanceResponseDto {
  subject_id: string;
  provider: string;
  current_balance: string;
  last_transaction_at: string | null;
}

export interface CreditTransactionResponseDto {
  id: number;
  transaction_type: string;
  provider: string;
  amount: string;
  balance_after: string;
  description: string;
  feature_name: string | null;
  reference_id: string | null;
  created_at: string;
}

export interface CreditMutationResponseDto {
  balance: CreditBalanceResponseDto;
  transaction: CreditTransactionResponseDto;
  replayed: boolean;
}
