import { IsEnum, IsInt, IsOptional, IsUUID, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { PaymentStatus } from '../../../database/entities';

export class PaymentListQueryDto {
  @IsUUID()
  subject_id!: string;

  @IsEnum(PaymentStatus)
  @IsOptional()
  status?: PaymentStatus;

  @IsInt()
  @Type(() => Number)
  @Min(1)
  @Max(100)
  @IsOptional()
  limit?: number = 20;

  @IsInt()
  @Type(() => Number)
  @Min(0)
  @IsOptional()
  offset?: number = 0;
}

export interface PaymentResponseDto {
  id: number;
  subject_id: string;
  payment_provider: string;
  provider_payment_ref: string;
  provider_txn_ref: string | null;
  provider_subscription_id: string | null;
  amount: string | null;
  currency: string | null;
  status: string;
  created_at: string;
  updated_at: string;
}
