import { IsNotEmpty, IsNumber, IsObject, IsOptional, IsString, Min, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';

export class TossPaymentDataDto {
  @IsString()
  @IsNotEmpty()
  orderId!: string;

  @IsString()
  @IsNotEmpty()
  status!: string;

  @IsString()
  @IsOptional()
  paymentKey?: string;

  @IsString()
  @IsOptional()
  transactionKey?: string;

  @IsString()
  @IsOptional()
  customerKey?: string;

  @IsNumber()
  @Min(0)
  @IsOptional()
  totalAmount?: number;

  @IsString()
  @IsOptional()
  currency?: string;

  @IsObject()
  @IsOptional()
  metadata?: Record<string, unknown>;
}

/**
 * Toss Webhook 请求体
 */
export class TossWebhookDto {
  @IsString()
  @IsNotEmpty()
  eventType!: string;

  @IsString()
  @IsNotEmpty()
  createdAt!: string;

  @IsObject()
  @ValidateNested()
  @Type(() => TossPaymentDataDto)
  data!: TossPaymentDataDto;
}
