import { IsEmail, IsISO8601, IsNotEmpty, IsOptional, IsString, IsUUID } from 'class-validator';

/**
 * Supabase 注册确认回调（Database Webhook 转发 auth.users 的确认事件）
 */
export class SignupConfirmationDto {
  @IsUUID()
  user_id!: string;

  @IsString()
  @IsNotEmpty()
  service_provider!: string;

  @IsEmail()
  @IsOptional()
  email?: string;

  @IsISO8601()
  @IsOptional()
  confirmed_at?: string;

  @IsISO8601()
  @IsOptional()
  created_at?: string;
}
