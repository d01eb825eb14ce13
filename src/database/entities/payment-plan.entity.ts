import { PaymentProvider } from './webhook-event.entity';

/**
 * 套餐（对应 payment_plans 表，由外部同步，只读）
 */
export interface PaymentPlan {
  id: number;
  payment_provider: PaymentProvider;
  provider_price_id: string | null;
  provider_product_id: string | null;
  display_name: string;
  credits_per_cycle: number;
  is_active: boolean;
}
