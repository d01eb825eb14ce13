import { PaymentProvider } from './webhook-event.entity';

/**
 * 渠道客户 ID <-> subject 映射（对应 customer_mappings 表）
 */
export interface CustomerMapping {
  id: number;
  payment_provider: PaymentProvider;
  provider_customer_id: string;
  subject_id: string;
  email: string | null;
  created_at: string;
  updated_at: string;
}
