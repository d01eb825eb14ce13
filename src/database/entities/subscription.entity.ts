import { PaymentProvider } from './webhook-event.entity';

export enum SubscriptionStatus {
  ACTIVE = 'active',
  INACTIVE = 'inactive',
}

/**
 * 订阅实体（对应 subscriptions 表）
 */
export interface Subscription {
  id: number;
  subject_id: string;
  provider: string; // 积分归属
  payment_provider: PaymentProvider;
  provider_subscription_id: string;
  provider_customer_id: string | null;
  status: SubscriptionStatus;
  plan_id: string | null;
  current_period_end: string | null;
  canceled_at: string | null;
  created_at: string;
  updated_at: string;
}
