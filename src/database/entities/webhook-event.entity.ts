/**
 * 支付渠道
 */
export enum PaymentProvider {
  STRIPE = 'stripe',
  TOSS = 'toss',
}

/**
 * 归一化后的状态（内部分发只看这个）
 */
export enum CanonicalStatus {
  COMPLETED = 'completed',
  CANCELED = 'canceled',
  REFUNDED = 'refunded',
  FAILED = 'failed',
}

/**
 * Webhook 处理状态
 */
export enum WebhookProcessingStatus {
  PENDING = 'pending',
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

/**
 * Webhook 事件实体（对应 webhook_events 表，event_id 唯一）
 */
export interface WebhookEvent {
  id: number;
  event_id: string;
  provider: PaymentProvider;
  event_type: string;
  canonical_status: CanonicalStatus | null;
  processing_status: WebhookProcessingStatus;
  retry_count: number;
  last_error: string | null;
  next_retry_at: string | null;
  claimed_at: string | null;
  processed_at: string | null;
  payload: Record<string, unknown>;
  received_at: string;
}
