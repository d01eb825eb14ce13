import Decimal from 'decimal.js';
import { CanonicalStatus, PaymentProvider, WebhookEvent } from '../../../database/entities';
import { PlanReference } from '../../plans/payment-plans.service';

export enum WebhookEventKind {
  PAYMENT = 'payment',
  SUBSCRIPTION = 'subscription',
  PAYMENT_SETUP = 'payment_setup',
  OTHER = 'other',
}

/**
 * subject 解析线索，按 SubjectResolverService 中固定的顺序尝试
 */
export interface SubjectHints {
  direct: string | null; // 对象本身的 metadata.user_id
  parent: string | null; // 父对象（订阅详情）的 metadata.user_id
  lineItem: string | null; // 第一个 line item 的 metadata.user_id
  providerCustomerId: string | null; // 通过 customer_mappings 反查
}

/**
 * 各渠道 Webhook 归一化后的统一事件
 */
export interface NormalizedWebhookEvent {
  provider: PaymentProvider;
  eventId: string;
  type: string; // 渠道原始事件类型
  kind: WebhookEventKind;
  canonicalStatus: CanonicalStatus | null; // null 表示无需处理
  correlationId: string | null; // 解析出的 subject
  subjectHints: SubjectHints;
  providerPaymentRef: string | null; // invoice id / orderId
  providerTxnRef: string | null; // payment intent / paymentKey
  providerCustomerId: string | null;
  providerSubscriptionRef: string | null;
  providerStatus: string | null;
  amount: Decimal | null; // 主币种单位
  currency: string | null; // ISO 4217，大写
  planRef: PlanReference | null;
  creditProvider: string | null; // metadata.service_provider
  email: string | null;
  periodEnd: Date | null;
  rawData: Record<string, unknown>;
  receivedAt: Date;
}

export type WebhookHeaders = Record<string, string | string[] | undefined>;

/**
 * 渠道适配器：校验签名 -> 解析 -> 归一化
 * 扣款类接口（发起/确认支付）由各渠道 SDK 封装，不在这里
 */
export interface PaymentProviderAdapter {
  readonly provider: PaymentProvider;

  /**
   * 签名校验失败或无法解析时抛出 ProviderVerificationException
   */
  handleWebhook(rawBody: Buffer, headers: WebhookHeaders): NormalizedWebhookEvent;

  /**
   * 从已入库（入库前已校验）的事件重建，用于重试
   */
  fromStoredEvent(event: WebhookEvent): NormalizedWebhookEvent;
}

export const PAYMENT_PROVIDER_ADAPTERS = Symbol('PAYMENT_PROVIDER_ADAPTERS');

export function emptySubjectHints(): SubjectHints {
  return { direct: null, parent: null, lineItem: null, providerCustomerId: null };
}

export function headerValue(headers: WebhookHeaders, name: string): string {
  const value = headers[name];
  return (Array.isArray(value) ? value[0] : value) ?? '';
}
