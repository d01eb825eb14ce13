import Decimal from 'decimal.js';
import { PaymentProvider } from './webhook-event.entity';

export enum PaymentStatus {
  PENDING = 'pending',
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELED = 'canceled',
  REFUNDED = 'refunded',
}

/**
 * 支付记录（对应 payments 表，按 payment_provider + provider_payment_ref 唯一）
 */
export interface Payment {
  id: number;
  subject_id: string;
  payment_provider: PaymentProvider;
  provider_payment_ref: string; // invoice id / orderId
  provider_txn_ref: string | null; // payment intent / paymentKey
  provider_subscription_id: string | null;
  amount: Decimal | null; // 主币种单位
  currency: string | null;
  status: PaymentStatus;
  metadata: Record<string, unknown>;
  created_at: string;
  updated_at: string;
}

export interface PaymentRow extends Omit<Payment, 'amount' | 'status'> {
  amount: string | number | null;
  status: string;
}

export const PAYMENT_COLUMNS =
  'id, subject_id, payment_provider, provider_payment_ref, provider_txn_ref, provider_subscription_id, amount::text, currency, status, metadata, created_at, updated_at';

const PAYMENT_STATUSES: ReadonlySet<string> = new Set(Object.values(PaymentStatus));

function isPaymentStatus(value: string): value is PaymentStatus {
  return PAYMENT_STATUSES.has(value);
}

export function toPayment(row: PaymentRow): Payment {
  if (!isPaymentStatus(row.status)) {
    throw new Error(`Unknown payment status: ${row.status}`);
  }
  return {
    ...row,
    status: row.status,
    amount: row.amount === null ? null : new Decimal(String(row.amount)),
    metadata: row.metadata ?? {},
  };
}
