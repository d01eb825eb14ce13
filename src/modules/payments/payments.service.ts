import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { SupabaseService } from '../../providers/supabase/supabase.service';
import {
  PAYMENT_COLUMNS,
  Payment,
  PaymentProvider,
  PaymentRow,
  PaymentStatus,
  toPayment,
} from '../../database/entities';
import { PaymentNotFoundException, PersistenceException } from '../../common/errors/billing.errors';

export interface RecordPaymentInput {
  subjectId: string;
  paymentProvider: PaymentProvider;
  providerPaymentRef: string;
  providerTxnRef: string | null;
  providerSubscriptionId: string | null;
  amount: Decimal | null;
  currency: string | null;
  metadata?: Record<string, unknown>;
}

export interface PaymentListQuery {
  limit?: number;
  offset?: number;
  status?: PaymentStatus;
}

export interface PaymentPage {
  items: Payment[];
  total: number;
  limit: number;
  offset: number;
}

type TerminalUpdate = PaymentStatus.FAILED | PaymentStatus.CANCELED | PaymentStatus.REFUNDED;

// 允许进入目标状态的来源状态；退款只针对已完成的支付
const ALLOWED_SOURCES: Record<TerminalUpdate, PaymentStatus[]> = {
  [PaymentStatus.FAILED]: [PaymentStatus.PENDING, PaymentStatus.PROCESSING],
  [PaymentStatus.CANCELED]: [PaymentStatus.PENDING, PaymentStatus.PROCESSING, PaymentStatus.COMPLETED],
  [PaymentStatus.REFUNDED]: [PaymentStatus.COMPLETED],
};

const DEFAULT_PAGE_LIMIT = 20;
const MAX_PAGE_LIMIT = 100;

/**
 * 支付记录
 * 每个渠道的一笔支付（invoice / orderId）对应一行，由 Webhook 写入
 */
@Injectable()
export class PaymentsService {
  private readonly logger = new Logger(PaymentsService.name);

  constructor(private supabaseService: SupabaseService) {}

  /**
   * 记录一笔已完成的支付
   * 同一笔支付重复投递时保留第一次写入的行
   */
  async recordCompleted(input: RecordPaymentInput): Promise<Payment> {
    const now = new Date().toISOString();
    const { data, error } = await this.supabaseService
      .getClient()
      .from('payments')
      .upsert(
        {
          subject_id: input.subjectId,
          payment_provider: input.paymentProvider,
          provider_payment_ref: input.providerPaymentRef,
          provider_txn_ref: input.providerTxnRef,
          provider_subscription_id: input.providerSubscriptionId,
          amount: input.amount?.toFixed(2) ?? null,
          currency: input.currency,
          status: PaymentStatus.COMPLETED,
          metadata: input.metadata ?? {},
          created_at: now,
          updated_at: now,
        },
        { onConflict: 'payment_provider,provider_payment_ref', ignoreDuplicates: true },
      )
      .select(PAYMENT_COLUMNS);

    if (error) {
      this.logger.error(`Failed to record payment ${input.providerPaymentRef}: ${error.message}`);
      throw new PersistenceException('record payment', error);
    }

    const rows: PaymentRow[] = data ?? [];
    if (rows.length > 0) {
      this.logger.log(
        `Recorded ${input.paymentProvider} payment ${input.providerPaymentRef} for subject ${input.subjectId}`,
      );
      return toPayment(rows[0]);
    }

    const existing = await this.getByProviderRef(input.paymentProvider, input.providerPaymentRef);
    if (!existing) {
      throw new PersistenceException('record payment', { message: 'payment vanished after conflict' });
    }
    this.logger.log(`Payment ${input.providerPaymentRef} already recorded (${existing.status})`);
    return existing;
  }

  /**
   * 失败/取消/退款
   * 当前状态不允许转换或没有这笔支付时返回 null
   */
  async updateStatus(
    paymentProvider: PaymentProvider,
    providerPaymentRef: string,
    status: TerminalUpdate,
  ): Promise<Payment | null> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from('payments')
      .update({ status, updated_at: new Date().toISOString() })
      .eq('payment_provider', paymentProvider)
      .eq('provider_payment_ref', providerPaymentRef)
      .in('status', ALLOWED_SOURCES[status])
      .select(PAYMENT_COLUMNS);

    if (error) {
      throw new PersistenceException('update payment status', error);
    }

    const rows: PaymentRow[] = data ?? [];
    if (rows.length === 0) {
      this.logger.warn(`No ${paymentProvider} payment ${providerPaymentRef} can move to ${status}`);
      return null;
    }

    this.logger.log(`Payment ${providerPaymentRef} marked ${status}`);
    return toPayment(rows[0]);
  }

  async getByProviderRef(paymentProvider: PaymentProvider, providerPaymentRef: string): Promise<Payment | null> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from('payments')
      .select(PAYMENT_COLUMNS)
      .eq('payment_provider', paymentProvider)
      .eq('provider_payment_ref', providerPaymentRef)
      .maybeSingle();

    if (error) {
      throw new PersistenceException('get payment', error);
    }

    const row: PaymentRow | null = data;
    return row ? toPayment(row) : null;
  }

  async getPayment(id: number): Promise<Payment> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from('payments')
      .select(PAYMENT_COLUMNS)
      .eq('id', id)
      .maybeSingle();

    if (error) {
      throw new PersistenceException('get payment', error);
    }

    const row: PaymentRow | null = data;
    if (!row) {
      throw new PaymentNotFoundException(id);
    }
    return toPayment(row);
  }

  /**
   * 某个 subject 的支付记录，按时间倒序
   */
  async listPayments(subjectId: string, query: PaymentListQuery = {}): Promise<PaymentPage> {
    const limit = Math.min(Math.max(query.limit ?? DEFAULT_PAGE_LIMIT, 1), MAX_PAGE_LIMIT);
    const offset = Math.max(query.offset ?? 0, 0);

    let request = this.supabaseService
      .getClient()
      .from('payments')
      .select(PAYMENT_COLUMNS, { count: 'exact' })
      .eq('subject_id', subjectId);

    if (query.status) {
      request = request.eq('status', query.status);
    }

    const { data, error, count } = await request
      .order('created_at', { ascending: false })
      .order('id', { ascending: false })
      .range(offset, offset + limit - 1);

    if (error) {
      throw new PersistenceException('list payments', error);
    }

    const rows: PaymentRow[] = data ?? [];
    return { items: rows.map(toPayment), total: count ?? offset + rows.length, limit, offset };
  }
}
