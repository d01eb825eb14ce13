import { Injectable, Logger } from '@nestjs/common';
import { SupabaseService, UNIQUE_VIOLATION } from '../../providers/supabase/supabase.service';
import {
  CreditBalance,
  CreditBalanceRow,
  CreditTransaction,
  CreditTransactionRow,
  PaymentProvider,
  Subscription,
  SubscriptionStatus,
  toCreditBalance,
  toCreditTransaction,
  zeroBalance,
} from '../../database/entities';
import { PersistenceException, SubscriptionNotFoundException } from '../../common/errors/billing.errors';

export interface SubscriptionUpsertInput {
  subjectId: string;
  provider: string;
  paymentProvider: PaymentProvider;
  providerSubscriptionId: string;
  providerCustomerId: string | null;
  status: SubscriptionStatus;
  planId: string | null;
  currentPeriodEnd: Date | null;
}

export interface SubscriptionCancellationResult {
  subscription: Subscription;
  transaction: CreditTransaction | null; // 余额为 0 时没有清零流水
  balance: CreditBalance;
}

interface CancelSubscriptionResult {
  outcome: 'not_found' | 'reset' | 'noop';
  subscription?: Subscription;
  transaction?: CreditTransactionRow;
  balance?: CreditBalanceRow | null;
}

@Injectable()
export class SubscriptionsService {
  private readonly logger = new Logger(SubscriptionsService.name);

  constructor(private supabaseService: SupabaseService) {}

  async getByProviderSubscriptionId(providerSubscriptionId: string): Promise<Subscription | null> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from('subscriptions')
      .select('*')
      .eq('provider_subscription_id', providerSubscriptionId)
      .maybeSingle();

    if (error) {
      throw new PersistenceException('get subscription', error);
    }

    const subscription: Subscription | null = data;
    return subscription;
  }

  /**
   * Webhook 驱动的创建/更新
   * 更新带 canceled_at is null 条件，已取消的订阅不会被乱序到达的 updated 事件重新激活
   */
  async upsertFromProvider(input: SubscriptionUpsertInput): Promise<Subscription> {
    const now = new Date().toISOString();
    const changes = {
      subject_id: input.subjectId,
      provider: input.provider,
      payment_provider: input.paymentProvider,
      provider_customer_id: input.providerCustomerId,
      status: input.status,
      plan_id: input.planId,
      current_period_end: input.currentPeriodEnd?.toISOString() ?? null,
      updated_at: now,
    };

    const updated = await this.updateUncanceled(input.providerSubscriptionId, changes);
    if (updated) {
      this.logger.log(
        `Subscription ${input.providerSubscriptionId} updated for subject ${input.subjectId} (${input.status})`,
      );
      return updated;
    }

    const { data, error } = await this.supabaseService
      .getClient()
      .from('subscriptions')
      .insert({ ...changes, provider_subscription_id: input.providerSubscriptionId, created_at: now })
      .select('*')
      .single();

    if (!error) {
      this.logger.log(
        `Subscription ${input.providerSubscriptionId} created for subject ${input.subjectId} (${input.status})`,
      );
      const subscription: Subscription = data;
      return subscription;
    }
    if (error.code !== UNIQUE_VIOLATION) {
      throw new PersistenceException('create subscription', error);
    }

    // 行已存在：要么已取消，要么刚被并发请求创建
    const existing = await this.getByProviderSubscriptionId(input.providerSubscriptionId);
    if (!existing) {
      throw new PersistenceException('create subscription', error);
    }
    if (existing.canceled_at) {
      this.logger.log(`Subscription ${input.providerSubscriptionId} already canceled, ignoring update`);
      return existing;
    }
    return (await this.updateUncanceled(input.providerSubscriptionId, changes)) ?? existing;
  }

  private async updateUncanceled(
    providerSubscriptionId: string,
    changes: Record<string, unknown>,
  ): Promise<Subscription | null> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from('subscriptions')
      .update(changes)
      .eq('provider_subscription_id', providerSubscriptionId)
      .is('canceled_at', null)
      .select('*');

    if (error) {
      throw new PersistenceException('update subscription', error);
    }

    const rows: Subscription[] = data ?? [];
    return rows[0] ?? null;
  }

  /**
   * 取消订阅并清零余额（同一个数据库事务）
   * 重复取消不会重复扣减
   */
  async cancelSubscription(providerSubscriptionId: string): Promise<SubscriptionCancellationResult> {
    const { data, error } = await this.supabaseService
      .getClient()
      .rpc('cancel_subscription_credits', { p_provider_subscription_id: providerSubscriptionId });

    if (error) {
      this.logger.error(`Failed to cancel subscription ${providerSubscriptionId}: ${error.message}`);
      throw new PersistenceException('cancel subscription', error);
    }

    const result: CancelSubscriptionResult = data;
    if (result.outcome === 'not_found' || !result.subscription) {
      throw new SubscriptionNotFoundException(providerSubscriptionId);
    }

    const subscription = result.subscription;
    const transaction = result.transaction ? toCreditTransaction(result.transaction) : null;
    const balance = result.balance
      ? toCreditBalance(result.balance)
      : zeroBalance(subscription.subject_id, subscription.provider);

    if (transaction) {
      this.logger.log(
        `Subscription ${providerSubscriptionId} canceled, reset balance of subject ${subscription.subject_id} ` +
          `(${transaction.amount.toFixed(2)})`,
      );
    } else {
      this.logger.log(`Subscription ${providerSubscriptionId} canceled, no balance to reset`);
    }

    return { subscription, transaction, balance };
  }
}
