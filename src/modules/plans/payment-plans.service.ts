import { Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from '../../providers/supabase/supabase.service';
import { PaymentPlan } from '../../database/entities';
import { PersistenceException, PlanNotFoundException } from '../../common/errors/billing.errors';

/**
 * 从渠道事件中取出的套餐线索
 */
export interface PlanReference {
  priceId: string | null;
  productId: string | null;
  metadataCredits: number | null; // price/product metadata 里的 credits_per_cycle
  metadataPlanName?: string | null;
}

export interface ResolvedCredits {
  credits: number;
  displayName: string;
  source: 'price' | 'product' | 'metadata';
}

@Injectable()
export class PaymentPlansService {
  private readonly logger = new Logger(PaymentPlansService.name);

  constructor(private supabaseService: SupabaseService) {}

  /**
   * 先按 price id 查，查不到再按 product id 查（只看启用的套餐）
   */
  async getPlanByPriceOrProductId(id: string): Promise<PaymentPlan | null> {
    return (await this.findActivePlan('provider_price_id', id)) ?? (await this.findActivePlan('provider_product_id', id));
  }

  /**
   * 计算本期发放的积分
   * 优先级固定：套餐表(price) -> 套餐表(product) -> metadata credits_per_cycle
   */
  async resolveCreditsPerCycle(ref: PlanReference): Promise<ResolvedCredits> {
    if (ref.priceId) {
      const plan = await this.findActivePlan('provider_price_id', ref.priceId);
      if (plan) {
        return { credits: plan.credits_per_cycle, displayName: plan.display_name, source: 'price' };
      }
    }

    if (ref.productId) {
      const plan = await this.findActivePlan('provider_product_id', ref.productId);
      if (plan) {
        return { credits: plan.credits_per_cycle, displayName: plan.display_name, source: 'product' };
      }
    }

    if (ref.metadataCredits !== null && ref.metadataCredits > 0) {
      this.logger.warn(
        `Plan not in catalog (price ${ref.priceId ?? '-'}, product ${ref.productId ?? '-'}), using metadata credits_per_cycle`,
      );
      return {
        credits: ref.metadataCredits,
        displayName: ref.metadataPlanName || ref.productId || ref.priceId || 'subscription',
        source: 'metadata',
      };
    }

    throw new PlanNotFoundException([ref.priceId, ref.productId]);
  }

  private async findActivePlan(
    column: 'provider_price_id' | 'provider_product_id',
    value: string,
  ): Promise<PaymentPlan | null> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from('payment_plans')
      .select('*')
      .eq(column, value)
      .eq('is_active', true)
      .order('id', { ascending: true })
      .limit(1)
      .maybeSingle();

    if (error) {
      throw new PersistenceException('get payment plan', error);
    }

    const plan: PaymentPlan | null = data;
    return plan;
  }
}
