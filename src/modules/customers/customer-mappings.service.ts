import { Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from '../../providers/supabase/supabase.service';
import { CustomerMapping, PaymentProvider } from '../../database/entities';
import { PersistenceException } from '../../common/errors/billing.errors';

export interface CustomerMappingInput {
  paymentProvider: PaymentProvider;
  providerCustomerId: string;
  subjectId: string;
  email?: string | null;
}

@Injectable()
export class CustomerMappingsService {
  private readonly logger = new Logger(CustomerMappingsService.name);

  constructor(private supabaseService: SupabaseService) {}

  async getByProviderCustomerId(
    paymentProvider: PaymentProvider,
    providerCustomerId: string,
  ): Promise<CustomerMapping | null> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from('customer_mappings')
      .select('*')
      .eq('payment_provider', paymentProvider)
      .eq('provider_customer_id', providerCustomerId)
      .maybeSingle();

    if (error) {
      throw new PersistenceException('get customer mapping', error);
    }

    const mapping: CustomerMapping | null = data;
    return mapping;
  }

  async getBySubjectId(paymentProvider: PaymentProvider, subjectId: string): Promise<CustomerMapping | null> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from('customer_mappings')
      .select('*')
      .eq('payment_provider', paymentProvider)
      .eq('subject_id', subjectId)
      .order('created_at', { ascending: false })
      .limit(1)
      .maybeSingle();

    if (error) {
      throw new PersistenceException('get customer mapping by subject', error);
    }

    const mapping: CustomerMapping | null = data;
    return mapping;
  }

  async create(input: CustomerMappingInput): Promise<CustomerMapping> {
    const now = new Date().toISOString();
    const { data, error } = await this.supabaseService
      .getClient()
      .from('customer_mappings')
      .insert({
        payment_provider: input.paymentProvider,
        provider_customer_id: input.providerCustomerId,
        subject_id: input.subjectId,
        email: input.email ?? null,
        created_at: now,
        updated_at: now,
      })
      .select('*')
      .single();

    if (error) {
      throw new PersistenceException('create customer mapping', error);
    }

    this.logger.log(`Created customer mapping ${input.paymentProvider}:${input.providerCustomerId} -> ${input.subjectId}`);
    const mapping: CustomerMapping = data;
    return mapping;
  }

  async update(
    id: number,
    changes: Partial<Pick<CustomerMapping, 'subject_id' | 'email'>>,
  ): Promise<CustomerMapping> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from('customer_mappings')
      .update({ ...changes, updated_at: new Date().toISOString() })
      .eq('id', id)
      .select('*')
      .single();

    if (error) {
      throw new PersistenceException('update customer mapping', error);
    }

    const mapping: CustomerMapping = data;
    return mapping;
  }

  /**
   * 支付方式绑定成功后建立映射（首次创建，之后只同步变更）
   */
  async upsertFromSetup(input: CustomerMappingInput): Promise<CustomerMapping> {
    const existing = await this.getByProviderCustomerId(input.paymentProvider, input.providerCustomerId);
    if (!existing) {
      return this.create(input);
    }

    const changes: Partial<Pick<CustomerMapping, 'subject_id' | 'email'>> = {};
    if (existing.subject_id !== input.subjectId) {
      this.logger.warn(
        `Customer ${input.providerCustomerId} remapped from ${existing.subject_id} to ${input.subjectId}`,
      );
      changes.subject_id = input.subjectId;
    }
    if (input.email && existing.email !== input.email) {
      changes.email = input.email;
    }

    if (Object.keys(changes).length === 0) {
      return existing;
    }
    return this.update(existing.id, changes);
  }
}
