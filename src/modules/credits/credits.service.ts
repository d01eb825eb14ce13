import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Decimal from 'decimal.js';
import { SupabaseService } from '../../providers/supabase/supabase.service';
import {
  CREDIT_BALANCE_COLUMNS,
  CREDIT_TRANSACTION_COLUMNS,
  CreditBalance,
  CreditBalanceRow,
  CreditTransaction,
  CreditTransactionRow,
  CreditTransactionType,
  toCreditBalance,
  toCreditTransaction,
  zeroBalance,
} from '../../database/entities';
import {
  CreditBalanceNotFoundException,
  InsufficientBalanceException,
  PersistenceException,
  ValidationException,
} from '../../common/errors/billing.errors';

export interface CreditMutationResult {
  balance: CreditBalance;
  transaction: CreditTransaction;
  replayed: boolean; // 幂等重放，未产生新流水
}

export interface UseCreditsOptions {
  idempotencyKey?: string;
  usageMetadata?: Record<string, unknown>;
}

export interface TransactionHistoryQuery {
  limit?: number;
  offset?: number;
  provider?: string;
  transactionType?: CreditTransactionType;
  startDate?: string; // ISO 8601，含边界
  endDate?: string; // ISO 8601，含边界
}

export interface TransactionHistoryPage {
  items: CreditTransaction[];
  total: number; // 满足过滤条件的总数
  limit: number; // 截断到上限后实际使用的值
  offset: number;
  hasMore: boolean;
}

interface ApplyTransactionParams {
  subjectId: string;
  provider: string;
  type: CreditTransactionType;
  amount: Decimal; // 有符号
  description: string;
  featureName?: string | null;
  referenceId?: string | null;
  idempotencyKey?: string | null;
  usageMetadata?: Record<string, unknown>;
  createIfMissing: boolean;
}

// apply_credit_transaction 的返回结构
interface ApplyTransactionResult {
  outcome: 'applied' | 'replayed' | 'not_found' | 'insufficient_balance';
  transaction?: CreditTransactionRow;
  balance?: CreditBalanceRow | null;
  available?: string;
}

const DEFAULT_HISTORY_LIMIT = 20;

@Injectable()
export class CreditsService {
  private readonly logger = new Logger(CreditsService.name);
  private readonly defaultProvider: string;
  private readonly historyMaxLimit: number;

  constructor(
    private supabaseService: SupabaseService,
    private configService: ConfigService,
  ) {
    this.defaultProvider = this.configService.get<string>('credits.defaultProvider') || 'default';
    this.historyMaxLimit = this.configService.get<number>('credits.historyMaxLimit') || 100;
  }

  resolveProvider(provider?: string | null): string {
    return provider?.trim() || this.defaultProvider;
  }

  /**
   * 获取余额，没有记录时返回 0
   */
  async getBalance(subjectId: string, provider?: string): Promise<CreditBalance> {
    const scope = this.resolveProvider(provider);
    const supabase = this.supabaseService.getClient();

    const { data, error } = await supabase
      .from('user_credit_balances')
      .select(CREDIT_BALANCE_COLUMNS)
      .eq('subject_id', subjectId)
      .eq('provider', scope)
      .maybeSingle();

    if (error) {
      throw new PersistenceException('get credit balance', error);
    }

    const row: CreditBalanceRow | null = data;
    return row ? toCreditBalance(row) : zeroBalance(subjectId, scope);
  }

  /**
   * 发放积分
   * referenceId 相同的重复调用直接返回已有流水（Webhook 重投安全）
   */
  async allocateCredits(
    subjectId: string,
    provider: string | undefined,
    amount: Decimal.Value,
    description: string,
    referenceId?: string | null,
  ): Promise<CreditMutationResult> {
    const value = this.parseAmount(amount, { positive: true });
    const reference = referenceId?.trim() || null;

    if (reference) {
      const existing = await this.getTransactionByReference(reference);
      if (existing) {
        this.logger.log(`Credit allocation already processed (reference ${reference})`);
        return {
          balance: await this.getBalance(existing.subject_id, existing.provider),
          transaction: existing,
          replayed: true,
        };
      }
    }

    return this.applyTransaction('allocate credits', {
      subjectId,
      provider: this.resolveProvider(provider),
      type: CreditTransactionType.ALLOCATION,
      amount: value,
      description,
      referenceId: reference,
      createIfMissing: true,
    });
  }

  /**
   * 扣减积分
   * 余额不足时抛出 InsufficientBalanceException，不做部分扣减
   */
  async useCredits(
    subjectId: string,
    provider: string | undefined,
    amount: Decimal.Value,
    description: string,
    featureName: string,
    options: UseCreditsOptions = {},
  ): Promise<CreditMutationResult> {
    const value = this.parseAmount(amount, { positive: true });

    return this.applyTransaction('use credits', {
      subjectId,
      provider: this.resolveProvider(provider),
      type: CreditTransactionType.USAGE,
      amount: value.negated(),
      description,
      featureName,
      idempotencyKey: options.idempotencyKey?.trim() || null,
      usageMetadata: options.usageMetadata,
      createIfMissing: false,
    });
  }

  /**
   * 人工调整（正负均可），结果不能小于 0
   */
  async adjustCredits(
    subjectId: string,
    provider: string | undefined,
    amount: Decimal.Value,
    description: string,
    referenceId: string,
  ): Promise<CreditMutationResult> {
    const value = this.parseAmount(amount, { positive: false });
    if (value.isZero()) {
      throw new ValidationException('Adjustment amount must not be zero');
    }
    if (!referenceId.trim()) {
      throw new ValidationException('Adjustment requires a reference id');
    }

    return this.applyTransaction('adjust credits', {
      subjectId,
      provider: this.resolveProvider(provider),
      type: CreditTransactionType.ADJUSTMENT,
      amount: value,
      description,
      referenceId: referenceId.trim(),
      createIfMissing: true,
    });
  }

  /**
   * 流水记录，按时间倒序
   */
  async getTransactionHistory(
    subjectId: string,
    query: TransactionHistoryQuery = {},
  ): Promise<TransactionHistoryPage> {
    const limit = Math.min(Math.max(query.limit ?? DEFAULT_HISTORY_LIMIT, 1), this.historyMaxLimit);
    const offset = Math.max(query.offset ?? 0, 0);
    if (query.startDate && query.endDate && new Date(query.startDate) > new Date(query.endDate)) {
      throw new ValidationException('start_date must not be after end_date', {
        start_date: query.startDate,
        end_date: query.endDate,
      });
    }
    const supabase = this.supabaseService.getClient();

    let request = supabase
      .from('credit_transactions')
      .select(CREDIT_TRANSACTION_COLUMNS, { count: 'exact' })
      .eq('subject_id', subjectId);

    if (query.provider) {
      request = request.eq('provider', query.provider);
    }
    if (query.transactionType) {
      request = request.eq('transaction_type', query.transactionType);
    }
    if (query.startDate) {
      request = request.gte('created_at', query.startDate);
    }
    if (query.endDate) {
      request = request.lte('created_at', query.endDate);
    }

    const { data, error, count } = await request
      .order('created_at', { ascending: false })
      .order('id', { ascending: false })
      .range(offset, offset + limit - 1);

    if (error) {
      throw new PersistenceException('get transaction history', error);
    }

    const rows: CreditTransactionRow[] = data ?? [];
    const total = count ?? offset + rows.length;
    return {
      items: rows.map(toCreditTransaction),
      total,
      limit,
      offset,
      hasMore: offset + limit < total,
    };
  }

  async getTransactionByReference(referenceId: string): Promise<CreditTransaction | null> {
    const supabase = this.supabaseService.getClient();

    const { data, error } = await supabase
      .from('credit_transactions')
      .select(CREDIT_TRANSACTION_COLUMNS)
      .eq('reference_id', referenceId)
      .maybeSingle();

    if (error) {
      throw new PersistenceException('get transaction by reference', error);
    }

    const row: CreditTransactionRow | null = data;
    return row ? toCreditTransaction(row) : null;
  }

  /**
   * 单个数据库函数内完成：幂等检查、行锁、写流水、更新余额
   */
  private async applyTransaction(operation: string, params: ApplyTransactionParams): Promise<CreditMutationResult> {
    const supabase = this.supabaseService.getClient();

    const { data, error } = await supabase.rpc('apply_credit_transaction', {
      p_subject_id: params.subjectId,
      p_provider: params.provider,
      p_transaction_type: params.type,
      p_amount: params.amount.toFixed(2),
      p_description: params.description,
      p_feature_name: params.featureName ?? null,
      p_reference_id: params.referenceId ?? null,
      p_idempotency_key: params.idempotencyKey ?? null,
      p_usage_metadata: params.usageMetadata ?? {},
      p_create_if_missing: params.createIfMissing,
    });

    if (error) {
      this.logger.error(`Failed to ${operation} for subject ${params.subjectId}: ${error.message}`);
      throw new PersistenceException(operation, error);
    }

    const result: ApplyTransactionResult = data;

    switch (result.outcome) {
      case 'not_found':
        throw new CreditBalanceNotFoundException(params.subjectId, params.provider);

      case 'insufficient_balance':
        this.logger.warn(
          `Insufficient balance for subject ${params.subjectId} (${params.provider}): ` +
            `requested ${params.amount.abs().toFixed(2)}, available ${result.available}`,
        );
        throw new InsufficientBalanceException(params.amount.abs(), new Decimal(result.available ?? 0));

      case 'applied':
      case 'replayed': {
        if (!result.transaction) {
          throw new PersistenceException(operation, { message: 'ledger function returned no transaction' });
        }
        const transaction = toCreditTransaction(result.transaction);
        const balance = result.balance
          ? toCreditBalance(result.balance)
          : zeroBalance(transaction.subject_id, transaction.provider);
        const replayed = result.outcome === 'replayed';

        this.logger.log(
          replayed
            ? `Credit transaction replayed for subject ${params.subjectId} (transaction ${transaction.id})`
            : `Applied ${params.type} ${transaction.amount.toFixed(2)} for subject ${params.subjectId} ` +
                `(${params.provider}), new balance: ${balance.current_balance.toFixed(2)}`,
        );

        return { balance, transaction, replayed };
      }

      default:
        throw new PersistenceException(operation, { message: `unexpected ledger outcome: ${String(result.outcome)}` });
    }
  }

  private parseAmount(value: Decimal.Value, { positive }: { positive: boolean }): Decimal {
    let amount: Decimal;
    try {
      amount = new Decimal(value);
    } catch {
      throw new ValidationException(`Invalid credit amount: ${String(value)}`);
    }

    if (!amount.isFinite() || amount.decimalPlaces() > 2) {
      throw new ValidationException(`Invalid credit amount: ${String(value)}`, { max_decimal_places: 2 });
    }
    if (positive && amount.lte(0)) {
      throw new ValidationException('Credit amount must be greater than zero');
    }

    return amount;
  }
}
