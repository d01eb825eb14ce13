import Decimal from 'decimal.js';

/**
 * 流水类型
 */
export enum CreditTransactionType {
  ALLOCATION = 'allocation',
  USAGE = 'usage',
  REFUND = 'refund',
  ADJUSTMENT = 'adjustment',
  SUBSCRIPTION_CANCELLATION = 'subscription_cancellation',
}

/**
 * 积分流水（对应 credit_transactions 表，只追加不修改）
 */
export interface CreditTransaction {
  id: number;
  subject_id: string;
  provider: string;
  subscription_id: number | null;
  transaction_type: CreditTransactionType;
  amount: Decimal; // 有符号
  balance_after: Decimal;
  description: string;
  feature_name: string | null;
  usage_metadata: Record<string, unknown>;
  reference_id: string | null; // 发放幂等键
  idempotency_key: string | null; // 扣减幂等键
  created_at: string;
}

/**
 * 余额缓存（对应 user_credit_balances 表，PK: subject_id + provider）
 */
export interface CreditBalance {
  subject_id: string;
  provider: string;
  current_balance: Decimal;
  last_transaction_at: string | null;
}

// numeric 列以字符串读出，避免经过浮点数
type NumericColumn = string | number;

export interface CreditTransactionRow extends Omit<CreditTransaction, 'amount' | 'balance_after' | 'transaction_type'> {
  transaction_type: string;
  amount: NumericColumn;
  balance_after: NumericColumn;
}

export interface CreditBalanceRow extends Omit<CreditBalance, 'current_balance'> {
  current_balance: NumericColumn;
}

export const CREDIT_TRANSACTION_COLUMNS =
  'id, subject_id, provider, subscription_id, transaction_type, amount::text, balance_after::text, description, feature_name, usage_metadata, reference_id, idempotency_key, created_at';

export const CREDIT_BALANCE_COLUMNS = 'subject_id, provider, current_balance::text, last_transaction_at';

const TRANSACTION_TYPES: ReadonlySet<string> = new Set(Object.values(CreditTransactionType));

function isTransactionType(value: string): value is CreditTransactionType {
  return TRANSACTION_TYPES.has(value);
}

export function toCreditTransaction(row: CreditTransactionRow): CreditTransaction {
  if (!isTransactionType(row.transaction_type)) {
    throw new Error(`Unknown credit transaction type: ${row.transaction_type}`);
  }
  return {
    ...row,
    transaction_type: row.transaction_type,
    amount: new Decimal(String(row.amount)),
    balance_after: new Decimal(String(row.balance_after)),
    usage_metadata: row.usage_metadata ?? {},
  };
}

export function toCreditBalance(row: CreditBalanceRow): CreditBalance {
  return {
    ...row,
    current_balance: new Decimal(String(row.current_balance)),
  };
}

export function zeroBalance(subjectId: string, provider: string): CreditBalance {
  return {
    subject_id: subjectId,
    provider,
    current_balance: new Decimal(0),
    last_transaction_at: null,
  };
}
