import { CreditBalance, CreditTransaction } from '../../database/entities';
import { CreditMutationResult } from './credits.service';
import {
  CreditBalanceResponseDto,
  CreditMutationResponseDto,
  CreditTransactionResponseDto,
} from './dto/credits.dto';

export function presentBalance(balance: CreditBalance): CreditBalanceResponseDto {
  return {
    subject_id: balance.subject_id,
    provider: balance.provider,
    current_balance: balance.current_balance.toFixed(2),
    last_transaction_at: balance.last_transaction_at,
  };
}

export function presentTransaction(transaction: CreditTransaction): CreditTransactionResponseDto {
  return {
    id: transaction.id,
    transaction_type: transaction.transaction_type,
    provider: transaction.provider,
    amount: transaction.amount.toFixed(2),
    balance_after: transaction.balance_after.toFixed(2),
    description: transaction.description,
    feature_name: transaction.feature_name,
    reference_id: transaction.reference_id,
    created_at: transaction.created_at,
  };
}

export function presentMutation(result: CreditMutationResult): CreditMutationResponseDto {
  return {
    balance: presentBalance(result.balance),
    transaction: presentTransaction(result.transaction),
    replayed: result.replayed,
  };
}
