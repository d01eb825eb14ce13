import { Payment } from '../../database/entities';
import { PaymentResponseDto } from './dto/payments.dto';

export function presentPayment(payment: Payment): PaymentResponseDto {
  return {
    id: payment.id,
    subject_id: payment.subject_id,
    payment_provider: payment.payment_provider,
    provider_payment_ref: payment.provider_payment_ref,
    provider_txn_ref: payment.provider_txn_ref,
    provider_subscription_id: payment.provider_subscription_id,
    amount: payment.amount?.toFixed(2) ?? null,
    currency: payment.currency,
    status: payment.status,
    created_at: payment.created_at,
    updated_at: payment.updated_at,
  };
}
