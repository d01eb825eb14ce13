import {
  BadRequestException,
  HttpException,
  HttpStatus,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import Decimal from 'decimal.js';
import { ErrorCode } from '../interfaces/response.interface';

export class ValidationException extends BadRequestException {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: ErrorCode.INVALID_INPUT, message, details });
  }
}

/**
 * 余额不足（业务规则，不是故障）
 */
export class InsufficientBalanceException extends HttpException {
  constructor(
    readonly requested: Decimal,
    readonly available: Decimal,
  ) {
    super(
      {
        code: ErrorCode.INSUFFICIENT_BALANCE,
        message: `Insufficient credit balance: requested ${requested.toFixed(2)}, available ${available.toFixed(2)}`,
        details: {
          requested: requested.toFixed(2),
          available: available.toFixed(2),
          shortfall: requested.minus(available).toFixed(2),
        },
      },
      HttpStatus.PAYMENT_REQUIRED,
    );
  }
}

abstract class MissingRecordException extends NotFoundException {
  constructor(message: string, details: Record<string, unknown>) {
    super({ code: ErrorCode.NOT_FOUND, message, details });
  }
}

export class CreditBalanceNotFoundException extends MissingRecordException {
  constructor(subjectId: string, provider: string) {
    super(`No credit balance for subject ${subjectId} (${provider})`, { subject_id: subjectId, provider });
  }
}

export class SubscriptionNotFoundException extends MissingRecordException {
  constructor(providerSubscriptionId: string) {
    super(`Subscription not found: ${providerSubscriptionId}`, {
      provider_subscription_id: providerSubscriptionId,
    });
  }
}

export class WebhookEventNotFoundException extends MissingRecordException {
  constructor(eventId: string) {
    super(`Webhook event not found: ${eventId}`, { event_id: eventId });
  }
}

export class PaymentNotFoundException extends MissingRecordException {
  constructor(paymentId: number) {
    super(`Payment not found: ${paymentId}`, { payment_id: paymentId });
  }
}

export class PlanNotFoundException extends MissingRecordException {
  constructor(identifiers: Array<string | null>) {
    const known = identifiers.filter((id): id is string => !!id);
    super(`No payment plan or credits_per_cycle metadata for: ${known.join(', ') || '(none)'}`, {
      identifiers: known,
    });
  }
}

export class UnresolvedSubjectException extends MissingRecordException {
  constructor(eventId: string) {
    super(`Could not resolve subject for event ${eventId}`, { event_id: eventId });
  }
}

/**
 * 签名/解析失败，PSP 不应重投
 */
export class ProviderVerificationException extends BadRequestException {
  constructor(provider: string, reason: string) {
    super({
      code: ErrorCode.PROVIDER_VERIFICATION_FAILED,
      message: `${provider} webhook rejected: ${reason}`,
    });
  }
}

/**
 * 存储层失败，可重试
 */
export class PersistenceException extends ServiceUnavailableException {
  constructor(operation: string, cause: { message: string; code?: string }) {
    super({
      code: ErrorCode.PERSISTENCE_ERROR,
      message: `Failed to ${operation}: ${cause.message}`,
      details: cause.code ? { db_code: cause.code } : undefined,
    });
  }
}
