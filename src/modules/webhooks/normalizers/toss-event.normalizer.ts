import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import {
  TOSS_SIGNATURE_HEADER,
  TOSS_TRANSMISSION_ID_HEADER,
  TOSS_TRANSMISSION_TIME_HEADER,
  TossService,
} from '../../../providers/toss/toss.service';
import { CanonicalStatus, PaymentProvider, WebhookEvent } from '../../../database/entities';
import { ProviderVerificationException } from '../../../common/errors/billing.errors';
import { TossWebhookDto } from '../dto/toss-webhook.dto';
import {
  NormalizedWebhookEvent,
  PaymentProviderAdapter,
  WebhookEventKind,
  WebhookHeaders,
  headerValue,
} from './normalized-event';
import { PayloadRecord, asRecord, readPositiveInt, readString } from './payload-readers';

const DEFAULT_CURRENCY = 'KRW';

// 只有这两类事件携带支付状态
const PAYMENT_EVENT_TYPES = new Set(['PAYMENT_STATUS_CHANGED', 'CANCEL_STATUS_CHANGED']);

export function mapTossPaymentStatus(status: string): CanonicalStatus | null {
  switch (status) {
    case 'DONE':
      return CanonicalStatus.COMPLETED;
    case 'CANCELED':
      return CanonicalStatus.CANCELED;
    case 'PARTIAL_CANCELED':
      return CanonicalStatus.REFUNDED;
    case 'ABORTED':
    case 'EXPIRED':
      return CanonicalStatus.FAILED;
    default:
      return null;
  }
}

function parsePayload(payload: unknown): TossWebhookDto {
  const dto = plainToInstance(TossWebhookDto, payload);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    const fields = errors.map((e) => e.property).join(', ');
    throw new ProviderVerificationException(PaymentProvider.TOSS, `invalid payload (${fields})`);
  }
  return dto;
}

/**
 * 没有 transmission id 时用订单号 + 状态 + 时间拼出稳定的事件 ID
 */
export function fallbackTossEventId(dto: TossWebhookDto): string {
  return `toss:${dto.data.orderId}:${dto.data.status}:${dto.createdAt}`;
}

export function normalizeTossEvent(
  eventId: string,
  payload: PayloadRecord,
  receivedAt: Date,
): NormalizedWebhookEvent {
  const dto = parsePayload(payload);
  const isPaymentEvent = PAYMENT_EVENT_TYPES.has(dto.eventType);
  const metadata = dto.data.metadata;
  const planId = readString(metadata, ['plan_id']);
  const metadataCredits = readPositiveInt(metadata, ['credits_per_cycle']);
  const customerKey = dto.data.customerKey?.trim() || null;

  return {
    provider: PaymentProvider.TOSS,
    eventId,
    type: dto.eventType,
    kind: isPaymentEvent ? WebhookEventKind.PAYMENT : WebhookEventKind.OTHER,
    canonicalStatus: isPaymentEvent ? mapTossPaymentStatus(dto.data.status) : null,
    correlationId: null,
    subjectHints: {
      direct: readString(metadata, ['user_id']),
      parent: null,
      lineItem: null,
      providerCustomerId: customerKey,
    },
    providerPaymentRef: dto.data.orderId,
    providerTxnRef: dto.data.paymentKey?.trim() || dto.data.transactionKey?.trim() || null,
    providerCustomerId: customerKey,
    providerSubscriptionRef: readString(metadata, ['subscription_id']),
    providerStatus: dto.data.status,
    amount: dto.data.totalAmount !== undefined ? new Decimal(dto.data.totalAmount) : null,
    currency: dto.data.currency?.trim().toUpperCase() || DEFAULT_CURRENCY,
    planRef:
      planId || metadataCredits !== null
        ? {
            priceId: planId,
            productId: null,
            metadataCredits,
            metadataPlanName: readString(metadata, ['plan_name']),
          }
        : null,
    creditProvider: readString(metadata, ['service_provider']),
    email: readString(metadata, ['email']),
    periodEnd: null,
    rawData: payload,
    receivedAt,
  };
}

@Injectable()
export class TossEventNormalizer implements PaymentProviderAdapter {
  readonly provider = PaymentProvider.TOSS;
  private readonly logger = new Logger(TossEventNormalizer.name);

  constructor(private tossService: TossService) {}

  handleWebhook(rawBody: Buffer, headers: WebhookHeaders): NormalizedWebhookEvent {
    const signature = headerValue(headers, TOSS_SIGNATURE_HEADER);
    const transmissionTime = headerValue(headers, TOSS_TRANSMISSION_TIME_HEADER);

    if (!this.tossService.verifyWebhookSignature(rawBody, signature, transmissionTime)) {
      this.logger.error('Toss webhook signature verification failed');
      throw new ProviderVerificationException(this.provider, 'invalid signature');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(rawBody.toString('utf8'));
    } catch {
      throw new ProviderVerificationException(this.provider, 'body is not valid JSON');
    }

    const payload = asRecord(parsed);
    if (!payload) {
      throw new ProviderVerificationException(this.provider, 'body is not a JSON object');
    }

    const dto = parsePayload(payload);
    const eventId = headerValue(headers, TOSS_TRANSMISSION_ID_HEADER) || fallbackTossEventId(dto);
    return normalizeTossEvent(eventId, payload, new Date());
  }

  fromStoredEvent(stored: WebhookEvent): NormalizedWebhookEvent {
    return normalizeTossEvent(stored.event_id, stored.payload, new Date(stored.received_at));
  }
}
