import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { StripeService } from '../../../providers/stripe/stripe.service';
import { CanonicalStatus, PaymentProvider, WebhookEvent } from '../../../database/entities';
import { ProviderVerificationException } from '../../../common/errors/billing.errors';
import { PlanReference } from '../../plans/payment-plans.service';
import {
  NormalizedWebhookEvent,
  PaymentProviderAdapter,
  SubjectHints,
  WebhookEventKind,
  WebhookHeaders,
  headerValue,
} from './normalized-event';
import {
  PayloadRecord,
  asRecord,
  firstOf,
  readId,
  readNumber,
  readPath,
  readPositiveInt,
  readString,
  readUnixTime,
} from './payload-readers';

export const STRIPE_SIGNATURE_HEADER = 'stripe-signature';

type Classification = [WebhookEventKind, CanonicalStatus | null];

// 这些币种的金额没有小数位，Stripe 直接按主单位给出
const ZERO_DECIMAL_CURRENCIES: ReadonlySet<string> = new Set([
  'bif',
  'clp',
  'djf',
  'gnf',
  'jpy',
  'kmf',
  'krw',
  'mga',
  'pyg',
  'rwf',
  'ugx',
  'vnd',
  'vuv',
  'xaf',
  'xof',
  'xpf',
]);

/**
 * Stripe 最小货币单位 -> 主单位
 */
export function fromStripeAmount(minorUnits: number | null, currency: string | null): Decimal | null {
  if (minorUnits === null || !currency) {
    return null;
  }
  const amount = new Decimal(minorUnits);
  return ZERO_DECIMAL_CURRENCIES.has(currency.toLowerCase()) ? amount : amount.dividedBy(100);
}

/**
 * Stripe 订阅状态 -> 统一状态
 */
export function mapStripeSubscriptionStatus(status: string | null): CanonicalStatus | null {
  switch (status) {
    case 'active':
    case 'trialing':
      return CanonicalStatus.COMPLETED;
    case 'canceled':
    case 'incomplete_expired':
      return CanonicalStatus.CANCELED;
    case 'past_due':
    case 'unpaid':
    case 'incomplete':
      return CanonicalStatus.FAILED;
    default:
      return null;
  }
}

function classify(type: string, object: PayloadRecord): Classification {
  switch (type) {
    case 'invoice.paid':
    case 'invoice.payment_succeeded':
      return [WebhookEventKind.PAYMENT, CanonicalStatus.COMPLETED];
    case 'invoice.payment_failed':
      return [WebhookEventKind.PAYMENT, CanonicalStatus.FAILED];
    case 'charge.refunded':
      return [WebhookEventKind.PAYMENT, CanonicalStatus.REFUNDED];
    case 'customer.subscription.created':
    case 'customer.subscription.updated':
      return [WebhookEventKind.SUBSCRIPTION, mapStripeSubscriptionStatus(readString(object, ['status']))];
    case 'customer.subscription.deleted':
      return [WebhookEventKind.SUBSCRIPTION, CanonicalStatus.CANCELED];
    case 'setup_intent.succeeded':
      return [WebhookEventKind.PAYMENT_SETUP, CanonicalStatus.COMPLETED];
    default:
      return [WebhookEventKind.OTHER, null];
  }
}

// 新版 API 把订阅信息放在 invoice.parent.subscription_details，旧版在顶层
function subscriptionDetailsPath(object: PayloadRecord): string[] {
  return readPath(object, ['parent', 'subscription_details']) !== undefined
    ? ['parent', 'subscription_details']
    : ['subscription_details'];
}

function planReferenceFromLine(line: unknown): PlanReference | null {
  const priceId = firstOf(readString(line, ['pricing', 'price_details', 'price']), readId(line, ['price']));
  const productId = firstOf(readString(line, ['pricing', 'price_details', 'product']), readId(line, ['price', 'product']));
  const metadataCredits = firstOf(
    readPositiveInt(line, ['price', 'metadata', 'credits_per_cycle']),
    readPositiveInt(line, ['price', 'product', 'metadata', 'credits_per_cycle']),
    readPositiveInt(line, ['metadata', 'credits_per_cycle']),
  );

  if (!priceId && !productId && metadataCredits === null) {
    return null;
  }
  return {
    priceId,
    productId,
    metadataCredits,
    metadataPlanName: readString(line, ['price', 'product', 'name']) ?? readString(line, ['description']),
  };
}

/**
 * Stripe 事件（已验签的 JSON）-> 统一事件
 */
export function normalizeStripeEvent(event: PayloadRecord, receivedAt: Date): NormalizedWebhookEvent {
  const eventId = readString(event, ['id']);
  const type = readString(event, ['type']);
  const object = asRecord(readPath(event, ['data', 'object']));
  if (!eventId || !type || !object) {
    throw new ProviderVerificationException(PaymentProvider.STRIPE, 'event is missing id, type or data.object');
  }

  const [kind, canonicalStatus] = classify(type, object);
  const isInvoice = readString(object, ['object']) === 'invoice';
  const detailsPath = subscriptionDetailsPath(object);
  const firstLine = readPath(object, ['lines', 'data', 0]);
  const firstItem = readPath(object, ['items', 'data', 0]);

  const subjectHints: SubjectHints = {
    direct: readString(object, ['metadata', 'user_id']),
    parent: readString(object, [...detailsPath, 'metadata', 'user_id']),
    lineItem: readString(firstLine, ['metadata', 'user_id']),
    providerCustomerId: readId(object, ['customer']),
  };

  let planRef: PlanReference | null = null;
  let providerSubscriptionRef: string | null = null;
  let periodEnd: Date | null = null;

  if (kind === WebhookEventKind.SUBSCRIPTION) {
    providerSubscriptionRef = readString(object, ['id']);
    planRef = planReferenceFromLine(firstItem);
    periodEnd = firstOf(readUnixTime(object, ['current_period_end']), readUnixTime(firstItem, ['current_period_end']));
  } else if (isInvoice) {
    providerSubscriptionRef = firstOf(readId(object, [...detailsPath, 'subscription']), readId(object, ['subscription']));
    planRef = planReferenceFromLine(firstLine);
    periodEnd = readUnixTime(firstLine, ['period', 'end']);
  }

  const providerPaymentRef = isInvoice
    ? readString(object, ['id'])
    : firstOf(readId(object, ['invoice']), readString(object, ['id']));
  const currency = readString(object, ['currency']);
  const amount =
    kind === WebhookEventKind.PAYMENT
      ? fromStripeAmount(readNumber(object, isInvoice ? ['amount_paid'] : ['amount']), currency)
      : null;

  return {
    provider: PaymentProvider.STRIPE,
    eventId,
    type,
    kind,
    canonicalStatus,
    correlationId: null,
    subjectHints,
    providerPaymentRef,
    providerTxnRef: firstOf(readId(object, ['payment_intent']), readId(object, ['payments', 'data', 0, 'payment', 'payment_intent'])),
    providerCustomerId: subjectHints.providerCustomerId,
    providerSubscriptionRef,
    providerStatus: readString(object, ['status']),
    amount,
    currency: amount !== null && currency ? currency.toUpperCase() : null,
    planRef,
    creditProvider: firstOf(
      readString(object, ['metadata', 'service_provider']),
      readString(object, [...detailsPath, 'metadata', 'service_provider']),
      readString(firstLine, ['metadata', 'service_provider']),
    ),
    email: firstOf(readString(object, ['customer_email']), readString(object, ['metadata', 'email'])),
    periodEnd,
    rawData: event,
    receivedAt,
  };
}

@Injectable()
export class StripeEventNormalizer implements PaymentProviderAdapter {
  readonly provider = PaymentProvider.STRIPE;
  private readonly logger = new Logger(StripeEventNormalizer.name);

  constructor(private stripeService: StripeService) {}

  handleWebhook(rawBody: Buffer, headers: WebhookHeaders): NormalizedWebhookEvent {
    const signature = headerValue(headers, STRIPE_SIGNATURE_HEADER);
    if (!signature) {
      throw new ProviderVerificationException(this.provider, 'missing stripe-signature header');
    }

    let event: PayloadRecord | null;
    try {
      event = asRecord(this.stripeService.constructEvent(rawBody, signature));
    } catch (err) {
      this.logger.error(`Webhook signature verification failed: ${err instanceof Error ? err.message : String(err)}`);
      throw new ProviderVerificationException(this.provider, 'invalid signature');
    }

    if (!event) {
      throw new ProviderVerificationException(this.provider, 'event payload is not an object');
    }
    return normalizeStripeEvent(event, new Date());
  }

  fromStoredEvent(stored: WebhookEvent): NormalizedWebhookEvent {
    return normalizeStripeEvent(stored.payload, new Date(stored.received_at));
  }
}
