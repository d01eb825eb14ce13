import { Test } from '@nestjs/testing';
import {
  StripeEventNormalizer,
  fromStripeAmount,
  mapStripeSubscriptionStatus,
  normalizeStripeEvent,
} from './stripe-event.normalizer';
import { WebhookEventKind } from './normalized-event';
import { StripeService } from '../../../providers/stripe/stripe.service';
import { CanonicalStatus, PaymentProvider, WebhookEvent, WebhookProcessingStatus } from '../../../database/entities';
import { ProviderVerificationException } from '../../../common/errors/billing.errors';
import { testConfig } from '../../../../test/support/test-config';
import {
  PERIOD_END,
  SUBJECT_ID,
  invoiceEvent,
  signedStripeRequest,
  stripeObjectEvent,
  subscriptionEvent,
} from '../../../../test/support/webhook-fixtures';

const RECEIVED_AT = new Date('2026-01-01T00:00:05.000Z');

describe('StripeEventNormalizer', () => {
  describe('fromStripeAmount', () => {
    it('converts minor units to major units', () => {
      expect(fromStripeAmount(990, 'usd')?.toFixed(2)).toBe('9.90');
    });

    it('keeps zero-decimal currencies as they are', () => {
      expect(fromStripeAmount(5000, 'JPY')?.toFixed(2)).toBe('5000.00');
    });

    it('returns null without an amount or currency', () => {
      expect(fromStripeAmount(null, 'usd')).toBeNull();
      expect(fromStripeAmount(990, null)).toBeNull();
    });
  });

  describe('normalizeStripeEvent', () => {
    it('maps a paid invoice with subscription details on the parent', () => {
      const event = normalizeStripeEvent(invoiceEvent({ serviceProvider: 'semo' }), RECEIVED_AT);

      expect(event).toMatchObject({
        provider: PaymentProvider.STRIPE,
        eventId: 'evt_invoice_paid',
        type: 'invoice.paid',
        kind: WebhookEventKind.PAYMENT,
        canonicalStatus: CanonicalStatus.COMPLETED,
        correlationId: null,
        subjectHints: { direct: null, parent: SUBJECT_ID, lineItem: null, providerCustomerId: 'cus_001' },
        providerPaymentRef: 'in_001',
        providerTxnRef: 'pi_001',
        providerCustomerId: 'cus_001',
        providerSubscriptionRef: 'sub_001',
        planRef: { priceId: 'price_basic', productId: 'prod_basic', metadataCredits: null, metadataPlanName: null },
        creditProvider: 'semo',
        email: 'buyer@example.com',
        currency: 'USD',
        receivedAt: RECEIVED_AT,
      });
      expect(event.amount?.toFixed(2)).toBe('9.90');
      expect(event.periodEnd).toEqual(new Date(PERIOD_END * 1000));
    });

    it('reads legacy invoice fields and metadata credits on the price', () => {
      const event = normalizeStripeEvent(
        stripeObjectEvent('invoice.payment_succeeded', {
          id: 'in_legacy',
          object: 'invoice',
          customer: { id: 'cus_legacy', object: 'customer' },
          subscription: 'sub_legacy',
          subscription_details: { metadata: { user_id: SUBJECT_ID } },
          lines: {
            data: [
              {
                metadata: {},
                price: {
                  id: 'price_legacy',
                  product: 'prod_legacy',
                  metadata: { credits_per_cycle: '250' },
                },
              },
            ],
          },
        }),
        RECEIVED_AT,
      );

      expect(event.canonicalStatus).toBe(CanonicalStatus.COMPLETED);
      expect(event.subjectHints.parent).toBe(SUBJECT_ID);
      expect(event.providerCustomerId).toBe('cus_legacy');
      expect(event.providerSubscriptionRef).toBe('sub_legacy');
      expect(event.planRef).toEqual({
        priceId: 'price_legacy',
        productId: 'prod_legacy',
        metadataCredits: 250,
        metadataPlanName: null,
      });
    });

    it('maps subscription events with the first item as plan', () => {
      const event = normalizeStripeEvent(subscriptionEvent({ type: 'customer.subscription.updated' }), RECEIVED_AT);

      expect(event.kind).toBe(WebhookEventKind.SUBSCRIPTION);
      expect(event.canonicalStatus).toBe(CanonicalStatus.COMPLETED);
      expect(event.subjectHints.direct).toBe(SUBJECT_ID);
      expect(event.providerSubscriptionRef).toBe('sub_001');
      expect(event.planRef?.priceId).toBe('price_pro');
      expect(event.planRef?.productId).toBe('prod_pro');
      expect(event.periodEnd).toEqual(new Date(PERIOD_END * 1000));
    });

    it('treats a deleted subscription as canceled', () => {
      const event = normalizeStripeEvent(
        subscriptionEvent({ type: 'customer.subscription.deleted', status: 'active' }),
        RECEIVED_AT,
      );

      expect(event.canonicalStatus).toBe(CanonicalStatus.CANCELED);
    });

    const classifications: Array<[string, Record<string, unknown>, WebhookEventKind, CanonicalStatus | null]> = [
      ['invoice.payment_failed', { id: 'in_1', object: 'invoice' }, WebhookEventKind.PAYMENT, CanonicalStatus.FAILED],
      ['charge.refunded', { id: 'ch_1', object: 'charge' }, WebhookEventKind.PAYMENT, CanonicalStatus.REFUNDED],
      ['setup_intent.succeeded', { id: 'seti_1' }, WebhookEventKind.PAYMENT_SETUP, CanonicalStatus.COMPLETED],
      ['customer.created', { id: 'cus_1', object: 'customer' }, WebhookEventKind.OTHER, null],
    ];

    it.each(classifications)('maps %s', (type, object, kind, status) => {
      const event = normalizeStripeEvent(stripeObjectEvent(type, object), RECEIVED_AT);

      expect(event.kind).toBe(kind);
      expect(event.canonicalStatus).toBe(status);
    });

    it('uses the invoice of a refunded charge as payment reference', () => {
      const event = normalizeStripeEvent(
        stripeObjectEvent('charge.refunded', { id: 'ch_1', object: 'charge', invoice: 'in_1' }),
        RECEIVED_AT,
      );

      expect(event.providerPaymentRef).toBe('in_1');
    });

    it('takes the subject and email of a setup intent from its metadata', () => {
      const event = normalizeStripeEvent(
        stripeObjectEvent('setup_intent.succeeded', {
          id: 'seti_1',
          object: 'setup_intent',
          customer: 'cus_new',
          metadata: { user_id: SUBJECT_ID, email: 'new@example.com' },
        }),
        RECEIVED_AT,
      );

      expect(event.subjectHints.direct).toBe(SUBJECT_ID);
      expect(event.providerCustomerId).toBe('cus_new');
      expect(event.email).toBe('new@example.com');
    });

    it('rejects an event without data.object', () => {
      expect(() => normalizeStripeEvent({ id: 'evt_1', type: 'invoice.paid' }, RECEIVED_AT)).toThrow(
        ProviderVerificationException,
      );
    });
  });

  describe('mapStripeSubscriptionStatus', () => {
    const statuses: Array<[string | null, CanonicalStatus | null]> = [
      ['active', CanonicalStatus.COMPLETED],
      ['trialing', CanonicalStatus.COMPLETED],
      ['canceled', CanonicalStatus.CANCELED],
      ['incomplete_expired', CanonicalStatus.CANCELED],
      ['past_due', CanonicalStatus.FAILED],
      ['unpaid', CanonicalStatus.FAILED],
      ['incomplete', CanonicalStatus.FAILED],
      ['paused', null],
      [null, null],
    ];

    it.each(statuses)('maps %p to %p', (status, expected) => {
      expect(mapStripeSubscriptionStatus(status)).toBe(expected);
    });
  });

  describe('handleWebhook', () => {
    let normalizer: StripeEventNormalizer;

    beforeEach(async () => {
      const moduleRef = await Test.createTestingModule({
        providers: [StripeEventNormalizer, { provide: StripeService, useValue: new StripeService(testConfig()) }],
      }).compile();
      normalizer = moduleRef.get(StripeEventNormalizer);
    });

    it('verifies the signature and normalizes the event', () => {
      const { rawBody, headers } = signedStripeRequest(invoiceEvent());

      const event = normalizer.handleWebhook(rawBody, headers);

      expect(event.eventId).toBe('evt_invoice_paid');
      expect(event.canonicalStatus).toBe(CanonicalStatus.COMPLETED);
    });

    it('rejects a tampered body', () => {
      const { headers } = signedStripeRequest(invoiceEvent());
      const tampered = Buffer.from(JSON.stringify(invoiceEvent({ invoiceId: 'in_forged' })));

      expect(() => normalizer.handleWebhook(tampered, headers)).toThrow(ProviderVerificationException);
    });

    it('rejects a missing signature header', () => {
      const { rawBody } = signedStripeRequest(invoiceEvent());

      expect(() => normalizer.handleWebhook(rawBody, {})).toThrow(ProviderVerificationException);
    });

    it('rebuilds a stored event without verifying it again', () => {
      const stored: WebhookEvent = {
        id: 1,
        event_id: 'evt_invoice_paid',
        provider: PaymentProvider.STRIPE,
        event_type: 'invoice.paid',
        canonical_status: CanonicalStatus.COMPLETED,
        processing_status: WebhookProcessingStatus.FAILED,
        retry_count: 1,
        last_error: 'boom',
        next_retry_at: null,
        claimed_at: null,
        processed_at: null,
        payload: invoiceEvent(),
        received_at: '2026-01-01T00:00:05.000Z',
      };

      const event = normalizer.fromStoredEvent(stored);

      expect(event.providerPaymentRef).toBe('in_001');
      expect(event.receivedAt).toEqual(RECEIVED_AT);
    });
  });
});
