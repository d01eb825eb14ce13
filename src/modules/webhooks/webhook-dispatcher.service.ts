import { Injectable, Logger } from '@nestjs/common';
import { CreditsService } from '../credits/credits.service';
import { SubscriptionsService } from '../subscriptions/subscriptions.service';
import { CustomerMappingsService } from '../customers/customer-mappings.service';
import { PaymentPlansService } from '../plans/payment-plans.service';
import { PaymentsService } from '../payments/payments.service';
import { CanonicalStatus, PaymentStatus, SubscriptionStatus } from '../../database/entities';
import {
  PlanNotFoundException,
  UnresolvedSubjectException,
  ValidationException,
} from '../../common/errors/billing.errors';
import { NormalizedWebhookEvent, WebhookEventKind } from './normalizers/normalized-event';
import { SubjectResolverService } from './subject-resolver.service';

export type DispatchOutcome =
  | 'allocated'
  | 'replayed'
  | 'skipped'
  | 'payment_updated'
  | 'subscription_synced'
  | 'subscription_canceled'
  | 'customer_mapped'
  | 'logged'
  | 'ignored';

/**
 * 按统一状态分发到积分 / 订阅 / 客户映射
 * 抛出的异常由调用方记为失败并安排重试
 */
@Injectable()
export class WebhookDispatcherService {
  private readonly logger = new Logger(WebhookDispatcherService.name);

  constructor(
    private creditsService: CreditsService,
    private subscriptionsService: SubscriptionsService,
    private customerMappingsService: CustomerMappingsService,
    private paymentPlansService: PaymentPlansService,
    private paymentsService: PaymentsService,
    private subjectResolver: SubjectResolverService,
  ) {}

  async dispatch(event: NormalizedWebhookEvent): Promise<DispatchOutcome> {
    const label = `${event.provider} ${event.type} (${event.eventId})`;

    if (event.canonicalStatus === null) {
      this.logger.log(`Ignoring ${label}: no actionable status`);
      return 'ignored';
    }

    switch (event.canonicalStatus) {
      case CanonicalStatus.COMPLETED:
        return this.handleCompleted(event, label);
      case CanonicalStatus.CANCELED:
        if (event.kind === WebhookEventKind.SUBSCRIPTION) {
          return this.handleSubscriptionCanceled(event);
        }
        if (event.kind === WebhookEventKind.PAYMENT) {
          return this.handlePaymentReversed(event, PaymentStatus.CANCELED);
        }
        break;
      case CanonicalStatus.FAILED:
        if (event.kind === WebhookEventKind.PAYMENT) {
          return this.handlePaymentReversed(event, PaymentStatus.FAILED);
        }
        if (event.kind === WebhookEventKind.SUBSCRIPTION) {
          // 扣款失败不收回积分，等到真正取消时清零
          this.logger.warn(
            `Subscription ${event.providerSubscriptionRef ?? '-'} is ${event.providerStatus ?? 'failing'}, credits kept until cancellation`,
          );
          return 'logged';
        }
        break;
      case CanonicalStatus.REFUNDED:
        if (event.kind === WebhookEventKind.PAYMENT) {
          return this.handlePaymentReversed(event, PaymentStatus.REFUNDED);
        }
        break;
    }

    this.logger.log(`${label}: ${event.kind} ${event.canonicalStatus}, no ledger change`);
    return 'logged';
  }

  private async handleCompleted(event: NormalizedWebhookEvent, label: string): Promise<DispatchOutcome> {
    switch (event.kind) {
      case WebhookEventKind.PAYMENT:
        return this.handlePaymentCompleted(event);
      case WebhookEventKind.SUBSCRIPTION:
        return this.handleSubscriptionActive(event);
      case WebhookEventKind.PAYMENT_SETUP:
        return this.handlePaymentSetup(event);
      default:
        this.logger.log(`Ignoring ${label}: unsupported event kind`);
        return 'ignored';
    }
  }

  /**
   * 支付成功 -> 记录支付，按套餐发放积分，引用号为 "<渠道>:<支付单号>"
   * 所属订阅已取消时只记录支付，不再发放
   */
  private async handlePaymentCompleted(event: NormalizedWebhookEvent): Promise<DispatchOutcome> {
    const subjectId = await this.resolveSubject(event);
    const paymentRef = event.providerPaymentRef ?? event.eventId;

    await this.paymentsService.recordCompleted({
      subjectId,
      paymentProvider: event.provider,
      providerPaymentRef: paymentRef,
      providerTxnRef: event.providerTxnRef,
      providerSubscriptionId: event.providerSubscriptionRef,
      amount: event.amount,
      currency: event.currency,
      metadata: { event_id: event.eventId, event_type: event.type, provider_customer_id: event.providerCustomerId },
    });

    const subscription = event.providerSubscriptionRef
      ? await this.subscriptionsService.getByProviderSubscriptionId(event.providerSubscriptionRef)
      : null;
    if (subscription?.canceled_at) {
      this.logger.warn(
        `Payment ${paymentRef} belongs to subscription ${subscription.provider_subscription_id} ` +
          `canceled at ${subscription.canceled_at}, skipping credit allocation`,
      );
      return 'skipped';
    }

    if (!event.planRef) {
      throw new PlanNotFoundException([event.providerPaymentRef]);
    }
    const plan = await this.paymentPlansService.resolveCreditsPerCycle(event.planRef);

    const creditProvider = event.creditProvider ?? subscription?.provider;
    const referenceId = `${event.provider}:${paymentRef}`;

    const result = await this.creditsService.allocateCredits(
      subjectId,
      creditProvider,
      plan.credits,
      `Credit allocation for ${plan.displayName} subscription`,
      referenceId,
    );

    if (result.replayed) {
      return 'replayed';
    }

    this.logger.log(
      `Allocated ${plan.credits} credits (${plan.source}) to subject ${subjectId}, ` +
        `balance ${result.balance.current_balance.toFixed(2)}`,
    );
    return 'allocated';
  }

  /**
   * 退款/取消/失败：只更新支付状态，已发放的积分不收回
   */
  private async handlePaymentReversed(
    event: NormalizedWebhookEvent,
    status: PaymentStatus.CANCELED | PaymentStatus.FAILED | PaymentStatus.REFUNDED,
  ): Promise<DispatchOutcome> {
    if (!event.providerPaymentRef) {
      this.logger.log(`${event.provider} ${event.type} (${event.eventId}) has no payment reference, no change`);
      return 'logged';
    }

    const payment = await this.paymentsService.updateStatus(event.provider, event.providerPaymentRef, status);
    return payment ? 'payment_updated' : 'logged';
  }

  private async handleSubscriptionActive(event: NormalizedWebhookEvent): Promise<DispatchOutcome> {
    if (!event.providerSubscriptionRef) {
      throw new ValidationException(`Subscription event ${event.eventId} has no subscription id`);
    }
    const subjectId = await this.resolveSubject(event);

    await this.subscriptionsService.upsertFromProvider({
      subjectId,
      provider: this.creditsService.resolveProvider(event.creditProvider),
      paymentProvider: event.provider,
      providerSubscriptionId: event.providerSubscriptionRef,
      providerCustomerId: event.providerCustomerId,
      status: SubscriptionStatus.ACTIVE,
      planId: event.planRef?.priceId ?? event.planRef?.productId ?? null,
      currentPeriodEnd: event.periodEnd,
    });
    return 'subscription_synced';
  }

  private async handleSubscriptionCanceled(event: NormalizedWebhookEvent): Promise<DispatchOutcome> {
    if (!event.providerSubscriptionRef) {
      throw new ValidationException(`Subscription event ${event.eventId} has no subscription id`);
    }
    await this.subscriptionsService.cancelSubscription(event.providerSubscriptionRef);
    return 'subscription_canceled';
  }

  private async handlePaymentSetup(event: NormalizedWebhookEvent): Promise<DispatchOutcome> {
    if (!event.providerCustomerId) {
      this.logger.warn(`Payment setup ${event.eventId} has no customer, skipping mapping`);
      return 'logged';
    }
    const subjectId = await this.resolveSubject(event);

    await this.customerMappingsService.upsertFromSetup({
      paymentProvider: event.provider,
      providerCustomerId: event.providerCustomerId,
      subjectId,
      email: event.email,
    });
    return 'customer_mapped';
  }

  private async resolveSubject(event: NormalizedWebhookEvent): Promise<string> {
    const resolved = await this.subjectResolver.resolve(event.provider, event.subjectHints);
    if (!resolved) {
      this.logger.warn(`Could not resolve subject for ${event.provider} event ${event.eventId}`);
      throw new UnresolvedSubjectException(event.eventId);
    }

    event.correlationId = resolved.subjectId;
    this.logger.debug(`Resolved subject ${resolved.subjectId} via ${resolved.source}`);
    return resolved.subjectId;
  }
}
