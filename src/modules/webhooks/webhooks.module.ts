import { Module } from '@nestjs/common';
import { WebhooksController } from './webhooks.controller';
import { WebhooksService } from './webhooks.service';
import { WebhookEventsService } from './webhook-events.service';
import { WebhookDispatcherService } from './webhook-dispatcher.service';
import { WebhookRetryService } from './webhook-retry.service';
import { SubjectResolverService } from './subject-resolver.service';
import { SignupCreditService } from './signup-credit.service';
import { StripeEventNormalizer } from './normalizers/stripe-event.normalizer';
import { TossEventNormalizer } from './normalizers/toss-event.normalizer';
import { PAYMENT_PROVIDER_ADAPTERS, PaymentProviderAdapter } from './normalizers/normalized-event';
import { CreditsModule } from '../credits/credits.module';
import { SubscriptionsModule } from '../subscriptions/subscriptions.module';
import { CustomersModule } from '../customers/customers.module';
import { PlansModule } from '../plans/plans.module';
import { PaymentsModule } from '../payments/payments.module';

@Module({
  imports: [CreditsModule, SubscriptionsModule, CustomersModule, PlansModule, PaymentsModule],
  controllers: [WebhooksController],
  providers: [
    StripeEventNormalizer,
    TossEventNormalizer,
    {
      provide: PAYMENT_PROVIDER_ADAPTERS,
      useFactory: (stripe: StripeEventNormalizer, toss: TossEventNormalizer): PaymentProviderAdapter[] => [stripe, toss],
      inject: [StripeEventNormalizer, TossEventNormalizer],
    },
    SubjectResolverService,
    WebhookEventsService,
    WebhookDispatcherService,
    WebhooksService,
    WebhookRetryService,
    SignupCreditService,
  ],
  exports: [WebhookEventsService],
})
export class WebhooksModule {}
