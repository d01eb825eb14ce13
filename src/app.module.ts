import { Module } from '@nestjs/common';
import { APP_GUARD, APP_INTERCEPTOR } from '@nestjs/core';
import { ScheduleModule } from '@nestjs/schedule';
import { ConfigModule } from '@nestjs/config';
import configuration from './common/config/configuration';

// Providers
import { SupabaseModule } from './providers/supabase/supabase.module';
import { StripeModule } from './providers/stripe/stripe.module';
import { TossModule } from './providers/toss/toss.module';

// Business Modules
import { CreditsModule } from './modules/credits/credits.module';
import { CustomersModule } from './modules/customers/customers.module';
import { PaymentsModule } from './modules/payments/payments.module';
import { PlansModule } from './modules/plans/plans.module';
import { SubscriptionsModule } from './modules/subscriptions/subscriptions.module';
import { WebhooksModule } from './modules/webhooks/webhooks.module';

// Guards / Interceptors
import { InternalApiKeyGuard } from './common/guards/internal-api-key.guard';
import { ResponseInterceptor } from './common/interceptors/response.interceptor';

@Module({
  imports: [
    // Config
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      envFilePath: ['.env.local', '.env'],
    }),

    // Schedule (Webhook 重试)
    ScheduleModule.forRoot(),

    // Providers
    SupabaseModule,
    StripeModule,
    TossModule,

    // Business Modules
    CreditsModule,
    CustomersModule,
    PaymentsModule,
    PlansModule,
    SubscriptionsModule,
    WebhooksModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: InternalApiKeyGuard,
    },
    {
      provide: APP_INTERCEPTOR,
      useClass: ResponseInterceptor,
    },
  ],
})
export class AppModule {}
