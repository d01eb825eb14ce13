import { Controller, Post, RawBodyRequest, Req, HttpCode } from '@nestjs/common';
import { FastifyRequest } from 'fastify';
import { Public } from '../../common/decorators/public.decorator';
import { SkipEnvelope } from '../../common/decorators/skip-envelope.decorator';
import { ProviderVerificationException } from '../../common/errors/billing.errors';
import { PaymentProvider } from '../../database/entities';
import { WebhookAck, WebhooksService } from './webhooks.service';
import { SignupCreditService } from './signup-credit.service';

@Controller('webhooks')
@Public()
@SkipEnvelope()
export class WebhooksController {
  constructor(
    private readonly webhooksService: WebhooksService,
    private readonly signupCreditService: SignupCreditService,
  ) {}

  /**
   * POST /api/webhooks/stripe
   * Stripe 回调
   */
  @Post('stripe')
  @HttpCode(200)
  async handleStripeWebhook(@Req() req: RawBodyRequest<FastifyRequest>): Promise<WebhookAck> {
    return this.handle(PaymentProvider.STRIPE, req);
  }

  /**
   * POST /api/webhooks/toss
   * Toss 回调；带 x-webhook-secret 的是 Supabase 注册确认
   */
  @Post('toss')
  @HttpCode(200)
  async handleTossWebhook(@Req() req: RawBodyRequest<FastifyRequest>): Promise<WebhookAck> {
    if (req.rawBody && this.signupCreditService.isSignupDelivery(req.headers)) {
      return this.signupCreditService.grantSignupCredit(req.rawBody);
    }
    return this.handle(PaymentProvider.TOSS, req);
  }

  private async handle(provider: PaymentProvider, req: RawBodyRequest<FastifyRequest>): Promise<WebhookAck> {
    const rawBody = req.rawBody;
    if (!rawBody) {
      throw new ProviderVerificationException(provider, 'raw body not available');
    }
    return this.webhooksService.handleWebhook(provider, rawBody, req.headers);
  }
}
