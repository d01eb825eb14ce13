import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Stripe from 'stripe';

@Injectable()
export class StripeService {
  private readonly logger = new Logger(StripeService.name);
  private readonly stripe: Stripe | null;
  private readonly webhookSecret: string;

  constructor(private configService: ConfigService) {
    const secretKey = this.configService.get<string>('stripe.secretKey');
    this.webhookSecret = this.configService.get<string>('stripe.webhookSecret') || '';

    if (!secretKey) {
      this.logger.warn('Stripe secret key not configured, Stripe webhooks will be rejected');
      this.stripe = null;
      return;
    }

    this.stripe = new Stripe(secretKey);
    this.logger.log('Stripe service initialized');
  }

  /**
   * 验证 Webhook 签名并解析事件
   * 签名不匹配或时间戳超出容忍范围时抛错
   */
  constructEvent(payload: string | Buffer, signature: string): Stripe.Event {
    if (!this.stripe || !this.webhookSecret) {
      throw new Error('Stripe webhook secret not configured');
    }
    return this.stripe.webhooks.constructEvent(payload, signature, this.webhookSecret);
  }
}
