import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHmac, timingSafeEqual } from 'crypto';

export const TOSS_SIGNATURE_HEADER = 'tosspayments-webhook-signature';
export const TOSS_TRANSMISSION_TIME_HEADER = 'tosspayments-webhook-transmission-time';
export const TOSS_TRANSMISSION_ID_HEADER = 'tosspayments-webhook-transmission-id';

@Injectable()
export class TossService {
  private readonly logger = new Logger(TossService.name);
  private readonly webhookSecret: string;

  constructor(private configService: ConfigService) {
    this.webhookSecret = this.configService.get<string>('toss.webhookSecret') || '';
    if (!this.webhookSecret) {
      this.logger.warn('Toss webhook secret not configured, Toss webhooks will be rejected');
    }
  }

  /**
   * 验证 Webhook 签名
   * 签名格式: v1:<base64(HMAC-SHA256("{body}:{transmission-time}"))>，可能有多个，逗号分隔
   */
  verifyWebhookSignature(payload: string | Buffer, signature: string, transmissionTime: string): boolean {
    if (!signature || !transmissionTime || !this.webhookSecret) {
      this.logger.warn('Missing signature, transmission time or secret for Toss webhook verification');
      return false;
    }

    const hmac = createHmac('sha256', this.webhookSecret);
    hmac.update(`${typeof payload === 'string' ? payload : payload.toString('utf8')}:${transmissionTime}`);
    const expected = hmac.digest();

    return signature
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.startsWith('v1:'))
      .some((part) => {
        const provided = Buffer.from(part.slice(3), 'base64');
        return provided.length === expected.length && timingSafeEqual(provided, expected);
      });
  }
}
