import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { timingSafeEqual } from 'crypto';
import { CreditsService } from '../credits/credits.service';
import { ValidationException } from '../../common/errors/billing.errors';
import { SignupConfirmationDto } from './dto/signup-confirmation.dto';
import { WebhookHeaders, headerValue } from './normalizers/normalized-event';
import { WebhookAck } from './webhooks.service';

export const SIGNUP_WEBHOOK_SECRET_HEADER = 'x-webhook-secret';

const SIGNUP_CREDIT_AMOUNT = 1;

/**
 * 注册确认赠送积分
 * 与 Toss 共用回调地址，靠 x-webhook-secret 区分
 */
@Injectable()
export class SignupCreditService {
  private readonly logger = new Logger(SignupCreditService.name);
  private readonly webhookSecret: Buffer;

  constructor(
    private configService: ConfigService,
    private creditsService: CreditsService,
  ) {
    this.webhookSecret = Buffer.from(this.configService.get<string>('supabase.webhookSecret') || '');
  }

  isSignupDelivery(headers: WebhookHeaders): boolean {
    if (this.webhookSecret.length === 0) {
      return false;
    }
    const provided = Buffer.from(headerValue(headers, SIGNUP_WEBHOOK_SECRET_HEADER));
    return provided.length === this.webhookSecret.length && timingSafeEqual(provided, this.webhookSecret);
  }

  async grantSignupCredit(rawBody: Buffer): Promise<WebhookAck> {
    const confirmation = parseConfirmation(rawBody);
    const confirmedAt = confirmation.confirmed_at || confirmation.created_at;
    if (!confirmedAt) {
      throw new ValidationException('Signup confirmation needs confirmed_at or created_at');
    }

    this.logger.log(
      `Received signup confirmation for ${confirmation.user_id} (${confirmation.service_provider})`,
    );

    const result = await this.creditsService.allocateCredits(
      confirmation.user_id,
      confirmation.service_provider,
      SIGNUP_CREDIT_AMOUNT,
      `Signup confirmation credit for ${confirmation.email || confirmation.user_id}`,
      `supabase:${confirmation.service_provider}:${confirmation.user_id}:${confirmedAt}`,
    );

    if (result.replayed) {
      this.logger.log(`Signup credit for ${confirmation.user_id} already granted`);
      return { received: true, duplicate: true };
    }
    return { received: true };
  }
}

function parseConfirmation(rawBody: Buffer): SignupConfirmationDto {
  let payload: unknown;
  try {
    payload = JSON.parse(rawBody.toString('utf8'));
  } catch {
    throw new ValidationException('Signup confirmation body is not valid JSON');
  }

  const dto = plainToInstance(SignupConfirmationDto, payload);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    throw new ValidationException('Invalid signup confirmation payload', {
      fields: errors.map((e) => e.property),
    });
  }
  return dto;
}
