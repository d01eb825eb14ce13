import { Inject, Injectable, Logger } from '@nestjs/common';
import { PaymentProvider, WebhookEvent } from '../../database/entities';
import { WebhookEventsService } from './webhook-events.service';
import { DispatchOutcome, WebhookDispatcherService } from './webhook-dispatcher.service';
import {
  NormalizedWebhookEvent,
  PAYMENT_PROVIDER_ADAPTERS,
  PaymentProviderAdapter,
  WebhookHeaders,
} from './normalizers/normalized-event';

export interface WebhookAck {
  received: true;
  duplicate?: true;
}

export interface ProcessingResult {
  eventId: string;
  succeeded: boolean;
  outcome: DispatchOutcome | null;
}

/**
 * Webhook 接入：验签 -> 入库 -> 抢占 -> 分发 -> 记录结果
 * 入库之后的失败只记录，不影响给渠道的 200 响应
 */
@Injectable()
export class WebhooksService {
  private readonly logger = new Logger(WebhooksService.name);
  private readonly adapters: Map<PaymentProvider, PaymentProviderAdapter>;

  constructor(
    @Inject(PAYMENT_PROVIDER_ADAPTERS) adapters: PaymentProviderAdapter[],
    private webhookEventsService: WebhookEventsService,
    private dispatcher: WebhookDispatcherService,
  ) {
    this.adapters = new Map(
      adapters.map((adapter): [PaymentProvider, PaymentProviderAdapter] => [adapter.provider, adapter]),
    );
  }

  async handleWebhook(provider: PaymentProvider, rawBody: Buffer, headers: WebhookHeaders): Promise<WebhookAck> {
    const event = this.getAdapter(provider).handleWebhook(rawBody, headers);
    this.logger.log(`Received ${provider} event ${event.type} (${event.eventId})`);

    await this.webhookEventsService.saveEvent({
      provider,
      eventId: event.eventId,
      eventType: event.type,
      canonicalStatus: event.canonicalStatus,
      payload: event.rawData,
    });

    if (!(await this.webhookEventsService.claimEvent(event.eventId))) {
      this.logger.log(`Event ${event.eventId} already processed or in progress, skipping`);
      return { received: true, duplicate: true };
    }

    await this.process(event);
    return { received: true };
  }

  /**
   * 重试入口：从库里的原始报文重建事件后处理
   * 调用前必须已经 claimEvent 成功
   */
  async processStoredEvent(stored: WebhookEvent): Promise<ProcessingResult> {
    let event: NormalizedWebhookEvent;
    try {
      event = this.getAdapter(stored.provider).fromStoredEvent(stored);
    } catch (err) {
      await this.webhookEventsService.markFailed(stored.event_id, err);
      return { eventId: stored.event_id, succeeded: false, outcome: null };
    }
    return this.process(event);
  }

  private async process(event: NormalizedWebhookEvent): Promise<ProcessingResult> {
    let outcome: DispatchOutcome;
    try {
      outcome = await this.dispatcher.dispatch(event);
    } catch (err) {
      this.logger.error(
        `Failed to process ${event.provider} event ${event.eventId}: ${err instanceof Error ? err.message : String(err)}`,
      );
      await this.webhookEventsService.markFailed(event.eventId, err);
      return { eventId: event.eventId, succeeded: false, outcome: null };
    }

    await this.webhookEventsService.markProcessed(event.eventId);
    return { eventId: event.eventId, succeeded: true, outcome };
  }

  private getAdapter(provider: PaymentProvider): PaymentProviderAdapter {
    const adapter = this.adapters.get(provider);
    if (!adapter) {
      throw new Error(`No webhook adapter registered for ${provider}`);
    }
    return adapter;
  }
}
