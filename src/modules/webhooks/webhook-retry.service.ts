import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { WebhookEventsService } from './webhook-events.service';
import { WebhooksService } from './webhooks.service';

export interface SweepSummary {
  released: number;
  attempted: number;
  succeeded: number;
}

/**
 * Webhook 重试
 * 重试时间只看 next_retry_at，进程重启不丢
 */
@Injectable()
export class WebhookRetryService {
  private readonly logger = new Logger(WebhookRetryService.name);
  private readonly enabled: boolean;
  private readonly batchSize: number;
  private readonly staleClaimMinutes: number;
  private running = false;

  constructor(
    private configService: ConfigService,
    private webhookEventsService: WebhookEventsService,
    private webhooksService: WebhooksService,
  ) {
    this.enabled = this.configService.get<boolean>('webhooks.sweeperEnabled') ?? true;
    this.batchSize = this.configService.get<number>('webhooks.retryBatchSize') || 50;
    this.staleClaimMinutes = this.configService.get<number>('webhooks.staleClaimMinutes') || 10;
  }

  /**
   * 每 5 分钟重试到期的事件
   */
  @Cron(CronExpression.EVERY_5_MINUTES)
  async handleCron(): Promise<void> {
    if (!this.enabled || this.running) {
      return;
    }

    this.running = true;
    try {
      await this.sweep();
    } catch (err) {
      this.logger.error(`Webhook retry sweep failed: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      this.running = false;
    }
  }

  async sweep(): Promise<SweepSummary> {
    const released = await this.webhookEventsService.releaseStaleClaims(this.staleClaimMinutes);
    const due = await this.webhookEventsService.getPendingEvents(this.batchSize);

    if (due.length === 0) {
      this.logger.debug('No webhook events due for retry');
      return { released, attempted: 0, succeeded: 0 };
    }

    let attempted = 0;
    let succeeded = 0;
    for (const event of due) {
      // 另一个实例可能已经抢走
      if (!(await this.webhookEventsService.claimEvent(event.event_id))) {
        continue;
      }
      attempted++;
      const result = await this.webhooksService.processStoredEvent(event);
      if (result.succeeded) succeeded++;
    }

    this.logger.log(`Retried ${attempted} webhook events, ${succeeded} succeeded`);
    return { released, attempted, succeeded };
  }
}
