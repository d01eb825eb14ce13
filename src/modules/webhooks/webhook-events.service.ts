import { Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from '../../providers/supabase/supabase.service';
import {
  CanonicalStatus,
  PaymentProvider,
  WebhookEvent,
  WebhookProcessingStatus,
} from '../../database/entities';
import { PersistenceException, WebhookEventNotFoundException } from '../../common/errors/billing.errors';
import { computeNextRetryAt } from './retry-policy';

export interface SaveWebhookEventInput {
  provider: PaymentProvider;
  eventId: string;
  eventType: string;
  canonicalStatus: CanonicalStatus | null;
  payload: Record<string, unknown>;
}

const RETRYABLE_STATUSES = [WebhookProcessingStatus.PENDING, WebhookProcessingStatus.FAILED];

/**
 * Webhook 事件存储与重试状态机
 * pending -> processing -> completed | failed，failed 到期后重新进入处理
 */
@Injectable()
export class WebhookEventsService {
  private readonly logger = new Logger(WebhookEventsService.name);

  constructor(private supabaseService: SupabaseService) {}

  /**
   * 按 event_id 插入，重复投递静默忽略
   */
  async saveEvent(input: SaveWebhookEventInput): Promise<{ created: boolean }> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from('webhook_events')
      .upsert(
        {
          event_id: input.eventId,
          provider: input.provider,
          event_type: input.eventType,
          canonical_status: input.canonicalStatus,
          processing_status: WebhookProcessingStatus.PENDING,
          retry_count: 0,
          last_error: null,
          next_retry_at: null,
          payload: input.payload,
          received_at: new Date().toISOString(),
        },
        { onConflict: 'event_id', ignoreDuplicates: true },
      )
      .select('id');

    if (error) {
      this.logger.error(`Failed to save webhook event ${input.eventId}: ${error.message}`);
      throw new PersistenceException('save webhook event', error);
    }

    const created = (data ?? []).length > 0;
    if (!created) {
      this.logger.log(`Webhook event ${input.eventId} already stored`);
    }
    return { created };
  }

  async getEvent(eventId: string): Promise<WebhookEvent | null> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from('webhook_events')
      .select('*')
      .eq('event_id', eventId)
      .maybeSingle();

    if (error) {
      throw new PersistenceException('get webhook event', error);
    }

    const event: WebhookEvent | null = data;
    return event;
  }

  /**
   * 抢占处理权：只有 pending / failed 的事件能被抢到
   */
  async claimEvent(eventId: string): Promise<boolean> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from('webhook_events')
      .update({
        processing_status: WebhookProcessingStatus.PROCESSING,
        claimed_at: new Date().toISOString(),
      })
      .eq('event_id', eventId)
      .in('processing_status', RETRYABLE_STATUSES)
      .select('id');

    if (error) {
      throw new PersistenceException('claim webhook event', error);
    }

    return (data ?? []).length > 0;
  }

  async markProcessed(eventId: string): Promise<void> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from('webhook_events')
      .update({
        processing_status: WebhookProcessingStatus.COMPLETED,
        processed_at: new Date().toISOString(),
        next_retry_at: null,
      })
      .eq('event_id', eventId)
      .select('id');

    if (error) {
      this.logger.error(`Failed to mark webhook ${eventId} as processed: ${error.message}`);
      throw new PersistenceException('mark webhook event processed', error);
    }

    if ((data ?? []).length === 0) {
      throw new WebhookEventNotFoundException(eventId);
    }
  }

  /**
   * 记录失败并按退避策略安排下次重试
   * 只作用于仍处于 processing 的事件；传入 claimedAt 时还要求是同一次抢占。
   * 事件已被其他流程结束（或重新抢占）时返回 null，不覆盖其状态
   */
  async markFailed(eventId: string, cause: unknown, claimedAt?: string): Promise<WebhookEvent | null> {
    const supabase = this.supabaseService.getClient();

    const { data: current, error: readError } = await supabase
      .from('webhook_events')
      .select('retry_count, processing_status, claimed_at')
      .eq('event_id', eventId)
      .maybeSingle();

    if (readError) {
      throw new PersistenceException('read webhook event for failure update', readError);
    }
    if (!current) {
      throw new WebhookEventNotFoundException(eventId);
    }

    const currentClaim: string | null = current.claimed_at ?? null;
    if (
      current.processing_status !== WebhookProcessingStatus.PROCESSING ||
      currentClaim === null ||
      (claimedAt !== undefined && !sameInstant(currentClaim, claimedAt))
    ) {
      this.logger.warn(`Webhook ${eventId} is no longer held by this claim, leaving it ${current.processing_status}`);
      return null;
    }

    const retryCount: number = current.retry_count ?? 0;
    const nextRetryAt = computeNextRetryAt(retryCount);
    const message = cause instanceof Error ? cause.message : String(cause);

    const { data, error } = await supabase
      .from('webhook_events')
      .update({
        processing_status: WebhookProcessingStatus.FAILED,
        retry_count: retryCount + 1,
        last_error: message,
        next_retry_at: nextRetryAt.toISOString(),
      })
      .eq('event_id', eventId)
      .eq('processing_status', WebhookProcessingStatus.PROCESSING)
      .eq('claimed_at', currentClaim)
      .select('*');

    if (error) {
      this.logger.error(`Failed to mark webhook ${eventId} as failed: ${error.message}`);
      throw new PersistenceException('mark webhook event failed', error);
    }

    const updated: WebhookEvent[] = data ?? [];
    if (updated.length === 0) {
      this.logger.warn(`Webhook ${eventId} changed state before the failure was recorded, leaving it as is`);
      return null;
    }

    this.logger.warn(
      `Webhook ${eventId} failed (attempt ${retryCount + 1}), next retry at ${nextRetryAt.toISOString()}: ${message}`,
    );
    return updated[0];
  }

  /**
   * 待处理/待重试且已到期的事件，按接收时间升序
   */
  async getPendingEvents(limit: number): Promise<WebhookEvent[]> {
    const now = new Date().toISOString();
    const { data, error } = await this.supabaseService
      .getClient()
      .from('webhook_events')
      .select('*')
      .in('processing_status', RETRYABLE_STATUSES)
      .or(`next_retry_at.is.null,next_retry_at.lte.${now}`)
      .order('received_at', { ascending: true })
      .order('id', { ascending: true })
      .limit(limit);

    if (error) {
      throw new PersistenceException('get pending webhook events', error);
    }

    const events: WebhookEvent[] = data ?? [];
    return events;
  }

  /**
   * processing 超时（进程中途崩溃）的事件记为失败，重新进入重试
   */
  async releaseStaleClaims(olderThanMinutes: number): Promise<number> {
    const threshold = new Date(Date.now() - olderThanMinutes * 60_000).toISOString();

    const { data, error } = await this.supabaseService
      .getClient()
      .from('webhook_events')
      .select('event_id, claimed_at')
      .eq('processing_status', WebhookProcessingStatus.PROCESSING)
      .lt('claimed_at', threshold);

    if (error) {
      throw new PersistenceException('query stale webhook claims', error);
    }

    const stale: Array<{ event_id: string; claimed_at: string }> = data ?? [];
    if (stale.length === 0) {
      return 0;
    }

    this.logger.warn(`Found ${stale.length} stale webhook claims, marking as failed...`);
    let released = 0;
    for (const { event_id, claimed_at } of stale) {
      const failed = await this.markFailed(
        event_id,
        new Error(`Processing timed out after ${olderThanMinutes} minutes`),
        claimed_at,
      );
      if (failed) {
        released++;
      }
    }
    return released;
  }
}

function sameInstant(a: string, b: string): boolean {
  return new Date(a).getTime() === new Date(b).getTime();
}
