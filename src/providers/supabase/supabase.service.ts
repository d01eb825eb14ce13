import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient, SupabaseClient } from '@supabase/supabase-js';

// Postgres unique_violation
export const UNIQUE_VIOLATION = '23505';

@Injectable()
export class SupabaseService {
  private readonly logger = new Logger(SupabaseService.name);
  private readonly client: SupabaseClient;

  constructor(private configService: ConfigService) {
    const url = this.configService.get<string>('supabase.url');
    const serviceRoleKey = this.configService.get<string>('supabase.serviceRoleKey');
    const timeoutMs = this.configService.get<number>('supabase.requestTimeoutMs') || 10_000;

    if (!url || !serviceRoleKey) {
      throw new Error('Supabase configuration missing (SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY)');
    }

    this.client = createClient(url, serviceRoleKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
      global: {
        fetch: (input, init) => fetch(input, this.withDeadline(init, timeoutMs)),
      },
    });

    this.logger.log('Supabase client initialized');
  }

  getClient(): SupabaseClient {
    return this.client;
  }

  /**
   * 每个请求都带超时；调用方自带 signal 时以调用方为准
   */
  private withDeadline(init: RequestInit | undefined, timeoutMs: number): RequestInit {
    if (init?.signal) {
      return init;
    }
    return { ...init, signal: AbortSignal.timeout(timeoutMs) };
  }
}
