import { SetMetadata } from '@nestjs/common';

export const SKIP_ENVELOPE_KEY = 'skipEnvelope';

/**
 * 原样返回响应体，不包装成 { data, error }
 * Webhook 回执使用
 */
export const SkipEnvelope = () => SetMetadata(SKIP_ENVELOPE_KEY, true);
