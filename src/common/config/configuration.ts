const intFromEnv = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export default () => ({
  port: intFromEnv(process.env.PORT, 3000),
  nodeEnv: process.env.NODE_ENV || 'development',

  supabase: {
    url: process.env.SUPABASE_URL,
    serviceRoleKey: process.env.SUPABASE_SERVICE_ROLE_KEY,
    requestTimeoutMs: intFromEnv(process.env.SUPABASE_REQUEST_TIMEOUT_MS, 10_000),
    webhookSecret: process.env.SUPABASE_WEBHOOK_SECRET, // 注册确认回调的共享密钥
  },

  stripe: {
    secretKey: process.env.STRIPE_SECRET_KEY,
    webhookSecret: process.env.STRIPE_WEBHOOK_SECRET,
  },

  toss: {
    webhookSecret: process.env.TOSS_WEBHOOK_SECRET,
  },

  internalApi: {
    key: process.env.INTERNAL_API_KEY,
  },

  // 业务配置
  credits: {
    defaultProvider: process.env.CREDIT_DEFAULT_PROVIDER || 'default', // 未指定归属时的积分 provider
    historyMaxLimit: 100,
  },

  webhooks: {
    sweeperEnabled: process.env.WEBHOOK_SWEEPER_ENABLED !== 'false',
    retryBatchSize: intFromEnv(process.env.WEBHOOK_RETRY_BATCH_SIZE, 50),
    staleClaimMinutes: intFromEnv(process.env.WEBHOOK_STALE_CLAIM_MINUTES, 10), // processing 超过该时长视为卡住
  },
});
