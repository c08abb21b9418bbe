const optional = {
  NODE_ENV: 'development',
  PORT: '8000',
  SMTP_HOST: 'smtp.gmail.com',
  SMTP_PORT: '465',
  SMTP_SECURE: 'true',
  SMTP_TIMEOUT_MS: '30000',
  TOKEN_TTL_HOURS: '1',
  TOKEN_SWEEP_INTERVAL_MS: '60000',
  MAX_REPEAT: '50',
  SEND_RATE_LIMIT_PER_MINUTE: '30',
  CORS_ORIGIN: '',
  CORS_ORIGIN_PROD: '',
} as const;

type Env = Record<string, string | undefined>;

function validateEnv(env: Env): string {
  const key = env.ENCRYPTION_KEY;
  if (key === undefined || key.trim() === '' || key === 'change-me') {
    throw new Error(
      'ENCRYPTION_KEY is required and must not be empty or "change-me". Set it in .env.'
    );
  }
  return key;
}

function toInt(name: string, raw: string): number {
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): Config {
  const encryptionKey = validateEnv(env);
  return {
    nodeEnv: env.NODE_ENV ?? optional.NODE_ENV,
    port: toInt('PORT', env.PORT ?? optional.PORT),
    encryptionKey,
    smtp: {
      host: env.SMTP_HOST || optional.SMTP_HOST,
      port: toInt('SMTP_PORT', env.SMTP_PORT ?? optional.SMTP_PORT),
      secure: (env.SMTP_SECURE ?? optional.SMTP_SECURE) !== 'false',
      timeoutMs: toInt('SMTP_TIMEOUT_MS', env.SMTP_TIMEOUT_MS ?? optional.SMTP_TIMEOUT_MS),
    },
    tokens: {
      ttlHours: toInt('TOKEN_TTL_HOURS', env.TOKEN_TTL_HOURS ?? optional.TOKEN_TTL_HOURS),
      sweepIntervalMs: toInt(
        'TOKEN_SWEEP_INTERVAL_MS',
        env.TOKEN_SWEEP_INTERVAL_MS ?? optional.TOKEN_SWEEP_INTERVAL_MS
      ),
    },
    mail: {
      maxRepeat: toInt('MAX_REPEAT', env.MAX_REPEAT ?? optional.MAX_REPEAT),
      rateLimitPerMinute: toInt(
        'SEND_RATE_LIMIT_PER_MINUTE',
        env.SEND_RATE_LIMIT_PER_MINUTE ?? optional.SEND_RATE_LIMIT_PER_MINUTE
      ),
    },
    cors: {
      origin: env.CORS_ORIGIN ?? optional.CORS_ORIGIN,
      originProd: env.CORS_ORIGIN_PROD ?? optional.CORS_ORIGIN_PROD,
    },
  };
}

export interface SmtpConfig {
  host: string;
  port: number;
  secure: boolean;
  timeoutMs: number;
}

export interface Config {
  nodeEnv: string;
  port: number;
  /** Never log this value. */
  encryptionKey: string;
  smtp: SmtpConfig;
  tokens: {
    ttlHours: number;
    sweepIntervalMs: number;
  };
  mail: {
    maxRepeat: number;
    rateLimitPerMinute: number;
  };
  cors: {
    origin: string;
    originProd: string;
  };
}

let cached: Config | null = null;

/** Process-wide config, read from `process.env` on first use. */
export function getConfig(): Config {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
