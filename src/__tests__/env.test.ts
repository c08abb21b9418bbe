import { getConfig, loadConfig } from '../config/env';

describe('loadConfig', () => {
  it('fails without an encryption key', () => {
    expect(() => loadConfig({})).toThrow('ENCRYPTION_KEY is required');
    expect(() => loadConfig({ ENCRYPTION_KEY: '   ' })).toThrow('ENCRYPTION_KEY is required');
    expect(() => loadConfig({ ENCRYPTION_KEY: 'change-me' })).toThrow('ENCRYPTION_KEY is required');
  });

  it('defaults to Gmail over SSL with one-hour tokens', () => {
    const config = loadConfig({ ENCRYPTION_KEY: 'test-secret' });
    expect(config).toEqual({
      nodeEnv: 'development',
      port: 8000,
      encryptionKey: 'test-secret',
      smtp: { host: 'smtp.gmail.com', port: 465, secure: true, timeoutMs: 30000 },
      tokens: { ttlHours: 1, sweepIntervalMs: 60000 },
      mail: { maxRepeat: 50, rateLimitPerMinute: 30 },
      cors: { origin: '', originProd: '' },
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      ENCRYPTION_KEY: 'test-secret',
      SMTP_HOST: 'smtp.example.com',
      SMTP_PORT: '587',
      SMTP_SECURE: 'false',
      MAX_REPEAT: '5',
    });
    expect(config.smtp).toEqual({ host: 'smtp.example.com', port: 587, secure: false, timeoutMs: 30000 });
    expect(config.mail.maxRepeat).toBe(5);
  });

  it('rejects non-numeric values', () => {
    expect(() => loadConfig({ ENCRYPTION_KEY: 'test-secret', PORT: 'abc' })).toThrow(
      'PORT must be a positive integer, got "abc"'
    );
  });
});

describe('getConfig', () => {
  const saved = process.env.ENCRYPTION_KEY;

  afterEach(() => {
    if (saved === undefined) delete process.env.ENCRYPTION_KEY;
    else process.env.ENCRYPTION_KEY = saved;
  });

  it('reads the environment once and caches the result', () => {
    process.env.ENCRYPTION_KEY = 'test-secret';
    const first = getConfig();
    process.env.ENCRYPTION_KEY = 'another-secret';

    expect(first.encryptionKey).toBe('test-secret');
    expect(getConfig()).toBe(first);
  });
});
