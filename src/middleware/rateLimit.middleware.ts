import rateLimit from 'express-rate-limit';

/** Limit failed auth attempts per IP: 20 per 15 minutes */
export function createAuthRateLimiter() {
  return rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: 20,
    message: { error: 'Too many authentication attempts. Try again later.', code: 'RATE_LIMIT' },
    standardHeaders: true,
    legacyHeaders: false,
    skipSuccessfulRequests: true,
  });
}

export function createSendRateLimiter(perMinute: number) {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: perMinute,
    message: { error: 'Too many send requests. Slow down.', code: 'RATE_LIMIT' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
