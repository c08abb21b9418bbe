import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import swaggerUi from 'swagger-ui-express';
import type { Config } from './config/env';
import { getSwaggerSpec } from './config/swagger';
import { AppError } from './errors/AppError';
import { createErrorHandler } from './middleware/errorHandler';
import type { AuthService } from './modules/auth/auth.service';
import { createAuthRouter } from './modules/auth/auth.route';
import { createDashboardController } from './modules/dashboard/dashboard.controller';
import { createHealthCheck } from './modules/health/health.controller';
import type { MailService } from './modules/mail/mail.service';
import { createMailRouter } from './modules/mail/mail.route';
import type { StatsService } from './services/stats.service';
import type { TokenStore } from './services/token-store.service';
import { logger } from './utils/logger';

export interface AppDependencies {
  config: Pick<Config, 'nodeEnv' | 'cors' | 'mail'>;
  authService: AuthService;
  mailService: MailService;
  tokens: TokenStore;
  stats: StatsService;
}

function getAllowedOrigins(config: AppDependencies['config']): string[] {
  const raw =
    config.nodeEnv === 'production' && config.cors.originProd
      ? config.cors.originProd
      : config.cors.origin;
  return raw ? raw.split(',').map((o) => o.trim()) : ['http://localhost:3000'];
}

// Keeps only protocol and host so "https://app.example.com/" matches "https://app.example.com"
const normalizeOrigin = (origin: string): string => {
  try {
    const url = new URL(origin);
    return `${url.protocol}//${url.host}`;
  } catch {
    return origin;
  }
};

export function createApp(deps: AppDependencies): Express {
  const { config } = deps;
  const app = express();
  const allowedOrigins = getAllowedOrigins(config).map(normalizeOrigin);

  app.use(cors({
    origin: (origin, callback) => {
      // Requests without Origin (curl, server-to-server) are allowed
      if (!origin) {
        return callback(null, true);
      }
      const normalizedOrigin = normalizeOrigin(origin);
      if (allowedOrigins.includes(normalizedOrigin)) {
        callback(null, normalizedOrigin);
      } else {
        logger.warn('CORS blocked origin', { origin });
        callback(null, false);
      }
    },
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Token', 'Accept', 'Origin'],
    optionsSuccessStatus: 204,
  }));

  app.use(helmet({
    crossOriginResourcePolicy: { policy: 'cross-origin' },
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'", 'https:'],
        scriptSrc: ["'self'"],
        imgSrc: ["'self'", 'data:', 'https:'],
      },
    },
  }));

  if (config.nodeEnv !== 'test') {
    app.use(morgan('dev'));
  }
  app.use(express.json({ limit: '1mb' }));

  app.get('/', createDashboardController(deps.stats, deps.tokens).show);
  app.get('/health', createHealthCheck(deps.tokens));
  app.use(createAuthRouter(deps.authService));
  app.use(createMailRouter(deps.mailService, {
    maxRepeat: config.mail.maxRepeat,
    rateLimitPerMinute: config.mail.rateLimitPerMinute,
  }));

  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(getSwaggerSpec(), { customSiteTitle: 'SMTP Relay API' }));
  app.get('/api-docs.json', (_req, res) => res.json(getSwaggerSpec()));

  app.use((req, _res, next) => {
    next(new AppError(404, `Route ${req.method} ${req.path} not found`, 'NOT_FOUND'));
  });

  // Error handling (must be last)
  app.use(createErrorHandler({ isDev: config.nodeEnv === 'development' }));

  return app;
}
