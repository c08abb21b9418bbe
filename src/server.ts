import dotenv from 'dotenv';
import type { Server } from 'http';
import { createApp } from './app';
import { getConfig, Config } from './config/env';
import { CredentialCipher } from './common/utils/crypto.utils';
import { AuthService } from './modules/auth/auth.service';
import { MailService } from './modules/mail/mail.service';
import { NodemailerGateway } from './services/smtp.service';
import { StatsService } from './services/stats.service';
import { InMemoryTokenStore } from './services/token-store.service';
import { logger } from './utils/logger';

dotenv.config();

function readConfig(): Config {
  try {
    return getConfig();
  } catch (error) {
    logger.error('Invalid configuration', error);
    process.exit(1);
  }
}

const startServer = (): void => {
  const config = readConfig();

  const cipher = new CredentialCipher(config.encryptionKey);
  const tokens = new InMemoryTokenStore({
    ttlHours: config.tokens.ttlHours,
    sweepIntervalMs: config.tokens.sweepIntervalMs,
  });
  const stats = new StatsService();
  const smtp = new NodemailerGateway(config.smtp);

  const app = createApp({
    config,
    tokens,
    stats,
    authService: new AuthService(smtp, cipher, tokens, stats),
    mailService: new MailService(smtp, cipher, tokens, stats, { maxRepeat: config.mail.maxRepeat }),
  });

  tokens.start();
  const server: Server = app.listen(config.port, () => {
    logger.info(`Server is running on port ${config.port}`, {
      smtpHost: config.smtp.host,
      smtpPort: config.smtp.port,
    });
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    tokens.stop();
    server.close((err) => {
      if (err) {
        logger.error('Error while closing server', err);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
};

startServer();
