import type { CredentialCipher } from '../../common/utils/crypto.utils';
import type { AuthResult } from '../../common/types/relay.types';
import { AuthenticationError } from '../../errors/relay.errors';
import type { SmtpGateway } from '../../services/smtp.service';
import { describeSmtpError } from '../../services/smtp.service';
import type { StatsService } from '../../services/stats.service';
import type { TokenStore } from '../../services/token-store.service';
import { logger } from '../../utils/logger';

const HOUR_MS = 60 * 60 * 1000;

export class AuthService {
  constructor(
    private readonly smtp: SmtpGateway,
    private readonly cipher: CredentialCipher,
    private readonly tokens: TokenStore,
    private readonly stats: StatsService
  ) {}

  /**
   * Logs in to the SMTP server with the submitted pair. A successful login is
   * the only proof the app password is genuine; nothing is stored otherwise.
   */
  async authenticate(email: string, password: string): Promise<AuthResult> {
    try {
      await this.smtp.verify({ email, password });
    } catch (error) {
      this.stats.recordAuth(false);
      logger.warn('SMTP login failed', { email, reason: error instanceof Error ? error.message : String(error) });
      throw new AuthenticationError(describeSmtpError(error));
    }

    const record = this.tokens.issue(this.cipher.encrypt({ email, password }));
    this.stats.recordAuth(true);
    logger.info('Token issued', { email, expiresAt: new Date(record.expiresAt).toISOString() });

    const expiresInHours = (record.expiresAt - record.issuedAt) / HOUR_MS;
    return {
      token: record.token,
      expiresInHours,
      expiresAt: record.expiresAt,
      senderEmail: email,
      message: `Authentication successful. Token is valid for ${expiresInHours} hour${expiresInHours === 1 ? '' : 's'}.`,
    };
  }

  revoke(token: string): boolean {
    const removed = this.tokens.revoke(token);
    if (removed) logger.info('Token revoked');
    return removed;
  }
}
