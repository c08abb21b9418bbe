import type { CredentialCipher } from '../../common/utils/crypto.utils';
import type { DeliveryResult, SendRequest } from '../../common/types/relay.types';
import { AppError } from '../../errors/AppError';
import { SendError } from '../../errors/relay.errors';
import type { OutgoingMessage, SmtpGateway, SmtpSession } from '../../services/smtp.service';
import { describeSmtpError } from '../../services/smtp.service';
import type { StatsService } from '../../services/stats.service';
import type { TokenStore } from '../../services/token-store.service';
import { logger } from '../../utils/logger';

export interface MailServiceOptions {
  maxRepeat: number;
}

export function toAddressList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  const list = Array.isArray(value) ? value : [value];
  return list.map((address) => address.trim()).filter((address) => address.length > 0);
}

export class MailService {
  constructor(
    private readonly smtp: SmtpGateway,
    private readonly cipher: CredentialCipher,
    private readonly tokens: TokenStore,
    private readonly stats: StatsService,
    private readonly options: MailServiceOptions
  ) {}

  /**
   * Sends `repeat` copies of one message, in order, over a single SMTP session.
   * Stops at the first failure and reports how many went out before it.
   */
  async send(token: string, request: SendRequest): Promise<DeliveryResult> {
    // Token and credentials are resolved before any connection is opened.
    const credential = this.cipher.decrypt(this.tokens.lookup(token));

    const recipients = toAddressList(request.recipients);
    if (recipients.length === 0) {
      throw new AppError(400, 'At least one recipient is required', 'VALIDATION_ERROR');
    }
    const requested = request.repeat ?? 1;
    if (!Number.isInteger(requested) || requested < 1 || requested > this.options.maxRepeat) {
      throw new AppError(400, `repeat must be an integer from 1 to ${this.options.maxRepeat}`, 'VALIDATION_ERROR');
    }

    const message: OutgoingMessage = {
      from: credential.email,
      to: recipients,
      subject: request.subject,
      ...(request.isHtml ? { html: request.body } : { text: request.body }),
    };
    const cc = toAddressList(request.cc);
    const bcc = toAddressList(request.bcc);
    if (cc.length > 0) message.cc = cc;
    if (bcc.length > 0) message.bcc = bcc;
    if (request.replyTo) message.replyTo = request.replyTo;

    let session: SmtpSession;
    try {
      session = await this.smtp.openSession(credential);
    } catch (error) {
      this.stats.recordSend(0, 1);
      logger.warn('SMTP session could not be opened', { sender: credential.email, reason: describeSmtpError(error) });
      throw new SendError(describeSmtpError(error), { sent: 0, failed: 1, requested });
    }

    const messageIds: string[] = [];
    try {
      for (let i = 0; i < requested; i++) {
        try {
          const { messageId } = await session.send(message);
          messageIds.push(messageId);
        } catch (error) {
          const reason = describeSmtpError(error);
          this.stats.recordSend(i, 1);
          logger.warn('Send stopped after failure', { sender: credential.email, sent: i, requested, reason });
          throw new SendError(`Message ${i + 1} of ${requested} failed: ${reason}`, {
            sent: i,
            failed: 1,
            requested,
          });
        }
      }
    } finally {
      session.close();
    }

    this.stats.recordSend(requested, 0);
    logger.info('Mail sent', { sender: credential.email, recipients: recipients.length, copies: requested });
    return { sent: requested, failed: 0, requested, recipients, messageIds };
  }
}
