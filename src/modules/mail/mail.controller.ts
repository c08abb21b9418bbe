import { Request, Response } from 'express';
import type { DeliveryResult, SendRequest } from '../../common/types/relay.types';
import { TokenNotFoundError } from '../../errors/relay.errors';
import type { TokenRequest } from '../../middleware/token.middleware';
import type { MailService } from './mail.service';

interface SendBody {
  recipients: string[];
  subject: string;
  body: string;
  is_html?: boolean;
  cc?: string[];
  bcc?: string[];
  reply_to?: string;
  repeat?: number;
}

interface LegacyMailBody {
  recipient_email: string;
  subject: string;
  body: string;
  quantity?: number;
  token: string;
}

function toResponse(result: DeliveryResult) {
  return {
    sent: result.sent,
    failed: result.failed,
    requested: result.requested,
    recipients: result.recipients,
    message_ids: result.messageIds,
    message: result.sent === 1 ? 'Message sent' : `${result.sent} messages sent`,
  };
}

export function createMailController(mailService: MailService) {
  return {
    async send(req: TokenRequest, res: Response): Promise<void> {
      if (!req.relayToken) throw new TokenNotFoundError();
      const body = req.body as SendBody;
      const request: SendRequest = {
        recipients: body.recipients,
        subject: body.subject,
        body: body.body,
        isHtml: body.is_html ?? false,
        cc: body.cc,
        bcc: body.bcc,
        replyTo: body.reply_to,
        repeat: body.repeat,
      };
      const result = await mailService.send(req.relayToken, request);
      res.json(toResponse(result));
    },

    async sendLegacy(req: Request, res: Response): Promise<void> {
      const body = req.body as LegacyMailBody;
      const result = await mailService.send(body.token, {
        recipients: body.recipient_email,
        subject: body.subject,
        body: body.body,
        repeat: body.quantity,
      });
      res.json(toResponse(result));
    },
  };
}
