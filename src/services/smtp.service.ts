import nodemailer from 'nodemailer';
import type { SmtpConfig } from '../config/env';
import type { Credential } from '../common/types/relay.types';

export interface OutgoingMessage {
  from: string;
  to: string[];
  cc?: string[];
  bcc?: string[];
  replyTo?: string;
  subject: string;
  text?: string;
  html?: string;
}

export interface SmtpSession {
  send(message: OutgoingMessage): Promise<{ messageId: string }>;
  close(): void;
}

/**
 * Seam between the services and the SMTP server. Tests swap in a fake.
 */
export interface SmtpGateway {
  /** Resolves when the server accepts the login; rejects otherwise. */
  verify(credential: Credential): Promise<void>;
  openSession(credential: Credential): Promise<SmtpSession>;
}

function errorCode(error: unknown): string | undefined {
  if (error !== null && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Turns a nodemailer failure into a message safe to return to the client. */
export function describeSmtpError(error: unknown): string {
  const msg = error instanceof Error ? error.message : String(error);
  const code = errorCode(error);
  if (msg.includes('Application-specific password') || msg.includes('185833')) {
    return 'Gmail requires an app password, not the account password. Enable 2-Step Verification and create one at https://support.google.com/accounts/answer/185833';
  }
  if (code === 'EAUTH' || /authentication/i.test(msg)) {
    return 'SMTP server rejected the credentials';
  }
  if (code === 'ETIMEDOUT' || /timeout/i.test(msg)) {
    return 'SMTP server timed out';
  }
  if (code === 'ECONNECTION' || code === 'ECONNREFUSED' || code === 'ESOCKET' || code === 'EDNS') {
    return 'Cannot connect to SMTP server';
  }
  return msg || 'SMTP error';
}

export class NodemailerGateway implements SmtpGateway {
  constructor(private readonly config: SmtpConfig) {}

  private createTransport(credential: Credential) {
    // One pooled connection so repeated messages go out in order over the same session.
    return nodemailer.createTransport({
      pool: true,
      maxConnections: 1,
      host: this.config.host,
      port: this.config.port,
      secure: this.config.secure,
      auth: { user: credential.email, pass: credential.password },
      connectionTimeout: this.config.timeoutMs,
      greetingTimeout: this.config.timeoutMs,
      socketTimeout: this.config.timeoutMs,
    });
  }

  async verify(credential: Credential): Promise<void> {
    const transport = this.createTransport(credential);
    try {
      await transport.verify();
    } finally {
      transport.close();
    }
  }

  /** Connects and logs in up front, so a dead endpoint or stale password fails here. */
  async openSession(credential: Credential): Promise<SmtpSession> {
    const transport = this.createTransport(credential);
    try {
      await transport.verify();
    } catch (error) {
      transport.close();
      throw error;
    }
    return {
      async send(message) {
        const info = await transport.sendMail({
          from: message.from,
          to: message.to,
          cc: message.cc,
          bcc: message.bcc,
          replyTo: message.replyTo,
          subject: message.subject,
          text: message.text,
          html: message.html,
        });
        return { messageId: info.messageId };
      },
      close() {
        transport.close();
      },
    };
  }
}
