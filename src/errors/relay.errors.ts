import { AppError } from './AppError';

/** SMTP login rejected the submitted credentials or could not be completed. */
export class AuthenticationError extends AppError {
  constructor(message = 'SMTP authentication failed') {
    super(401, message, 'AUTH_FAILED');
  }
}

export class TokenNotFoundError extends AppError {
  constructor() {
    super(401, 'Invalid token. Authenticate again.', 'INVALID_TOKEN');
  }
}

export class TokenExpiredError extends AppError {
  constructor() {
    super(401, 'Token expired. Authenticate again.', 'TOKEN_EXPIRED');
  }
}

/** Stored credential blob is corrupted or was sealed under another key. */
export class DecryptionError extends AppError {
  constructor(reason: string) {
    super(500, `Stored credentials could not be decrypted: ${reason}`, 'DECRYPTION_FAILED');
  }
}

export interface SendProgress {
  sent: number;
  failed: number;
  requested: number;
}

export class SendError extends AppError {
  constructor(
    message: string,
    public readonly progress: SendProgress
  ) {
    super(502, message, 'SEND_FAILED', { ...progress });
  }
}
