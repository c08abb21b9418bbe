import { Request, Response } from 'express';
import { TokenNotFoundError } from '../../errors/relay.errors';
import type { TokenRequest } from '../../middleware/token.middleware';
import type { AuthService } from './auth.service';

export function createAuthController(authService: AuthService) {
  return {
    async authenticate(req: Request, res: Response): Promise<void> {
      const { email, password } = req.body as { email: string; password: string };
      const result = await authService.authenticate(email, password);
      res.json({
        token: result.token,
        expires_in_hours: result.expiresInHours,
        expires_at: new Date(result.expiresAt).toISOString(),
        sender_email: result.senderEmail,
        message: result.message,
      });
    },

    async revoke(req: TokenRequest, res: Response): Promise<void> {
      if (!req.relayToken || !authService.revoke(req.relayToken)) {
        throw new TokenNotFoundError();
      }
      res.json({ message: 'Token revoked' });
    },
  };
}
