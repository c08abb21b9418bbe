import { Request, Response } from 'express';
import type { TokenStore } from '../../services/token-store.service';

export function createHealthCheck(tokens: TokenStore) {
  return (_req: Request, res: Response): void => {
    res.json({ status: 'ok', message: 'Server is running', active_tokens: tokens.size() });
  };
}
