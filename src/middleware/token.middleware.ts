import { Request, Response, NextFunction } from 'express';

export const TOKEN_HEADER = 'x-token';

export interface TokenRequest extends Request {
  relayToken?: string;
}

/**
 * Picks the relay token from `X-Token` (or `Authorization: Bearer`). Validity
 * is checked by the token store, not here.
 */
export const requireToken = (req: TokenRequest, res: Response, next: NextFunction): void => {
  const header = req.get(TOKEN_HEADER)?.trim();
  const bearer = req.headers.authorization?.startsWith('Bearer ')
    ? req.headers.authorization.slice('Bearer '.length).trim()
    : undefined;
  const token = header || bearer;

  if (!token) {
    res.status(401).json({ error: 'Token not provided. Send it in the X-Token header.', code: 'NO_TOKEN' });
    return;
  }

  req.relayToken = token;
  next();
};
