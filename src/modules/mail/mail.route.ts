import { Router } from 'express';
import { asyncHandler } from '../../middleware/asyncHandler';
import { validate } from '../../middleware/validate';
import { createSendRateLimiter } from '../../middleware/rateLimit.middleware';
import { requireToken } from '../../middleware/token.middleware';
import { legacyMailValidators, sendValidators } from '../../validators/mail.validators';
import { createMailController } from './mail.controller';
import type { MailService } from './mail.service';

export interface MailRouterOptions {
  maxRepeat: number;
  rateLimitPerMinute: number;
}

export function createMailRouter(mailService: MailService, options: MailRouterOptions): Router {
  const router = Router();
  const ctrl = createMailController(mailService);
  const limiter = createSendRateLimiter(options.rateLimitPerMinute);

  // Token is checked first so a bad token never reaches validation or SMTP.
  router.post('/send', limiter, requireToken, validate(sendValidators(options.maxRepeat)), asyncHandler(ctrl.send));
  router.post('/mail', limiter, validate(legacyMailValidators(options.maxRepeat)), asyncHandler(ctrl.sendLegacy));

  return router;
}
