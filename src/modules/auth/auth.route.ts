import { Router } from 'express';
import { asyncHandler } from '../../middleware/asyncHandler';
import { validate } from '../../middleware/validate';
import { createAuthRateLimiter } from '../../middleware/rateLimit.middleware';
import { requireToken } from '../../middleware/token.middleware';
import { authValidators } from '../../validators/auth.validators';
import { createAuthController } from './auth.controller';
import type { AuthService } from './auth.service';

export function createAuthRouter(authService: AuthService): Router {
  const router = Router();
  const ctrl = createAuthController(authService);

  router.post('/auth', createAuthRateLimiter(), validate(authValidators), asyncHandler(ctrl.authenticate));
  router.delete('/token', requireToken, asyncHandler(ctrl.revoke));

  return router;
}
