import { Request, Response, NextFunction, RequestHandler } from 'express';
import { TokenService } from '../services/token.service';
import { AuthenticatedDealer } from '../types';

export const AUTH_COOKIE = 'jwt';

// Extend Express Request to include the authenticated dealer
declare global {
  namespace Express {
    interface Request {
      dealer?: AuthenticatedDealer;
    }
  }
}

/**
 * Resolves the dealer from the `jwt` cookie. Any failure answers 401 with the
 * same body, whatever the reason.
 */
export const authenticate = (tokens: TokenService): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    const cookies: Record<string, unknown> = req.cookies ?? {};
    const token = cookies[AUTH_COOKIE];

    const result = tokens.validate(typeof token === 'string' ? token : undefined);
    if (!result.ok) {
      res.status(401).json({ message: 'Unauthorized' });
      return;
    }

    req.dealer = { dealerId: result.value };
    next();
  };
};

/** The dealer resolved by `authenticate`; throws if that middleware did not run. */
export const dealerIdOf = (req: Request): number => {
  if (!req.dealer) {
    throw new Error('authenticate must run before this handler');
  }
  return req.dealer.dealerId;
};
