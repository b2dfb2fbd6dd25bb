import jwt, { JwtPayload } from 'jsonwebtoken';
import { randomUUID } from 'crypto';
import { JwtConfig } from '../config';
import { AuthFailure, Result, fail, isDealerId, ok } from '../types';

export const TOKEN_TTL_SECONDS = 60 * 60;

/**
 * Issues and validates the HS256 tokens carried in the `jwt` cookie.
 * Validation is purely cryptographic and time based; nothing is stored.
 */
export class TokenService {
  private readonly config: Readonly<JwtConfig>;

  constructor(config: JwtConfig) {
    if (!config.key) {
      throw new Error('JWT signing key is not configured');
    }
    this.config = Object.freeze({ ...config });
  }

  issue(dealerId: number): string {
    return jwt.sign({ dealerId: String(dealerId) }, this.config.key, {
      algorithm: 'HS256',
      issuer: this.config.issuer,
      audience: this.config.audience,
      expiresIn: TOKEN_TTL_SECONDS,
      jwtid: randomUUID(),
    });
  }

  validate(token: string | undefined): Result<number, AuthFailure> {
    if (!token) {
      return fail({ reason: 'missing_token' });
    }

    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.config.key, {
        algorithms: ['HS256'],
        issuer: this.config.issuer,
        audience: this.config.audience,
        clockTolerance: 0,
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        return fail({ reason: 'expired_token' });
      }
      if (error instanceof jwt.JsonWebTokenError) {
        return fail({ reason: 'invalid_token' });
      }
      throw error;
    }

    if (typeof payload === 'string') {
      return fail({ reason: 'invalid_token' });
    }

    const claim: unknown = payload.dealerId;
    if (typeof claim !== 'string' || !/^\d{4}$/.test(claim)) {
      return fail({ reason: 'missing_claim' });
    }

    const dealerId = Number(claim);
    return isDealerId(dealerId) ? ok(dealerId) : fail({ reason: 'missing_claim' });
  }
}
