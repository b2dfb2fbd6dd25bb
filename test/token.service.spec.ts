import { describe, it, expect } from 'vitest';
import jwt, { JwtPayload } from 'jsonwebtoken';
import { TokenService, TOKEN_TTL_SECONDS } from '../src/services/token.service';

const jwtConfig = { key: 'test-secret', issuer: 'dealer-stock-test', audience: 'dealer-stock-clients' };

const decodePayload = (token: string): JwtPayload => {
  const decoded = jwt.decode(token);
  if (!decoded || typeof decoded === 'string') {
    throw new Error('token payload is not an object');
  }
  return decoded;
};

describe('TokenService', () => {
  const tokens = new TokenService(jwtConfig);

  it('refuses to start without a signing key', () => {
    expect(() => new TokenService({ ...jwtConfig, key: '' })).toThrow(
      'JWT signing key is not configured'
    );
  });

  describe('issue', () => {
    it('embeds the dealer id, issuer and audience and expires one hour later', () => {
      const payload = decodePayload(tokens.issue(1001));

      expect(payload.dealerId).toBe('1001');
      expect(payload.iss).toBe('dealer-stock-test');
      expect(payload.aud).toBe('dealer-stock-clients');
      expect(payload.exp).toBeDefined();
      expect(payload.iat).toBeDefined();
      expect((payload.exp ?? 0) - (payload.iat ?? 0)).toBe(TOKEN_TTL_SECONDS);
      expect(TOKEN_TTL_SECONDS).toBe(3600);
    });

    it('gives every token its own id', () => {
      const first = decodePayload(tokens.issue(1001));
      const second = decodePayload(tokens.issue(1001));

      expect(first.jti).toMatch(/^[0-9a-f-]{36}$/);
      expect(second.jti).not.toBe(first.jti);
    });

    it('signs with HS256', () => {
      const decoded = jwt.decode(tokens.issue(1001), { complete: true });

      expect(decoded?.header.alg).toBe('HS256');
    });
  });

  describe('validate', () => {
    it('returns the dealer id of a token it issued', () => {
      expect(tokens.validate(tokens.issue(9999))).toEqual({ ok: true, value: 9999 });
    });

    it('fails when no token is present', () => {
      expect(tokens.validate(undefined)).toEqual({ ok: false, error: { reason: 'missing_token' } });
      expect(tokens.validate('')).toEqual({ ok: false, error: { reason: 'missing_token' } });
    });

    it('fails on garbage input', () => {
      expect(tokens.validate('not-a-jwt')).toEqual({ ok: false, error: { reason: 'invalid_token' } });
    });

    it('fails when signed with another key', () => {
      const foreign = new TokenService({ ...jwtConfig, key: 'other-secret' }).issue(1001);

      expect(tokens.validate(foreign)).toEqual({ ok: false, error: { reason: 'invalid_token' } });
    });

    it('fails on a wrong issuer', () => {
      const foreign = new TokenService({ ...jwtConfig, issuer: 'someone-else' }).issue(1001);

      expect(tokens.validate(foreign)).toEqual({ ok: false, error: { reason: 'invalid_token' } });
    });

    it('fails on a wrong audience', () => {
      const foreign = new TokenService({ ...jwtConfig, audience: 'someone-else' }).issue(1001);

      expect(tokens.validate(foreign)).toEqual({ ok: false, error: { reason: 'invalid_token' } });
    });

    it('fails when the payload was altered', () => {
      const [header, , signature] = tokens.issue(1001).split('.');
      const forgedPayload = Buffer.from(
        JSON.stringify({
          dealerId: '1002',
          iss: jwtConfig.issuer,
          aud: jwtConfig.audience,
          exp: Math.floor(Date.now() / 1000) + 600,
        })
      ).toString('base64url');

      expect(tokens.validate(`${header}.${forgedPayload}.${signature}`)).toEqual({
        ok: false,
        error: { reason: 'invalid_token' },
      });
    });

    it('fails on an expired token', () => {
      const expired = jwt.sign(
        { dealerId: '1001', exp: Math.floor(Date.now() / 1000) - 1 },
        jwtConfig.key,
        { issuer: jwtConfig.issuer, audience: jwtConfig.audience }
      );

      expect(tokens.validate(expired)).toEqual({ ok: false, error: { reason: 'expired_token' } });
    });

    it('allows no clock skew at the expiry second', () => {
      const expiringNow = jwt.sign(
        { dealerId: '1001', exp: Math.floor(Date.now() / 1000) },
        jwtConfig.key,
        { issuer: jwtConfig.issuer, audience: jwtConfig.audience }
      );

      expect(tokens.validate(expiringNow)).toEqual({ ok: false, error: { reason: 'expired_token' } });
    });

    it('fails when the dealer id claim is missing', () => {
      const token = jwt.sign({ sub: 'dealer' }, jwtConfig.key, {
        issuer: jwtConfig.issuer,
        audience: jwtConfig.audience,
        expiresIn: 60,
      });

      expect(tokens.validate(token)).toEqual({ ok: false, error: { reason: 'missing_claim' } });
    });

    it('fails when the dealer id claim is out of range', () => {
      const token = jwt.sign({ dealerId: '999' }, jwtConfig.key, {
        issuer: jwtConfig.issuer,
        audience: jwtConfig.audience,
        expiresIn: 60,
      });

      expect(tokens.validate(token)).toEqual({ ok: false, error: { reason: 'missing_claim' } });
    });
  });
});
