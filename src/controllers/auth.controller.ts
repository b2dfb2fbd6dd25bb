import { Request, Response, CookieOptions } from 'express';
import { AUTH_COOKIE } from '../middleware/auth';
import { AuthService } from '../services/auth.service';
import { TOKEN_TTL_SECONDS } from '../services/token.service';
import { loginSchema, validate } from '../validators';

export const authCookieOptions = (): CookieOptions => ({
  httpOnly: true,
  secure: true,
  sameSite: 'strict',
  path: '/',
  maxAge: TOKEN_TTL_SECONDS * 1000,
});

export const createAuthController = (authService: AuthService) => ({
  async login(req: Request, res: Response): Promise<void> {
    const parsed = validate(loginSchema, req.body);
    if (!parsed.ok) {
      res.status(400).json(parsed.error);
      return;
    }

    try {
      const { DealerId, Password } = parsed.value;
      const result = await authService.login({ dealerId: DealerId, password: Password });

      if (!result.ok) {
        res.status(401).json({ message: 'Invalid username or password' });
        return;
      }

      res.cookie(AUTH_COOKIE, result.value, authCookieOptions());
      res.json({ message: 'Logged in successfully' });
    } catch (error) {
      console.error('Error during login:', error);
      res.status(500).json({ message: 'Login failed' });
    }
  },
});

export type AuthController = ReturnType<typeof createAuthController>;
