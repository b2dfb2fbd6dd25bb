import bcrypt from 'bcryptjs';
import { DealerRepository } from '../repositories/dealer.repository';
import { AuthFailure, Result, fail, ok } from '../types';
import { TokenService } from './token.service';

export const PASSWORD_SALT_ROUNDS = 10;

export interface LoginDto {
  dealerId: number;
  password: string;
}

export class AuthService {
  // Compared against when the dealer does not exist, so both failure paths cost one bcrypt round.
  private readonly dummyHash = bcrypt.hashSync('not-a-dealer-password', PASSWORD_SALT_ROUNDS);

  constructor(
    private readonly dealers: DealerRepository,
    private readonly tokens: TokenService
  ) {}

  /** Resolves to a signed token, or a failure that never says which check failed. */
  async login(data: LoginDto): Promise<Result<string, AuthFailure>> {
    const dealer = await this.dealers.findByDealerId(data.dealerId);

    const isValidPassword = await bcrypt.compare(
      data.password,
      dealer?.HashedPassword ?? this.dummyHash
    );

    if (!dealer || !isValidPassword) {
      return fail({ reason: 'invalid_credentials' });
    }

    return ok(this.tokens.issue(dealer.DealerId));
  }
}

export const hashPassword = (password: string): Promise<string> =>
  bcrypt.hash(password, PASSWORD_SALT_ROUNDS);
