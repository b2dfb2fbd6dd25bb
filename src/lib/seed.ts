import { DealerRepository } from '../repositories/dealer.repository';
import { hashPassword } from '../services/auth.service';
import { isDealerId } from '../types';
import { ConnectionFactory } from './database';

export interface DealerSeed {
  dealerId: number;
  password: string;
}

export async function seedDealers(connections: ConnectionFactory, dealers: DealerSeed[]): Promise<void> {
  const repository = new DealerRepository(connections);

  for (const dealer of dealers) {
    if (!isDealerId(dealer.dealerId)) {
      throw new Error(`Dealer id ${dealer.dealerId} is not a four-digit number`);
    }
    await repository.upsert(dealer.dealerId, await hashPassword(dealer.password));
  }
}
