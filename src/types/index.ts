export type Dealer = {
  DealerId: number;
  HashedPassword: string;
};

export type Car = {
  Id: number;
  Make: string;
  Model: string;
  Year: number;
  StockLevel: number;
  DealerId: number;
};

export type NewCar = Omit<Car, 'Id'>;

export interface CarSearchCriteria {
  make?: string;
  model?: string;
}

export interface AuthenticatedDealer {
  dealerId: number;
}

export type AuthFailureReason =
  | 'missing_token'
  | 'invalid_token'
  | 'expired_token'
  | 'missing_claim'
  | 'invalid_credentials';

export interface AuthFailure {
  reason: AuthFailureReason;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const fail = <E>(error: E): Result<never, E> => ({ ok: false, error });

export const DEALER_ID_MIN = 1000;
export const DEALER_ID_MAX = 9999;

export const isDealerId = (value: number): boolean =>
  Number.isInteger(value) && value >= DEALER_ID_MIN && value <= DEALER_ID_MAX;
