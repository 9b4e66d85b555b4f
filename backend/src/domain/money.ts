import { IncompatibleCurrencyError, InvalidAmountError, InvalidCurrencyError } from './errors';
import type { MoneySnapshot } from '../types/subscription';

export const DEFAULT_CURRENCY = 'USD';

/**
 * Immutable monetary amount. Every operation returns a new instance.
 */
export class Money {
  readonly amount: number;
  readonly currency: string;

  private constructor(amount: number, currency: string) {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new InvalidAmountError(amount);
    }
    if (currency.length !== 3) {
      throw new InvalidCurrencyError(currency);
    }

    this.amount = amount;
    this.currency = currency;
    Object.freeze(this);
  }

  static of(amount: number, currency: string = DEFAULT_CURRENCY): Money {
    return new Money(amount, currency);
  }

  static zero(currency: string = DEFAULT_CURRENCY): Money {
    return new Money(0, currency);
  }

  static fromSnapshot(snapshot: MoneySnapshot): Money {
    return new Money(snapshot.amount, snapshot.currency);
  }

  add(other: Money): Money {
    if (other.currency !== this.currency) {
      throw new IncompatibleCurrencyError(this.currency, other.currency);
    }
    return new Money(this.amount + other.amount, this.currency);
  }

  scale(factor: number): Money {
    return new Money(this.amount * factor, this.currency);
  }

  isZero(): boolean {
    return this.amount === 0;
  }

  equals(other: Money): boolean {
    return this.amount === other.amount && this.currency === other.currency;
  }

  format(): string {
    return `${this.amount.toFixed(2)} ${this.currency}`;
  }

  toJSON(): MoneySnapshot {
    return { amount: this.amount, currency: this.currency };
  }
}
