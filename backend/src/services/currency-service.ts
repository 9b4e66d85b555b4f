import { loadCurrencyConfig, type CurrencyConfig } from '../config/currency';
import { Money } from '../domain/money';

/**
 * Fixed-rate conversion into the base currency for display purposes.
 * Rates come from configuration; an unknown currency converts at 1.
 */
export class CurrencyService {
  constructor(private readonly config: CurrencyConfig = loadCurrencyConfig()) {}

  get baseCurrency(): string {
    return this.config.baseCurrency;
  }

  rateFor(currency: string): number {
    const code = currency.toUpperCase();
    if (code === this.config.baseCurrency) return 1;
    return this.config.exchangeRates[code] ?? 1;
  }

  convertToBase(money: Money): Money {
    const rate = this.rateFor(money.currency);
    if (rate === 0) {
      return Money.zero(this.config.baseCurrency);
    }
    return Money.of(money.amount * rate, this.config.baseCurrency);
  }
}
