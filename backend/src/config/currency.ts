import { DEFAULT_CURRENCY } from '../domain/money';

export interface CurrencyConfig {
  baseCurrency: string;
  /** Multiplier from a currency into the base currency. */
  exchangeRates: Record<string, number>;
}

export function loadCurrencyConfig(): CurrencyConfig {
  return {
    baseCurrency: parseCurrencyCode(process.env.BASE_CURRENCY) ?? DEFAULT_CURRENCY,
    exchangeRates: parseExchangeRates(process.env.EXCHANGE_RATES),
  };
}

function parseCurrencyCode(value: string | undefined): string | null {
  if (!value) return null;
  const code = value.trim().toUpperCase();
  return code.length === 3 ? code : null;
}

/**
 * Parses "EUR=1.08,GBP=1.27". Malformed entries are dropped.
 */
function parseExchangeRates(value: string | undefined): Record<string, number> {
  const rates: Record<string, number> = {};
  if (!value || value.trim() === '') return rates;

  for (const entry of value.split(',')) {
    const [rawCode, rawRate] = entry.split('=');
    const code = parseCurrencyCode(rawCode);
    const rate = rawRate === undefined ? NaN : parseFloat(rawRate.trim());

    if (code && Number.isFinite(rate) && rate >= 0) {
      rates[code] = rate;
    }
  }

  return rates;
}
