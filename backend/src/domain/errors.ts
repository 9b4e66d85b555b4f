import type { SubscriptionStatus } from '../types/subscription';

export type DomainErrorCode =
  | 'INVALID_AMOUNT'
  | 'INVALID_CURRENCY'
  | 'INCOMPATIBLE_CURRENCY'
  | 'INVALID_INTERVAL'
  | 'INVALID_UNIT'
  | 'INVALID_TIMING'
  | 'INVALID_STATUS'
  | 'INVALID_TRANSITION'
  | 'INCONSISTENT_STATE'
  | 'DUPLICATE_RULE'
  | 'CURRENCY_MISMATCH'
  | 'NOT_FOUND';

/**
 * Base class for every failure raised by the domain and use-case layers.
 * Callers branch on `code`; the message is for humans.
 */
export class DomainError extends Error {
  readonly code: DomainErrorCode;

  constructor(code: DomainErrorCode, message: string) {
    super(message);
    this.name = 'DomainError';
    this.code = code;
    Object.setPrototypeOf(this, DomainError.prototype);
  }
}

export class InvalidAmountError extends DomainError {
  constructor(amount: number) {
    super('INVALID_AMOUNT', `Amount must be a non-negative number, got ${amount}`);
    this.name = 'InvalidAmountError';
    Object.setPrototypeOf(this, InvalidAmountError.prototype);
  }
}

export class InvalidCurrencyError extends DomainError {
  constructor(currency: string) {
    super('INVALID_CURRENCY', `Currency must be a 3-letter code (e.g. USD), got "${currency}"`);
    this.name = 'InvalidCurrencyError';
    Object.setPrototypeOf(this, InvalidCurrencyError.prototype);
  }
}

export class IncompatibleCurrencyError extends DomainError {
  constructor(expected: string, actual: string) {
    super('INCOMPATIBLE_CURRENCY', `Cannot combine ${expected} with ${actual}`);
    this.name = 'IncompatibleCurrencyError';
    Object.setPrototypeOf(this, IncompatibleCurrencyError.prototype);
  }
}

export class InvalidIntervalError extends DomainError {
  constructor(interval: number) {
    super('INVALID_INTERVAL', `Billing interval must be a positive integer, got ${interval}`);
    this.name = 'InvalidIntervalError';
    Object.setPrototypeOf(this, InvalidIntervalError.prototype);
  }
}

export class InvalidUnitError extends DomainError {
  constructor(unit: string) {
    super('INVALID_UNIT', `Billing unit must be days, weeks, months, or years, got "${unit}"`);
    this.name = 'InvalidUnitError';
    Object.setPrototypeOf(this, InvalidUnitError.prototype);
  }
}

export class InvalidTimingError extends DomainError {
  constructor(timing: string) {
    super('INVALID_TIMING', `Unknown notification timing "${timing}"`);
    this.name = 'InvalidTimingError';
    Object.setPrototypeOf(this, InvalidTimingError.prototype);
  }
}

export class InvalidStatusError extends DomainError {
  constructor(status: string) {
    super('INVALID_STATUS', `Unknown subscription status "${status}"`);
    this.name = 'InvalidStatusError';
    Object.setPrototypeOf(this, InvalidStatusError.prototype);
  }
}

export type SubscriptionAction = 'pause' | 'resume' | 'cancel' | 'process_renewal';

export class InvalidTransitionError extends DomainError {
  readonly from: SubscriptionStatus;
  readonly action: SubscriptionAction;

  constructor(subscriptionId: string, from: SubscriptionStatus, action: SubscriptionAction, message: string) {
    super('INVALID_TRANSITION', `${message} (subscription ${subscriptionId})`);
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.action = action;
    Object.setPrototypeOf(this, InvalidTransitionError.prototype);
  }
}

/**
 * Raised when stored state cannot form a valid aggregate.
 */
export class InconsistentStateError extends DomainError {
  constructor(subscriptionId: string, message: string) {
    super('INCONSISTENT_STATE', `${message} (subscription ${subscriptionId})`);
    this.name = 'InconsistentStateError';
    Object.setPrototypeOf(this, InconsistentStateError.prototype);
  }
}

export class DuplicateRuleError extends DomainError {
  constructor(timing: string) {
    super('DUPLICATE_RULE', `Notification rule for ${timing} already exists`);
    this.name = 'DuplicateRuleError';
    Object.setPrototypeOf(this, DuplicateRuleError.prototype);
  }
}

export class CurrencyMismatchError extends DomainError {
  readonly currencies: string[];

  constructor(currencies: string[]) {
    super(
      'CURRENCY_MISMATCH',
      `Cannot aggregate subscriptions billed in different currencies: ${currencies.join(', ')}`,
    );
    this.name = 'CurrencyMismatchError';
    this.currencies = currencies;
    Object.setPrototypeOf(this, CurrencyMismatchError.prototype);
  }
}

export type EntityKind = 'Subscription' | 'Provider' | 'NotificationRule';

export class NotFoundError extends DomainError {
  readonly entity: EntityKind;
  readonly entityId: string;

  constructor(entity: EntityKind, entityId: string) {
    super('NOT_FOUND', `${entity} ${entityId} not found`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.entityId = entityId;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}
