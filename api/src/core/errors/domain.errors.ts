export type DomainErrorKind = 'not_found' | 'conflict' | 'invalid';

export abstract class DomainError extends Error {
  abstract readonly kind: DomainErrorKind;
}

export class ClientNotFoundError extends DomainError {
  readonly kind = 'not_found';
  constructor(readonly clientId: string) {
    super(`Client ${clientId} not found`);
    this.name = 'ClientNotFoundError';
  }
}

export class TransactionNotFoundError extends DomainError {
  readonly kind = 'not_found';
  constructor(readonly transactionId: string) {
    super(`Transaction ${transactionId} not found`);
    this.name = 'TransactionNotFoundError';
  }
}

export class LineItemNotFoundError extends DomainError {
  readonly kind = 'not_found';
  constructor(readonly lineItemId: string) {
    super(`Line item ${lineItemId} not found`);
    this.name = 'LineItemNotFoundError';
  }
}

export class BalanceConflictError extends DomainError {
  readonly kind = 'conflict';
  constructor(
    readonly clientId: string,
    readonly expected: number,
  ) {
    super(
      `Bonus balance of client ${clientId} changed concurrently (expected ${expected})`,
    );
    this.name = 'BalanceConflictError';
  }
}

export class RecalculationInProgressError extends DomainError {
  readonly kind = 'conflict';
  constructor(readonly job: string) {
    super(`${job} is already running`);
    this.name = 'RecalculationInProgressError';
  }
}

export class DuplicateTransactionError extends DomainError {
  readonly kind = 'conflict';
  constructor(readonly transactionId: string) {
    super(`Transaction ${transactionId} already exists`);
    this.name = 'DuplicateTransactionError';
  }
}

export class InvalidAdjustmentError extends DomainError {
  readonly kind = 'invalid';
  constructor(message: string) {
    super(message);
    this.name = 'InvalidAdjustmentError';
  }
}

export class InvalidSettingError extends DomainError {
  readonly kind = 'invalid';
  constructor(
    readonly key: string,
    readonly value: string,
    expected: string,
  ) {
    super(`Setting "${key}" has invalid value "${value}": expected ${expected}`);
    this.name = 'InvalidSettingError';
  }
}
