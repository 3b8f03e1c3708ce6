/**
 * Error types raised by the disbursement core, the ledger and the deployment script
 */

export type DisbursementErrorKind =
  | 'WrongNetwork'
  | 'LengthMismatch'
  | 'InsufficientFunds'
  | 'InvalidRecipient'
  | 'TransferFailed'
  | 'ArithmeticOverflow';

// errorType codes sent to HTTP and WebSocket clients
const ERROR_TYPES: Record<DisbursementErrorKind, string> = {
  WrongNetwork: 'WRONG_NETWORK',
  LengthMismatch: 'LENGTH_MISMATCH',
  InsufficientFunds: 'INSUFFICIENT_FUNDS',
  InvalidRecipient: 'INVALID_RECIPIENT',
  TransferFailed: 'TRANSFER_FAILED',
  ArithmeticOverflow: 'ARITHMETIC_OVERFLOW',
};

export class BaseUtilsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BaseUtilsError';
  }
}

export class DisbursementError extends BaseUtilsError {
  public readonly kind: DisbursementErrorKind;
  public readonly errorType: string;
  // Position in the batch, when the failure belongs to one pair
  public readonly index?: number;

  constructor(kind: DisbursementErrorKind, message: string, options?: { index?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'DisbursementError';
    this.kind = kind;
    this.errorType = ERROR_TYPES[kind];
    this.index = options?.index;
  }
}

export type LedgerErrorCode =
  | 'INSUFFICIENT_BALANCE'
  | 'RECEIVER_REJECTED'
  | 'TRANSACTION_IN_PROGRESS'
  | 'TRANSACTION_CLOSED'
  | 'INVALID_AMOUNT';

export class LedgerError extends BaseUtilsError {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LedgerError';
    this.code = code;
  }
}

export type DeploymentErrorCode =
  | 'WRONG_NETWORK'
  | 'INSUFFICIENT_BALANCE'
  | 'ARTIFACT_NOT_FOUND'
  | 'INVALID_ARTIFACT'
  | 'DEPLOYMENT_FAILED'
  | 'NO_CODE';

export class DeploymentError extends BaseUtilsError {
  public readonly code: DeploymentErrorCode;

  constructor(code: DeploymentErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeploymentError';
    this.code = code;
  }
}
