declare const addressBrand: unique symbol;

/**
 * A validated, lower-case `0x`-prefixed 20-byte address.
 * Only `EthereumService.toAddress` and `EthereumService.toRecipient` produce one.
 */
export type Address = string & { readonly [addressBrand]: true };

export type AuditAction = 'batch_transfer' | 'deposit';

// Audit record before the trail stamps it with a sequence number
export interface AuditRecord {
  account: Address;
  action: AuditAction;
  amount: bigint;
  blockNumber: bigint;
  timestamp: bigint;
}

export interface AuditEvent extends AuditRecord {
  readonly sequence: number;
}

export interface NetworkInfo {
  chainId: bigint;
  bridge: Address;
  blockNumber: bigint;
  timestamp: bigint;
}

export interface BlockHeader {
  number: bigint;
  timestamp: bigint;
}

// Boundary form of a batch: parallel sequences as received from the caller
export interface TransferRequest {
  recipients: ReadonlyArray<string | null | undefined>;
  amounts: readonly bigint[];
}

export interface DisbursementContext {
  caller: Address;
  suppliedValue: bigint;
}

export interface DisbursementResult {
  events: AuditEvent[];
  totalAmount: bigint;
  retained: bigint;
  blockNumber: bigint;
}

export interface SerializedAuditEvent {
  sequence: number;
  account: string;
  action: AuditAction;
  amount: string;
  blockNumber: string;
  timestamp: string;
}
