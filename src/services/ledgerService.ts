import { Address } from '../types/index.js';
import { LedgerError } from '../types/errors.js';

/**
 * Hook an account can register to accept or refuse inbound value.
 * Throwing from onValueReceived rejects the transfer.
 */
export interface ValueReceiver {
  onValueReceived(sender: Address, amount: bigint): void;
}

export interface GenesisAllocation {
  address: Address;
  balance: bigint;
}

type TransactionState = 'open' | 'committed' | 'rolledBack';

/**
 * In-process value ledger with atomic, staged transactions
 */
export class LedgerService {
  private balances: Map<Address, bigint> = new Map();
  private receivers: Map<Address, ValueReceiver> = new Map();
  private openTransaction: LedgerTransaction | null = null;

  constructor(genesis: GenesisAllocation[] = []) {
    genesis.forEach(({ address, balance }) => this.credit(address, balance));
  }

  balanceOf(address: Address): bigint {
    return this.balances.get(address) ?? 0n;
  }

  /**
   * Mint value to an account outside any transaction (genesis or faucet funding)
   */
  credit(address: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError('INVALID_AMOUNT', `Cannot credit a negative amount: ${amount}`);
    }
    if (this.openTransaction) {
      throw new LedgerError('TRANSACTION_IN_PROGRESS', 'Cannot credit while a transaction is open');
    }
    this.balances.set(address, this.balanceOf(address) + amount);
  }

  registerReceiver(address: Address, receiver: ValueReceiver): void {
    this.receivers.set(address, receiver);
  }

  unregisterReceiver(address: Address): void {
    this.receivers.delete(address);
  }

  getReceiver(address: Address): ValueReceiver | undefined {
    return this.receivers.get(address);
  }

  beginTransaction(): LedgerTransaction {
    if (this.openTransaction) {
      throw new LedgerError('TRANSACTION_IN_PROGRESS', 'Another ledger transaction is still open');
    }
    const transaction = new LedgerTransaction(this, (staged) => this.close(transaction, staged));
    this.openTransaction = transaction;
    return transaction;
  }

  hasOpenTransaction(): boolean {
    return this.openTransaction !== null;
  }

  private close(transaction: LedgerTransaction, staged: Map<Address, bigint> | null): void {
    if (this.openTransaction !== transaction) {
      return;
    }
    this.openTransaction = null;
    if (staged) {
      staged.forEach((balance, address) => this.balances.set(address, balance));
    }
  }
}

/**
 * Pending balance changes over the committed ledger state.
 * Nothing is visible to the ledger until commit().
 */
export class LedgerTransaction {
  private staged: Map<Address, bigint> = new Map();
  private state: TransactionState = 'open';

  constructor(
    private readonly ledger: LedgerService,
    private readonly onClose: (staged: Map<Address, bigint> | null) => void
  ) {}

  balanceOf(address: Address): bigint {
    return this.staged.get(address) ?? this.ledger.balanceOf(address);
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    this.ensureOpen();
    if (amount < 0n) {
      throw new LedgerError('INVALID_AMOUNT', `Cannot transfer a negative amount: ${amount}`);
    }

    const fromBalance = this.balanceOf(from);
    if (fromBalance < amount) {
      throw new LedgerError(
        'INSUFFICIENT_BALANCE',
        `Balance of ${from} (${fromBalance}) does not cover ${amount}`
      );
    }

    const receiver = this.ledger.getReceiver(to);
    if (receiver) {
      try {
        receiver.onValueReceived(from, amount);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new LedgerError('RECEIVER_REJECTED', `${to} rejected ${amount}: ${reason}`, { cause: error });
      }
    }

    this.staged.set(from, fromBalance - amount);
    this.staged.set(to, this.balanceOf(to) + amount);
  }

  commit(): void {
    this.ensureOpen();
    this.state = 'committed';
    this.onClose(this.staged);
  }

  rollback(): void {
    if (this.state !== 'open') {
      return;
    }
    this.state = 'rolledBack';
    this.staged.clear();
    this.onClose(null);
  }

  isOpen(): boolean {
    return this.state === 'open';
  }

  private ensureOpen(): void {
    if (this.state !== 'open') {
      throw new LedgerError('TRANSACTION_CLOSED', `Ledger transaction already ${this.state}`);
    }
  }
}
