import { Utils } from 'alchemy-sdk';
import {
  Address,
  AuditEvent,
  AuditRecord,
  DisbursementContext,
  DisbursementResult,
  NetworkInfo,
  TransferRequest,
} from '../types/index.js';
import { DisbursementError, LedgerError } from '../types/errors.js';
import { NetworkConfig } from '../config/index.js';
import { AuditTrail } from './auditTrail.js';
import { CheckedMath } from './checkedMath.js';
import { EthereumService } from './ethereumService.js';
import { LedgerService, LedgerTransaction } from './ledgerService.js';
import { ChainEnvironment } from './localChainService.js';

export interface BaseUtilsServiceOptions {
  network: NetworkConfig;
  // The account's own address on the ledger
  accountAddress: Address;
  ledger: LedgerService;
  chain: ChainEnvironment;
  auditTrail: AuditTrail;
}

// Pending audit entry, stamped with a block once the batch commits
interface StagedTransfer {
  account: Address;
  amount: bigint;
}

/**
 * Base utility account: batch ETH disbursement, deposits and read-only network helpers.
 * Every mutating call is atomic; it either commits as a whole or leaves no trace.
 */
export class BaseUtilsService {
  private readonly network: NetworkConfig;
  private readonly accountAddress: Address;
  private readonly ledger: LedgerService;
  private readonly chain: ChainEnvironment;
  private readonly auditTrail: AuditTrail;

  constructor(options: BaseUtilsServiceOptions) {
    this.network = options.network;
    this.accountAddress = options.accountAddress;
    this.ledger = options.ledger;
    this.chain = options.chain;
    this.auditTrail = options.auditTrail;
  }

  get address(): Address {
    return this.accountAddress;
  }

  /**
   * Send amounts[i] to recipients[i] for every i, in order, funded by the value the caller attached.
   * The value left over after the batch stays with the account.
   */
  batchTransfer(request: TransferRequest, context: DisbursementContext): DisbursementResult {
    const { recipients, amounts } = request;

    this.ensureDesignatedNetwork();

    if (recipients.length !== amounts.length) {
      throw new DisbursementError(
        'LengthMismatch',
        `Recipients and amounts length mismatch: ${recipients.length} recipients, ${amounts.length} amounts`
      );
    }

    const suppliedValue = CheckedMath.assertUint256(context.suppliedValue, 'Supplied value');
    const totalAmount = CheckedMath.sum(amounts);
    if (totalAmount > suppliedValue) {
      throw new DisbursementError(
        'InsufficientFunds',
        `Insufficient ETH sent: batch needs ${totalAmount} wei, ${suppliedValue} wei supplied`
      );
    }

    console.log(
      `💸 Batch transfer of ${Utils.formatEther(totalAmount.toString())} ETH to ${recipients.length} recipient(s) ` +
      `from ${EthereumService.shorten(context.caller)}`
    );

    const transaction = this.begin();
    const staged: StagedTransfer[] = [];

    try {
      this.reserve(transaction, context.caller, suppliedValue);

      recipients.forEach((input, index) => {
        const recipient = EthereumService.toRecipient(input);
        if (recipient === null) {
          throw new DisbursementError('InvalidRecipient', `Invalid recipient at index ${index}: ${String(input)}`, { index });
        }

        const amount = amounts[index];
        try {
          transaction.transfer(this.accountAddress, recipient, amount);
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          throw new DisbursementError('TransferFailed', `Transfer to ${recipient} at index ${index} failed: ${reason}`, {
            index,
            cause: error,
          });
        }

        staged.push({ account: recipient, amount });
      });

      transaction.commit();
    } catch (error) {
      transaction.rollback();
      console.error(`❌ Batch transfer reverted: ${error instanceof Error ? error.message : String(error)}`);
      throw this.toDisbursementError(error);
    }

    const events = this.sealAndPublish(
      staged.map(({ account, amount }) => ({ account, action: 'batch_transfer' as const, amount }))
    );
    const block = events.length > 0 ? events[0].blockNumber : this.chain.getBlockNumber();

    console.log(`✅ Batch transfer committed in block ${block}: ${events.length} transfer(s)`);

    return {
      events,
      totalAmount,
      retained: suppliedValue - totalAmount,
      blockNumber: block,
    };
  }

  /**
   * Passive deposit path: accept value sent straight to the account
   */
  receive(sender: string, amount: bigint): AuditEvent {
    const from = EthereumService.toRecipient(sender);
    if (from === null) {
      throw new DisbursementError('InvalidRecipient', `Deposit sender must be a valid non-zero address, got ${sender}`);
    }
    CheckedMath.assertUint256(amount, 'Deposit amount');

    const transaction = this.begin();
    try {
      this.reserve(transaction, from, amount);
      transaction.commit();
    } catch (error) {
      transaction.rollback();
      throw this.toDisbursementError(error);
    }

    const [event] = this.sealAndPublish([{ account: from, action: 'deposit', amount }]);
    console.log(`📥 Deposit of ${Utils.formatEther(amount.toString())} ETH from ${EthereumService.shorten(from)}`);
    return event;
  }

  getNetworkInfo(): NetworkInfo {
    return {
      chainId: this.network.chainId,
      bridge: this.network.bridgeAddress,
      blockNumber: this.chain.getBlockNumber(),
      timestamp: this.chain.getBlockTimestamp(),
    };
  }

  calculateGasCost(gasUsed: bigint, gasPrice: bigint): bigint {
    return CheckedMath.mul(gasUsed, gasPrice);
  }

  getBalance(): bigint {
    return this.ledger.balanceOf(this.accountAddress);
  }

  private ensureDesignatedNetwork(): void {
    const current = this.chain.getChainId();
    if (current !== this.network.chainId) {
      throw new DisbursementError(
        'WrongNetwork',
        `Wrong network: expected chain ${this.network.chainId}, running on ${current}`
      );
    }
  }

  private begin(): LedgerTransaction {
    try {
      return this.ledger.beginTransaction();
    } catch (error) {
      throw this.toDisbursementError(error);
    }
  }

  // Move the attached value from the caller into the account inside the pending transaction
  private reserve(transaction: LedgerTransaction, from: Address, amount: bigint): void {
    try {
      transaction.transfer(from, this.accountAddress, amount);
    } catch (error) {
      if (error instanceof LedgerError && error.code === 'INSUFFICIENT_BALANCE') {
        throw new DisbursementError('InsufficientFunds', `Caller cannot cover the attached value: ${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  private sealAndPublish(entries: ReadonlyArray<Omit<AuditRecord, 'blockNumber' | 'timestamp'>>): AuditEvent[] {
    const block = this.chain.mineBlock();
    return this.auditTrail.publish(
      entries.map(entry => ({ ...entry, blockNumber: block.number, timestamp: block.timestamp }))
    );
  }

  // Anything not already classified failed while moving value
  private toDisbursementError(error: unknown): DisbursementError {
    if (error instanceof DisbursementError) {
      return error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new DisbursementError('TransferFailed', `Transfer failed: ${reason}`, { cause: error });
  }
}
