import { Utils } from 'alchemy-sdk';
import { AuditEvent } from '../../types/index.js';
import { IAuditSink } from '../../interfaces/IAuditSink.js';
import { EthereumService } from '../ethereumService.js';

export class ConsoleAuditSink implements IAuditSink {
  readonly name = 'console';

  record(event: AuditEvent): void {
    const icon = event.action === 'deposit' ? '📥' : '📤';
    console.log(
      `${icon} #${event.sequence} ${event.action} ${Utils.formatEther(event.amount.toString())} ETH ` +
      `${event.action === 'deposit' ? 'from' : 'to'} ${EthereumService.shorten(event.account)} (block ${event.blockNumber})`
    );
  }
}
