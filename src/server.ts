import 'dotenv/config';
import express, { Request, Response, NextFunction } from 'express';
import http from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import { App } from './app.js';
import { loadLedgerConfig, loadNetworkConfig, loadServerConfig } from './config/index.js';
import { AuditAction } from './types/index.js';
import { DisbursementError, DisbursementErrorKind } from './types/errors.js';
import { serializeAuditEvent } from './services/auditTrail.js';
import { EthereumService } from './services/ethereumService.js';
import { WebSocketAuditSink } from './services/sinks/webSocketAuditSink.js';

// Anything a message can be pushed to; ws clients and test doubles both fit
export interface BroadcastClient {
  readyState: number;
  send(data: string): void;
}

export interface ServerInstance {
  expressApp: express.Express;
  server: http.Server;
  wss: WebSocketServer;
  clients: Set<BroadcastClient>;
  broadcast: (message: object) => void;
}

const STATUS_BY_KIND: Record<DisbursementErrorKind, number> = {
  WrongNetwork: 409,
  LengthMismatch: 400,
  InsufficientFunds: 402,
  InvalidRecipient: 400,
  TransferFailed: 422,
  ArithmeticOverflow: 400,
};

const AUDIT_ACTIONS: readonly AuditAction[] = ['batch_transfer', 'deposit'];

/**
 * Parse a wei amount from JSON: a decimal string or a non-negative safe integer
 */
export function parseAmount(value: unknown): bigint | null {
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return BigInt(value.trim());
  }
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  return null;
}

// Function to broadcast messages to all connected WebSocket clients
export function broadcastToClients(clients: Iterable<BroadcastClient>, message: object): void {
  const data = JSON.stringify(message);
  for (const client of clients) {
    if (client.readyState === WebSocket.OPEN) {
      try {
        client.send(data);
      } catch (error) {
        console.error('Error sending message to client:', error);
      }
    }
  }
}

function sendInvalidRequest(res: Response, message: string): void {
  res.status(400).json({ success: false, message, errorType: 'INVALID_REQUEST' });
}

function sendError(res: Response, error: unknown, route: string): void {
  if (error instanceof DisbursementError) {
    res.status(STATUS_BY_KIND[error.kind]).json({
      success: false,
      message: error.message,
      errorType: error.errorType,
      ...(error.index !== undefined ? { index: error.index } : {}),
    });
    return;
  }
  console.error(`Error in ${route} endpoint:`, error);
  res.status(500).json({ success: false, message: 'Internal server error', errorType: 'SERVER_ERROR' });
}

/**
 * Build the HTTP + WebSocket surface for an App without listening yet
 */
export function createServer(app: App): ServerInstance {
  const expressApp = express();
  const server = http.createServer(expressApp);
  const wss = new WebSocketServer({ server });
  const clients = new Set<BroadcastClient>();
  const broadcast = (message: object) => broadcastToClients(clients, message);

  app.auditTrail.addSink(new WebSocketAuditSink(broadcast));

  wss.on('connection', (ws: WebSocket) => {
    console.log('🟢 Client connected to WebSocket');
    clients.add(ws);
    ws.send(JSON.stringify({ type: 'status', message: 'Connected to BaseUtils audit stream.' }));

    ws.on('close', () => {
      console.log('🔴 Client disconnected from WebSocket');
      clients.delete(ws);
    });
    ws.on('error', (error) => {
      console.error('WebSocket error:', error);
      clients.delete(ws);
    });
  });

  // Middleware to parse JSON bodies
  expressApp.use(express.json());

  expressApp.post('/batch-transfer', (req: Request, res: Response) => {
    const { from, recipients, amounts, value } = req.body ?? {};

    const caller = EthereumService.toAddress(from);
    if (!caller) {
      sendInvalidRequest(res, 'Invalid caller address');
      return;
    }
    if (!Array.isArray(recipients) || !Array.isArray(amounts)) {
      sendInvalidRequest(res, 'recipients and amounts must be arrays');
      return;
    }

    const parsedAmounts = amounts.map(parseAmount);
    const badIndex = parsedAmounts.findIndex(amount => amount === null);
    if (badIndex !== -1) {
      sendInvalidRequest(res, `Invalid amount at index ${badIndex}`);
      return;
    }
    const suppliedValue = parseAmount(value);
    if (suppliedValue === null) {
      sendInvalidRequest(res, 'Invalid value');
      return;
    }

    try {
      const result = app.baseUtils.batchTransfer(
        {
          recipients: recipients.map((recipient: unknown) => (typeof recipient === 'string' ? recipient : null)),
          amounts: parsedAmounts.filter((amount): amount is bigint => amount !== null),
        },
        { caller, suppliedValue }
      );
      res.json({
        success: true,
        totalAmount: result.totalAmount.toString(),
        retained: result.retained.toString(),
        blockNumber: result.blockNumber.toString(),
        events: result.events.map(serializeAuditEvent),
      });
    } catch (error) {
      broadcast({ type: 'batch_failure', message: error instanceof Error ? error.message : String(error) });
      sendError(res, error, '/batch-transfer');
    }
  });

  expressApp.post('/deposit', (req: Request, res: Response) => {
    const { from, amount } = req.body ?? {};
    const sender = EthereumService.toRecipient(from);
    if (!sender) {
      sendInvalidRequest(res, 'Invalid sender address');
      return;
    }
    const parsedAmount = parseAmount(amount);
    if (parsedAmount === null) {
      sendInvalidRequest(res, 'Invalid amount');
      return;
    }

    try {
      const event = app.baseUtils.receive(sender, parsedAmount);
      res.json({ success: true, event: serializeAuditEvent(event) });
    } catch (error) {
      sendError(res, error, '/deposit');
    }
  });

  expressApp.post('/faucet', (req: Request, res: Response) => {
    const { address, amount } = req.body ?? {};
    const target = EthereumService.toAddress(address);
    const parsedAmount = parseAmount(amount);
    if (!target || parsedAmount === null) {
      sendInvalidRequest(res, 'address and amount are required');
      return;
    }

    try {
      app.ledger.credit(target, parsedAmount);
      console.log(`🚰 Faucet credited ${parsedAmount} wei to ${EthereumService.shorten(target)}`);
      res.json({ success: true, address: target, balance: app.ledger.balanceOf(target).toString() });
    } catch (error) {
      sendError(res, error, '/faucet');
    }
  });

  expressApp.get('/network-info', (req: Request, res: Response) => {
    const info = app.baseUtils.getNetworkInfo();
    res.json({
      chainId: info.chainId.toString(),
      bridge: info.bridge,
      blockNumber: info.blockNumber.toString(),
      timestamp: info.timestamp.toString(),
    });
  });

  expressApp.get('/balance', (req: Request, res: Response) => {
    res.json({ address: app.baseUtils.address, balance: app.baseUtils.getBalance().toString() });
  });

  expressApp.get('/accounts/:address/balance', (req: Request, res: Response) => {
    const address = EthereumService.toAddress(req.params.address);
    if (!address) {
      sendInvalidRequest(res, 'Invalid address');
      return;
    }
    res.json({ address, balance: app.ledger.balanceOf(address).toString() });
  });

  expressApp.get('/gas-cost', (req: Request, res: Response) => {
    const gasUsed = parseAmount(req.query.gasUsed);
    const gasPrice = parseAmount(req.query.gasPrice);
    if (gasUsed === null || gasPrice === null) {
      sendInvalidRequest(res, 'gasUsed and gasPrice are required');
      return;
    }

    try {
      res.json({ gasCost: app.baseUtils.calculateGasCost(gasUsed, gasPrice).toString() });
    } catch (error) {
      sendError(res, error, '/gas-cost');
    }
  });

  expressApp.get('/audit-log', (req: Request, res: Response) => {
    const { action, account } = req.query;

    const actionFilter = AUDIT_ACTIONS.find(candidate => candidate === action);
    if (action !== undefined && !actionFilter) {
      sendInvalidRequest(res, `action must be one of ${AUDIT_ACTIONS.join(', ')}`);
      return;
    }
    const accountFilter = account === undefined ? undefined : EthereumService.toAddress(account);
    if (accountFilter === null) {
      sendInvalidRequest(res, 'Invalid account address');
      return;
    }

    res.json(app.auditLog.getEvents({ action: actionFilter, account: accountFilter }).map(serializeAuditEvent));
  });

  // Malformed JSON bodies
  expressApp.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (error instanceof SyntaxError) {
      sendInvalidRequest(res, 'Malformed JSON body');
      return;
    }
    next(error);
  });

  return { expressApp, server, wss, clients, broadcast };
}

export function startServer(): ServerInstance {
  const app = new App({ network: loadNetworkConfig(), ledger: loadLedgerConfig() });
  const { port } = loadServerConfig();
  const instance = createServer(app);

  process.on('unhandledRejection', (reason, promise) => {
    console.error('❌ Unhandled Rejection at:', promise, 'reason:', reason);
  });

  const shutdown = (signal: string) => {
    console.log(`\n👋 Received ${signal}. Shutting down.`);
    instance.wss.close();
    instance.server.close(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  instance.server.listen(port, () => {
    console.log(`📡 HTTP & WebSocket Server running at http://localhost:${port}`);
  });

  return instance;
}

if (require.main === module) {
  try {
    startServer();
  } catch (error) {
    console.error('❌ Failed to start BaseUtils server:', error);
    process.exit(1);
  }
}
