import WebSocket from 'ws';
import { App } from '../src/app.js';
import { createServer, parseAmount, ServerInstance } from '../src/server.js';
import { ACCOUNT, ALICE, BOB, CALLER, createTestApp } from './utils/testHelpers.js';

describe('HTTP & WebSocket server', () => {
  let app: App;
  let instance: ServerInstance;
  let baseUrl: string;

  const start = async (testApp: App) => {
    app = testApp;
    instance = createServer(app);
    await new Promise<void>(resolve => instance.server.listen(0, '127.0.0.1', resolve));
    const address = instance.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  };

  const post = async (route: string, body: unknown) => {
    const response = await fetch(`${baseUrl}${route}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    });
    const responseBody: unknown = await response.json();
    return { status: response.status, body: responseBody };
  };

  const get = async (route: string) => {
    const response = await fetch(`${baseUrl}${route}`);
    const responseBody: unknown = await response.json();
    return { status: response.status, body: responseBody };
  };

  afterEach(async () => {
    instance.wss.clients.forEach(client => client.terminate());
    await new Promise<void>(resolve => instance.wss.close(() => resolve()));
    await new Promise<void>(resolve => instance.server.close(() => resolve()));
  });

  describe('with the account on its designated network', () => {
    beforeEach(async () => {
      await start(createTestApp());
    });

    it('runs a batch transfer and returns the events', async () => {
      const { status, body } = await post('/batch-transfer', {
        from: CALLER,
        recipients: [ALICE, BOB],
        amounts: ['100', 200],
        value: '300',
      });

      expect(status).toBe(200);
      expect(body).toEqual({
        success: true,
        totalAmount: '300',
        retained: '0',
        blockNumber: '1',
        events: [
          { sequence: 1, account: ALICE, action: 'batch_transfer', amount: '100', blockNumber: '1', timestamp: '1700000001' },
          { sequence: 2, account: BOB, action: 'batch_transfer', amount: '200', blockNumber: '1', timestamp: '1700000001' },
        ],
      });
      expect(app.ledger.balanceOf(ALICE)).toBe(100n);
    });

    it('maps InsufficientFunds to 402', async () => {
      const { status, body } = await post('/batch-transfer', {
        from: CALLER,
        recipients: [ALICE, BOB],
        amounts: ['100', '200'],
        value: '250',
      });

      expect(status).toBe(402);
      expect(body).toEqual({
        success: false,
        message: 'Insufficient ETH sent: batch needs 300 wei, 250 wei supplied',
        errorType: 'INSUFFICIENT_FUNDS',
      });
    });

    it('maps LengthMismatch to 400', async () => {
      const { status, body } = await post('/batch-transfer', {
        from: CALLER,
        recipients: [ALICE],
        amounts: ['50', '60'],
        value: '110',
      });

      expect(status).toBe(400);
      expect(body).toMatchObject({ success: false, errorType: 'LENGTH_MISMATCH' });
    });

    it('reports the index of an invalid recipient', async () => {
      const { status, body } = await post('/batch-transfer', {
        from: CALLER,
        recipients: [ALICE, null],
        amounts: ['1', '2'],
        value: '3',
      });

      expect(status).toBe(400);
      expect(body).toMatchObject({ success: false, errorType: 'INVALID_RECIPIENT', index: 1 });
      expect(app.ledger.balanceOf(ALICE)).toBe(0n);
    });

    it('maps TransferFailed to 422', async () => {
      app.ledger.registerReceiver(BOB, {
        onValueReceived: () => {
          throw new Error('no payable fallback');
        },
      });

      const { status, body } = await post('/batch-transfer', {
        from: CALLER,
        recipients: [ALICE, BOB],
        amounts: ['1', '2'],
        value: '3',
      });

      expect(status).toBe(422);
      expect(body).toMatchObject({ success: false, errorType: 'TRANSFER_FAILED', index: 1 });
    });

    it.each([
      ['a bad caller', { from: 'nobody', recipients: [], amounts: [], value: '0' }, 'Invalid caller address'],
      ['non-array recipients', { from: CALLER, recipients: 'x', amounts: [], value: '0' }, 'recipients and amounts must be arrays'],
      ['a fractional amount', { from: CALLER, recipients: [ALICE], amounts: [1.5], value: '2' }, 'Invalid amount at index 0'],
      ['a missing value', { from: CALLER, recipients: [], amounts: [] }, 'Invalid value'],
    ])('rejects %s with INVALID_REQUEST', async (_label, payload, message) => {
      const { status, body } = await post('/batch-transfer', payload);

      expect(status).toBe(400);
      expect(body).toEqual({ success: false, message, errorType: 'INVALID_REQUEST' });
    });

    it('rejects a malformed JSON body', async () => {
      const { status, body } = await post('/batch-transfer', '{"from":');

      expect(status).toBe(400);
      expect(body).toEqual({ success: false, message: 'Malformed JSON body', errorType: 'INVALID_REQUEST' });
    });

    it('accepts deposits and lists them in the audit log', async () => {
      const event = { sequence: 1, account: CALLER, action: 'deposit', amount: '25', blockNumber: '1', timestamp: '1700000001' };
      const deposit = await post('/deposit', { from: CALLER, amount: '25' });

      expect(deposit.status).toBe(200);
      expect(deposit.body).toEqual({ success: true, event });

      const balance = await get('/balance');
      expect(balance.body).toEqual({ address: ACCOUNT, balance: '25' });

      const log = await get(`/audit-log?action=deposit&account=${CALLER}`);
      expect(log.body).toEqual([event]);
    });

    it.each([
      ['the zero address', { from: '0x0000000000000000000000000000000000000000', amount: '1' }, 'Invalid sender address'],
      ['a malformed sender', { from: 'nobody', amount: '1' }, 'Invalid sender address'],
      ['a negative amount', { from: CALLER, amount: '-1' }, 'Invalid amount'],
    ])('rejects a deposit from %s with INVALID_REQUEST', async (_label, payload, message) => {
      const { status, body } = await post('/deposit', payload);

      expect(status).toBe(400);
      expect(body).toEqual({ success: false, message, errorType: 'INVALID_REQUEST' });
      expect(app.auditLog.size).toBe(0);
    });

    it('funds addresses through the faucet', async () => {
      const { status, body } = await post('/faucet', { address: ALICE, amount: '500' });

      expect(status).toBe(200);
      expect(body).toEqual({ success: true, address: ALICE, balance: '500' });

      const account = await get(`/accounts/${ALICE}/balance`);
      expect(account.body).toEqual({ address: ALICE, balance: '500' });
    });

    it('serves network info and gas cost', async () => {
      const info = await get('/network-info');
      expect(info.body).toEqual({
        chainId: '8453',
        bridge: '0x3154cf16ccdb4c6d922629664174b904d80f2c35',
        blockNumber: '0',
        timestamp: '1700000000',
      });

      const cost = await get('/gas-cost?gasUsed=21000&gasPrice=1000000000');
      expect(cost.body).toEqual({ gasCost: '21000000000000' });

      const missing = await get('/gas-cost?gasUsed=21000');
      expect(missing.status).toBe(400);
    });

    it('rejects unknown audit log filters', async () => {
      expect((await get('/audit-log?action=withdraw')).status).toBe(400);
      expect((await get('/audit-log?account=nobody')).status).toBe(400);
      expect((await get('/accounts/nobody/balance')).status).toBe(400);
    });

    it('greets WebSocket clients and streams audit events', async () => {
      const ws = new WebSocket(baseUrl.replace('http', 'ws'));
      const received: unknown[] = [];
      const twoMessages = new Promise<void>(resolve => {
        ws.on('message', data => {
          received.push(JSON.parse(data.toString()));
          if (received.length === 2) resolve();
        });
      });
      await new Promise<void>(resolve => ws.on('open', () => resolve()));
      // Wait until the server has registered the client
      while (instance.clients.size === 0) {
        await global.testUtils.wait(5);
      }

      await post('/deposit', { from: CALLER, amount: '7' });
      await twoMessages;
      ws.close();

      expect(received).toEqual([
        { type: 'status', message: 'Connected to BaseUtils audit stream.' },
        {
          type: 'audit_event',
          event: { sequence: 1, account: CALLER, action: 'deposit', amount: '7', blockNumber: '1', timestamp: '1700000001' },
        },
      ]);
    });
  });

  it('maps WrongNetwork to 409', async () => {
    await start(createTestApp({ executionChainId: 1n }));

    const { status, body } = await post('/batch-transfer', { from: CALLER, recipients: [], amounts: [], value: '0' });

    expect(status).toBe(409);
    expect(body).toEqual({
      success: false,
      message: 'Wrong network: expected chain 8453, running on 1',
      errorType: 'WRONG_NETWORK',
    });
  });
});

describe('parseAmount', () => {
  it('accepts decimal strings and non-negative safe integers', () => {
    expect(parseAmount('115792089237316195423570985008687907853269984665640564039457584007913129639935')).toBe(
      2n ** 256n - 1n
    );
    expect(parseAmount(' 42 ')).toBe(42n);
    expect(parseAmount(0)).toBe(0n);
  });

  it.each([-1, 1.5, '0x10', '-3', '', null, undefined, Number.MAX_SAFE_INTEGER + 1])('rejects %p', (value) => {
    expect(parseAmount(value)).toBeNull();
  });
});
