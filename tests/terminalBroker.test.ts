import pino from 'pino';
import { MockAgent } from 'undici';

import { ConnectivityError } from '../src/domain/errors.js';
import { TerminalBroker } from '../src/execution/terminalBroker.js';
import { TerminalClient } from '../src/terminal/client.js';

const baseUrl = 'http://127.0.0.1:8228';

describe('TerminalBroker', () => {
  let agent: MockAgent;
  let broker: TerminalBroker;

  function brokerWithRetries(retryCount: number): TerminalBroker {
    const logger = pino({ enabled: false });
    const client = new TerminalClient({
      env: { TERMINAL_API_KEY: 'test-key', TERMINAL_API_SECRET: 'test-secret', TERMINAL_BASE_URL: baseUrl, RECV_WINDOW_MS: 5000 },
      retryCount,
      rateLimitRps: 100,
      dispatcher: agent,
      logger
    });
    return new TerminalBroker({ client, logger });
  }

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    broker = brokerWithRetries(0);
  });

  afterEach(async () => {
    await agent.close();
  });

  const pool = () => agent.get(baseUrl);

  it('maps tagged positions', async () => {
    pool()
      .intercept({ path: '/api/v1/positions?magic=234000&symbol=EURUSD', method: 'GET' })
      .reply(200, [
        {
          ticket: 501234,
          symbol: 'EURUSD',
          type: 'SELL',
          volume: 0.1,
          price_open: 1.1,
          sl: 1.1035,
          tp: 0,
          profit: -4.5,
          magic: 234000
        }
      ]);

    await expect(broker.getOpenPositions({ symbol: 'EURUSD', tag: 234000 })).resolves.toEqual([
      {
        id: 501234,
        symbol: 'EURUSD',
        direction: 'Short',
        volume: 0.1,
        entryPrice: 1.1,
        stopLoss: 1.1035,
        takeProfit: 0,
        profit: -4.5,
        tag: 234000,
        comment: ''
      }
    ]);
  });

  it('maps symbol info to a quote', async () => {
    pool()
      .intercept({ path: '/api/v1/symbols/EURUSD', method: 'GET' })
      .reply(200, {
        symbol: 'EURUSD',
        bid: 1.10012,
        ask: 1.10025,
        point: 0.00001,
        volume_min: 0.01,
        volume_max: 100,
        volume_step: 0.01,
        trade_contract_size: 100000
      });

    await expect(broker.getQuote('EURUSD')).resolves.toEqual({
      symbol: 'EURUSD',
      bid: 1.10012,
      ask: 1.10025,
      point: 0.00001,
      contractSize: 100000,
      volumeMin: 0.01,
      volumeMax: 100,
      volumeStep: 0.01
    });
  });

  it('reports a filled order', async () => {
    let sent = '';
    pool()
      .intercept({
        path: '/api/v1/orders',
        method: 'POST',
        body: (body) => {
          sent = body;
          return true;
        }
      })
      .reply(200, { retcode: 10009, order: 77, volume: 0.1, price: 1.10025 });

    const result = await broker.submitOrder({
      symbol: 'EURUSD',
      direction: 'Long',
      volume: 0.1,
      stopLoss: 1.0965,
      tag: 234000,
      comment: 'Bot_234000_BUY'
    });

    expect(result).toEqual({ status: 'FILLED', positionId: 77, price: 1.10025, volume: 0.1 });
    expect(JSON.parse(sent)).toEqual({
      symbol: 'EURUSD',
      type: 'BUY',
      volume: 0.1,
      sl: 1.0965,
      tp: 0,
      magic: 234000,
      comment: 'Bot_234000_BUY'
    });
  });

  it('reports a refused order with its retcode', async () => {
    pool().intercept({ path: '/api/v1/orders', method: 'POST' }).reply(200, { retcode: 10019, comment: 'No money' });

    await expect(
      broker.submitOrder({ symbol: 'EURUSD', direction: 'Short', volume: 0.1, tag: 234000, comment: 'Bot_234000_SELL' })
    ).resolves.toEqual({ status: 'REJECTED', reason: 'retcode 10019: No money' });
  });

  it('does not resubmit an order after a gateway error', async () => {
    let posts = 0;
    pool()
      .intercept({ path: '/api/v1/orders', method: 'POST' })
      .reply(() => {
        posts += 1;
        return { statusCode: 502, data: 'bad gateway' };
      })
      .persist();

    await expect(
      brokerWithRetries(3).submitOrder({
        symbol: 'EURUSD',
        direction: 'Long',
        volume: 0.1,
        tag: 234000,
        comment: 'Bot_234000_BUY'
      })
    ).rejects.toMatchObject({ name: 'ConnectivityError', message: 'submitOrder: bad gateway' });
    expect(posts).toBe(1);
  });

  it('maps modify responses', async () => {
    pool().intercept({ path: '/api/v1/positions/5/modify', method: 'POST' }).reply(200, { retcode: 10009 });
    pool().intercept({ path: '/api/v1/positions/6/modify', method: 'POST' }).reply(404, { message: 'unknown ticket' });
    pool().intercept({ path: '/api/v1/positions/7/modify', method: 'POST' }).reply(400, 'invalid stops');

    await expect(broker.modifyStop(5, 1.1005, 0)).resolves.toEqual({ status: 'MODIFIED' });
    await expect(broker.modifyStop(6, 1.1005, 0)).resolves.toEqual({ status: 'NOT_FOUND' });
    await expect(broker.modifyStop(7, 1.1005, 0)).resolves.toEqual({ status: 'REJECTED', reason: 'invalid stops' });
  });

  it('returns the realized profit of a close', async () => {
    pool().intercept({ path: '/api/v1/positions/5/close', method: 'POST' }).reply(200, { retcode: 10009, profit: 12.3 });

    await expect(broker.closePosition(5)).resolves.toEqual({ status: 'CLOSED', profit: 12.3 });
  });

  it('treats malformed bodies as connectivity failures', async () => {
    pool().intercept({ path: '/api/v1/account', method: 'GET' }).reply(200, { balance: 'lots' });

    await expect(broker.getAccountState()).rejects.toBeInstanceOf(ConnectivityError);
  });

  it('treats server errors as connectivity failures', async () => {
    pool().intercept({ path: '/api/v1/account', method: 'GET' }).reply(500, 'bridge down');

    await expect(broker.getAccountState()).rejects.toMatchObject({
      name: 'ConnectivityError',
      operation: 'getAccountState',
      message: 'getAccountState: bridge down'
    });
  });

  it('wraps a failed time sync on connect', async () => {
    pool().intercept({ path: '/api/v1/time', method: 'GET' }).reply(200, { serverTime: 'later' });

    await expect(broker.connect()).rejects.toMatchObject({
      name: 'ConnectivityError',
      message: 'connect: Invalid server time response from terminal bridge'
    });
  });
});
