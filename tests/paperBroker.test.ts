import { ConnectivityError } from '../src/domain/errors.js';
import type { Quote } from '../src/domain/models.js';
import { PaperBroker } from '../src/execution/index.js';

const TAG = 234000;

function quote(price: number): Quote {
  return {
    symbol: 'EURUSD',
    bid: price,
    ask: price,
    point: 0.00001,
    contractSize: 100000,
    volumeMin: 0.01,
    volumeMax: 100,
    volumeStep: 0.01
  };
}

describe('PaperBroker', () => {
  it('fills at the quote and marks profit to market', async () => {
    const broker = new PaperBroker();
    broker.setQuote(quote(1.1));

    const fill = await broker.submitOrder({ symbol: 'EURUSD', direction: 'Long', volume: 0.1, tag: TAG, comment: 'Bot_234000_BUY' });
    broker.setQuote(quote(1.1025));
    const [position] = await broker.getOpenPositions({ symbol: 'EURUSD', tag: TAG });

    expect(fill).toEqual({ status: 'FILLED', positionId: 1, price: 1.1, volume: 0.1 });
    expect(position).toMatchObject({ id: 1, direction: 'Long', entryPrice: 1.1, stopLoss: 0, profit: 25 });
  });

  it('rejects orders for symbols without a quote', async () => {
    const broker = new PaperBroker();

    await expect(
      broker.submitOrder({ symbol: 'GBPUSD', direction: 'Short', volume: 0.1, tag: TAG, comment: '' })
    ).resolves.toEqual({ status: 'REJECTED', reason: 'no quote for GBPUSD' });
  });

  it('filters positions by tag', async () => {
    const broker = new PaperBroker();
    broker.setQuote(quote(1.1));
    broker.seedPosition({
      id: 40,
      symbol: 'EURUSD',
      direction: 'Short',
      volume: 0.2,
      entryPrice: 1.1,
      stopLoss: 0,
      takeProfit: 0,
      tag: 999,
      comment: 'manual'
    });

    await expect(broker.getOpenPositions({ symbol: 'EURUSD', tag: TAG })).resolves.toEqual([]);
    await expect(broker.getOpenPositions({ symbol: 'EURUSD', tag: 999 })).resolves.toHaveLength(1);
  });

  it('reports missing positions and injected rejections on modify', async () => {
    const broker = new PaperBroker();
    broker.setQuote(quote(1.1));
    await broker.submitOrder({ symbol: 'EURUSD', direction: 'Long', volume: 0.1, tag: TAG, comment: '' });

    broker.rejectNextModify('invalid stops');

    await expect(broker.modifyStop(77, 1.1, 0)).resolves.toEqual({ status: 'NOT_FOUND' });
    await expect(broker.modifyStop(1, 1.1005, 0)).resolves.toEqual({ status: 'REJECTED', reason: 'invalid stops' });
    await expect(broker.modifyStop(1, 1.1005, 0)).resolves.toEqual({ status: 'MODIFIED' });
    expect(broker.modifications).toEqual([{ positionId: 1, stopLoss: 1.1005, takeProfit: 0 }]);
  });

  it('realizes profit into the balance on close', async () => {
    const broker = new PaperBroker({ balance: 10_000 });
    broker.setQuote(quote(1.1));
    await broker.submitOrder({ symbol: 'EURUSD', direction: 'Long', volume: 0.1, tag: TAG, comment: '' });
    broker.setQuote(quote(1.1025));

    await expect(broker.closePosition(1)).resolves.toEqual({ status: 'CLOSED', profit: 25 });
    await expect(broker.closePosition(1)).resolves.toEqual({ status: 'NOT_FOUND' });
    await expect(broker.getAccountState()).resolves.toEqual({ balance: 10_025, equity: 10_025, profit: 0, marginLevel: 0 });
  });

  it('closes positions whose stop is crossed', async () => {
    const broker = new PaperBroker({ balance: 10_000 });
    broker.setQuote(quote(1.1));
    await broker.submitOrder({ symbol: 'EURUSD', direction: 'Long', volume: 0.1, stopLoss: 1.099, tag: TAG, comment: '' });

    broker.setQuote(quote(1.0985));

    await expect(broker.getOpenPositions({ symbol: 'EURUSD', tag: TAG })).resolves.toEqual([]);
    expect((await broker.getAccountState()).balance).toBe(9_990);
  });

  it('throws connectivity errors while offline', async () => {
    const broker = new PaperBroker();
    broker.setConnectivity(false);

    await expect(broker.getAccountState()).rejects.toBeInstanceOf(ConnectivityError);
    await expect(broker.getQuote('EURUSD')).rejects.toThrow('getQuote: paper venue offline');
  });
});
