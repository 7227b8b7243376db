/**
 * Tests for the DynamoDB repositories against a recording DocumentClient
 */

import { conditionalCheckFailed, FakeDocumentStore } from '../test/fake-document-store';
import { FIXED_NOW, makeOrder } from '../test/generators';
import { Trade } from '../types/trade';
import { DynamoOrderRepository } from './order';
import { DynamoPositionHistoryRepository } from './position-history';
import { DynamoPositionRepository } from './position';
import { DynamoSignalRepository } from './signal';
import { DynamoTradeRepository } from './trade';

function trade(tradeId: string, ledgerSequence: number): Trade {
  return {
    tradeId,
    orderId: 'order-1',
    fillQuantity: 10,
    fillPrice: 100,
    filledAt: FIXED_NOW.toISOString(),
    ledgerSequence,
  };
}

describe('DynamoOrderRepository', () => {
  it('returns null for a missing order', async () => {
    const store = new FakeDocumentStore();
    const repository = new DynamoOrderRepository(store, 'orders');

    expect(await repository.getOrder('order-1')).toBeNull();
    expect(store.gets).toEqual([{ TableName: 'orders', Key: { orderId: 'order-1' } }]);
  });

  it('lists the orders of a position in creation order through the position index', async () => {
    const store = new FakeDocumentStore();
    const later = makeOrder({ orderId: 'b', createdAt: '2026-03-02T04:31:00.000Z' });
    const earlier = makeOrder({ orderId: 'a', createdAt: '2026-03-02T04:30:00.000Z' });
    store.queryResponses.push({ Items: [later, earlier] });
    const repository = new DynamoOrderRepository(store, 'orders');

    const orders = await repository.listOrdersByPosition('position-1');

    expect(orders.map((order) => order.orderId)).toEqual(['a', 'b']);
    expect(store.queries[0]).toMatchObject({
      IndexName: 'positionId-index',
      ExpressionAttributeValues: { ':positionId': 'position-1' },
    });
  });

  it('pages through working orders', async () => {
    const store = new FakeDocumentStore();
    store.scanResponses.push(
      { Items: [makeOrder({ orderId: 'a' })], LastEvaluatedKey: { orderId: 'a' } },
      { Items: [makeOrder({ orderId: 'b' })] }
    );
    const repository = new DynamoOrderRepository(store, 'orders');

    const orders = await repository.listWorkingOrders();

    expect(orders.map((order) => order.orderId)).toEqual(['a', 'b']);
    expect(store.scans[0]).toMatchObject({
      FilterExpression: '#status IN (:status0, :status1)',
      ExpressionAttributeValues: { ':status0': 'OPEN', ':status1': 'TRIGGER_PENDING' },
    });
    expect(store.scans[1].ExclusiveStartKey).toEqual({ orderId: 'a' });
  });
});

describe('DynamoTradeRepository', () => {
  it('appends a trade only once', async () => {
    const store = new FakeDocumentStore();
    store.putResponses.push({}, conditionalCheckFailed());
    const repository = new DynamoTradeRepository(store, 'trades');

    expect(await repository.appendTrade(trade('t-1', 1))).toBe(true);
    expect(await repository.appendTrade(trade('t-1', 2))).toBe(false);
    expect(store.puts[0].ConditionExpression).toBe('attribute_not_exists(tradeId)');
  });

  it('passes on other write failures', async () => {
    const store = new FakeDocumentStore();
    store.putResponses.push(new Error('ProvisionedThroughputExceededException'));
    const repository = new DynamoTradeRepository(store, 'trades');

    await expect(repository.appendTrade(trade('t-1', 1))).rejects.toThrow('ProvisionedThroughputExceededException');
  });

  it('finds the highest ledger sequence across pages', async () => {
    const store = new FakeDocumentStore();
    store.scanResponses.push(
      { Items: [{ ledgerSequence: 4 }, { ledgerSequence: 9 }], LastEvaluatedKey: { tradeId: 'x' } },
      { Items: [{ ledgerSequence: 7 }] }
    );
    const repository = new DynamoTradeRepository(store, 'trades');

    expect(await repository.latestSequence()).toBe(9);
  });

  it('sorts the trades of an order by ledger sequence', async () => {
    const store = new FakeDocumentStore();
    store.queryResponses.push({ Items: [trade('t-2', 2), trade('t-1', 1)] });
    const repository = new DynamoTradeRepository(store, 'trades');

    expect((await repository.listTradesByOrder('order-1')).map((item) => item.tradeId)).toEqual(['t-1', 't-2']);
  });
});

describe('DynamoSignalRepository', () => {
  it('claims a signal id once', async () => {
    const store = new FakeDocumentStore();
    store.putResponses.push({}, conditionalCheckFailed());
    const repository = new DynamoSignalRepository(store, 'signals');
    const record = {
      signalId: 'sig-001',
      positionId: 'position-1',
      outcome: 'ACCEPTED' as const,
      receivedAt: FIXED_NOW.toISOString(),
    };

    expect(await repository.claim(record)).toBe(true);
    expect(await repository.claim(record)).toBe(false);
    expect(store.puts[0].ConditionExpression).toBe('attribute_not_exists(signalId)');
  });
});

describe('DynamoPositionRepository', () => {
  it('lists only positions that are not archived', async () => {
    const store = new FakeDocumentStore();
    const repository = new DynamoPositionRepository(store, 'positions');

    expect(await repository.listLivePositions()).toEqual([]);
    expect(store.scans[0].FilterExpression).toBe('attribute_not_exists(archivedAt)');
  });

  it('deletes by position id', async () => {
    const store = new FakeDocumentStore();
    const repository = new DynamoPositionRepository(store, 'positions');

    await repository.deletePosition('position-1');

    expect(store.deletes).toEqual([{ TableName: 'positions', Key: { positionId: 'position-1' } }]);
  });
});

describe('DynamoPositionHistoryRepository', () => {
  it('stores entries under a time-ordered sort key and strips it on read', async () => {
    const store = new FakeDocumentStore();
    const repository = new DynamoPositionHistoryRepository(store, 'history');
    const entry = {
      historyId: 'h-1',
      positionId: 'position-1',
      eventType: 'OPEN' as const,
      previousQuantity: 0,
      newQuantity: 50,
      previousAvgPrice: 0,
      newAvgPrice: 100,
      realizedPnl: 0,
      timestamp: FIXED_NOW.toISOString(),
    };

    await repository.appendHistory(entry);
    expect(store.puts[0].Item).toEqual({ ...entry, timestampHistoryId: `${FIXED_NOW.toISOString()}#h-1` });

    store.queryResponses.push({ Items: [store.puts[0].Item] });
    expect(await repository.listHistory('position-1')).toEqual([entry]);
  });
});
