/**
 * Trade Repository
 *
 * Append-only store of executions. Trades are never updated or deleted.
 */

import { documentClient, DocumentStore, isConditionalCheckFailed } from '../db/client';
import { TableNames, KeySchemas } from '../db/tables';
import { Trade } from '../types/trade';

export interface TradeRepository {
  getTrade(tradeId: string): Promise<Trade | null>;
  /**
   * Appends a trade. Returns false when a trade with the same id exists.
   */
  appendTrade(trade: Trade): Promise<boolean>;
  listTradesByOrder(orderId: string): Promise<Trade[]>;
  latestSequence(): Promise<number>;
}

export class InMemoryTradeRepository implements TradeRepository {
  private readonly trades = new Map<string, Trade>();

  async getTrade(tradeId: string): Promise<Trade | null> {
    const trade = this.trades.get(tradeId);
    return trade ? { ...trade } : null;
  }

  async appendTrade(trade: Trade): Promise<boolean> {
    if (this.trades.has(trade.tradeId)) {
      return false;
    }
    this.trades.set(trade.tradeId, { ...trade });
    return true;
  }

  async listTradesByOrder(orderId: string): Promise<Trade[]> {
    return [...this.trades.values()]
      .filter((trade) => trade.orderId === orderId)
      .sort((a, b) => a.ledgerSequence - b.ledgerSequence)
      .map((trade) => ({ ...trade }));
  }

  async latestSequence(): Promise<number> {
    let latest = 0;
    for (const trade of this.trades.values()) {
      latest = Math.max(latest, trade.ledgerSequence);
    }
    return latest;
  }

  clear(): void {
    this.trades.clear();
  }
}

export class DynamoTradeRepository implements TradeRepository {
  constructor(
    private readonly client: DocumentStore = documentClient,
    private readonly tableName: string = TableNames.TRADES
  ) {}

  async getTrade(tradeId: string): Promise<Trade | null> {
    const result = await this.client
      .get({
        TableName: this.tableName,
        Key: { [KeySchemas.TRADES.partitionKey]: tradeId },
      })
      .promise();

    if (!result.Item) {
      return null;
    }

    return result.Item as Trade;
  }

  async appendTrade(trade: Trade): Promise<boolean> {
    try {
      await this.client
        .put({
          TableName: this.tableName,
          Item: trade,
          ConditionExpression: 'attribute_not_exists(tradeId)',
        })
        .promise();
      return true;
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        return false;
      }
      throw error;
    }
  }

  async listTradesByOrder(orderId: string): Promise<Trade[]> {
    const result = await this.client
      .query({
        TableName: this.tableName,
        IndexName: KeySchemas.TRADES.orderIndex,
        KeyConditionExpression: '#orderId = :orderId',
        ExpressionAttributeNames: { '#orderId': 'orderId' },
        ExpressionAttributeValues: { ':orderId': orderId },
      })
      .promise();

    return ((result.Items || []) as Trade[]).sort((a, b) => a.ledgerSequence - b.ledgerSequence);
  }

  async latestSequence(): Promise<number> {
    let latest = 0;
    let lastKey: Record<string, unknown> | undefined;
    do {
      const result = await this.client
        .scan({
          TableName: this.tableName,
          ProjectionExpression: 'ledgerSequence',
          ExclusiveStartKey: lastKey,
        })
        .promise();
      for (const item of result.Items || []) {
        if (typeof item.ledgerSequence === 'number') {
          latest = Math.max(latest, item.ledgerSequence);
        }
      }
      lastKey = result.LastEvaluatedKey;
    } while (lastKey);

    return latest;
  }
}
