/**
 * Position History Repository
 *
 * One record per position mutation, queried by position in time order.
 */

import { documentClient, DocumentStore } from '../db/client';
import { TableNames, KeySchemas } from '../db/tables';
import { PositionHistory } from '../types/position';

export interface PositionHistoryRepository {
  appendHistory(entry: PositionHistory): Promise<void>;
  listHistory(positionId: string): Promise<PositionHistory[]>;
}

export class InMemoryPositionHistoryRepository implements PositionHistoryRepository {
  private readonly entries: PositionHistory[] = [];

  async appendHistory(entry: PositionHistory): Promise<void> {
    this.entries.push({ ...entry });
  }

  async listHistory(positionId: string): Promise<PositionHistory[]> {
    return this.entries
      .filter((entry) => entry.positionId === positionId)
      .map((entry) => ({ ...entry }));
  }

  clear(): void {
    this.entries.length = 0;
  }
}

export class DynamoPositionHistoryRepository implements PositionHistoryRepository {
  constructor(
    private readonly client: DocumentStore = documentClient,
    private readonly tableName: string = TableNames.POSITION_HISTORY
  ) {}

  async appendHistory(entry: PositionHistory): Promise<void> {
    await this.client
      .put({
        TableName: this.tableName,
        Item: {
          ...entry,
          [KeySchemas.POSITION_HISTORY.sortKey]: `${entry.timestamp}#${entry.historyId}`,
        },
      })
      .promise();
  }

  async listHistory(positionId: string): Promise<PositionHistory[]> {
    const result = await this.client
      .query({
        TableName: this.tableName,
        KeyConditionExpression: '#pk = :positionId',
        ExpressionAttributeNames: { '#pk': KeySchemas.POSITION_HISTORY.partitionKey },
        ExpressionAttributeValues: { ':positionId': positionId },
        ScanIndexForward: true,
      })
      .promise();

    return (result.Items || []).map((item) => {
      const { timestampHistoryId: _sortKey, ...entry } = item;
      return entry as PositionHistory;
    });
  }
}
