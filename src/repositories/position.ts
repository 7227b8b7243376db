/**
 * Position Repository
 */

import { documentClient, DocumentStore } from '../db/client';
import { TableNames, KeySchemas } from '../db/tables';
import { Position } from '../types/position';

export interface PositionRepository {
  getPosition(positionId: string): Promise<Position | null>;
  putPosition(position: Position): Promise<void>;
  deletePosition(positionId: string): Promise<void>;
  /**
   * Positions not yet archived
   */
  listLivePositions(): Promise<Position[]>;
}

export class InMemoryPositionRepository implements PositionRepository {
  private readonly positions = new Map<string, Position>();

  async getPosition(positionId: string): Promise<Position | null> {
    const position = this.positions.get(positionId);
    return position ? structuredClone(position) : null;
  }

  async putPosition(position: Position): Promise<void> {
    this.positions.set(position.positionId, structuredClone(position));
  }

  async deletePosition(positionId: string): Promise<void> {
    this.positions.delete(positionId);
  }

  async listLivePositions(): Promise<Position[]> {
    return [...this.positions.values()]
      .filter((position) => !position.archivedAt)
      .map((position) => structuredClone(position));
  }

  clear(): void {
    this.positions.clear();
  }
}

export class DynamoPositionRepository implements PositionRepository {
  constructor(
    private readonly client: DocumentStore = documentClient,
    private readonly tableName: string = TableNames.POSITIONS
  ) {}

  async getPosition(positionId: string): Promise<Position | null> {
    const result = await this.client
      .get({
        TableName: this.tableName,
        Key: { [KeySchemas.POSITIONS.partitionKey]: positionId },
      })
      .promise();

    if (!result.Item) {
      return null;
    }

    return result.Item as Position;
  }

  async putPosition(position: Position): Promise<void> {
    await this.client
      .put({
        TableName: this.tableName,
        Item: position,
      })
      .promise();
  }

  async deletePosition(positionId: string): Promise<void> {
    await this.client
      .delete({
        TableName: this.tableName,
        Key: { [KeySchemas.POSITIONS.partitionKey]: positionId },
      })
      .promise();
  }

  async listLivePositions(): Promise<Position[]> {
    const items: Position[] = [];
    let lastKey: Record<string, unknown> | undefined;
    do {
      const result = await this.client
        .scan({
          TableName: this.tableName,
          FilterExpression: 'attribute_not_exists(archivedAt)',
          ExclusiveStartKey: lastKey,
        })
        .promise();
      items.push(...((result.Items || []) as Position[]));
      lastKey = result.LastEvaluatedKey;
    } while (lastKey);

    return items;
  }
}
