/**
 * Signal Repository
 *
 * Keeps one dedup record per consumed signal id. The signal body itself is
 * not retained.
 */

import { documentClient, DocumentStore, isConditionalCheckFailed } from '../db/client';
import { TableNames, KeySchemas } from '../db/tables';
import { SignalRecord } from '../types/signal';

export interface SignalRepository {
  getRecord(signalId: string): Promise<SignalRecord | null>;
  /**
   * Stores the record unless one exists for the signal id.
   * Returns false when the id was already taken.
   */
  claim(record: SignalRecord): Promise<boolean>;
  putRecord(record: SignalRecord): Promise<void>;
}

export class InMemorySignalRepository implements SignalRepository {
  private readonly records = new Map<string, SignalRecord>();

  async getRecord(signalId: string): Promise<SignalRecord | null> {
    const record = this.records.get(signalId);
    return record ? { ...record } : null;
  }

  async claim(record: SignalRecord): Promise<boolean> {
    if (this.records.has(record.signalId)) {
      return false;
    }
    this.records.set(record.signalId, { ...record });
    return true;
  }

  async putRecord(record: SignalRecord): Promise<void> {
    this.records.set(record.signalId, { ...record });
  }

  clear(): void {
    this.records.clear();
  }
}

export class DynamoSignalRepository implements SignalRepository {
  constructor(
    private readonly client: DocumentStore = documentClient,
    private readonly tableName: string = TableNames.SIGNALS
  ) {}

  async getRecord(signalId: string): Promise<SignalRecord | null> {
    const result = await this.client
      .get({
        TableName: this.tableName,
        Key: { [KeySchemas.SIGNALS.partitionKey]: signalId },
      })
      .promise();

    if (!result.Item) {
      return null;
    }

    return result.Item as SignalRecord;
  }

  async claim(record: SignalRecord): Promise<boolean> {
    try {
      await this.client
        .put({
          TableName: this.tableName,
          Item: record,
          ConditionExpression: 'attribute_not_exists(signalId)',
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

  async putRecord(record: SignalRecord): Promise<void> {
    await this.client
      .put({
        TableName: this.tableName,
        Item: record,
      })
      .promise();
  }
}
