/**
 * Order Repository
 *
 * Persists orders keyed by orderId. The in-memory implementation backs the
 * sandbox and tests; the DynamoDB implementation is used in deployment.
 */

import { documentClient, DocumentStore } from '../db/client';
import { TableNames, KeySchemas } from '../db/tables';
import { Order, OrderStatus, WORKING_ORDER_STATUSES } from '../types/order';

export interface OrderRepository {
  getOrder(orderId: string): Promise<Order | null>;
  putOrder(order: Order): Promise<void>;
  listOrdersByPosition(positionId: string): Promise<Order[]>;
  listWorkingOrders(): Promise<Order[]>;
}

// Creation order, ties broken by id so iteration is stable
function byCreation(a: Order, b: Order): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? -1 : 1;
  }
  return a.orderId < b.orderId ? -1 : a.orderId > b.orderId ? 1 : 0;
}

export class InMemoryOrderRepository implements OrderRepository {
  private readonly orders = new Map<string, Order>();
  private readonly insertion: string[] = [];

  async getOrder(orderId: string): Promise<Order | null> {
    const order = this.orders.get(orderId);
    return order ? structuredClone(order) : null;
  }

  async putOrder(order: Order): Promise<void> {
    if (!this.orders.has(order.orderId)) {
      this.insertion.push(order.orderId);
    }
    this.orders.set(order.orderId, structuredClone(order));
  }

  async listOrdersByPosition(positionId: string): Promise<Order[]> {
    return this.inInsertionOrder().filter((order) => order.positionId === positionId);
  }

  async listWorkingOrders(): Promise<Order[]> {
    return this.inInsertionOrder().filter((order) => WORKING_ORDER_STATUSES.includes(order.status));
  }

  clear(): void {
    this.orders.clear();
    this.insertion.length = 0;
  }

  // Same-millisecond orders keep the order they were created in
  private inInsertionOrder(): Order[] {
    const result: Order[] = [];
    for (const orderId of this.insertion) {
      const order = this.orders.get(orderId);
      if (order) {
        result.push(structuredClone(order));
      }
    }
    return result;
  }
}

export class DynamoOrderRepository implements OrderRepository {
  constructor(
    private readonly client: DocumentStore = documentClient,
    private readonly tableName: string = TableNames.ORDERS
  ) {}

  async getOrder(orderId: string): Promise<Order | null> {
    const result = await this.client
      .get({
        TableName: this.tableName,
        Key: { [KeySchemas.ORDERS.partitionKey]: orderId },
      })
      .promise();

    if (!result.Item) {
      return null;
    }

    return result.Item as Order;
  }

  async putOrder(order: Order): Promise<void> {
    await this.client
      .put({
        TableName: this.tableName,
        Item: order,
      })
      .promise();
  }

  async listOrdersByPosition(positionId: string): Promise<Order[]> {
    const result = await this.client
      .query({
        TableName: this.tableName,
        IndexName: KeySchemas.ORDERS.positionIndex,
        KeyConditionExpression: '#positionId = :positionId',
        ExpressionAttributeNames: { '#positionId': 'positionId' },
        ExpressionAttributeValues: { ':positionId': positionId },
      })
      .promise();

    return ((result.Items || []) as Order[]).sort(byCreation);
  }

  async listWorkingOrders(): Promise<Order[]> {
    const statuses: readonly OrderStatus[] = WORKING_ORDER_STATUSES;
    const values: Record<string, string> = {};
    statuses.forEach((status, index) => {
      values[`:status${index}`] = status;
    });

    const items: Order[] = [];
    let lastKey: Record<string, unknown> | undefined;
    do {
      const result = await this.client
        .scan({
          TableName: this.tableName,
          FilterExpression: `#status IN (${Object.keys(values).join(', ')})`,
          ExpressionAttributeNames: { '#status': 'status' },
          ExpressionAttributeValues: values,
          ExclusiveStartKey: lastKey,
        })
        .promise();
      items.push(...((result.Items || []) as Order[]));
      lastKey = result.LastEvaluatedKey;
    } while (lastKey);

    return items.sort(byCreation);
  }
}
