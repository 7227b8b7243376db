/**
 * DynamoDB table configurations for the reconciliation engine
 */

/**
 * Table name constants - use environment variables for flexibility across environments
 */
export const TableNames = {
  ORDERS: process.env.ORDERS_TABLE || 'engine-orders',
  TRADES: process.env.TRADES_TABLE || 'engine-trades',
  POSITIONS: process.env.POSITIONS_TABLE || 'engine-positions',
  SIGNALS: process.env.SIGNALS_TABLE || 'engine-signals',
  POSITION_HISTORY: process.env.POSITION_HISTORY_TABLE || 'engine-position-history'
} as const;

/**
 * Key schema definitions for each table
 */
export const KeySchemas = {
  /**
   * Orders Table
   * - Partition Key: orderId
   * - GSI positionId-index: orders of one position
   */
  ORDERS: {
    partitionKey: 'orderId',
    positionIndex: 'positionId-index'
  },

  /**
   * Trades Table
   * - Partition Key: tradeId
   * - GSI orderId-index: trades of one order, sorted by ledgerSequence
   */
  TRADES: {
    partitionKey: 'tradeId',
    orderIndex: 'orderId-index'
  },

  /**
   * Positions Table
   * - Partition Key: positionId
   */
  POSITIONS: {
    partitionKey: 'positionId'
  },

  /**
   * Signals Table (dedup records)
   * - Partition Key: signalId
   */
  SIGNALS: {
    partitionKey: 'signalId'
  },

  /**
   * Position History Table
   * - Partition Key: positionId
   * - Sort Key: timestamp#historyId
   */
  POSITION_HISTORY: {
    partitionKey: 'positionId',
    sortKey: 'timestampHistoryId'
  }
} as const;

export type TableName = typeof TableNames[keyof typeof TableNames];
