/**
 * Engine Provider
 *
 * Holds the engine shared by the Lambda handlers. The default engine is built
 * from environment configuration over the DynamoDB tables; tests install
 * their own with setEngine.
 */

import { v4 as uuidv4 } from 'uuid';
import { DynamoOrderRepository } from '../repositories/order';
import { DynamoTradeRepository } from '../repositories/trade';
import { DynamoPositionRepository } from '../repositories/position';
import { DynamoSignalRepository } from '../repositories/signal';
import { DynamoPositionHistoryRepository } from '../repositories/position-history';
import { EngineRepositories, TradingEngine } from './trading-engine';

let current: TradingEngine | undefined;

export function createDynamoRepositories(): EngineRepositories {
  return {
    orders: new DynamoOrderRepository(),
    trades: new DynamoTradeRepository(),
    positions: new DynamoPositionRepository(),
    signals: new DynamoSignalRepository(),
    history: new DynamoPositionHistoryRepository(),
  };
}

export const EngineProvider = {
  getEngine(): TradingEngine {
    if (!current) {
      current = new TradingEngine({
        repositories: createDynamoRepositories(),
        instanceId: uuidv4().slice(0, 8).toUpperCase(),
      });
    }
    return current;
  },

  setEngine(engine: TradingEngine | undefined): void {
    current = engine;
  },
};
