export * from './types/order';
export * from './types/trade';
export * from './types/position';
export * from './types/signal';
export * from './types/broker';
export * from './types/sandbox';
export * from './types/engine';
export * from './services/errors';
export { loadEngineConfig, parseSandboxConfig } from './config';
export type { EngineConfig } from './config';
export { BrokerErrorTable, createErrorTable } from './services/broker-error-table';
export { InstrumentRegistry, DEFAULT_INSTRUMENTS } from './services/instrument-registry';
export type { Instrument } from './services/instrument-registry';
export { FillSimulator, MarginAccount, DEFAULT_SANDBOX_CONFIG } from './services/fill-simulator';
export { SandboxBroker } from './services/sandbox-broker';
export { LiveBrokerGateway, DEFAULT_RETRY_CONFIG } from './services/live-broker-gateway';
export type { RetryConfig } from './services/live-broker-gateway';
export { OrderStateMachine, ORDER_TRANSITIONS } from './services/order-state-machine';
export { TradeLedger } from './services/trade-ledger';
export { PositionAggregator, unrealizedPnl } from './services/position-aggregator';
export { ProtectiveOrderCoordinator } from './services/protective-order-coordinator';
export { SignalIngestor } from './services/signal-ingestor';
export { SyncEngine } from './services/sync-engine';
export { TradingEngine, createInMemoryRepositories } from './services/trading-engine';
export type { EngineRepositories, TradingEngineOptions } from './services/trading-engine';
export { EngineProvider, createDynamoRepositories } from './services/engine-provider';
