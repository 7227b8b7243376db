import { EngineConfig, loadEngineConfig } from '../config';
import { BrokerGateway, LiveBrokerAdapter } from '../types/broker';
import { AnomalyEvent, SyncErrorEvent } from '../types/engine';
import { SandboxBroker } from '../services/sandbox-broker';
import { createInMemoryRepositories, EngineRepositories, TradingEngine } from '../services/trading-engine';
import { FIXED_NOW } from './generators';

/**
 * Mutable clock for tests
 */
export class TestClock {
  private current: Date;

  constructor(start: Date = FIXED_NOW) {
    this.current = new Date(start.getTime());
  }

  now = (): Date => new Date(this.current.getTime());

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export function testConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return { ...loadEngineConfig({}), ...overrides };
}

export interface EngineHarness {
  engine: TradingEngine;
  repositories: EngineRepositories;
  clock: TestClock;
  syncErrors: SyncErrorEvent[];
  anomalies: AnomalyEvent[];
}

/**
 * Engine over in-memory repositories. Without a gateway the engine builds
 * its backend from `config.mode`: the sandbox, or a live gateway over `adapter`.
 */
export function buildEngine(
  options: { config?: Partial<EngineConfig>; gateway?: BrokerGateway; adapter?: LiveBrokerAdapter } = {}
): EngineHarness {
  const clock = new TestClock();
  const repositories = createInMemoryRepositories();
  const engine = new TradingEngine({
    config: testConfig(options.config),
    repositories,
    gateway: options.gateway,
    adapter: options.adapter,
    clock: clock.now,
  });

  const syncErrors: SyncErrorEvent[] = [];
  const anomalies: AnomalyEvent[] = [];
  engine.events.on('sync-error', (event: SyncErrorEvent) => syncErrors.push(event));
  engine.events.on('anomaly', (event: AnomalyEvent) => anomalies.push(event));

  return { engine, repositories, clock, syncErrors, anomalies };
}

export function sandboxOf(engine: TradingEngine): SandboxBroker {
  if (!(engine.gateway instanceof SandboxBroker)) {
    throw new Error('Engine is not running on the sandbox');
  }
  return engine.gateway;
}

export async function tick(engine: TradingEngine, symbol: string, price: number): Promise<void> {
  await engine.onTick({ symbol, price, timestamp: FIXED_NOW.toISOString() });
}
