import { BrokerGateway } from "./broker/gateway.js";
import { EngineConfig, loadInstruments } from "./config/config.js";
import { PaperVenue } from "./execution/paper_venue.js";
import { ExecutionVenue } from "./execution/venue.js";
import { TradeLogger, buildTradeLogger } from "./logging/trade_logger.js";
import { BarSeriesIndicatorAdapter } from "./market_data/indicator_adapter.js";
import { PositionMonitor, StopAdjustment } from "./monitor/position_monitor.js";
import { OMS } from "./oms/oms.js";
import { Alerter, buildAlerter } from "./ops/alerter.js";
import { CycleOutcome, TradeOrchestrator } from "./orchestrator/trade_orchestrator.js";
import { NoopPersistence, Persistence } from "./persistence/persistence.js";
import { PostgresPersistence } from "./persistence/postgres_persistence.js";
import { RiskEngine } from "./risk/risk_engine.js";
import { InMemoryStore, emptyAccount } from "./storage/store.js";
import { Unsubscribe } from "./broker/broker.js";

export interface Runtime {
  config: EngineConfig;
  logger: TradeLogger;
  persistence: Persistence;
  alerter: Alerter;
  store: InMemoryStore;
  venue: ExecutionVenue;
  gateway: BrokerGateway;
  indicators: BarSeriesIndicatorAdapter;
  risk: RiskEngine;
  orchestrator: TradeOrchestrator;
  positionMonitor: PositionMonitor;
  detach: Unsubscribe[];
}

export interface RuntimeOverrides {
  logger?: TradeLogger;
  persistence?: Persistence;
  alerter?: Alerter;
  venue?: ExecutionVenue;
  now?: () => Date;
}

export interface PassResult {
  outcomes: CycleOutcome[];
  adjustments: StopAdjustment[];
}

export async function createRuntime(
  config: EngineConfig,
  overrides: RuntimeOverrides = {}
): Promise<Runtime> {
  const logger = overrides.logger ?? buildTradeLogger({ logDir: config.logDir, echo: config.logEcho });
  const persistence = overrides.persistence ?? (await buildPersistence(config, logger));
  const alerter = overrides.alerter ?? buildAlerter(persistence, logger);

  const store = new InMemoryStore();
  store.account = emptyAccount(config.accountId, config.paper.currency);
  const venue =
    overrides.venue ??
    new PaperVenue(
      {
        startingBalance: config.paper.startingBalance,
        leverage: config.paper.leverage,
        currency: config.paper.currency,
        instruments: loadInstruments(config.paper.instrumentsFile),
        fillDelayMs: config.paper.fillDelayMs
      },
      logger
    );
  const oms = new OMS(store, persistence, logger);
  const gateway = new BrokerGateway(venue, store, oms, persistence, logger);
  const indicators = new BarSeriesIndicatorAdapter(config.maxBars, config.maMethod);
  const risk = new RiskEngine({
    maxDrawdownPercent: config.maxDrawdownPercent,
    tradingStart: config.tradingStart,
    tradingEnd: config.tradingEnd,
    timeZone: config.timeZone
  });
  const orchestrator = new TradeOrchestrator(
    gateway,
    indicators,
    risk,
    {
      timeframe: config.timeframe,
      riskPercent: config.riskPercent,
      stopLossPips: config.stopLossPips,
      minLot: config.minLot,
      maxLot: config.maxLot,
      maPeriod: config.maPeriod,
      cciPeriod: config.cciPeriod,
      atrPeriod: config.atrPeriod,
      signal: config.signal,
      exit: config.exit
    },
    logger,
    alerter,
    overrides.now
  );
  const positionMonitor = new PositionMonitor(
    gateway,
    indicators,
    { ...config.monitor, timeframe: config.timeframe, atrPeriod: config.atrPeriod },
    logger
  );

  const detach = [
    gateway.onMarketDataUpdate((data) => indicators.pushBar(data)),
    orchestrator.attach()
  ];

  return {
    config,
    logger,
    persistence,
    alerter,
    store,
    venue,
    gateway,
    indicators,
    risk,
    orchestrator,
    positionMonitor,
    detach
  };
}

/** Connects the gateway and subscribes every configured symbol. */
export async function startRuntime(runtime: Runtime): Promise<void> {
  const { config, gateway, logger } = runtime;
  await gateway.connect({ accountId: config.accountId, isDemoAccount: config.isDemoAccount });
  for (const symbol of config.symbols) {
    await gateway.subscribeToMarketData(symbol, config.timeframe);
  }
  const previousStart = await runtime.persistence.loadSystemState("last_start_at");
  if (previousStart) {
    logger.info("ENGINE", `Previous start at ${previousStart}`);
  }
  await runtime.persistence.upsertSystemState("last_start_at", new Date().toISOString());
  logger.info("ENGINE", `Started for ${config.symbols.join(",")} on ${config.timeframe}`);
}

/** Runs one decision cycle per symbol, then one stop-management pass. */
export async function runTradingPass(runtime: Runtime): Promise<PassResult> {
  const { config, logger, orchestrator, positionMonitor } = runtime;
  const outcomes: CycleOutcome[] = [];
  if (config.haltTrading) {
    logger.info("ENGINE", "HALT_TRADING=1, skipping entries");
  } else {
    for (const symbol of config.symbols) {
      const outcome = await orchestrator.runCycle(symbol);
      if (outcome.kind !== "submitted") {
        logger.info(symbol, describeOutcome(outcome));
      }
      outcomes.push(outcome);
    }
  }
  const adjustments = await positionMonitor.evaluateAndAct();
  await recordPass(runtime, outcomes);
  return { outcomes, adjustments };
}

export async function shutdownRuntime(runtime: Runtime): Promise<void> {
  for (const off of runtime.detach) {
    off();
  }
  await runtime.gateway.disconnect();
  await runtime.persistence.close();
  await runtime.logger.flush();
}

export function describeOutcome(outcome: CycleOutcome): string {
  switch (outcome.kind) {
    case "skipped":
      return `Skipped: ${outcome.reason}`;
    case "no_signal":
      return `No signal: ${outcome.reason}`;
    case "sizing_rejected":
      return `Sizing rejected: ${outcome.reason}`;
    case "insufficient_margin":
      return `Insufficient margin: required ${outcome.required.toFixed(2)}, free ${outcome.available.toFixed(2)}`;
    case "submit_failed":
      return `Submit failed: ${outcome.error}`;
    case "submitted":
      return `Submitted ${outcome.direction} ${outcome.lots.toFixed(2)} lots as ${outcome.orderId}`;
  }
}

async function recordPass(runtime: Runtime, outcomes: CycleOutcome[]): Promise<void> {
  try {
    await runtime.persistence.upsertSystemState(
      "last_pass",
      JSON.stringify({
        at: new Date().toISOString(),
        outcomes: outcomes.map((o) => ({ symbol: o.symbol, kind: o.kind }))
      })
    );
  } catch (err) {
    runtime.logger.error("ENGINE", "Failed to record pass state", err);
  }
}

async function buildPersistence(config: EngineConfig, logger: TradeLogger): Promise<Persistence> {
  if (!config.databaseUrl) {
    return new NoopPersistence();
  }
  const pg = new PostgresPersistence(config.databaseUrl);
  try {
    await pg.init();
    return pg;
  } catch (err) {
    if (config.requireDb) {
      throw err;
    }
    logger.error(
      "ENGINE",
      "DB unavailable. Falling back to in-memory persistence. Set REQUIRE_DB=1 to fail hard.",
      err
    );
    await pg.close();
    return new NoopPersistence();
  }
}
