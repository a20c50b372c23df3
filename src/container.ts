import { dispatchConfig, relayConfig, workerConfig } from './config/dispatch';
import type { DispatchConfig, RelayConfig, WorkerConfig } from './config/dispatch';
import { env } from './config/env';
import { DeliveryLogDal } from './dal/delivery-log.dal';
import { IdempotencyDal } from './dal/idempotency.dal';
import { LeaseDal } from './dal/lease.dal';
import { NotificationRequestDal } from './dal/notification-request.dal';
import { OutboxDal } from './dal/outbox.dal';
import { PreferencesDal } from './dal/preferences.dal';
import { TemplateDal } from './dal/template.dal';
import { openDatabase, type Db } from './db/client';
import {
  LoggingEventBroker,
  StubEmailGateway,
  StubPushGateway,
  StubSmsGateway,
} from './integrations/adapters';
import type { GatewayRegistry } from './integrations/interfaces/channel-gateway';
import type { IEventBroker } from './integrations/interfaces/event-broker';
import { DeliveryLedgerService } from './services/delivery-ledger.service';
import { DispatchService } from './services/dispatch.service';
import { NotificationWorkerService } from './services/notification-worker.service';
import { OutboxRelayService } from './services/outbox-relay.service';
import { PreferencesService } from './services/preferences.service';
import { RequestLifecycleService } from './services/request-lifecycle.service';
import { TemplateService } from './services/template.service';
import { systemClock, type Clock } from './types/common';
import type { Sleep } from './utils/backoff';

export interface ContainerOptions {
  databaseUrl?: string;
  gateways?: GatewayRegistry;
  broker?: IEventBroker;
  clock?: Clock;
  sleep?: Sleep;
  random?: () => number;
  dispatch?: Partial<DispatchConfig>;
  relay?: Partial<RelayConfig>;
  worker?: Partial<WorkerConfig>;
}

/**
 * Everything the HTTP layer and the background loops need, wired once.
 * Tests build their own container against an in-memory database.
 */
export interface Container {
  db: Db;
  close: () => void;
  dals: {
    requests: NotificationRequestDal;
    logs: DeliveryLogDal;
    templates: TemplateDal;
    preferences: PreferencesDal;
    idempotency: IdempotencyDal;
    leases: LeaseDal;
    outbox: OutboxDal;
  };
  gateways: GatewayRegistry;
  broker: IEventBroker;
  templates: TemplateService;
  preferences: PreferencesService;
  ledger: DeliveryLedgerService;
  dispatcher: DispatchService;
  lifecycle: RequestLifecycleService;
  relay: OutboxRelayService;
  worker: NotificationWorkerService;
}

export function defaultGateways(): GatewayRegistry {
  return {
    Email: new StubEmailGateway(),
    SMS: new StubSmsGateway(),
    Push: new StubPushGateway(),
  };
}

export function createContainer(options: ContainerOptions = {}): Container {
  const { db, close } = openDatabase(options.databaseUrl ?? env.DATABASE_URL);
  const clock = options.clock ?? systemClock;
  const config: DispatchConfig = { ...dispatchConfig, ...options.dispatch };

  const outbox = new OutboxDal(db);
  const dals = {
    requests: new NotificationRequestDal(db, outbox),
    logs: new DeliveryLogDal(db, outbox),
    templates: new TemplateDal(db, outbox),
    preferences: new PreferencesDal(db, outbox),
    idempotency: new IdempotencyDal(db),
    leases: new LeaseDal(db),
    outbox,
  };

  const gateways = options.gateways ?? defaultGateways();
  const broker = options.broker ?? new LoggingEventBroker();

  const templates = new TemplateService(dals.templates, { cacheSize: env.TEMPLATE_CACHE_SIZE, clock });
  const preferences = new PreferencesService(dals.preferences, { clock });
  const ledger = new DeliveryLedgerService(dals.logs, { clock });
  const dispatcher = new DispatchService({
    ledger,
    leases: dals.leases,
    requests: dals.requests,
    gateways,
    config,
    clock,
    sleep: options.sleep,
    random: options.random,
  });
  const lifecycle = new RequestLifecycleService({
    requests: dals.requests,
    idempotency: dals.idempotency,
    ledger,
    dispatcher,
    templates,
    preferences,
    config,
    clock,
    sleep: options.sleep,
  });
  const relay = new OutboxRelayService(outbox, broker, { ...relayConfig, ...options.relay }, { clock });
  const worker = new NotificationWorkerService(
    dals.requests,
    lifecycle,
    { ...workerConfig, ...options.worker },
    { clock },
  );

  return {
    db,
    close,
    dals,
    gateways,
    broker,
    templates,
    preferences,
    ledger,
    dispatcher,
    lifecycle,
    relay,
    worker,
  };
}
