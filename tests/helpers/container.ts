import { createContainer, type Container, type ContainerOptions } from '@/container';
import type { GatewayRegistry } from '@/integrations/interfaces/channel-gateway';
import { FakeBroker, FakeClock, FakeGateway, recordingSleep } from './fakes';

export interface TestContext {
  container: Container;
  clock: FakeClock;
  broker: FakeBroker;
  gateways: { Email: FakeGateway; SMS: FakeGateway; Push: FakeGateway };
  delays: number[];
}

/**
 * Container over a fresh in-memory database with fake gateways, a fixed
 * clock, instant sleeps and jitter pinned to zero.
 */
export function createTestContext(
  overrides: Omit<ContainerOptions, 'gateways'> & { gateways?: Partial<TestContext['gateways']> } = {},
): TestContext {
  const clock = new FakeClock();
  const broker = new FakeBroker();
  const { sleep, delays } = recordingSleep();
  const gateways = {
    Email: new FakeGateway('Email'),
    SMS: new FakeGateway('SMS', { supportsDeliveryReceipts: true }),
    Push: new FakeGateway('Push', { supportsDeliveryReceipts: true, supportsReadReceipts: true }),
    ...overrides.gateways,
  };
  const registry: GatewayRegistry = gateways;

  const container = createContainer({
    databaseUrl: ':memory:',
    clock: clock.now,
    broker,
    sleep,
    random: () => 0.5,
    ...overrides,
    gateways: registry,
    dispatch: {
      maxAttempts: 3,
      baseDelayMs: 100,
      maxDelayMs: 1000,
      gatewayTimeoutMs: 1000,
      ...overrides.dispatch,
    },
  });

  return { container, clock, broker, gateways, delays };
}

/** Publishes an Active template for every channel of `name`. */
export async function seedTemplates(
  container: Container,
  name: string,
  body = 'Hello {{ name | there }}, order {{ orderId }} is confirmed.',
): Promise<void> {
  for (const channel of ['Email', 'SMS', 'Push'] as const) {
    await container.templates.publish({
      name,
      channel,
      subject: channel === 'Email' ? 'Order {{ orderId }}' : '',
      body,
    });
  }
}

/** Event types the outbox holds for one aggregate, in write order. */
export async function outboxTypes(container: Container, aggregateId: string): Promise<string[]> {
  const rows = await container.dals.outbox.findByAggregate(aggregateId);
  return rows.map((r) => r.eventType);
}
