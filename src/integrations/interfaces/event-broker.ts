/**
 * Interface for the message broker outbox rows are relayed to.
 * Delivery is at least once; subscribers dedupe on `id`.
 */
export interface PublishedEvent {
  id: string;
  type: string;
  aggregateType: string;
  aggregateId: string;
  correlationId: string | null;
  occurredAt: string;
  payload: Record<string, unknown>;
}

export interface IEventBroker {
  readonly brokerName: string;

  /** Resolves once the broker has accepted the event. */
  publish(event: PublishedEvent): Promise<void>;
}
