import { logger } from '../../config/logger';
import type { IEventBroker, PublishedEvent } from '../interfaces/event-broker';

type Subscriber = (event: PublishedEvent) => void | Promise<void>;

/**
 * In-process broker. Logs every event and fans it out to local subscribers;
 * a subscriber that throws fails the publish so the relay retries the row.
 */
export class LoggingEventBroker implements IEventBroker {
  readonly brokerName = 'LoggingBroker';

  private readonly subscribers: Subscriber[] = [];

  subscribe(subscriber: Subscriber): () => void {
    this.subscribers.push(subscriber);
    return () => {
      const index = this.subscribers.indexOf(subscriber);
      if (index >= 0) this.subscribers.splice(index, 1);
    };
  }

  async publish(event: PublishedEvent): Promise<void> {
    logger.info(
      {
        eventId: event.id,
        type: event.type,
        aggregateId: event.aggregateId,
        correlationId: event.correlationId,
      },
      'event.published',
    );
    for (const subscriber of this.subscribers) {
      await subscriber(event);
    }
  }
}
