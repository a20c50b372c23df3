import { v4 as uuid } from 'uuid';
import type { z } from 'zod';
import { logger } from '../../config/logger';
import { PermanentGatewayError } from '../../domain/errors';
import type { Channel } from '../../types/common';
import type {
  GatewayResult,
  IChannelGateway,
  OutboundMessage,
} from '../interfaces/channel-gateway';

export interface StubSentMessage {
  address: string;
  message: OutboundMessage;
  providerMessageId: string;
}

/**
 * Shared behaviour of the stub providers: validate the address, record the
 * message in memory and hand back a provider message id.
 * A malformed address is a permanent failure, exactly as a real provider
 * rejecting it would be.
 */
export abstract class StubChannelGateway implements IChannelGateway {
  abstract readonly adapterName: string;
  abstract readonly channel: Channel;
  abstract readonly supportsDeliveryReceipts: boolean;
  abstract readonly supportsReadReceipts: boolean;

  readonly sent: StubSentMessage[] = [];

  protected abstract readonly addressSchema: z.ZodType<string>;
  protected abstract readonly idPrefix: string;

  async send(message: OutboundMessage, address: string): Promise<GatewayResult> {
    const parsed = this.addressSchema.safeParse(address);
    if (!parsed.success) {
      const reason = parsed.error.issues[0]?.message ?? 'invalid address';
      throw new PermanentGatewayError(`${this.adapterName} rejected address: ${reason}`);
    }

    const providerMessageId = `${this.idPrefix}-${uuid().slice(0, 8)}`;
    this.sent.push({ address: parsed.data, message, providerMessageId });

    logger.info(
      {
        adapter: this.adapterName,
        requestId: message.requestId,
        recipientId: message.recipientId,
        providerMessageId,
      },
      'stub.gateway.sent',
    );

    return { providerMessageId };
  }
}
