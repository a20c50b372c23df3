import { pushTokenSchema } from '../validation';
import { StubChannelGateway } from './stub-gateway';

export class StubPushGateway extends StubChannelGateway {
  readonly adapterName = 'StubPush';
  readonly channel = 'Push';
  readonly supportsDeliveryReceipts = true;
  readonly supportsReadReceipts = true;

  protected readonly addressSchema = pushTokenSchema;
  protected readonly idPrefix = 'stub-push';
}
