import { emailAddressSchema } from '../validation';
import { StubChannelGateway } from './stub-gateway';

/** Stub email provider. Accepted mail counts as delivered; no callbacks. */
export class StubEmailGateway extends StubChannelGateway {
  readonly adapterName = 'StubEmail';
  readonly channel = 'Email';
  readonly supportsDeliveryReceipts = false;
  readonly supportsReadReceipts = false;

  protected readonly addressSchema = emailAddressSchema;
  protected readonly idPrefix = 'stub-email';
}
