import { phoneNumberSchema } from '../validation';
import { StubChannelGateway } from './stub-gateway';

/** Stub SMS provider. Carrier delivery reports arrive via /delivery-receipts. */
export class StubSmsGateway extends StubChannelGateway {
  readonly adapterName = 'StubSms';
  readonly channel = 'SMS';
  readonly supportsDeliveryReceipts = true;
  readonly supportsReadReceipts = false;

  protected readonly addressSchema = phoneNumberSchema;
  protected readonly idPrefix = 'stub-sms';
}
