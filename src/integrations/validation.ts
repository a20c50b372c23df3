/**
 * Zod schemas for validating payloads that enter the service.
 * Every inbound command and provider callback goes through these schemas.
 */
import { z } from 'zod';
import { channelSchema, entityIdSchema, urgencySchema, type Channel } from '../types/common';

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

const isoDateTimeField = z
  .string()
  .datetime({ offset: true, message: 'Must be an ISO-8601 date-time' })
  .transform((value) => new Date(value));
const timeField = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Must be HH:mm');

// ---------------------------------------------------------------------------
// Addresses
// ---------------------------------------------------------------------------

export const emailAddressSchema = z.string().email('Must be a valid email address');
export const phoneNumberSchema = z.string().regex(/^\+[1-9]\d{6,14}$/, 'Must be E.164, e.g. +15551234567');
export const pushTokenSchema = z.string().min(8, 'Push token too short').max(4096);

// ---------------------------------------------------------------------------
// Notifications
// ---------------------------------------------------------------------------

export const recipientSchema = z
  .object({
    userId: entityIdSchema,
    email: emailAddressSchema.optional(),
    phone: phoneNumberSchema.optional(),
    pushToken: pushTokenSchema.optional(),
  })
  .transform((r) => {
    const addresses: Partial<Record<Channel, string>> = {};
    if (r.email !== undefined) addresses.Email = r.email;
    if (r.phone !== undefined) addresses.SMS = r.phone;
    if (r.pushToken !== undefined) addresses.Push = r.pushToken;
    return { id: r.userId, addresses };
  });

export const createNotificationSchema = z.object({
  type: z.string().min(1, 'type is required').max(128),
  payload: z
    .record(z.unknown())
    .refine((p) => Object.keys(p).length > 0, 'payload must not be empty'),
  recipients: z.array(recipientSchema).min(1, 'at least one recipient is required'),
  channelPreferences: z
    .array(channelSchema)
    .min(1, 'at least one channel is required')
    .refine((c) => new Set(c).size === c.length, 'channels must not repeat'),
  urgency: urgencySchema.default('Medium'),
  scheduledAt: isoDateTimeField.optional(),
  correlationId: z.string().min(1).max(128).optional(),
  dedupKey: z.string().min(1, 'dedupKey is required').max(256),
});

export type CreateNotificationInput = z.input<typeof createNotificationSchema>;

// ---------------------------------------------------------------------------
// Provider callbacks
// ---------------------------------------------------------------------------

export const deliveryReceiptSchema = z.object({
  providerMessageId: z.string().min(1),
  status: z.enum(['Delivered', 'Read', 'Failed']),
  reason: z.string().max(1024).optional(),
  occurredAt: isoDateTimeField.optional(),
});

export type DeliveryReceiptInput = z.input<typeof deliveryReceiptSchema>;

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

export const publishTemplateSchema = z.object({
  name: z.string().min(1).max(128),
  channel: channelSchema,
  subject: z.string().max(998).default(''),
  body: z.string().min(1, 'body is required'),
  defaults: z.record(z.string()).default({}),
  /** false stores a Draft that must be activated separately. */
  activate: z.boolean().default(true),
});

export type PublishTemplateInput = z.input<typeof publishTemplateSchema>;

// ---------------------------------------------------------------------------
// Preferences
// ---------------------------------------------------------------------------

export const doNotDisturbSchema = z.object({
  start: timeField,
  end: timeField,
  utcOffsetMinutes: z.number().int().min(-14 * 60).max(14 * 60).default(0),
});

export const frequencyLimitSchema = z.object({
  max: z.number().int().positive(),
  windowMinutes: z.number().int().positive(),
});

export const preferencesPatchSchema = z
  .object({
    optOuts: z.array(z.object({ type: z.string().min(1), channel: channelSchema })),
    doNotDisturb: doNotDisturbSchema.nullable(),
    frequencyLimits: z.record(frequencyLimitSchema),
  })
  .partial();

export type PreferencesPatchInput = z.input<typeof preferencesPatchSchema>;
