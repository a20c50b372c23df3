import { z } from 'zod';

/**
 * Delivery channels, in the spelling used on the wire and in storage.
 */
export const CHANNELS = ['Email', 'SMS', 'Push'] as const;
export type Channel = (typeof CHANNELS)[number];
export const channelSchema = z.enum(CHANNELS);

export const URGENCIES = ['High', 'Medium', 'Low'] as const;
export type Urgency = (typeof URGENCIES)[number];
export const urgencySchema = z.enum(URGENCIES);

/**
 * Zod schema for entity IDs (requestId, userId, logId, templateId, etc.).
 */
export const entityIdSchema = z
  .string()
  .min(1, 'ID must not be empty')
  .max(128, 'ID too long');

/**
 * Source of "now". Services take one so tests can pin time.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Standard API error response shape.
 */
export interface ApiError {
  error: string;
  message?: string;
}
