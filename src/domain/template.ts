import type { Channel } from '../types/common';

export const TEMPLATE_STATUSES = ['Draft', 'Active', 'Deprecated'] as const;
export type TemplateStatus = (typeof TEMPLATE_STATUSES)[number];

/**
 * One immutable version of a template. Only `status` ever changes after
 * creation: Draft -> Active -> Deprecated.
 */
export interface NotificationTemplate {
  id: string;
  /** Matches the notification type it renders. */
  name: string;
  channel: Channel;
  subject: string;
  body: string;
  /** Fallback values for placeholders absent from the render data. */
  defaults: Record<string, string>;
  version: number;
  status: TemplateStatus;
  createdAt: Date;
}

export interface RenderedMessage {
  subject: string;
  body: string;
  templateId: string;
  templateVersion: number;
}
