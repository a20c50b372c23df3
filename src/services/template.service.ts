import { LRUCache } from 'lru-cache';
import { v4 as uuid } from 'uuid';
import { logger } from '../config/logger';
import type { TemplateDal } from '../dal/template.dal';
import {
  InvalidStateTransitionError,
  MissingPlaceholderError,
  TemplateNotFoundError,
  ValidationError,
} from '../domain/errors';
import { createEvent, type DomainEvent } from '../domain/events';
import type { NotificationTemplate, RenderedMessage } from '../domain/template';
import { publishTemplateSchema, type PublishTemplateInput } from '../integrations/validation';
import { startTimer } from '../telemetry/timing';
import { systemClock, type Channel, type Clock } from '../types/common';

// {{ key }}, {{ order.id }}, {{ name | there }}
const PLACEHOLDER = /\{\{\s*([A-Za-z0-9_.-]+)\s*(?:\|\s*([^}]*?)\s*)?\}\}/g;

function lookup(data: Record<string, unknown>, path: string): unknown {
  let current: unknown = data;
  for (const segment of path.split('.')) {
    if (current === null || typeof current !== 'object' || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}

function stringify(value: unknown): string {
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

function fill(text: string, template: NotificationTemplate, data: Record<string, unknown>): string {
  return text.replace(PLACEHOLDER, (_match, key: string, inlineDefault: string | undefined) => {
    const value = lookup(data, key);
    if (value !== undefined && value !== null) return stringify(value);
    if (inlineDefault !== undefined) return inlineDefault;

    const fallback = Object.hasOwn(template.defaults, key) ? template.defaults[key] : undefined;
    if (fallback !== undefined) return fallback;

    throw new MissingPlaceholderError(key, template.name);
  });
}

/**
 * Renders subject and body. Pure: the same template and data always give
 * the same message.
 */
export function renderTemplate(
  template: NotificationTemplate,
  data: Record<string, unknown>,
): RenderedMessage {
  return {
    subject: fill(template.subject, template, data),
    body: fill(template.body, template, data),
    templateId: template.id,
    templateVersion: template.version,
  };
}

function activeKey(name: string, channel: Channel): string {
  return `active:${name}:${channel}`;
}

function versionKey(name: string, channel: Channel, version: number): string {
  return `v${version}:${name}:${channel}`;
}

function versionCreatedEvent(template: NotificationTemplate, at: Date): DomainEvent {
  return createEvent(
    'NotificationTemplateVersionCreatedEvent',
    { type: 'NotificationTemplate', id: template.id },
    {
      name: template.name,
      channel: template.channel,
      version: template.version,
      status: template.status,
    },
    at,
  );
}

export interface TemplateServiceOptions {
  cacheSize?: number;
  clock?: Clock;
}

/**
 * Resolves, renders and versions templates.
 * Active templates are cached per (name, channel) until a publish or activate
 * for that pair evicts them. Version content never changes, so looked-up
 * versions are cached for good.
 */
export class TemplateService {
  private readonly cache: LRUCache<string, NotificationTemplate>;
  private readonly clock: Clock;

  constructor(
    private readonly templates: TemplateDal,
    options: TemplateServiceOptions = {},
  ) {
    this.cache = new LRUCache({ max: options.cacheSize ?? 500 });
    this.clock = options.clock ?? systemClock;
  }

  /** The Active template for (type, channel). */
  async resolve(type: string, channel: Channel): Promise<NotificationTemplate> {
    const key = activeKey(type, channel);
    const cached = this.cache.get(key);
    if (cached) return cached;

    const template = await this.templates.findActive(type, channel);
    if (!template) throw new TemplateNotFoundError(type, channel);

    this.cache.set(key, template);
    return template;
  }

  async getVersion(name: string, channel: Channel, version: number): Promise<NotificationTemplate> {
    const key = versionKey(name, channel, version);
    const cached = this.cache.get(key);
    if (cached) return cached;

    const template = await this.templates.findVersion(name, channel, version);
    if (!template) throw new TemplateNotFoundError(name, channel, version);

    this.cache.set(key, template);
    return template;
  }

  async listVersions(name: string, channel: Channel): Promise<NotificationTemplate[]> {
    return this.templates.listVersions(name, channel);
  }

  render(template: NotificationTemplate, data: Record<string, unknown>): RenderedMessage {
    return renderTemplate(template, data);
  }

  /**
   * Stores a new version of (name, channel). By default it becomes Active and
   * the previous Active version is deprecated; `activate: false` stores a Draft.
   */
  async publish(input: PublishTemplateInput): Promise<NotificationTemplate> {
    const parsed = publishTemplateSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid template',
        parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      );
    }

    const timer = startTimer('service.template.publish');
    const { activate, ...content } = parsed.data;
    const now = this.clock();

    try {
      const template = await this.templates.insertVersion(
        { ...content, id: uuid(), createdAt: now },
        activate,
        (stored) => [versionCreatedEvent(stored, now)],
      );

      if (activate) this.cache.delete(activeKey(template.name, template.channel));

      logger.info(
        {
          templateId: template.id,
          name: template.name,
          channel: template.channel,
          version: template.version,
          status: template.status,
        },
        'Template version created',
      );
      return template;
    } finally {
      timer.stop();
    }
  }

  /** Draft -> Active. The previous Active version becomes Deprecated. */
  async activate(name: string, channel: Channel, version: number): Promise<NotificationTemplate> {
    const template = await this.templates.findVersion(name, channel, version);
    if (!template) throw new TemplateNotFoundError(name, channel, version);
    if (template.status !== 'Draft') {
      throw new InvalidStateTransitionError('NotificationTemplate', template.status, 'Active');
    }

    const activated = await this.templates.activate(template, [
      versionCreatedEvent({ ...template, status: 'Active' }, this.clock()),
    ]);
    this.cache.delete(activeKey(name, channel));
    return activated;
  }
}
