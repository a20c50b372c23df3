import { and, desc, eq, max } from 'drizzle-orm';
import type { Db } from '../db/client';
import { notificationTemplates } from '../db/schema';
import type { DomainEvent } from '../domain/events';
import type { NotificationTemplate } from '../domain/template';
import type { Channel } from '../types/common';
import type { OutboxDal } from './outbox.dal';

export interface NewTemplateVersion {
  id: string;
  name: string;
  channel: Channel;
  subject: string;
  body: string;
  defaults: Record<string, string>;
  createdAt: Date;
}

/**
 * Data Access Layer for versioned templates.
 * Version content is immutable; only `status` is ever updated.
 */
export class TemplateDal {
  constructor(
    private readonly db: Db,
    private readonly outbox: OutboxDal,
  ) {}

  async findActive(name: string, channel: Channel): Promise<NotificationTemplate | null> {
    const row = this.db
      .select()
      .from(notificationTemplates)
      .where(
        and(
          eq(notificationTemplates.name, name),
          eq(notificationTemplates.channel, channel),
          eq(notificationTemplates.status, 'Active'),
        ),
      )
      .get();
    return row ?? null;
  }

  async findVersion(
    name: string,
    channel: Channel,
    version: number,
  ): Promise<NotificationTemplate | null> {
    const row = this.db
      .select()
      .from(notificationTemplates)
      .where(
        and(
          eq(notificationTemplates.name, name),
          eq(notificationTemplates.channel, channel),
          eq(notificationTemplates.version, version),
        ),
      )
      .get();
    return row ?? null;
  }

  /** Newest first. */
  async listVersions(name: string, channel: Channel): Promise<NotificationTemplate[]> {
    return this.db
      .select()
      .from(notificationTemplates)
      .where(and(eq(notificationTemplates.name, name), eq(notificationTemplates.channel, channel)))
      .orderBy(desc(notificationTemplates.version))
      .all();
  }

  /**
   * Stores the next version of (name, channel). When `activate` is set the
   * previous Active version is deprecated in the same transaction.
   * `buildEvents` sees the stored template so events carry its version.
   */
  async insertVersion(
    input: NewTemplateVersion,
    activate: boolean,
    buildEvents: (template: NotificationTemplate) => DomainEvent[],
  ): Promise<NotificationTemplate> {
    return this.db.transaction((tx) => {
      const latest = tx
        .select({ version: max(notificationTemplates.version) })
        .from(notificationTemplates)
        .where(
          and(
            eq(notificationTemplates.name, input.name),
            eq(notificationTemplates.channel, input.channel),
          ),
        )
        .get();

      const template: NotificationTemplate = {
        ...input,
        version: (latest?.version ?? 0) + 1,
        status: activate ? 'Active' : 'Draft',
      };

      if (activate) {
        tx.update(notificationTemplates)
          .set({ status: 'Deprecated' })
          .where(
            and(
              eq(notificationTemplates.name, input.name),
              eq(notificationTemplates.channel, input.channel),
              eq(notificationTemplates.status, 'Active'),
            ),
          )
          .run();
      }
      tx.insert(notificationTemplates).values(template).run();
      this.outbox.append(tx, buildEvents(template));

      return template;
    });
  }

  /** Makes `template` the Active version; the previous Active one is deprecated. */
  async activate(template: NotificationTemplate, events: DomainEvent[]): Promise<NotificationTemplate> {
    this.db.transaction((tx) => {
      tx.update(notificationTemplates)
        .set({ status: 'Deprecated' })
        .where(
          and(
            eq(notificationTemplates.name, template.name),
            eq(notificationTemplates.channel, template.channel),
            eq(notificationTemplates.status, 'Active'),
          ),
        )
        .run();
      tx.update(notificationTemplates)
        .set({ status: 'Active' })
        .where(eq(notificationTemplates.id, template.id))
        .run();
      this.outbox.append(tx, events);
    });

    return { ...template, status: 'Active' };
  }
}
