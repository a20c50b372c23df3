import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  InvalidStateTransitionError,
  MissingPlaceholderError,
  TemplateNotFoundError,
  ValidationError,
} from '@/domain/errors';
import type { NotificationTemplate } from '@/domain/template';
import { renderTemplate } from '@/services/template.service';
import { createTestContext, outboxTypes, type TestContext } from '../../helpers/container';

function template(patch: Partial<NotificationTemplate> = {}): NotificationTemplate {
  return {
    id: 'tpl-1',
    name: 'OrderShipped',
    channel: 'Email',
    subject: 'Order {{ order.id }}',
    body: 'Hi {{ name }}, your order {{ order.id }} ships {{ when | soon }}.',
    defaults: {},
    version: 1,
    status: 'Active',
    createdAt: new Date('2026-03-01T00:00:00.000Z'),
    ...patch,
  };
}

describe('renderTemplate', () => {
  it('fills placeholders, dotted paths and inline fallbacks', () => {
    expect(renderTemplate(template(), { name: 'Ana', order: { id: 'A-1' } })).toEqual({
      subject: 'Order A-1',
      body: 'Hi Ana, your order A-1 ships soon.',
      templateId: 'tpl-1',
      templateVersion: 1,
    });
  });

  it('prefers data over the fallback', () => {
    const message = renderTemplate(template(), { name: 'Ana', order: { id: 'A-1' }, when: 'today' });
    expect(message.body).toBe('Hi Ana, your order A-1 ships today.');
  });

  it('uses template defaults for absent keys', () => {
    const message = renderTemplate(template({ defaults: { name: 'there' } }), { order: { id: 'A-1' } });
    expect(message.body).toBe('Hi there, your order A-1 ships soon.');
  });

  it('formats numbers and serializes objects', () => {
    const message = renderTemplate(template({ body: '{{ total }} for {{ items }}' }), {
      total: 12.5,
      items: ['cup', 'pot'],
      order: { id: 'A-1' },
    });
    expect(message.body).toBe('12.5 for ["cup","pot"]');
  });

  it('throws MissingPlaceholderError naming the key', () => {
    const render = () => renderTemplate(template(), { name: 'Ana' });
    expect(render).toThrow(MissingPlaceholderError);
    expect(render).toThrow("Template 'OrderShipped' references '{{order.id}}' but no value or default was given");
  });

  it('does not resolve placeholders through inherited properties', () => {
    const render = () => renderTemplate(template({ body: 'Hi {{ constructor }}' }), { order: { id: 'A-1' } });
    expect(render).toThrow("Template 'OrderShipped' references '{{constructor}}' but no value or default was given");

    const nested = () => renderTemplate(template({ body: '{{ order.toString }}' }), { order: { id: 'A-1' } });
    expect(nested).toThrow(MissingPlaceholderError);
  });

  it('is deterministic', () => {
    const data = { name: 'Ana', order: { id: 'A-1' } };
    expect(renderTemplate(template(), data)).toEqual(renderTemplate(template(), data));
  });
});

describe('TemplateService', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    ctx.container.close();
  });

  it('publishes version 1 as Active and emits a version-created event', async () => {
    const { templates } = ctx.container;
    const v1 = await templates.publish({ name: 'Welcome', channel: 'Email', subject: 'Hi', body: 'Hello {{ name }}' });

    expect(v1.version).toBe(1);
    expect(v1.status).toBe('Active');
    expect(v1.defaults).toEqual({});
    expect(await outboxTypes(ctx.container, v1.id)).toEqual(['NotificationTemplateVersionCreatedEvent']);
    expect((await templates.resolve('Welcome', 'Email')).id).toBe(v1.id);
  });

  it('deprecates the previous Active version when a new one is published', async () => {
    const { templates } = ctx.container;
    await templates.publish({ name: 'Welcome', channel: 'Email', body: 'v1 {{ name }}' });
    await templates.publish({ name: 'Welcome', channel: 'Email', body: 'v2 {{ name }}' });

    const versions = await templates.listVersions('Welcome', 'Email');
    expect(versions.map((v) => [v.version, v.status])).toEqual([
      [2, 'Active'],
      [1, 'Deprecated'],
    ]);
    expect((await templates.resolve('Welcome', 'Email')).body).toBe('v2 {{ name }}');
  });

  it('keeps versions per channel independent', async () => {
    const { templates } = ctx.container;
    await templates.publish({ name: 'Welcome', channel: 'Email', body: 'mail' });
    const sms = await templates.publish({ name: 'Welcome', channel: 'SMS', body: 'text' });

    expect(sms.version).toBe(1);
    expect((await templates.resolve('Welcome', 'Email')).body).toBe('mail');
  });

  it('renders a pinned version exactly as before a newer version was published', async () => {
    const { templates } = ctx.container;
    const data = { name: 'Ana' };
    const v1 = await templates.publish({ name: 'Welcome', channel: 'Email', body: 'Hello {{ name }}' });
    const before = templates.render(await templates.resolve('Welcome', 'Email'), data);

    await templates.publish({ name: 'Welcome', channel: 'Email', body: 'Hey {{ name }}!' });
    const pinned = templates.render(await templates.getVersion('Welcome', 'Email', v1.version), data);

    expect(pinned).toEqual(before);
    expect(templates.render(await templates.resolve('Welcome', 'Email'), data).body).toBe('Hey Ana!');
  });

  it('stores a Draft without touching the Active version, then activates it', async () => {
    const { templates } = ctx.container;
    await templates.publish({ name: 'Welcome', channel: 'Email', body: 'v1' });
    const draft = await templates.publish({ name: 'Welcome', channel: 'Email', body: 'v2', activate: false });

    expect(draft.status).toBe('Draft');
    expect((await templates.resolve('Welcome', 'Email')).version).toBe(1);

    const activated = await templates.activate('Welcome', 'Email', 2);
    expect(activated.status).toBe('Active');
    expect((await templates.resolve('Welcome', 'Email')).version).toBe(2);
    expect((await templates.listVersions('Welcome', 'Email')).map((v) => v.status)).toEqual([
      'Active',
      'Deprecated',
    ]);
    expect(await outboxTypes(ctx.container, draft.id)).toEqual([
      'NotificationTemplateVersionCreatedEvent',
      'NotificationTemplateVersionCreatedEvent',
    ]);
  });

  it('refuses to activate anything but a Draft', async () => {
    const { templates } = ctx.container;
    await templates.publish({ name: 'Welcome', channel: 'Email', body: 'v1' });

    await expect(templates.activate('Welcome', 'Email', 1)).rejects.toThrow(InvalidStateTransitionError);
    await expect(templates.activate('Welcome', 'Email', 7)).rejects.toThrow(TemplateNotFoundError);
  });

  it('throws TemplateNotFoundError when nothing is Active', async () => {
    await expect(ctx.container.templates.resolve('Unknown', 'Push')).rejects.toThrow(
      "No active template 'Unknown' for channel Push",
    );
  });

  it('rejects an invalid template', async () => {
    await expect(
      ctx.container.templates.publish({ name: 'Welcome', channel: 'Email', body: '' }),
    ).rejects.toThrow(ValidationError);
  });

  it('serves the Active version from cache until a publish evicts it', async () => {
    const { templates, dals } = ctx.container;
    await templates.publish({ name: 'Welcome', channel: 'Email', body: 'v1' });
    const findActive = vi.spyOn(dals.templates, 'findActive');

    await templates.resolve('Welcome', 'Email');
    await templates.resolve('Welcome', 'Email');
    expect(findActive).toHaveBeenCalledTimes(1);

    await templates.publish({ name: 'Welcome', channel: 'Email', body: 'v2' });
    expect((await templates.resolve('Welcome', 'Email')).body).toBe('v2');
    expect(findActive).toHaveBeenCalledTimes(2);
  });
});
