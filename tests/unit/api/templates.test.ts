import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '@/app';
import type { NotificationTemplate } from '@/domain/template';
import { createTestContext, type TestContext } from '../../helpers/container';

describe('template routes', () => {
  let ctx: TestContext;
  let app: FastifyInstance;

  beforeEach(async () => {
    ctx = createTestContext();
    app = buildApp(ctx.container);
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
    ctx.container.close();
  });

  function publish(payload: Record<string, unknown>) {
    return app.inject({ method: 'POST', url: '/templates', payload });
  }

  it('POST /templates publishes an Active version', async () => {
    const res = await publish({ name: 'Welcome', channel: 'Email', subject: 'Hi', body: 'Hello {{ name }}' });

    expect(res.statusCode).toBe(201);
    const { template } = res.json<{ template: NotificationTemplate }>();
    expect(template.version).toBe(1);
    expect(template.status).toBe('Active');
  });

  it('POST /templates rejects an unknown channel', async () => {
    const res = await publish({ name: 'Welcome', channel: 'Fax', body: 'Hello' });
    expect(res.statusCode).toBe(400);
  });

  it('GET /templates/:name/:channel returns the Active version', async () => {
    await publish({ name: 'Welcome', channel: 'SMS', body: 'one' });
    await publish({ name: 'Welcome', channel: 'SMS', body: 'two' });

    const res = await app.inject({ method: 'GET', url: '/templates/Welcome/SMS' });

    expect(res.statusCode).toBe(200);
    expect(res.json<{ template: NotificationTemplate }>().template.body).toBe('two');
  });

  it('GET /templates/:name/:channel answers 422 when nothing is Active', async () => {
    const res = await app.inject({ method: 'GET', url: '/templates/Welcome/Push' });

    expect(res.statusCode).toBe(422);
    expect(res.json<{ error: string }>().error).toBe('template_not_found');
  });

  it('lists versions newest first and activates a Draft', async () => {
    await publish({ name: 'Welcome', channel: 'Email', body: 'one' });
    await publish({ name: 'Welcome', channel: 'Email', body: 'two', activate: false });

    const activated = await app.inject({
      method: 'POST',
      url: '/templates/Welcome/Email/versions/2/activate',
    });
    expect(activated.statusCode).toBe(200);

    const res = await app.inject({ method: 'GET', url: '/templates/Welcome/Email/versions' });
    const { versions } = res.json<{ versions: NotificationTemplate[] }>();
    expect(versions.map((v) => [v.version, v.status])).toEqual([
      [2, 'Active'],
      [1, 'Deprecated'],
    ]);
  });

  it('answers 409 when activating a version that is not a Draft', async () => {
    await publish({ name: 'Welcome', channel: 'Email', body: 'one' });

    const res = await app.inject({ method: 'POST', url: '/templates/Welcome/Email/versions/1/activate' });

    expect(res.statusCode).toBe(409);
  });
});
