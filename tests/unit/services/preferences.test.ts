import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ValidationError } from '@/domain/errors';
import { createTestContext, outboxTypes, type TestContext } from '../../helpers/container';

describe('PreferencesService', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    ctx.container.close();
  });

  it('returns all-enabled defaults for an unknown user', async () => {
    expect(await ctx.container.preferences.get('user-1')).toEqual({
      userId: 'user-1',
      optOuts: [],
      doNotDisturb: null,
      frequencyLimits: {},
      version: 0,
      updatedAt: new Date('2026-03-02T12:00:00.000Z'),
    });
  });

  it('merges only the fields a patch names and bumps the version', async () => {
    const { preferences } = ctx.container;
    await preferences.update('user-1', { optOuts: [{ type: 'Marketing', channel: 'SMS' }] });
    const updated = await preferences.update('user-1', {
      doNotDisturb: { start: '22:00', end: '07:00' },
    });

    expect(updated.version).toBe(2);
    expect(updated.optOuts).toEqual([{ type: 'Marketing', channel: 'SMS' }]);
    expect(updated.doNotDisturb).toEqual({ start: '22:00', end: '07:00', utcOffsetMinutes: 0 });
    expect(await preferences.get('user-1')).toEqual(updated);
    expect(await outboxTypes(ctx.container, 'user-1')).toEqual([
      'UserNotificationPreferencesUpdatedEvent',
      'UserNotificationPreferencesUpdatedEvent',
    ]);
  });

  it('clears the quiet hours with null', async () => {
    const { preferences } = ctx.container;
    await preferences.update('user-1', { doNotDisturb: { start: '22:00', end: '07:00' } });
    const cleared = await preferences.update('user-1', { doNotDisturb: null });

    expect(cleared.doNotDisturb).toBeNull();
  });

  it('rejects malformed windows', async () => {
    await expect(
      ctx.container.preferences.update('user-1', { doNotDisturb: { start: '25:00', end: '07:00' } }),
    ).rejects.toThrow(ValidationError);
  });
});
