import { NotificationRule, daysBeforeFor } from '../src/domain/notification-rule';

describe('NotificationRule', () => {
  const renewal = new Date('2026-01-31T00:00:00.000Z');

  it('should map each timing to a day count', () => {
    expect(daysBeforeFor('1_day')).toBe(1);
    expect(daysBeforeFor('3_days')).toBe(3);
    expect(daysBeforeFor('1_week')).toBe(7);
    expect(daysBeforeFor('2_weeks')).toBe(14);
  });

  it('should be enabled on creation', () => {
    const rule = NotificationRule.create('1_week');
    expect(rule.isEnabled).toBe(true);
    expect(rule.daysBefore()).toBe(7);
    expect(rule.id).toEqual(expect.any(String));
  });

  it('should fire when exactly the configured number of whole days remain', () => {
    const rule = NotificationRule.create('1_week');
    expect(rule.shouldNotify(renewal, new Date('2026-01-24T00:00:00.000Z'))).toBe(true);
    expect(rule.shouldNotify(renewal, new Date('2026-01-23T18:30:00.000Z'))).toBe(true);
    expect(rule.shouldNotify(renewal, new Date('2026-01-24T18:30:00.000Z'))).toBe(false);
  });

  it('should not fire on neighbouring days', () => {
    const rule = NotificationRule.create('1_week');
    expect(rule.shouldNotify(renewal, new Date('2026-01-23T00:00:00.000Z'))).toBe(false);
    expect(rule.shouldNotify(renewal, new Date('2026-01-25T00:00:00.000Z'))).toBe(false);
  });

  it('should never fire when disabled', () => {
    const rule = NotificationRule.create('1_day').withEnabled(false);
    expect(rule.shouldNotify(renewal, new Date('2026-01-30T00:00:00.000Z'))).toBe(false);
  });

  it('should keep id and timing when toggled', () => {
    const rule = NotificationRule.create('3_days');
    const disabled = rule.withEnabled(false);
    expect(disabled).not.toBe(rule);
    expect(disabled.toJSON()).toEqual({ id: rule.id, timing: '3_days', isEnabled: false });
    expect(rule.isEnabled).toBe(true);
  });
});
