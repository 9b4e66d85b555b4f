import cron from 'node-cron';

export interface SchedulerConfig {
  enabled: boolean;
  reminderCron: string;
  renewalCron: string;
  upcomingRenewalDays: number;
}

export const DEFAULT_REMINDER_CRON = '0 9 * * *';
export const DEFAULT_RENEWAL_CRON = '0 * * * *';
export const DEFAULT_UPCOMING_RENEWAL_DAYS = 30;

/**
 * Load scheduler settings from environment variables.
 * Re-reads on each call so tests and restarts pick up env changes.
 */
export function loadSchedulerConfig(): SchedulerConfig {
  return {
    enabled: parseEnvBoolean(process.env.SCHEDULER_ENABLED, true),
    reminderCron: parseCronExpression('REMINDER_CRON', process.env.REMINDER_CRON, DEFAULT_REMINDER_CRON),
    renewalCron: parseCronExpression('RENEWAL_CRON', process.env.RENEWAL_CRON, DEFAULT_RENEWAL_CRON),
    upcomingRenewalDays: parseEnvInt(process.env.UPCOMING_RENEWAL_DAYS) ?? DEFAULT_UPCOMING_RENEWAL_DAYS,
  };
}

function parseCronExpression(name: string, value: string | undefined, fallback: string): string {
  if (value === undefined || value.trim() === '') return fallback;

  const expression = value.trim();
  if (!cron.validate(expression)) {
    throw new Error(`Invalid ${name} value "${expression}". Must be a valid cron expression.`);
  }
  return expression;
}

function parseEnvBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

function parseEnvInt(value: string | undefined): number | null {
  if (value === undefined || value === '') return null;
  const num = parseInt(value, 10);
  if (!Number.isFinite(num) || num < 1) return null;
  return num;
}
